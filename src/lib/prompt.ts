/**
 * Terminal prompts
 */

import { createInterface } from "node:readline/promises";

/**
 * Ask a yes/no question on the terminal; anything but y/yes is a no
 */
export async function confirm(question: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(`${question} [y/N] `);
    return /^y(es)?$/i.test(answer.trim());
  } finally {
    rl.close();
  }
}
