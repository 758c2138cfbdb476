/**
 * Filesystem utilities
 */

import { stat } from "node:fs/promises";

/**
 * Check if a file or directory exists
 */
export async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}
