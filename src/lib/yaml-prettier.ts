/**
 * YAML formatting with Prettier
 */

import * as prettier from "prettier";
import { stringify as stringifyYaml } from "yaml";

/**
 * Convert a plain object to formatted YAML string
 */
export async function formatYaml(data: Record<string, unknown>): Promise<string> {
  const yaml = stringifyYaml(data);

  return await prettier.format(yaml, {
    parser: "yaml",
    printWidth: 80,
  });
}
