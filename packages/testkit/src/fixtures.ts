/**
 * Declaration fixtures shared by driver tests
 */

import { fileURLToPath } from "node:url";

export type FixtureName = "app" | "git" | "invalid-schema" | "duplicate-long";

/**
 * Absolute path of a fixture declaration file
 */
export function fixturePath(name: FixtureName): string {
  return fileURLToPath(new URL(`../fixtures/${name}.json`, import.meta.url));
}
