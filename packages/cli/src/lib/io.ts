/**
 * I/O for the driver
 *
 * Commands write through an Output so tests can run the program in process.
 */

import * as fs from "node:fs/promises";
import { parseJson } from "./arg.js";

export interface Output {
  stdout(text: string): void;
  stderr(text: string): void;
  /** Whether stderr accepts ANSI colors */
  colors: boolean;
}

/**
 * Output bound to the process streams
 */
export const processOutput: Output = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
  colors: process.stderr.isTTY ?? false,
};

/**
 * Read JSON from a file
 */
export async function readJsonFromFile(filePath: string): Promise<unknown> {
  const content = await fs.readFile(filePath, "utf8");
  return parseJson(content, `file ${filePath}`);
}
