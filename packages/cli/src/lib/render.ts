/**
 * Output rendering helpers
 */

import type { Output } from "./io.js";

type Color = "red" | "green" | "yellow";

const CODES: Record<Color, string> = {
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
};

/**
 * Print JSON to stdout
 * @param options - `raw` prints a single line
 */
export function printJson(output: Output, data: unknown, options?: { raw?: boolean }): void {
  const json = options?.raw ? JSON.stringify(data) : JSON.stringify(data, null, 2);
  output.stdout(`${json}\n`);
}

/**
 * Print lines to stdout (one per line)
 */
export function printLines(output: Output, lines: string[]): void {
  for (const line of lines) output.stdout(`${line}\n`);
}

/**
 * Apply an ANSI color when enabled
 */
export function colorize(text: string, color: Color, enabled: boolean): string {
  if (!enabled) {
    return text;
  }
  return `${CODES[color]}${text}\x1b[0m`;
}
