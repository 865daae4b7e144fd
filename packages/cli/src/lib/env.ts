/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";
import { InvalidArgumentError } from "commander";
import { parseNonNegativeInt } from "./arg.js";

/**
 * Expand tilde (~) to home directory
 */
function expandTilde(input: string): string {
  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~[\\/](.*)/);
  if (!match) {
    return input;
  }

  return path.join(homedir(), match[1] ?? "");
}

/**
 * Resolve the declaration file
 * Priority: --spec option > ARGSPEC_SPEC env var
 * @throws InvalidArgumentError when neither is set
 */
export function resolveSpecPath(cliSpec?: string): string {
  const spec = cliSpec ?? process.env.ARGSPEC_SPEC;
  if (!spec) {
    throw new InvalidArgumentError("No declaration file given. Use --spec <file> or set ARGSPEC_SPEC");
  }
  return path.resolve(expandTilde(spec));
}

/**
 * Resolve the help wrap width
 * Priority: --width option > ARGSPEC_HELP_WIDTH env var > no wrapping
 */
export function resolveHelpWidth(cliWidth?: number): number | undefined {
  if (cliWidth !== undefined) {
    return cliWidth;
  }
  const env = process.env.ARGSPEC_HELP_WIDTH;
  return env ? parseNonNegativeInt(env, "ARGSPEC_HELP_WIDTH") : undefined;
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(): boolean {
  return process.env.ARGSPEC_CLI_DEBUG === "1";
}
