/**
 * CLI error handling and exit code mapping
 */

import { ConfigError, ParseError } from "@argspec/core";

/**
 * Base CLI error class
 */
export class CliError extends Error {
  exitCode: number;

  constructor(message: string, options?: { exitCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? 1;
  }
}

/**
 * Map errors to CLI exit codes
 * - 0: success, or help was requested
 * - 1: parse failure, usage error or unknown error
 * - 2: invalid declaration file
 */
export function mapErrorToExitCode(error: unknown): number {
  // CliError carries its own code
  if (error instanceof CliError) {
    return error.exitCode;
  }

  if (error instanceof ConfigError) {
    return 2;
  }

  if (error instanceof ParseError) {
    return 1;
  }

  return 1;
}

/**
 * Format an error for CLI output
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (error instanceof Error) {
    let message = error.message;

    // Redact large payloads from error messages
    if (message.length > 2000) {
      message = message.substring(0, 2000) + "... (truncated)";
    }

    if (verbose && error.cause !== undefined) {
      message += `\n  Cause: ${error.cause instanceof Error ? error.cause.message : String(error.cause)}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}
