/**
 * Error Reporter: parse errors → user-facing diagnostics
 */

import { ParseError, UnknownArgumentError } from "./errors.js";
import type { SpecModel } from "./spec/model.js";
import { renderUsage } from "./help/usage.js";

export interface Diagnostic {
  code: ParseError["code"];
  /** Command path of the failing level */
  commandPath: string[];
  message: string;
  /** e.g. "Did you mean '--verbose'?" */
  hint?: string;
  /** Usage line of the failing level */
  usage: string;
}

/**
 * Describe a parse error against the model it was produced from
 */
export function describeError(error: ParseError, root: SpecModel): Diagnostic {
  const level = resolveLevel(root, error.commandPath);
  const suggestion = error instanceof UnknownArgumentError ? error.suggestion : undefined;

  return {
    code: error.code,
    commandPath: error.commandPath,
    message: error.message,
    hint: suggestion === undefined ? undefined : `Did you mean '${suggestion}'?`,
    usage: renderUsage(level),
  };
}

/**
 * Render a diagnostic as terminal text
 */
export function formatDiagnostic(diagnostic: Diagnostic, helpHint = true): string {
  let out = `error: ${diagnostic.message}\n`;
  if (diagnostic.hint) out += `\n    ${diagnostic.hint}\n`;
  out += `\nUSAGE:\n    ${diagnostic.usage}\n`;
  if (helpHint) out += "\nFor more information try --help\n";
  return out;
}

/**
 * Walk from the root to the model named by `commandPath`
 */
export function resolveLevel(root: SpecModel, commandPath: readonly string[]): SpecModel {
  let level = root;
  for (const name of commandPath.slice(1)) {
    const child = level.subcommand(name);
    if (!child) break;
    level = child;
  }
  return level;
}
