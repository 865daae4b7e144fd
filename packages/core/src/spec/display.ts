/**
 * Textual forms of arguments shared by diagnostics and help
 */

import type { ArgumentSpec } from "../types.js";

/**
 * Value placeholders for one occurrence, e.g. "<NAME>" or "<X> <Y>..."
 */
export function valuePlaceholder(arg: ArgumentSpec): string {
  const one = `<${arg.valueName}>`;
  const { min, max } = arg.arity;
  const required = Array.from({ length: Math.max(min, 1) }, () => one).join(" ");
  return max > Math.max(min, 1) ? `${required}...` : required;
}

/**
 * The switch a user types: "--long" when declared, else "-s"
 */
export function switchName(arg: ArgumentSpec): string {
  if (arg.long !== undefined) return `--${arg.long}`;
  if (arg.short !== undefined) return `-${arg.short}`;
  return arg.id;
}

/**
 * Display form used in diagnostics and usage lines
 * @example "--name <NAME>", "-v", "<FILE>..."
 */
export function displayArg(arg: ArgumentSpec): string {
  switch (arg.kind) {
    case "flag":
      return switchName(arg);
    case "option":
      return `${switchName(arg)} ${valuePlaceholder(arg)}`;
    case "positional":
      return arg.multiple ? `<${arg.valueName}>...` : `<${arg.valueName}>`;
  }
}
