/**
 * Usage line synthesis
 */

import type { SpecModel } from "../spec/model.js";
import { displayArg } from "../spec/display.js";

/**
 * One-line usage for a command, prefixed by its parent chain
 * @example "git remote add [FLAGS] [OPTIONS] --force --url <URL> <NAME> [SUBCOMMAND]"
 */
export function renderUsage(model: SpecModel): string {
  const parts = [model.commandPath.join(" ")];
  const visible = model.args.filter((arg) => !arg.hidden);

  const flags = visible.filter((arg) => arg.kind === "flag");
  if (flags.some((arg) => !arg.required) || model.implicitHelpShort || model.implicitHelpLong) {
    parts.push("[FLAGS]");
  }

  if (visible.some((arg) => arg.kind === "option" && !arg.required)) {
    parts.push("[OPTIONS]");
  }

  // Required switches are spelled out in declaration order
  for (const arg of visible) {
    if (arg.kind !== "positional" && arg.required) parts.push(displayArg(arg));
  }

  for (const arg of model.positionals()) {
    if (arg.hidden) continue;
    const name = arg.required ? `<${arg.valueName}>` : `[${arg.valueName}]`;
    parts.push(arg.multiple ? `${name}...` : name);
  }

  if (model.hasSubcommands()) {
    parts.push("[SUBCOMMAND]");
  }

  return parts.join(" ");
}
