/**
 * `argspec help` and `argspec usage`: render a command's help or usage line
 */

import type { Command } from "commander";
import { renderHelp, renderUsage, suggest } from "@argspec/core";
import type { SpecModel } from "@argspec/core";
import { loadSpec } from "../lib/load-spec.js";
import { resolveHelpWidth, resolveSpecPath } from "../lib/env.js";
import { parseNonNegativeInt } from "../lib/arg.js";
import { CliError } from "../lib/errors.js";
import { withTiming } from "../lib/telemetry.js";
import type { CommandContext, GlobalOptions } from "../lib/context.js";

/**
 * Walk subcommand names from the root
 * @throws CliError for a name that is not a subcommand
 */
export function resolveCommand(root: SpecModel, path: readonly string[]): SpecModel {
  let model = root;
  for (const name of path) {
    const child = model.subcommand(name);
    if (!child) {
      const match = suggest(name, model.subcommands.keys());
      const hint = match === undefined ? "" : ` (did you mean '${match}'?)`;
      throw new CliError(`'${model.commandPath.join(" ")}' has no subcommand '${name}'${hint}`);
    }
    model = child;
  }
  return model;
}

export function registerHelpCommands(program: Command, ctx: CommandContext): void {
  program
    .command("help [path...]")
    .description("Print help for the root command or a nested subcommand")
    .option("--width <n>", "Wrap help text", (v) => parseNonNegativeInt(v, "width"))
    .action(async (path: string[], options: { width?: number }) => {
      await withTiming(ctx.output, "cli.help", async () => {
        const root = await loadSpec(resolveSpecPath(program.opts<GlobalOptions>().spec));
        const text = renderHelp(resolveCommand(root, path), { width: resolveHelpWidth(options.width) });

        ctx.output.stdout(text.endsWith("\n") ? text : `${text}\n`);
      });
    });

  program
    .command("usage [path...]")
    .description("Print the usage line of the root command or a nested subcommand")
    .action(async (path: string[]) => {
      await withTiming(ctx.output, "cli.usage", async () => {
        const root = await loadSpec(resolveSpecPath(program.opts<GlobalOptions>().spec));

        ctx.output.stdout(`${renderUsage(resolveCommand(root, path))}\n`);
      });
    });
}
