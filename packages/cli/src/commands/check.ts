/**
 * `argspec check`: load and build a declaration file
 */

import type { Command } from "commander";
import type { SpecModel } from "@argspec/core";
import { loadSpec } from "../lib/load-spec.js";
import { resolveSpecPath } from "../lib/env.js";
import { printLines } from "../lib/render.js";
import { withTiming } from "../lib/telemetry.js";
import type { CommandContext, GlobalOptions } from "../lib/context.js";

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

/**
 * One summary line per command, depth first
 */
export function summarize(model: SpecModel): string[] {
  const line = [
    plural(model.args.length, "argument"),
    plural(model.groups.length, "group"),
    plural(model.subcommands.size, "subcommand"),
  ].join(", ");

  return [
    `  ${model.commandPath.join(" ")}: ${line}`,
    ...[...model.subcommands.values()].flatMap((child) => summarize(child)),
  ];
}

export function registerCheckCommand(program: Command, ctx: CommandContext): void {
  program
    .command("check")
    .description("Validate a declaration file and summarize its commands")
    .action(async () => {
      await withTiming(ctx.output, "cli.check", async () => {
        const file = resolveSpecPath(program.opts<GlobalOptions>().spec);
        const model = await loadSpec(file);

        printLines(ctx.output, [`Declaration OK: ${file}`, ...summarize(model)]);
      });
    });
}
