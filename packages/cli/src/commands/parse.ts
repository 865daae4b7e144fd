/**
 * `argspec parse -- <argv...>`: parse an argument vector against a declaration
 */

import type { Command } from "commander";
import { describeError, formatDiagnostic, parse, resultToJSON } from "@argspec/core";
import { loadSpec } from "../lib/load-spec.js";
import { resolveHelpWidth, resolveSpecPath } from "../lib/env.js";
import { parseNonNegativeInt } from "../lib/arg.js";
import { colorize, printJson } from "../lib/render.js";
import { emitMetric, withTiming } from "../lib/telemetry.js";
import type { CommandContext, GlobalOptions } from "../lib/context.js";

interface ParseCommandOptions {
  raw?: boolean;
  json?: boolean;
  suggestions: boolean;
  width?: number;
}

export function registerParseCommand(program: Command, ctx: CommandContext): void {
  program
    .command("parse [argv...]")
    .description("Parse an argument vector and print the bound values as JSON")
    .option("--raw", "Print compact JSON")
    .option("--json", "Print parse errors as JSON on stdout")
    .option("--no-suggestions", "Do not suggest near matches for unknown arguments")
    .option("--width <n>", "Wrap requested help text", (v) => parseNonNegativeInt(v, "width"))
    .addHelpText(
      "after",
      `
Arguments to parse follow "--":
  $ argspec --spec app.json parse -- --name=a -v f1 f2
  $ argspec --spec app.json parse -- build --target=x`
    )
    .action(async (argv: string[], options: ParseCommandOptions) => {
      await withTiming(ctx.output, "cli.parse", async () => {
        const model = await loadSpec(resolveSpecPath(program.opts<GlobalOptions>().spec));
        const result = parse(model, argv, {
          suggestions: options.suggestions,
          helpWidth: resolveHelpWidth(options.width),
        });
        emitMetric(ctx.output, "cli.parse.result", { status: result.status });

        switch (result.status) {
          case "ok":
            printJson(ctx.output, resultToJSON(result), { raw: options.raw });
            break;
          case "help":
            ctx.output.stdout(result.text.endsWith("\n") ? result.text : `${result.text}\n`);
            break;
          case "error":
            if (options.json) {
              printJson(ctx.output, resultToJSON(result), { raw: options.raw });
            } else {
              const diagnostic = describeError(result.error, model);
              ctx.output.stderr(colorize(formatDiagnostic(diagnostic), "red", ctx.output.colors));
            }
            ctx.exitCode = 1;
            break;
        }
      });
    });
}
