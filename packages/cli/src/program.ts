/**
 * The argspec driver program
 *
 * Built fresh for every run so tests can drive it in process.
 */

import { Command, CommanderError, InvalidArgumentError } from "commander";
import packageJson from "../package.json" with { type: "json" };
import { processOutput, type Output } from "./lib/io.js";
import { colorize } from "./lib/render.js";
import { isVerbose } from "./lib/env.js";
import { formatCliError, mapErrorToExitCode } from "./lib/errors.js";
import type { CommandContext, GlobalOptions } from "./lib/context.js";
import { registerCheckCommand } from "./commands/check.js";
import { registerParseCommand } from "./commands/parse.js";
import { registerHelpCommands } from "./commands/help.js";

export function createProgram(ctx: CommandContext): Command {
  const program = new Command();

  // Output and exit settings are copied to subcommands, so they come first
  program
    .configureOutput({
      writeOut: (str) => ctx.output.stdout(str),
      writeErr: (str) => ctx.output.stderr(colorize(str, "red", ctx.output.colors)),
    })
    .exitOverride()
    .helpCommand(false);

  program
    .name("argspec")
    .description("Check argument declarations and parse argument vectors against them")
    .version(packageJson.version)
    .option("-s, --spec <file>", "Declaration file (default: $ARGSPEC_SPEC)")
    .option("--verbose", "Verbose diagnostics");

  registerCheckCommand(program, ctx);
  registerParseCommand(program, ctx);
  registerHelpCommands(program, ctx);

  return program;
}

/**
 * Run the driver with user arguments (program name excluded)
 * @returns The process exit code
 */
export async function run(argv: readonly string[], output: Output = processOutput): Promise<number> {
  const ctx: CommandContext = { output, exitCode: 0 };
  const program = createProgram(ctx);

  try {
    await program.parseAsync([...argv], { from: "user" });
    return ctx.exitCode;
  } catch (err) {
    // Commander has already written its own messages, help and version
    if (err instanceof CommanderError && !(err instanceof InvalidArgumentError)) {
      return err.exitCode;
    }

    const verbose = program.opts<GlobalOptions>().verbose === true || isVerbose();
    output.stderr(colorize(`Error: ${formatCliError(err, verbose)}`, "red", output.colors) + "\n");
    return mapErrorToExitCode(err);
  }
}
