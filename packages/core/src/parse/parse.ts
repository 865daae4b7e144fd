/**
 * Parse entry point
 */

import type {
  ArgumentMatch,
  ParseOptions,
  ParseResult,
  ParseSuccess,
} from "../types.js";
import { ParseError } from "../errors.js";
import type { SpecModel } from "../spec/model.js";
import { renderHelp } from "../help/help.js";
import { logger } from "../observability/logs.js";
import { bindLevel, type LevelBinding } from "./matcher.js";
import { validateChain } from "./validator.js";

/**
 * Parse `argv` (program name excluded) against an immutable Spec Model
 *
 * Never throws for user input: every failure is returned as `status: "error"`.
 */
export function parse(
  model: SpecModel,
  argv: readonly string[],
  options: ParseOptions = {}
): ParseResult {
  logger.debug("parse.start", { command: model.name, details: { argc: argv.length } });

  try {
    const outcome = bindLevel(model, argv, options);

    if (outcome.kind === "help") {
      return {
        status: "help",
        commandPath: outcome.model.commandPath,
        text: renderHelp(outcome.model, { width: options.helpWidth }),
      };
    }

    validateChain(outcome.level);
    const result = toSuccess(outcome.level);
    logger.debug("parse.done", { command: model.name, details: { path: chosenPath(result) } });
    return result;
  } catch (err) {
    if (err instanceof ParseError) {
      logger.debug("parse.error", {
        command: err.commandPath.join(" "),
        message: err.message,
        details: { code: err.code },
      });
      return { status: "error", error: err };
    }
    logger.error("parse.failed", {
      command: model.name,
      message: err instanceof Error ? err.message : String(err),
    });
    throw err;
  }
}

function toSuccess(level: LevelBinding): ParseSuccess {
  const result: ParseSuccess = {
    status: "ok",
    commandPath: level.model.commandPath,
    binding: level.binding,
  };
  if (level.subcommand) {
    result.subcommand = {
      name: level.subcommand.name,
      result: toSuccess(level.subcommand.level),
    };
  }
  return result;
}

function chosenPath(result: ParseSuccess): string {
  let path = result.commandPath.join(" ");
  for (let sub = result.subcommand; sub; sub = sub.result.subcommand) {
    path = sub.result.commandPath.join(" ");
  }
  return path;
}

export interface ParseSuccessJSON {
  status: "ok";
  commandPath: string[];
  values: Record<string, ArgumentMatch>;
  subcommand?: { name: string; result: ParseSuccessJSON };
}

export type ParseResultJSON =
  | ParseSuccessJSON
  | { status: "help"; commandPath: string[]; text: string }
  | {
      status: "error";
      error: { code: string; message: string; commandPath: string[]; token?: string; argument?: string };
    };

/**
 * Plain-data form of a result, for printing or structural comparison
 */
export function resultToJSON(result: ParseResult): ParseResultJSON {
  switch (result.status) {
    case "ok":
      return successToJSON(result);
    case "help":
      return { status: "help", commandPath: result.commandPath, text: result.text };
    case "error": {
      const { code, message, commandPath, token, argument } = result.error;
      return { status: "error", error: { code, message, commandPath, token, argument } };
    }
  }
}

function successToJSON(result: ParseSuccess): ParseSuccessJSON {
  const json: ParseSuccessJSON = {
    status: "ok",
    commandPath: result.commandPath,
    values: result.binding.toJSON(),
  };
  if (result.subcommand) {
    json.subcommand = { name: result.subcommand.name, result: successToJSON(result.subcommand.result) };
  }
  return json;
}
