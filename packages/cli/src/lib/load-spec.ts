/**
 * Declaration file loading
 *
 * A declaration file is the JSON form of a CommandDeclaration. It is checked
 * against a zod schema, then handed to buildSpec for the consistency rules.
 */

import { z } from "zod";
import { buildSpec, ConfigError } from "@argspec/core";
import type { CommandDeclaration, SpecModel } from "@argspec/core";
import { readJsonFromFile } from "./io.js";
import { CliError } from "./errors.js";

const NameListSchema = z.array(z.string().min(1));

const AritySchema = z.union([
  z.number().int(),
  z
    .object({
      min: z.number().int(),
      max: z.number().int().optional(),
    })
    .strict(),
]);

export const ArgumentSchema = z
  .object({
    id: z.string().min(1),
    kind: z.enum(["flag", "option", "positional"]),
    short: z.string().optional(),
    long: z.string().min(1).optional(),
    aliases: NameListSchema.optional(),
    help: z.string().optional(),
    valueName: z.string().min(1).optional(),
    required: z.boolean().optional(),
    multiple: z.boolean().optional(),
    defaultValue: z.string().optional(),
    possibleValues: z.array(z.string()).optional(),
    arity: AritySchema.optional(),
    index: z.number().int().positive().optional(),
    hidden: z.boolean().optional(),
    groups: NameListSchema.optional(),
    overrides: NameListSchema.optional(),
  })
  .strict()
  .superRefine((arg, ctx) => {
    if (arg.short !== undefined && [...arg.short].length !== 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["short"],
        message: "short must be a single character",
      });
    }
  });

export const GroupSchema = z
  .object({
    id: z.string().min(1),
    kind: z.enum(["conflict", "requires", "one-required"]),
    members: NameListSchema.optional(),
    requires: NameListSchema.optional(),
  })
  .strict();

export const CommandSchema: z.ZodType<CommandDeclaration> = z.lazy(() =>
  z
    .object({
      name: z.string().min(1),
      about: z.string().optional(),
      version: z.string().optional(),
      author: z.string().optional(),
      beforeHelp: z.string().optional(),
      afterHelp: z.string().optional(),
      helpTemplate: z.string().optional(),
      args: z.array(ArgumentSchema).optional(),
      groups: z.array(GroupSchema).optional(),
      subcommands: z.array(CommandSchema).optional(),
    })
    .strict()
);

/**
 * Validate a parsed JSON value as a command declaration
 * @throws CliError (exit code 2) listing every schema issue
 */
export function toDeclaration(value: unknown, source: string): CommandDeclaration {
  const result = CommandSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${where}: ${issue.message}`;
    });
    throw new CliError(`Invalid declaration in ${source}: ${issues.join(", ")}`, {
      exitCode: 2,
      cause: result.error,
    });
  }
  return result.data;
}

/**
 * Read, validate and build a declaration file
 * @throws CliError (exit code 2) when the file is unreadable or inconsistent
 */
export async function loadSpec(filePath: string): Promise<SpecModel> {
  let raw: unknown;
  try {
    raw = await readJsonFromFile(filePath);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new CliError(`Cannot read declaration file ${filePath}: ${reason}`, {
      exitCode: 2,
      cause: err,
    });
  }

  const declaration = toDeclaration(raw, filePath);

  try {
    return buildSpec(declaration);
  } catch (err) {
    if (err instanceof ConfigError) {
      throw new CliError(`Invalid declaration in ${filePath}: ${err.message}`, {
        exitCode: 2,
        cause: err,
      });
    }
    throw err;
  }
}
