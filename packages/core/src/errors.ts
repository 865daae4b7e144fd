/**
 * Error types for argspec
 *
 * Invariants:
 * - Configuration errors are thrown by buildSpec, before any parse
 * - Parse errors are returned inside ParseResult, never printed
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

/**
 * Base class for all argspec errors
 */
export abstract class ArgSpecError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

// ---------------------------------------------------------------------------
// Configuration errors
// ---------------------------------------------------------------------------

/**
 * Base class for errors raised while building a Spec Model
 */
export abstract class ConfigError extends ArgSpecError {
  constructor(
    /** Name of the command whose declaration is invalid */
    public readonly command: string,
    message: string,
    options?: ErrorOptions
  ) {
    super(`[${command}] ${message}`, options);
  }
}

export type IdentityKind = "id" | "short" | "long" | "group" | "subcommand";

/**
 * Two declarations share an identity within one command
 */
export class DuplicateIdentityError extends ConfigError {
  readonly code = "DUPLICATE_IDENTITY";

  constructor(
    command: string,
    public readonly identityKind: IdentityKind,
    public readonly identity: string,
    options?: ErrorOptions
  ) {
    super(command, `Duplicate ${identityKind} "${identity}"`, options);
  }
}

/**
 * A group references an argument id that is not declared
 */
export class UnknownGroupMemberError extends ConfigError {
  readonly code = "UNKNOWN_GROUP_MEMBER";

  constructor(
    command: string,
    public readonly group: string,
    public readonly member: string,
    options?: ErrorOptions
  ) {
    super(command, `Group "${group}" references unknown argument "${member}"`, options);
  }
}

/**
 * An argument lists membership in a group that is not declared
 */
export class UnknownGroupError extends ConfigError {
  readonly code = "UNKNOWN_GROUP";

  constructor(
    command: string,
    public readonly argument: string,
    public readonly group: string,
    options?: ErrorOptions
  ) {
    super(command, `Argument "${argument}" belongs to unknown group "${group}"`, options);
  }
}

/**
 * Positional indices are duplicated, gapped or out of order
 */
export class InvalidPositionalOrderingError extends ConfigError {
  readonly code = "INVALID_POSITIONAL_ORDERING";

  constructor(
    command: string,
    public readonly argument: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(command, `Invalid positional "${argument}": ${reason}`, options);
  }
}

/**
 * A single argument declaration is inconsistent
 */
export class InvalidDeclarationError extends ConfigError {
  readonly code = "INVALID_DECLARATION";

  constructor(
    command: string,
    public readonly argument: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(command, `Invalid argument "${argument}": ${reason}`, options);
  }
}

// ---------------------------------------------------------------------------
// Parse errors
// ---------------------------------------------------------------------------

export type ParseErrorPhase = "token" | "bind" | "validation";

export type ParseErrorCode =
  | "MALFORMED_TOKEN"
  | "UNKNOWN_ARGUMENT"
  | "MISSING_VALUE"
  | "TOO_MANY_OCCURRENCES"
  | "INVALID_VALUE"
  | "UNEXPECTED_VALUE"
  | "MISSING_REQUIRED"
  | "CONFLICTING_ARGUMENTS"
  | "GROUP_REQUIREMENT_UNMET";

/**
 * Where a parse error occurred and what it concerns
 */
export interface ParseErrorContext {
  /** Command path of the level that failed, e.g. ["app", "build"] */
  commandPath: string[];
  /** Offending raw token text */
  token?: string;
  /** Offending argument id */
  argument?: string;
}

/**
 * Base class for errors terminating a parse
 */
export abstract class ParseError extends ArgSpecError {
  abstract override readonly code: ParseErrorCode;
  abstract readonly phase: ParseErrorPhase;
  readonly commandPath: string[];
  readonly token?: string;
  readonly argument?: string;

  constructor(context: ParseErrorContext, message: string, options?: ErrorOptions) {
    super(message, options);
    this.commandPath = context.commandPath;
    this.token = context.token;
    this.argument = context.argument;
  }
}

/**
 * A raw string cannot be classified as any token
 */
export class MalformedTokenError extends ParseError {
  readonly code = "MALFORMED_TOKEN";
  readonly phase = "token";

  constructor(commandPath: string[], token: string, reason: string) {
    super({ commandPath, token }, `Malformed argument '${token}': ${reason}`);
  }
}

/**
 * A flag or bare word matches no declared argument or subcommand
 */
export class UnknownArgumentError extends ParseError {
  readonly code = "UNKNOWN_ARGUMENT";
  readonly phase = "bind";

  constructor(
    commandPath: string[],
    token: string,
    /** Nearest known identity, e.g. "--verbose" or "build" */
    public readonly suggestion?: string
  ) {
    super(
      { commandPath, token },
      `Found argument '${token}' which wasn't expected, or isn't valid in this context`
    );
  }
}

/**
 * An option ran out of values
 */
export class MissingValueError extends ParseError {
  readonly code = "MISSING_VALUE";
  readonly phase = "bind";

  constructor(commandPath: string[], argument: string, display: string, token?: string) {
    super(
      { commandPath, argument, token },
      `The argument '${display}' requires a value but none was supplied`
    );
  }
}

/**
 * A non-multiple argument occurred more than once
 */
export class TooManyOccurrencesError extends ParseError {
  readonly code = "TOO_MANY_OCCURRENCES";
  readonly phase = "bind";

  constructor(commandPath: string[], argument: string, display: string, token?: string) {
    super(
      { commandPath, argument, token },
      `The argument '${display}' was provided more than once, but cannot be used multiple times`
    );
  }
}

/**
 * A value lies outside the declared possible values
 */
export class InvalidValueError extends ParseError {
  readonly code = "INVALID_VALUE";
  readonly phase = "bind";

  constructor(
    commandPath: string[],
    argument: string,
    display: string,
    public readonly value: string,
    public readonly possibleValues: readonly string[]
  ) {
    super(
      { commandPath, argument, token: value },
      `'${value}' isn't a valid value for '${display}' [possible values: ${possibleValues.join(", ")}]`
    );
  }
}

/**
 * A zero-arity flag was given a joined value
 */
export class UnexpectedValueError extends ParseError {
  readonly code = "UNEXPECTED_VALUE";
  readonly phase = "bind";

  constructor(
    commandPath: string[],
    argument: string,
    display: string,
    public readonly value: string,
    token?: string
  ) {
    super(
      { commandPath, argument, token },
      `The argument '${display}' takes no value but '${value}' was supplied`
    );
  }
}

/**
 * A required argument has no occurrence and no default
 */
export class MissingRequiredError extends ParseError {
  readonly code = "MISSING_REQUIRED";
  readonly phase = "validation";

  constructor(commandPath: string[], argument: string, display: string) {
    super(
      { commandPath, argument },
      `The following required argument was not provided: ${display}`
    );
  }
}

/**
 * Two members of a conflict group are present
 */
export class ConflictingArgumentsError extends ParseError {
  readonly code = "CONFLICTING_ARGUMENTS";
  readonly phase = "validation";

  constructor(
    commandPath: string[],
    public readonly group: string,
    argument: string,
    public readonly other: string,
    displays: [string, string]
  ) {
    super(
      { commandPath, argument },
      `The argument '${displays[0]}' cannot be used with '${displays[1]}'`
    );
  }
}

/**
 * A requires or one-required group is not satisfied
 */
export class GroupRequirementUnmetError extends ParseError {
  readonly code = "GROUP_REQUIREMENT_UNMET";
  readonly phase = "validation";

  constructor(
    commandPath: string[],
    public readonly group: string,
    /** Ids that would satisfy the group */
    public readonly missing: readonly string[],
    message: string,
    /** Present member that triggered a requires group */
    argument?: string
  ) {
    super({ commandPath, argument }, message);
  }
}
