/**
 * Core types for argspec
 */

import type { Binding } from "./binding.js";
import type { ParseError } from "./errors.js";

/**
 * Argument kind
 * - flag: zero-arity, presence is the signal
 * - option: takes one or more values per occurrence
 * - positional: identified by position rather than name
 */
export type ArgumentKind = "flag" | "option" | "positional";

/**
 * Number of values an argument consumes per occurrence
 * `max` is `Infinity` for unbounded positionals
 */
export interface Arity {
  min: number;
  max: number;
}

/**
 * Group relationship kind
 */
export type GroupKind = "conflict" | "requires" | "one-required";

/**
 * Declaration of a single argument, as produced by a declaration loader
 */
export interface ArgumentDeclaration {
  /** Binding key, unique within a command */
  id: string;
  kind: ArgumentKind;
  /** Single character, without the dash */
  short?: string;
  /** Long name, without the dashes */
  long?: string;
  /** Additional long names resolving to the same argument */
  aliases?: string[];
  help?: string;
  /** Placeholder shown in usage (defaults to the upper-cased id) */
  valueName?: string;
  required?: boolean;
  multiple?: boolean;
  defaultValue?: string;
  possibleValues?: string[];
  /** Options only: values per occurrence (default 1) */
  arity?: number | { min: number; max?: number };
  /** Positionals only: explicit 1-based index */
  index?: number;
  hidden?: boolean;
  /** Ids of groups this argument belongs to */
  groups?: string[];
  /**
   * Ids of flags or options this argument overrides: whichever of them occurs
   * last wins and the others are cleared and no longer required. Listing the
   * argument's own id lets a repeat replace the earlier occurrence.
   */
  overrides?: string[];
}

/**
 * Declaration of an argument group
 */
export interface GroupDeclaration {
  id: string;
  kind: GroupKind;
  members?: string[];
  /** `requires` groups only: ids that must be present when any member is */
  requires?: string[];
}

/**
 * Declaration of a command (the root application or a subcommand)
 */
export interface CommandDeclaration {
  name: string;
  about?: string;
  version?: string;
  author?: string;
  beforeHelp?: string;
  afterHelp?: string;
  /** Help layout using `{usage}`, `{all-args}`, ... tags */
  helpTemplate?: string;
  args?: ArgumentDeclaration[];
  groups?: GroupDeclaration[];
  subcommands?: CommandDeclaration[];
}

/**
 * A validated, immutable argument description
 */
export interface ArgumentSpec {
  readonly id: string;
  readonly kind: ArgumentKind;
  readonly short?: string;
  readonly long?: string;
  readonly aliases: readonly string[];
  readonly help?: string;
  readonly valueName: string;
  readonly required: boolean;
  readonly multiple: boolean;
  readonly defaultValue?: string;
  readonly possibleValues?: readonly string[];
  readonly arity: Readonly<Arity>;
  /** 1-based index among sibling positionals */
  readonly index?: number;
  readonly hidden: boolean;
  readonly groups: readonly string[];
  readonly overrides: readonly string[];
  /** Declaration order within the command */
  readonly order: number;
}

/**
 * A validated, immutable group description
 */
export interface GroupSpec {
  readonly id: string;
  readonly kind: GroupKind;
  readonly members: readonly string[];
  readonly requires: readonly string[];
}

/**
 * Where a bound value came from
 */
export type ValueSource = "argv" | "default";

/**
 * Values and occurrence count bound to one argument
 */
export interface ArgumentMatch {
  values: string[];
  occurrences: number;
  source: ValueSource;
}

/**
 * Successful parse of one command level
 */
export interface ParseSuccess {
  status: "ok";
  /** Command path from the root, e.g. ["git", "remote", "add"] */
  commandPath: string[];
  binding: Binding;
  subcommand?: {
    name: string;
    result: ParseSuccess;
  };
}

/**
 * `--help`, `-h` or `help <name>` was requested
 */
export interface HelpRequested {
  status: "help";
  commandPath: string[];
  text: string;
}

/**
 * Parse terminated with a single error
 */
export interface ParseFailure {
  status: "error";
  error: ParseError;
}

export type ParseResult = ParseSuccess | HelpRequested | ParseFailure;

/**
 * Options for a parse invocation
 */
export interface ParseOptions {
  /** Compute "did you mean" suggestions for unknown arguments (default true) */
  suggestions?: boolean;
  /** Largest edit distance for a suggestion (default 2) */
  maxSuggestionDistance?: number;
  /** Wrap width for requested help text */
  helpWidth?: number;
}

/**
 * Options for help rendering
 */
export interface HelpOptions {
  /** Wrap help text to this many columns (no wrapping when unset) */
  width?: number;
}
