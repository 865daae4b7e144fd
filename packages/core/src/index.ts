/**
 * argspec core
 *
 * Declarative command-line argument definition and parsing engine
 */

// Re-export types
export type {
  ArgumentKind,
  Arity,
  GroupKind,
  ArgumentDeclaration,
  GroupDeclaration,
  CommandDeclaration,
  ArgumentSpec,
  GroupSpec,
  ValueSource,
  ArgumentMatch,
  ParseSuccess,
  HelpRequested,
  ParseFailure,
  ParseResult,
  ParseOptions,
  HelpOptions,
} from "./types.js";

// Spec Model
export { buildSpec } from "./spec/build.js";
export { SpecModel } from "./spec/model.js";
export { displayArg } from "./spec/display.js";

// Parsing
export { parse, resultToJSON } from "./parse/parse.js";
export type { ParseResultJSON, ParseSuccessJSON } from "./parse/parse.js";
export { Binding } from "./binding.js";

// Help and diagnostics
export { renderHelp, renderTemplate } from "./help/help.js";
export { renderUsage } from "./help/usage.js";
export { wrapText, displayWidth } from "./help/wrap.js";
export { describeError, formatDiagnostic } from "./report.js";
export type { Diagnostic } from "./report.js";
export { suggest, editDistance } from "./suggest.js";

// Logging
export { logger } from "./observability/logs.js";
export type { LogLevel, LogEntry } from "./observability/logs.js";

// Re-export errors
export {
  ArgSpecError,
  ConfigError,
  DuplicateIdentityError,
  UnknownGroupMemberError,
  UnknownGroupError,
  InvalidPositionalOrderingError,
  InvalidDeclarationError,
  ParseError,
  MalformedTokenError,
  UnknownArgumentError,
  MissingValueError,
  TooManyOccurrencesError,
  InvalidValueError,
  UnexpectedValueError,
  MissingRequiredError,
  ConflictingArgumentsError,
  GroupRequirementUnmetError,
} from "./errors.js";
export type { IdentityKind, ParseErrorCode, ParseErrorPhase, ParseErrorContext } from "./errors.js";
