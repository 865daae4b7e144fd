/**
 * Tokenizer: raw argv strings → classified tokens
 *
 * Tokens are produced lazily, one raw string at a time, so that the slice
 * following a subcommand name is classified against the subcommand's model.
 */

import { MalformedTokenError } from "../errors.js";
import type { SpecModel } from "../spec/model.js";

interface TokenBase {
  /** Text shown in diagnostics, e.g. "-v" for one flag of a "-vx" cluster */
  raw: string;
  /** Index of the argv string this token came from */
  argIndex: number;
}

export interface ShortFlagToken extends TokenBase {
  kind: "short-flag";
  name: string;
}

export interface LongFlagToken extends TokenBase {
  kind: "long-flag";
  name: string;
}

export interface ValueJoinedToken extends TokenBase {
  kind: "value-joined";
  form: "short" | "long";
  name: string;
  value: string;
}

export interface PositionalToken extends TokenBase {
  kind: "positional";
  text: string;
  /** Follows the "--" marker */
  afterEnd: boolean;
}

export interface BareToken extends TokenBase {
  kind: "bare";
  text: string;
  afterEnd: boolean;
}

export interface EndOfOptionsToken extends TokenBase {
  kind: "end-of-options";
}

export type Token =
  | ShortFlagToken
  | LongFlagToken
  | ValueJoinedToken
  | PositionalToken
  | BareToken
  | EndOfOptionsToken;

export type ValueToken = PositionalToken | BareToken;

/**
 * Tells the tokenizer whether the matcher still has an open positional slot
 */
export interface PositionalCursor {
  expectsPositional(): boolean;
}

export function isValueToken(token: Token): token is ValueToken {
  return token.kind === "positional" || token.kind === "bare";
}

export class Tokenizer {
  readonly #argv: readonly string[];
  readonly #model: SpecModel;
  readonly #cursor: PositionalCursor;
  #next = 0;
  #pending: Token[] = [];
  #afterEnd = false;

  constructor(argv: readonly string[], model: SpecModel, cursor: PositionalCursor) {
    this.#argv = argv;
    this.#model = model;
    this.#cursor = cursor;
  }

  /**
   * Next token without consuming it
   * @throws MalformedTokenError
   */
  peek(): Token | undefined {
    if (this.#pending.length === 0 && this.#next < this.#argv.length) {
      this.#pending = this.#classify(this.#next);
      this.#next++;
    }
    return this.#pending[0];
  }

  /**
   * Consume the next token
   * @throws MalformedTokenError
   */
  next(): Token | undefined {
    const token = this.peek();
    this.#pending.shift();
    return token;
  }

  /**
   * Raw strings that have not been tokenized yet
   */
  rest(): string[] {
    return this.#argv.slice(this.#next);
  }

  #classify(argIndex: number): Token[] {
    const arg = this.#argv[argIndex] ?? "";

    if (this.#afterEnd) {
      return [this.#plain(arg, argIndex)];
    }

    if (arg === "--") {
      this.#afterEnd = true;
      return [{ kind: "end-of-options", raw: arg, argIndex }];
    }

    if (arg.startsWith("---")) {
      throw new MalformedTokenError(this.#model.commandPath, arg, "too many leading dashes");
    }

    if (arg.startsWith("--")) {
      return [this.#long(arg, argIndex)];
    }

    if (arg.startsWith("-") && arg.length > 1) {
      return this.#cluster(arg, argIndex);
    }

    return [this.#plain(arg, argIndex)];
  }

  #long(arg: string, argIndex: number): Token {
    const body = arg.slice(2);
    const eq = body.indexOf("=");

    if (eq === 0) {
      throw new MalformedTokenError(this.#model.commandPath, arg, "missing argument name before '='");
    }
    if (eq > 0) {
      return {
        kind: "value-joined",
        form: "long",
        name: body.slice(0, eq),
        value: body.slice(eq + 1),
        raw: `--${body.slice(0, eq)}`,
        argIndex,
      };
    }
    return { kind: "long-flag", name: body, raw: arg, argIndex };
  }

  /**
   * Expand "-abc"; a value-taking flag takes the rest of the string as its value
   */
  #cluster(arg: string, argIndex: number): Token[] {
    const chars = [...arg.slice(1)];
    const tokens: Token[] = [];

    for (let i = 0; i < chars.length; i++) {
      const name = chars[i] ?? "";
      const spec = this.#model.findShort(name);
      const remainder = chars.slice(i + 1).join("");

      if (spec?.kind === "option" && remainder.length > 0) {
        tokens.push({
          kind: "value-joined",
          form: "short",
          name,
          value: remainder.startsWith("=") ? remainder.slice(1) : remainder,
          raw: `-${name}`,
          argIndex,
        });
        break;
      }

      tokens.push({ kind: "short-flag", name, raw: `-${name}`, argIndex });
    }

    return tokens;
  }

  #plain(arg: string, argIndex: number): ValueToken {
    const kind = this.#cursor.expectsPositional() ? "positional" : "bare";
    return { kind, text: arg, raw: arg, argIndex, afterEnd: this.#afterEnd };
  }
}
