/**
 * Matcher/Binder: walks the token stream against a Spec Model
 *
 * Single pass, left to right, no backtracking. A matched subcommand name
 * hands the remaining raw slice to a fresh matcher for the child model.
 */

import type { ArgumentSpec, ParseOptions } from "../types.js";
import { Binding, BindingBuilder } from "../binding.js";
import {
  InvalidValueError,
  MissingValueError,
  TooManyOccurrencesError,
  UnexpectedValueError,
  UnknownArgumentError,
} from "../errors.js";
import { HELP_LONG, HELP_SHORT, HELP_SUBCOMMAND, type SpecModel } from "../spec/model.js";
import { displayArg } from "../spec/display.js";
import { suggest } from "../suggest.js";
import { logger } from "../observability/logs.js";
import {
  Tokenizer,
  isValueToken,
  type PositionalCursor,
  type Token,
  type ValueToken,
} from "./tokenizer.js";

/**
 * Unvalidated binding of one command level and its chosen subcommand
 */
export interface LevelBinding {
  model: SpecModel;
  binding: Binding;
  /** Ids released from `required` by an overriding argument */
  overridden: ReadonlySet<string>;
  subcommand?: {
    name: string;
    level: LevelBinding;
  };
}

type Subcommand = NonNullable<LevelBinding["subcommand"]>;

export type BindOutcome =
  | { kind: "bound"; level: LevelBinding }
  | { kind: "help"; model: SpecModel };

type PlainOutcome =
  | { kind: "help"; model: SpecModel }
  | { kind: "subcommand"; subcommand: Subcommand }
  | undefined;

/**
 * Bind `argv` against `model`, recursing into a matched subcommand
 * @throws ParseError (token or bind phase)
 */
export function bindLevel(
  model: SpecModel,
  argv: readonly string[],
  options: ParseOptions = {}
): BindOutcome {
  return new Matcher(model, argv, options).run();
}

class Matcher implements PositionalCursor {
  readonly #model: SpecModel;
  readonly #options: ParseOptions;
  readonly #tokens: Tokenizer;
  readonly #builder = new BindingBuilder();
  readonly #positionals: readonly ArgumentSpec[];
  readonly #overridden = new Set<string>();
  #slot = 0;

  constructor(model: SpecModel, argv: readonly string[], options: ParseOptions) {
    this.#model = model;
    this.#options = options;
    this.#positionals = model.positionals();
    this.#tokens = new Tokenizer(argv, model, this);
  }

  expectsPositional(): boolean {
    return this.#slot < this.#positionals.length;
  }

  run(): BindOutcome {
    let subcommand: Subcommand | undefined;

    for (let token = this.#tokens.next(); token; token = this.#tokens.next()) {
      switch (token.kind) {
        case "end-of-options":
          break;

        case "short-flag": {
          if (token.name === HELP_SHORT && this.#model.implicitHelpShort) {
            return { kind: "help", model: this.#model };
          }
          const spec = this.#model.findShort(token.name) ?? this.#unknown(token.raw);
          this.#bindSwitch(spec, token);
          break;
        }

        case "long-flag": {
          if (token.name === HELP_LONG && this.#model.implicitHelpLong) {
            return { kind: "help", model: this.#model };
          }
          const spec = this.#model.findLong(token.name) ?? this.#unknownLong(token.raw, token.name);
          this.#bindSwitch(spec, token);
          break;
        }

        case "value-joined": {
          const spec =
            token.form === "short"
              ? (this.#model.findShort(token.name) ?? this.#unknown(token.raw))
              : (this.#model.findLong(token.name) ?? this.#unknownLong(token.raw, token.name));
          if (spec.kind === "flag") {
            throw new UnexpectedValueError(
              this.#model.commandPath,
              spec.id,
              displayArg(spec),
              token.value,
              token.raw
            );
          }
          this.#countOccurrence(spec, token);
          this.#addValue(spec, token.value);
          this.#consumeValues(spec, token, spec.arity.min - 1, spec.arity.min - 1);
          break;
        }

        case "positional":
        case "bare": {
          const outcome = this.#plain(token);
          if (outcome === undefined) break;
          if (outcome.kind === "help") return outcome;
          subcommand = outcome.subcommand;
          break;
        }
      }

      if (subcommand) break;
    }

    for (const arg of this.#model.args) {
      if (
        arg.defaultValue !== undefined &&
        this.#builder.occurrencesOf(arg.id) === 0 &&
        !this.#overridden.has(arg.id)
      ) {
        this.#builder.applyDefault(arg.id, arg.defaultValue);
      }
    }

    const binding = this.#builder.build(this.#model.args.map((arg) => arg.id));
    return {
      kind: "bound",
      level: { model: this.#model, binding, overridden: this.#overridden, subcommand },
    };
  }

  /**
   * Subcommand, help request, or positional value
   */
  #plain(token: ValueToken): PlainOutcome {
    if (!token.afterEnd && this.#subcommandEligible()) {
      if (token.text === HELP_SUBCOMMAND && this.#model.implicitHelpSubcommand) {
        return { kind: "help", model: this.#helpTarget(this.#tokens.rest()) };
      }

      const child = this.#model.subcommand(token.text);
      if (child) {
        logger.debug("parse.subcommand", {
          message: child.commandPath.join(" "),
          details: { argIndex: token.argIndex },
        });
        const outcome = bindLevel(child, this.#tokens.rest(), this.#options);
        if (outcome.kind === "help") return outcome;
        return { kind: "subcommand", subcommand: { name: token.text, level: outcome.level } };
      }
    }

    const spec = this.#positionals[this.#slot];
    if (!spec) {
      const candidates = token.afterEnd ? [] : [...this.#model.subcommands.keys()];
      throw new UnknownArgumentError(
        this.#model.commandPath,
        token.raw,
        this.#suggest(token.text, candidates)
      );
    }

    this.#builder.occur(spec.id);
    this.#addValue(spec, token.text);
    if (!spec.multiple) this.#slot++;
    return undefined;
  }

  /**
   * Positionals must reach their minimum before a bare word may name a subcommand
   */
  #subcommandEligible(): boolean {
    return this.#positionals.every(
      (arg) => !arg.required || this.#builder.valueCount(arg.id) >= arg.arity.min
    );
  }

  /**
   * Resolve `help a b ...` to the named nested subcommand
   */
  #helpTarget(names: string[]): SpecModel {
    let target = this.#model;
    for (const name of names) {
      const child = target.subcommand(name);
      if (!child) {
        throw new UnknownArgumentError(
          target.commandPath,
          name,
          this.#suggest(name, [...target.subcommands.keys()])
        );
      }
      target = child;
    }
    return target;
  }

  #bindSwitch(spec: ArgumentSpec, token: Token): void {
    this.#countOccurrence(spec, token);
    if (spec.kind === "option") {
      this.#consumeValues(spec, token, spec.arity.min, spec.arity.max);
    }
  }

  #countOccurrence(spec: ArgumentSpec, token: Token): void {
    for (const id of this.#model.overridesOf(spec.id)) {
      if (this.#builder.occurrencesOf(id) > 0) {
        logger.debug("parse.override", {
          message: `${spec.id} overrides ${id}`,
          details: { token: token.raw },
        });
        this.#builder.clear(id);
      }
      if (id !== spec.id) this.#overridden.add(id);
    }

    const count = this.#builder.occur(spec.id);
    if (count > 1 && !spec.multiple) {
      throw new TooManyOccurrencesError(this.#model.commandPath, spec.id, displayArg(spec), token.raw);
    }
  }

  /**
   * Take at least `min` and at most `max` following value tokens
   */
  #consumeValues(spec: ArgumentSpec, token: Token, min: number, max: number): void {
    let taken = 0;
    while (taken < max) {
      const next = this.#tokens.peek();
      if (!next || !isValueToken(next)) break;
      this.#tokens.next();
      this.#addValue(spec, next.text);
      taken++;
    }
    if (taken < min) {
      throw new MissingValueError(this.#model.commandPath, spec.id, displayArg(spec), token.raw);
    }
  }

  #addValue(spec: ArgumentSpec, value: string): void {
    if (spec.possibleValues && !spec.possibleValues.includes(value)) {
      throw new InvalidValueError(
        this.#model.commandPath,
        spec.id,
        displayArg(spec),
        value,
        spec.possibleValues
      );
    }
    this.#builder.addValue(spec.id, value);
  }

  #unknown(raw: string): never {
    throw new UnknownArgumentError(this.#model.commandPath, raw);
  }

  #unknownLong(raw: string, name: string): never {
    const match = this.#suggest(name, this.#model.longNames());
    throw new UnknownArgumentError(
      this.#model.commandPath,
      raw,
      match === undefined ? undefined : `--${match}`
    );
  }

  #suggest(input: string, candidates: string[]): string | undefined {
    if (this.#options.suggestions === false) return undefined;
    return suggest(input, candidates, this.#options.maxSuggestionDistance ?? 2);
  }
}
