/**
 * Binding: argument id → values and occurrence count for one parse
 */

import type { ArgumentMatch, ValueSource } from "./types.js";

/**
 * Accumulates matches while the token stream is walked
 */
export class BindingBuilder {
  #entries = new Map<string, ArgumentMatch>();

  /**
   * Count one occurrence of an argument
   * @returns The new occurrence count
   */
  occur(id: string): number {
    const entry = this.#entry(id);
    entry.occurrences++;
    return entry.occurrences;
  }

  addValue(id: string, value: string): void {
    this.#entry(id).values.push(value);
  }

  /**
   * Drop everything bound to an argument so far
   */
  clear(id: string): void {
    this.#entries.delete(id);
  }

  /**
   * Record a declared default for an argument that never occurred
   */
  applyDefault(id: string, value: string): void {
    this.#entries.set(id, { values: [value], occurrences: 0, source: "default" });
  }

  occurrencesOf(id: string): number {
    return this.#entries.get(id)?.occurrences ?? 0;
  }

  valueCount(id: string): number {
    return this.#entries.get(id)?.values.length ?? 0;
  }

  /**
   * Freeze the accumulated matches, ordered by `order`
   */
  build(order: readonly string[]): Binding {
    const sorted = new Map<string, ArgumentMatch>();
    for (const id of order) {
      const entry = this.#entries.get(id);
      if (entry) sorted.set(id, entry);
    }
    return new Binding(sorted);
  }

  #entry(id: string): ArgumentMatch {
    let entry = this.#entries.get(id);
    if (!entry) {
      entry = { values: [], occurrences: 0, source: "argv" };
      this.#entries.set(id, entry);
    }
    return entry;
  }
}

interface FrozenMatch {
  readonly values: readonly string[];
  readonly occurrences: number;
  readonly source: ValueSource;
}

/**
 * Read-only result of binding one command level
 */
export class Binding {
  readonly #entries: ReadonlyMap<string, FrozenMatch>;

  constructor(entries: Map<string, ArgumentMatch>) {
    const frozen = new Map<string, FrozenMatch>();
    for (const [id, entry] of entries) {
      frozen.set(id, Object.freeze({ ...entry, values: Object.freeze([...entry.values]) }));
    }
    this.#entries = frozen;
  }

  /**
   * True when the argument occurred on the command line (defaults do not count)
   */
  isPresent(id: string): boolean {
    return this.occurrencesOf(id) > 0;
  }

  occurrencesOf(id: string): number {
    return this.#entries.get(id)?.occurrences ?? 0;
  }

  /**
   * First bound value, from argv or the declared default
   */
  valueOf(id: string): string | undefined {
    return this.#entries.get(id)?.values[0];
  }

  valuesOf(id: string): string[] {
    return [...(this.#entries.get(id)?.values ?? [])];
  }

  sourceOf(id: string): ValueSource | undefined {
    return this.#entries.get(id)?.source;
  }

  /**
   * Ids with an occurrence or a default, in declaration order
   */
  ids(): string[] {
    return [...this.#entries.keys()];
  }

  get size(): number {
    return this.#entries.size;
  }

  toJSON(): Record<string, ArgumentMatch> {
    const out: Record<string, ArgumentMatch> = {};
    for (const [id, entry] of this.#entries) {
      out[id] = { values: [...entry.values], occurrences: entry.occurrences, source: entry.source };
    }
    return out;
  }
}
