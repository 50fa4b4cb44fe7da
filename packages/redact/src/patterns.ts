/**
 * PatternSet: the live mapping from pattern text to replacement.
 *
 * Entries apply in insertion order, each to the output of the one
 * before. When two patterns can match overlapping text the outcome
 * depends on that order; no other precedence is defined.
 */

import type { PatternInput, Replacement } from "@logscrub/core";

import { applyPattern, compilePattern, type CompiledPattern } from "./rules.js";

function isIterableInput(
  input: PatternInput,
): input is Iterable<readonly [string | RegExp, Replacement]> {
  return Symbol.iterator in input;
}

/** Normalize any accepted input shape to [source, replacement] pairs. */
function toPairs(input: PatternInput): Array<readonly [string | RegExp, Replacement]> {
  if (isIterableInput(input)) return [...input];
  return Object.entries(input);
}

export class PatternSet {
  private entriesByKey = new Map<string, CompiledPattern>();

  constructor(input?: PatternInput) {
    if (input) this.add(input);
  }

  /**
   * Merge entries into the set. An existing key keeps its position and
   * takes the new replacement.
   *
   * All entries are compiled before any is stored, so an invalid
   * pattern leaves the set unchanged.
   */
  add(input: PatternInput): this {
    const compiled = toPairs(input).map(([source, replacement]) =>
      compilePattern(source, replacement),
    );
    for (const entry of compiled) {
      this.entriesByKey.set(entry.key, entry);
    }
    return this;
  }

  /** Copy every entry of `other` into this set, keeping its order. */
  merge(other: PatternSet): this {
    for (const entry of other.entries()) {
      this.entriesByKey.set(entry.key, entry);
    }
    return this;
  }

  /**
   * Remove entries by key. Accepts the same shapes as {@link add}
   * (replacements are ignored) or a plain list of keys.
   *
   * @returns the number of entries removed.
   */
  remove(input: PatternKeyInput): number {
    let removed = 0;
    for (const item of toKeyList(input)) {
      const key = typeof item === "string" ? item : item.toString();
      if (this.entriesByKey.delete(key)) removed++;
    }
    return removed;
  }

  has(key: string): boolean {
    return this.entriesByKey.has(key);
  }

  get(key: string): Replacement | undefined {
    return this.entriesByKey.get(key)?.replacement;
  }

  clear(): void {
    this.entriesByKey.clear();
  }

  get size(): number {
    return this.entriesByKey.size;
  }

  keys(): string[] {
    return [...this.entriesByKey.keys()];
  }

  /** Compiled entries in application order. */
  entries(): readonly CompiledPattern[] {
    return [...this.entriesByKey.values()];
  }

  /** Plain object view, keyed by pattern text. */
  toObject(): Record<string, Replacement> {
    const result: Record<string, Replacement> = {};
    for (const [key, entry] of this.entriesByKey) {
      result[key] = entry.replacement;
    }
    return result;
  }

  /**
   * Independent copy. Compiled regexes are shared; they are only used
   * through {@link applyPattern}, which resets `lastIndex` first.
   */
  clone(): PatternSet {
    const copy = new PatternSet();
    for (const [key, entry] of this.entriesByKey) {
      copy.entriesByKey.set(key, entry);
    }
    return copy;
  }

  /**
   * Run every pattern over `text`, left to right.
   *
   * @param onMatch - Called with the key and count of each pattern that matched.
   */
  apply(text: string, onMatch?: (key: string, count: number) => void): string {
    let result = text;
    for (const entry of this.entriesByKey.values()) {
      const applied = applyPattern(result, entry);
      result = applied.text;
      if (applied.count > 0) onMatch?.(entry.key, applied.count);
    }
    return result;
  }
}

/** Keys to remove: any pattern input, or bare pattern texts and regexes. */
export type PatternKeyInput = PatternInput | Iterable<string | RegExp>;

function isIterableKeys(
  input: PatternKeyInput,
): input is Exclude<PatternKeyInput, Readonly<Record<string, Replacement>>> {
  return Symbol.iterator in input;
}

function toKeyList(input: PatternKeyInput): Array<string | RegExp> {
  if (!isIterableKeys(input)) return Object.keys(input);
  const keys: Array<string | RegExp> = [];
  for (const item of input) {
    keys.push(typeof item === "string" || item instanceof RegExp ? item : item[0]);
  }
  return keys;
}
