/**
 * Redaction engine.
 *
 * Walks arbitrary values, applying the live PatternSet to every scalar.
 * Arrays, plain objects and Maps are rewritten in place so the caller's
 * own references see the redacted data; keys are redacted too, and an
 * entry whose key changes moves to the new key. Frozen, sealed and
 * non-extensible composites, or ones with read-only properties, can't
 * be rewritten, so a redacted copy takes their place instead.
 */

import { classify, type Classified } from "./classify.js";
import type { PatternSet } from "./patterns.js";

export interface RedactionStats {
  /** Total number of replacements made across all patterns. */
  totalReplacements: number;
  /** Per-pattern replacement counts. Only includes patterns that matched. */
  byPattern: Record<string, number>;
}

/**
 * Create fresh stats for a redaction pass.
 */
export function createStats(): RedactionStats {
  return { totalReplacements: 0, byPattern: {} };
}

/** A fixed set, or a getter returning whichever set is live right now. */
export type PatternSource = PatternSet | (() => PatternSet);

/** State shared by every value in one top-level call. */
interface Pass {
  patterns: PatternSet;
  /** Each composite walked so far, mapped to what replaced it. */
  visited: Map<object, unknown>;
  stats: RedactionStats | null;
}

/** An own data property that can be overwritten and deleted. */
function isEditable(owner: object, key: string): boolean {
  const descriptor = Object.getOwnPropertyDescriptor(owner, key);
  return descriptor?.writable === true && descriptor.configurable === true;
}

/** Whether every entry of `owner` can be rewritten in place. */
function canEditInPlace(owner: object): boolean {
  return Object.isExtensible(owner) && Object.keys(owner).every((key) => isEditable(owner, key));
}

/**
 * Write redacted entries back: unchanged keys keep their position,
 * moved keys are deleted and re-added at the end, overwriting any
 * entry already under the new key.
 */
function writeEntries<K>(
  entries: ReadonlyArray<readonly [K, K, unknown]>,
  remove: (key: K) => void,
  set: (key: K, value: unknown) => void,
): void {
  for (const [key, newKey] of entries) if (!Object.is(newKey, key)) remove(key);
  for (const [key, newKey, value] of entries) if (Object.is(newKey, key)) set(key, value);
  for (const [key, newKey, value] of entries) if (!Object.is(newKey, key)) set(newKey, value);
}

export class Redactor {
  private readonly source: PatternSource;

  constructor(source: PatternSource) {
    this.source = source;
  }

  /** The pattern set this redactor applies, resolved now. */
  get patterns(): PatternSet {
    return typeof this.source === "function" ? this.source() : this.source;
  }

  /**
   * Redact each value of a variadic call.
   *
   * Returns a new list of the same length. Scalars come back as
   * strings; composites come back as the same (now redacted) objects,
   * or as redacted copies when they can't be edited. A composite
   * reachable twice, including through a cycle, is walked once and
   * resolves to the same result every time.
   *
   * @param stats - Mutable stats object; updated with replacement counts.
   */
  redact(values: readonly unknown[], stats?: RedactionStats): unknown[] {
    const pass: Pass = { patterns: this.patterns, visited: new Map(), stats: stats ?? null };
    if (pass.patterns.size === 0) return [...values];
    return values.map((value) => this.walk(classify(value), pass));
  }

  /** Redact a single string. */
  redactText(text: string, stats?: RedactionStats): string {
    return this.scrubText(text, { patterns: this.patterns, visited: new Map(), stats: stats ?? null });
  }

  private scrubText(text: string, pass: Pass): string {
    const { stats } = pass;
    if (!stats) return pass.patterns.apply(text);
    return pass.patterns.apply(text, (key, count) => {
      stats.totalReplacements += count;
      stats.byPattern[key] = (stats.byPattern[key] ?? 0) + count;
    });
  }

  private walk(item: Classified, pass: Pass): unknown {
    switch (item.kind) {
      case "scalar":
        return this.scrubText(String(item.value), pass);
      case "opaque":
        return item.value;
    }

    if (pass.visited.has(item.value)) return pass.visited.get(item.value);

    switch (item.kind) {
      case "sequence":
        return this.walkSequence(item.value, pass);
      case "record":
        return this.walkRecord(item.value, pass);
      case "map":
        return this.walkMap(item.value, pass);
    }
  }

  private walkSequence(list: unknown[], pass: Pass): unknown[] {
    const target: unknown[] = canEditInPlace(list) ? list : [];
    pass.visited.set(list, target);
    for (let i = 0; i < list.length; i++) {
      target[i] = this.walk(classify(list[i]), pass);
    }
    return target;
  }

  private walkRecord(record: Record<string, unknown>, pass: Pass): Record<string, unknown> {
    const inPlace = canEditInPlace(record);
    const target: Record<string, unknown> = inPlace ? record : {};
    pass.visited.set(record, target);

    const entries = Object.keys(record).map(
      (key) => [key, this.scrubText(key, pass), this.walk(classify(record[key]), pass)] as const,
    );
    writeEntries(
      entries,
      (key) => {
        if (inPlace) delete target[key];
      },
      (key, value) => {
        target[key] = value;
      },
    );
    return target;
  }

  private walkMap(map: Map<unknown, unknown>, pass: Pass): Map<unknown, unknown> {
    pass.visited.set(map, map);
    const entries = [...map].map(
      ([key, value]) =>
        [key, typeof key === "string" ? this.scrubText(key, pass) : key, this.walk(classify(value), pass)] as const,
    );
    writeEntries(
      entries,
      (key) => map.delete(key),
      (key, value) => map.set(key, value),
    );
    return map;
  }
}

/**
 * Redact values against a fixed pattern set.
 *
 * Convenience for one-off use; long-lived callers should keep a
 * {@link Redactor}.
 */
export function redactValues(
  values: readonly unknown[],
  patterns: PatternSet,
  stats?: RedactionStats,
): unknown[] {
  return new Redactor(patterns).redact(values, stats);
}
