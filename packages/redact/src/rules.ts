/**
 * Compiled pattern type.
 *
 * Patterns are the atomic unit of the redaction engine. Each one pairs
 * a global regex with the replacement for its matches. The key is the
 * pattern text the caller registered; it identifies the entry in a
 * PatternSet and is what function replacements receive.
 */

import { PatternError, type Replacement } from "@logscrub/core";

export interface CompiledPattern {
  /** Pattern text as registered (a RegExp key uses its `toString()`). */
  key: string;
  /** Compiled matcher. Always has the global flag. */
  pattern: RegExp;
  replacement: Replacement;
}

/**
 * Compile pattern text (or a RegExp) into a global matcher.
 *
 * Text may start with (?i) to request case-insensitive matching. This
 * is converted to the "i" flag since JS doesn't support inline flags.
 */
export function compilePattern(source: string | RegExp, replacement: Replacement): CompiledPattern {
  if (source instanceof RegExp) {
    const flags = source.flags.includes("g") ? source.flags : `${source.flags}g`;
    return {
      key: source.toString(),
      pattern: new RegExp(source.source, flags),
      replacement,
    };
  }

  let flags = "g";
  let text = source;
  if (text.startsWith("(?i)")) {
    flags += "i";
    text = text.slice(4);
  }

  let pattern: RegExp;
  try {
    pattern = new RegExp(text, flags);
  } catch (err: unknown) {
    throw new PatternError(source, err);
  }
  return { key: source, pattern, replacement };
}

/**
 * Apply one compiled pattern to a string.
 *
 * Literal replacements are inserted as-is ("$1" is not expanded).
 * Function replacements run once per match. Returns the new text and
 * the number of matches replaced.
 */
export function applyPattern(text: string, compiled: CompiledPattern): { text: string; count: number } {
  const { key, pattern, replacement } = compiled;
  let count = 0;
  pattern.lastIndex = 0;
  const result = text.replace(pattern, (match) => {
    count++;
    return typeof replacement === "function" ? replacement(key, match) : replacement;
  });
  return { text: result, count };
}
