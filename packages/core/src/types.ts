/**
 * Core types for the logscrub ecosystem.
 *
 * These are the public types that the redaction engine, the hook
 * registry and the facade depend on. Zero external dependencies.
 */

// --- Patterns ---

/**
 * Computes the replacement for a single match.
 *
 * Called with the pattern text that matched and the matched substring.
 */
export type ReplacementFn = (pattern: string, match: string) => string;

/** A literal replacement string or a per-match transform. */
export type Replacement = string | ReplacementFn;

/**
 * Pattern input accepted wherever patterns are added or replaced.
 *
 * A plain object maps pattern text to its replacement. An iterable
 * (such as a `Map`) may also use `RegExp` keys.
 */
export type PatternInput =
  | Readonly<Record<string, Replacement>>
  | Iterable<readonly [string | RegExp, Replacement]>;

// --- Handlers ---

/**
 * Any live handler occupying an interception point.
 *
 * Handlers are opaque to the registry: they are compared by identity
 * and invoked with `Reflect.apply`, never called through this type.
 */
export type Handler = (...args: never[]) => unknown;

/** A wrapping handler installed by the registry. */
export type Wrapper = (this: unknown, ...args: unknown[]) => unknown;

/** Redacts a list of values; the registry's view of the redactor. */
export type ScrubFn = (values: unknown[]) => unknown[];

// --- Interception targets ---

/**
 * "hook" is a signal-style slot that may be empty (like a warning
 * handler); "method" is a named callable that must exist.
 */
export type TargetKind = "hook" | "method";

/**
 * Which side of the call gets redacted.
 *
 * "arguments" redacts before invoking the original; "result" redacts
 * the string the original returns (used for stack formatting, where
 * the sensitive text only exists after formatting).
 */
export type RedactionSide = "arguments" | "result";

/**
 * Capability object for one interception point.
 *
 * Supplied by a platform adapter. The registry only ever reads the live
 * handler, replaces it, and falls back to the default behavior; it never
 * resolves names itself.
 */
export interface HookTarget {
  /** Identifier such as "WARN" or "console::warn". */
  readonly id: string;
  readonly kind: TargetKind;
  readonly redacts: RedactionSide;
  /**
   * Id of the hook whose original handler serves as this hook's
   * fallback. Set on aliases such as "ERROR" (backed by "WARN").
   */
  readonly aliasOf?: string;
  /** Number of leading arguments passed through without redaction. */
  readonly passthrough?: number;
  /** The live handler, or undefined when the slot is empty. */
  get(): Handler | undefined;
  /** Install a handler, or empty the slot with undefined. */
  set(handler: Handler | undefined): void;
  /** Default platform behavior used when there is no original handler. */
  fallback(this: unknown, ...args: unknown[]): unknown;
}

/**
 * Registry bookkeeping for one tracked interception point.
 *
 * `wrapper` is set while this system's handler is installed and `old`
 * holds whatever was live immediately before it.
 */
export interface HookRecord {
  readonly id: string;
  old: Handler | undefined;
  wrapper: Wrapper | undefined;
}
