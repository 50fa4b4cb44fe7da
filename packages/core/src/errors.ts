/**
 * Error types shared by every logscrub package.
 *
 * Each error carries a stable `code` so callers can branch without
 * matching on message text.
 */

export type ScrubErrorCode =
  | "CONFIG_CONFLICT"
  | "MISSING_TARGET"
  | "SCOPE_MISUSE"
  | "INVALID_PATTERN";

export class ScrubError extends Error {
  readonly code: ScrubErrorCode;

  constructor(code: ScrubErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Another party replaced a handler this system installed.
 *
 * Built for reporting only: disabling a taken-over hook warns with this
 * message and leaves the foreign handler in place.
 */
export class ConfigConflictError extends ScrubError {
  readonly target: string;

  constructor(target: string) {
    super(
      "CONFIG_CONFLICT",
      `Cannot restore "${target}": its handler was replaced by another party; leaving it in place`,
    );
    this.target = target;
  }
}

/** An interception target (hook, source or method) does not exist. */
export class MissingTargetError extends ScrubError {
  readonly target: string;

  constructor(target: string, detail?: string) {
    super(
      "MISSING_TARGET",
      detail ? `Unknown target "${target}": ${detail}` : `Unknown target "${target}"`,
    );
    this.target = target;
  }
}

/** A configuration request asked for contradictory changes. */
export class ScopeMisuseError extends ScrubError {
  constructor(message: string) {
    super("SCOPE_MISUSE", message);
  }
}

/** Pattern text that does not compile as a regular expression. */
export class PatternError extends ScrubError {
  readonly pattern: string;

  constructor(pattern: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("INVALID_PATTERN", `Invalid pattern "${pattern}": ${reason}`);
    this.pattern = pattern;
  }
}
