/**
 * @logscrub/core
 *
 * Shared types, errors and the diagnostic logger for the logscrub
 * ecosystem. This is the contract layer: every other `@logscrub/*`
 * package depends on it.
 *
 * Zero npm dependencies. Just types and small helpers.
 *
 * @packageDocumentation
 */

// Errors: stable codes for conflicts, missing targets and misuse
export {
  ConfigConflictError,
  MissingTargetError,
  PatternError,
  ScopeMisuseError,
  ScrubError,
  type ScrubErrorCode,
} from "./errors.js";

// Diagnostics: prefixed stderr lines that bypass wrapped consoles
export { createLogger, type LogSink, type Logger, type LoggerOptions } from "./logger.js";

// Core types used across all packages
export type {
  Handler,
  HookRecord,
  HookTarget,
  PatternInput,
  RedactionSide,
  Replacement,
  ReplacementFn,
  ScrubFn,
  TargetKind,
  Wrapper,
} from "./types.js";
