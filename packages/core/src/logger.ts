/**
 * Diagnostic output for logscrub itself.
 *
 * Lines look like `[scrubber] Restored WARN`. They are written straight
 * to stderr, never through `console`, which may itself be wrapped: a
 * report about a hook must not pass back through that hook.
 */

import { format } from "node:util";

/** Receives one fully formatted line (without trailing newline). */
export type LogSink = (line: string) => void;

export interface Logger {
  /** Always printed. */
  warn(message: string, ...args: unknown[]): void;
  /** Printed only when verbose. */
  debug(message: string, ...args: unknown[]): void;
  readonly verbose: boolean;
}

export interface LoggerOptions {
  verbose?: boolean;
  sink?: LogSink;
}

const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

/**
 * Create a prefixed logger.
 *
 * ```typescript
 * const log = createLogger("hooks", { verbose: true });
 * log.debug("Installed %s", "WARN"); // [hooks] Installed WARN
 * ```
 */
export function createLogger(prefix: string, options: LoggerOptions = {}): Logger {
  const sink = options.sink ?? stderrSink;
  const verbose = options.verbose ?? false;

  function emit(message: string, args: unknown[]): void {
    sink(`[${prefix}] ${format(message, ...args)}`);
  }

  return {
    verbose,
    warn(message, ...args) {
      emit(message, args);
    },
    debug(message, ...args) {
      if (verbose) emit(message, args);
    },
  };
}
