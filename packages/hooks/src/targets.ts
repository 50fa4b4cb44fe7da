/**
 * Interception targets: the platform adapter.
 *
 * A target is a capability object over one mutable slot: read the live
 * handler, replace it, and fall back to the default behavior when there
 * is no original. Everything else about wrapping lives in the registry.
 *
 * Well-known hooks for Node:
 *   WARN     console.warn
 *   ERROR    console.error          (alias of WARN)
 *   LOG      console.log
 *   INFO     console.info           (alias of LOG)
 *   DEBUG    console.debug          (alias of LOG)
 *   TRACE    console.trace
 *   ASSERT   console.assert         (condition passed through as-is)
 *   WARNING  process.emitWarning
 *   DIE      Error.prepareStackTrace (redacts the formatted stack)
 */

import { format } from "node:util";

import {
  MissingTargetError,
  type Handler,
  type HookTarget,
  type RedactionSide,
  type TargetKind,
} from "@logscrub/core";

export function isHandler(value: unknown): value is Handler {
  return typeof value === "function";
}

export interface PropertyTargetOptions {
  kind?: TargetKind;
  redacts?: RedactionSide;
  aliasOf?: string;
  passthrough?: number;
  fallback: (this: unknown, ...args: unknown[]) => unknown;
}

/**
 * Target over a property of an object, such as `console.warn`.
 *
 * The slot is read and written through `Reflect`, so the owner can be
 * any object: a console, a module's exports, a logger instance.
 */
export function propertyTarget(
  id: string,
  owner: object,
  key: PropertyKey,
  options: PropertyTargetOptions,
): HookTarget {
  return {
    id,
    kind: options.kind ?? "hook",
    redacts: options.redacts ?? "arguments",
    aliasOf: options.aliasOf,
    passthrough: options.passthrough,
    get() {
      const value: unknown = Reflect.get(owner, key);
      return isHandler(value) ? value : undefined;
    },
    set(handler) {
      Reflect.set(owner, key, handler);
    },
    fallback: options.fallback,
  };
}

/** Minimal writable the fallbacks print to. */
export interface TextSink {
  write(chunk: string): unknown;
}

function writeLine(sink: TextSink, prefix = ""): (...args: unknown[]) => void {
  return (...args) => {
    sink.write(`${prefix}${format(...args)}\n`);
  };
}

/** Prints like Node's console.assert: only when the condition is falsy. */
function assertLine(sink: TextSink): (...args: unknown[]) => void {
  const write = writeLine(sink, "Assertion failed: ");
  return (...args) => {
    const [condition, ...data] = args;
    if (condition) return;
    if (data.length === 0) sink.write("Assertion failed\n");
    else write(...data);
  };
}

/**
 * Default stack formatting, matching V8's own layout:
 *
 *   Error: message
 *       at fn (file.js:1:2)
 */
export function formatStack(...args: unknown[]): string {
  const [error, sites] = args;
  let header: string;
  try {
    header = String(error);
  } catch {
    header = "Error";
  }
  if (!Array.isArray(sites)) return header;
  return header + sites.map((site) => `\n    at ${String(site)}`).join("");
}

export interface PlatformHookOptions {
  /** Console whose methods back the console hooks. Default: the global console. */
  console?: object;
  /** Object exposing `emitWarning`. Default: `process`. */
  process?: object;
  /** Object exposing `prepareStackTrace`. Default: the global `Error`. */
  errorClass?: object;
  stdout?: TextSink;
  stderr?: TextSink;
}

/**
 * Build the well-known hook targets for this process.
 */
export function createPlatformHooks(options: PlatformHookOptions = {}): HookTarget[] {
  const owner = options.console ?? console;
  const proc = options.process ?? process;
  const errorClass = options.errorClass ?? Error;
  const stdout = options.stdout ?? process.stdout;
  const stderr = options.stderr ?? process.stderr;

  return [
    propertyTarget("WARN", owner, "warn", { fallback: writeLine(stderr) }),
    propertyTarget("ERROR", owner, "error", { aliasOf: "WARN", fallback: writeLine(stderr) }),
    propertyTarget("LOG", owner, "log", { fallback: writeLine(stdout) }),
    propertyTarget("INFO", owner, "info", { aliasOf: "LOG", fallback: writeLine(stdout) }),
    propertyTarget("DEBUG", owner, "debug", { aliasOf: "LOG", fallback: writeLine(stdout) }),
    propertyTarget("TRACE", owner, "trace", { fallback: writeLine(stderr, "Trace: ") }),
    propertyTarget("ASSERT", owner, "assert", { passthrough: 1, fallback: assertLine(stderr) }),
    propertyTarget("WARNING", proc, "emitWarning", { fallback: writeLine(stderr, "Warning: ") }),
    propertyTarget("DIE", errorClass, "prepareStackTrace", {
      redacts: "result",
      fallback: formatStack,
    }),
  ];
}

/**
 * Named signal-style hooks known to this process.
 *
 * Starts with the platform hooks; callers can define more, for example
 * a handler slot on their own error reporter.
 */
export class HookCatalog {
  private targets = new Map<string, HookTarget>();

  constructor(targets: Iterable<HookTarget> = createPlatformHooks()) {
    for (const target of targets) this.define(target);
  }

  /** Add or replace a hook definition. */
  define(target: HookTarget): void {
    this.targets.set(target.id, target);
  }

  has(id: string): boolean {
    return this.targets.has(id);
  }

  ids(): string[] {
    return [...this.targets.keys()];
  }

  resolve(id: string): HookTarget {
    const target = this.targets.get(id);
    if (!target) {
      throw new MissingTargetError(id, `no such hook (known: ${this.ids().join(", ")})`);
    }
    return target;
  }
}
