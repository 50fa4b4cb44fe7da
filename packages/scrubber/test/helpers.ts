/**
 * Fake platform objects so scrubber tests never touch the real console.
 */

import { createLogger } from "@logscrub/core";
import { HookCatalog, SourceRegistry, createPlatformHooks, type PlatformHookOptions } from "@logscrub/hooks";
import { PatternSet } from "@logscrub/redact";

import { Scrubber } from "../src/index.js";

export const CARD = "4007000000027";

export interface FakePlatform {
  /** Lines received by each console method, keyed by method name. */
  calls: Record<string, string[]>;
  console: Record<string, (...args: unknown[]) => void>;
  process: { emitWarning: (...args: unknown[]) => void };
  errorClass: { prepareStackTrace?: (error: unknown, sites: unknown[]) => unknown };
  stdout: string[];
  stderr: string[];
  options: PlatformHookOptions;
}

export function fakePlatform(): FakePlatform {
  const calls: Record<string, string[]> = {};
  const record =
    (name: string) =>
    (...args: unknown[]): void => {
      (calls[name] ??= []).push(args.map(String).join(" "));
    };

  const fakeConsole = {
    warn: record("warn"),
    error: record("error"),
    log: record("log"),
    info: record("info"),
    debug: record("debug"),
    trace: record("trace"),
    assert: record("assert"),
  };
  const fakeProcess = { emitWarning: record("emitWarning") };
  const errorClass: FakePlatform["errorClass"] = {};
  const stdout: string[] = [];
  const stderr: string[] = [];

  return {
    calls,
    console: fakeConsole,
    process: fakeProcess,
    errorClass,
    stdout,
    stderr,
    options: {
      console: fakeConsole,
      process: fakeProcess,
      errorClass,
      stdout: { write: (chunk: string) => stdout.push(chunk) },
      stderr: { write: (chunk: string) => stderr.push(chunk) },
    },
  };
}

export interface TestScrubber {
  scrubber: Scrubber;
  platform: FakePlatform;
  /** Diagnostic lines the scrubber logged. */
  diagnostics: string[];
}

export function testScrubber(
  patterns: Record<string, string> = { [CARD]: "DELETED" },
  options: { enabled?: boolean; verbose?: boolean } = {},
): TestScrubber {
  const platform = fakePlatform();
  const diagnostics: string[] = [];
  const scrubber = new Scrubber({
    enabled: options.enabled,
    patterns: new PatternSet(patterns),
    catalog: new HookCatalog(createPlatformHooks(platform.options)),
    sources: new SourceRegistry([]),
    logger: createLogger("scrubber", { verbose: options.verbose, sink: (line) => diagnostics.push(line) }),
  });
  return { scrubber, platform, diagnostics };
}
