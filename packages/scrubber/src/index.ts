/**
 * @logscrub/scrubber - Keep sensitive values out of diagnostics.
 *
 * Intercepts the process's diagnostic output (console methods,
 * `process.emitWarning`, formatted error stacks, methods of registered
 * sources) and rewrites sensitive matches before the original handler
 * sees them. Call sites don't change.
 *
 * ```typescript
 * import { install, initialize } from '@logscrub/scrubber';
 *
 * install();                                  // WARN, ERROR, DIE, WARNING
 * initialize({ "4007000000027": "DELETED" });
 * console.warn("The card number is 4007000000027.");
 * // The card number is DELETED.
 * ```
 *
 * All functions here act on one process-wide {@link Scrubber}.
 * Tests can swap it with {@link setScrubber}.
 */

import { createLogger, type PatternInput, type Replacement } from "@logscrub/core";
import { HookCatalog, SourceRegistry, type PlatformHookOptions, createPlatformHooks } from "@logscrub/hooks";
import type { PatternKeyInput, PatternSet } from "@logscrub/redact";

import { resolveConfig, type ConfigOverrides } from "./config.js";
import { Scrubber, type ScrubberConfig } from "./scrubber.js";

/** Hooks installed by {@link install} when none are named. */
export const DEFAULT_HOOKS: readonly string[] = ["WARN", "ERROR", "DIE", "WARNING"];

export interface CreateScrubberOptions extends ConfigOverrides {
  /** Where the platform hooks point (console, process, Error). */
  platform?: PlatformHookOptions;
  /** Initial sources, by name. Default: `console`. */
  sources?: Iterable<readonly [string, object]>;
}

/**
 * Create a standalone scrubber. Environment variables fill in whatever
 * `options` leaves out (see {@link resolveConfig}).
 */
export function createScrubber(options: CreateScrubberOptions = {}): Scrubber {
  const resolved = resolveConfig(options);
  return new Scrubber({
    enabled: resolved.enabled,
    patterns: resolved.patterns,
    catalog: new HookCatalog(createPlatformHooks(options.platform)),
    sources: new SourceRegistry(options.sources),
    logger: createLogger("scrubber", { verbose: resolved.verbose }),
  });
}

let current: Scrubber | null = null;

/** The process-wide scrubber, created on first use. */
export function getScrubber(): Scrubber {
  current ??= createScrubber();
  return current;
}

/**
 * Replace the process-wide scrubber (null drops it; the next call
 * creates a fresh one). Does not stop the one being replaced.
 *
 * @returns the previous scrubber, if any.
 */
export function setScrubber(scrubber: Scrubber | null): Scrubber | null {
  const previous = current;
  current = scrubber;
  return previous;
}

export interface InstallOptions {
  /** Hook ids to intercept. Default: {@link DEFAULT_HOOKS}. */
  hooks?: readonly string[];
  /** Sources whose every method is intercepted. */
  sources?: readonly string[];
  /** Patterns merged into the live set. */
  patterns?: PatternInput;
}

/**
 * One-call setup: merge patterns, then intercept the given hooks and
 * sources.
 */
export function install(options: InstallOptions = {}): Scrubber {
  const scrubber = getScrubber();
  if (options.patterns) scrubber.addPatterns(options.patterns);
  scrubber.addHooks(...(options.hooks ?? DEFAULT_HOOKS));
  scrubber.addSources(...(options.sources ?? []));
  return scrubber;
}

/**
 * Stop everything, replace the patterns if given, and start again.
 * Call it after installing your own console or warning handlers to put
 * the scrubber back in front of them.
 */
export function initialize(patterns?: PatternInput | PatternSet): Record<string, Replacement> {
  return getScrubber().init(patterns);
}

/** Redact values by hand. */
export function redact(...values: unknown[]): unknown[] {
  return getScrubber().redact(...values);
}

export function isEnabled(): boolean {
  return getScrubber().enabled;
}

export function enable(): void {
  getScrubber().start();
}

export function disable(): void {
  getScrubber().stop();
}

export function addPattern(patterns: PatternInput): void {
  getScrubber().addPatterns(patterns);
}

/** @returns the number of patterns removed. */
export function removePattern(patterns: PatternKeyInput): number {
  return getScrubber().removePatterns(patterns);
}

export function addHook(...ids: string[]): void {
  getScrubber().addHooks(...ids);
}

export function removeHook(...ids: string[]): void {
  getScrubber().removeHooks(...ids);
}

export function addMethod(...ids: string[]): void {
  getScrubber().addMethods(...ids);
}

export function removeMethod(...ids: string[]): void {
  getScrubber().removeMethods(...ids);
}

export function addSource(...names: string[]): void {
  getScrubber().addSources(...names);
}

export function removeSource(...names: string[]): void {
  getScrubber().removeSources(...names);
}

/** Make an object's methods available as `name::method` and to {@link addSource}. */
export function registerSource(name: string, owner: object): void {
  getScrubber().registerSource(name, owner);
}

/**
 * Scope-style reconfiguration: a config object pushes, `undefined`
 * pops, a boolean starts or stops.
 */
export function scrubberConfig(value: ScrubberConfig | boolean | undefined): void {
  getScrubber().assign(value);
}

export function withScrubber<T>(config: ScrubberConfig, fn: () => T): T {
  return getScrubber().withScrubber(config, fn);
}

export function withScrubberAsync<T>(config: ScrubberConfig, fn: () => Promise<T>): Promise<T> {
  return getScrubber().withScrubberAsync(config, fn);
}

export { Scrubber } from "./scrubber.js";
export type { ScrubberConfig, ScrubberOptions } from "./scrubber.js";
export { ScrubberState } from "./state.js";
export type { ScrubberStateFields } from "./state.js";
export { resolveConfig } from "./config.js";
export type { ConfigOverrides, ResolvedConfig } from "./config.js";
