/**
 * The scrubber: live state, start/stop, and scoped reconfiguration.
 *
 * Wrappers installed by either registry call back into {@link Scrubber}
 * when they run, so they always redact with whichever state is live at
 * that moment, including states pushed after the wrapper was installed.
 */

import {
  ScopeMisuseError,
  createLogger,
  type Logger,
  type PatternInput,
  type Replacement,
} from "@logscrub/core";
import { HookCatalog, HookRegistry, SourceRegistry, type RegistryContext } from "@logscrub/hooks";
import {
  PatternSet,
  Redactor,
  createStats,
  type PatternKeyInput,
  type RedactionStats,
} from "@logscrub/redact";

import { ScrubberState, type ScrubberStateFields } from "./state.js";

/**
 * A configuration request, applied as a new scope on top of the live
 * state (see {@link Scrubber.assign}).
 */
export interface ScrubberConfig {
  /** Turn scrubbing on in the new scope. */
  enable?: boolean;
  /** Turn scrubbing off in the new scope. Conflicts with `enable`. */
  disable?: boolean;
  /** Replace the pattern set. */
  patterns?: PatternInput | PatternSet;
  /** Merge into the pattern set (after `patterns`). */
  addPatterns?: PatternInput;
  removePatterns?: PatternKeyInput;
  hooks?: string[];
  removeHooks?: string[];
  methods?: string[];
  removeMethods?: string[];
  sources?: string[];
  removeSources?: string[];
}

export interface ScrubberOptions {
  enabled?: boolean;
  patterns?: PatternSet;
  catalog?: HookCatalog;
  sources?: SourceRegistry;
  logger?: Logger;
}

function toPatternSet(input: PatternInput | PatternSet): PatternSet {
  return input instanceof PatternSet ? input.clone() : new PatternSet(input);
}

export class Scrubber {
  readonly catalog: HookCatalog;
  readonly sources: SourceRegistry;
  readonly logger: Logger;
  private readonly redactor: Redactor;
  private readonly hookContext: RegistryContext;
  private readonly methodContext: RegistryContext;
  private live: ScrubberState;

  constructor(options: ScrubberOptions = {}) {
    this.catalog = options.catalog ?? new HookCatalog();
    this.sources = options.sources ?? new SourceRegistry();
    this.logger = options.logger ?? createLogger("scrubber");
    this.redactor = new Redactor(() => this.live.patterns);

    const shared = {
      isEnabled: () => this.live.enabled,
      scrub: (values: unknown[]) => this.scrub(values),
      logger: this.logger,
    };
    this.hookContext = { ...shared, resolve: (id) => this.catalog.resolve(id) };
    this.methodContext = { ...shared, resolve: (id) => this.sources.resolve(id) };

    this.live = new ScrubberState({
      enabled: options.enabled ?? true,
      patterns: options.patterns ?? new PatternSet(),
      hooks: new HookRegistry(this.hookContext),
      methods: new HookRegistry(this.methodContext),
    });
  }

  // --- Flag ---

  get enabled(): boolean {
    return this.live.enabled;
  }

  /** Number of scopes currently pushed. */
  get depth(): number {
    return this.live.depth;
  }

  /** Turn on and install every tracked hook, then every tracked method. */
  start(): void {
    this.live.enabled = true;
    this.live.hooks.enableAll();
    this.live.methods.enableAll();
  }

  /** Turn off and restore every tracked method, then every tracked hook. */
  stop(): void {
    this.live.enabled = false;
    this.live.methods.disableAll();
    this.live.hooks.disableAll();
  }

  /**
   * Stop, optionally replace the patterns, and start again.
   *
   * Without patterns this just reinstalls everything, which recovers
   * hooks that another party replaced since they were installed.
   *
   * @returns the patterns now in effect.
   */
  init(patterns?: PatternInput | PatternSet): Record<string, Replacement> {
    const replacement = patterns === undefined ? undefined : toPatternSet(patterns);
    this.stop();
    if (replacement) {
      this.live = new ScrubberState({ ...this.fields(), patterns: replacement });
    }
    this.start();
    return this.live.patterns.toObject();
  }

  // --- Redaction ---

  /** Redact values with the live patterns. Same-length list out. */
  redact(...values: unknown[]): unknown[] {
    return this.redactor.redact(values);
  }

  /** Redact and report what was replaced. */
  redactWithStats(...values: unknown[]): { values: unknown[]; stats: RedactionStats } {
    const stats = createStats();
    return { values: this.redactor.redact(values, stats), stats };
  }

  // --- Patterns ---

  patterns(): Record<string, Replacement> {
    return this.live.patterns.toObject();
  }

  addPatterns(input: PatternInput): void {
    this.live.patterns.add(input);
  }

  /** @returns the number of patterns removed. */
  removePatterns(input: PatternKeyInput): number {
    return this.live.patterns.remove(input);
  }

  // --- Hooks, methods, sources ---

  hooks(): string[] {
    return this.live.hooks.ids();
  }

  methods(): string[] {
    return this.live.methods.ids();
  }

  addHooks(...ids: string[]): void {
    this.live.hooks.addAll(ids);
  }

  removeHooks(...ids: string[]): void {
    this.live.hooks.removeAll(ids);
  }

  addMethods(...ids: string[]): void {
    this.live.methods.addAll(ids);
  }

  removeMethods(...ids: string[]): void {
    this.live.methods.removeAll(ids);
  }

  /** Intercept every method each source exposes right now. */
  addSources(...names: string[]): void {
    for (const name of names) {
      this.live.methods.addAll(this.sources.methodsOf(name));
    }
  }

  /** Stop intercepting every tracked method of each source. */
  removeSources(...names: string[]): void {
    for (const name of names) {
      const prefix = `${name}::`;
      this.live.methods.removeAll(this.live.methods.ids().filter((id) => id.startsWith(prefix)));
    }
  }

  registerSource(name: string, owner: object): void {
    this.sources.register(name, owner);
  }

  // --- Scoping ---

  /**
   * Reconfigure, scope-style.
   *
   * - a config object pushes a new scope built from the live state plus
   *   the requested changes (all-or-nothing);
   * - `undefined` pops back to a copy of the previous scope;
   * - a boolean starts or stops without touching anything else.
   */
  assign(value: ScrubberConfig | boolean | undefined): void {
    if (value === undefined) {
      this.restore();
    } else if (typeof value === "boolean") {
      if (value) this.start();
      else this.stop();
    } else {
      this.push(value);
    }
  }

  /**
   * Run `fn` under a temporary configuration. The previous
   * configuration is restored on every exit path.
   */
  withScrubber<T>(config: ScrubberConfig, fn: () => T): T {
    const depth = this.depth;
    this.push(config);
    try {
      return fn();
    } finally {
      this.restoreTo(depth);
    }
  }

  /** {@link withScrubber} for async callbacks; restores after settling. */
  async withScrubberAsync<T>(config: ScrubberConfig, fn: () => Promise<T>): Promise<T> {
    const depth = this.depth;
    this.push(config);
    try {
      return await fn();
    } finally {
      this.restoreTo(depth);
    }
  }

  private push(config: ScrubberConfig): void {
    if (config.enable && config.disable) {
      throw new ScopeMisuseError("A configuration cannot both enable and disable scrubbing");
    }
    const patterns = config.patterns === undefined ? undefined : toPatternSet(config.patterns);
    const added = config.addPatterns === undefined ? undefined : new PatternSet(config.addPatterns);
    for (const id of config.hooks ?? []) this.catalog.resolve(id);
    for (const id of config.methods ?? []) this.sources.resolve(id);
    for (const name of config.sources ?? []) this.sources.methodsOf(name);

    const depth = this.depth;
    this.live = this.live.snapshot();
    try {
      if (patterns) this.live = new ScrubberState({ ...this.fields(), patterns });
      if (added) this.live.patterns.merge(added);
      if (config.removePatterns !== undefined) this.live.patterns.remove(config.removePatterns);
      if (config.disable) this.stop();
      this.removeHooks(...(config.removeHooks ?? []));
      this.removeMethods(...(config.removeMethods ?? []));
      this.removeSources(...(config.removeSources ?? []));
      this.addHooks(...(config.hooks ?? []));
      this.addMethods(...(config.methods ?? []));
      this.addSources(...(config.sources ?? []));
      if (config.enable) this.start();
    } catch (err: unknown) {
      this.restoreTo(depth);
      throw err;
    }
    this.logger.debug("Entered scope %d", this.depth);
  }

  private restore(): void {
    const parent = this.live.parent;
    if (!parent) {
      this.logger.debug("No previous configuration to restore");
      return;
    }
    this.stop();
    this.live = parent.restoreCopy();
    if (this.live.enabled) this.start();
    this.logger.debug("Restored scope %d", this.depth);
  }

  private restoreTo(depth: number): void {
    while (this.depth > depth) this.restore();
  }

  /** Live state's fields, for building a replacement at the same depth. */
  private fields(): ScrubberStateFields {
    const { enabled, patterns, hooks, methods, parent } = this.live;
    return { enabled, patterns, hooks, methods, parent };
  }

  private scrub(values: unknown[]): unknown[] {
    if (!this.logger.verbose) return this.redactor.redact(values);
    const stats = createStats();
    const result = this.redactor.redact(values, stats);
    if (stats.totalReplacements > 0) {
      const details = Object.entries(stats.byPattern)
        .map(([key, count]) => `${key}=${count}`)
        .join(", ");
      this.logger.debug("Redacted %d match(es): %s", stats.totalReplacements, details);
    }
    return result;
  }
}
