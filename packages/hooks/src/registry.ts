/**
 * Hook registry.
 *
 * Tracks, per interception point, the handler that was live before this
 * system took over ("old") and the wrapper it installed. Enabling is
 * idempotent: a point whose live handler is already our wrapper is left
 * alone. Disabling only restores "old" while our wrapper is still the
 * live handler; if someone else has installed their own handler since,
 * that is a conflict, reported and left in place.
 */

import {
  ConfigConflictError,
  MissingTargetError,
  type Handler,
  type HookRecord,
  type HookTarget,
  type Logger,
  type ScrubFn,
  type Wrapper,
} from "@logscrub/core";

/** What a registry needs from the state that owns it. */
export interface RegistryContext {
  /** Global on/off flag. Enabling while off is a silent no-op. */
  isEnabled(): boolean;
  /** Redacts against whatever patterns are live when the wrapper runs. */
  scrub: ScrubFn;
  /** Capability lookup; throws MissingTargetError for unknown ids. */
  resolve(id: string): HookTarget;
  logger: Logger;
}

export class HookRegistry {
  private readonly context: RegistryContext;
  private records = new Map<string, HookRecord>();

  constructor(context: RegistryContext, records: Iterable<HookRecord> = []) {
    this.context = context;
    for (const record of records) {
      this.records.set(record.id, { ...record });
    }
  }

  has(id: string): boolean {
    return this.records.has(id);
  }

  /** Tracked ids in registration order. */
  ids(): string[] {
    return [...this.records.keys()];
  }

  /** Copy of the record for `id`, if tracked. */
  record(id: string): HookRecord | undefined {
    const record = this.records.get(id);
    return record ? { ...record } : undefined;
  }

  /** Whether this registry's wrapper is currently installed for `id`. */
  isActive(id: string): boolean {
    const wrapper = this.records.get(id)?.wrapper;
    return wrapper !== undefined && this.context.resolve(id).get() === wrapper;
  }

  /**
   * Track `id` and enable it. No-op if already tracked.
   *
   * The target is resolved before anything is recorded, so an unknown
   * id throws MissingTargetError and leaves the registry unchanged.
   */
  add(id: string): void {
    if (this.records.has(id)) return;
    this.context.resolve(id);
    this.records.set(id, { id, old: undefined, wrapper: undefined });
    try {
      this.enable(id);
    } catch (err: unknown) {
      this.records.delete(id);
      throw err;
    }
  }

  /**
   * Install the wrapper for a tracked id, capturing the live handler as
   * the one to delegate to and to restore later.
   */
  enable(id: string): void {
    if (!this.context.isEnabled()) return;
    const record = this.records.get(id);
    if (!record) return;

    const target = this.context.resolve(id);
    const live = target.get();
    if (record.wrapper !== undefined && live === record.wrapper) return;
    if (target.kind === "method" && live === undefined) {
      throw new MissingTargetError(id, "method no longer exists");
    }

    record.old = live;
    record.wrapper = this.wrap(target, live);
    target.set(record.wrapper);
    this.context.logger.debug("Installed %s", id);
  }

  /**
   * Restore the handler that was live before our wrapper.
   */
  disable(id: string): void {
    const record = this.records.get(id);
    if (!record || record.wrapper === undefined) return;

    let target: HookTarget;
    try {
      target = this.context.resolve(id);
    } catch (err: unknown) {
      if (!(err instanceof MissingTargetError)) throw err;
      this.context.logger.warn("Cannot restore %s: %s", id, err.message);
      return;
    }

    const live = target.get();
    if (live === record.wrapper) {
      target.set(record.old);
    } else if (live !== record.old) {
      this.context.logger.warn(new ConfigConflictError(id).message);
      return;
    }
    record.old = undefined;
    record.wrapper = undefined;
    this.context.logger.debug("Restored %s", id);
  }

  /** Disable, then forget `id`. The record is dropped even after a conflict. */
  remove(id: string): void {
    if (!this.records.has(id)) return;
    this.disable(id);
    this.records.delete(id);
  }

  /**
   * Add several ids in order. Stops at the first failure; ids before it
   * stay registered.
   */
  addAll(ids: Iterable<string>): void {
    for (const id of ids) this.add(id);
  }

  removeAll(ids: Iterable<string>): void {
    for (const id of ids) this.remove(id);
  }

  enableAll(): void {
    for (const id of this.ids()) this.enable(id);
  }

  /** Disable in reverse registration order, so nested wrappers unwind cleanly. */
  disableAll(): void {
    for (const id of this.ids().reverse()) this.disable(id);
  }

  /**
   * Independent copy of the bookkeeping. Handlers are shared by
   * identity; the records themselves are not.
   */
  clone(context: RegistryContext = this.context): HookRegistry {
    return new HookRegistry(context, this.records.values());
  }

  /**
   * The handler `id` had before this system took over: the captured
   * "old" while wrapped, otherwise whatever is live.
   */
  originalOf(id: string): Handler | undefined {
    const record = this.records.get(id);
    if (record?.wrapper !== undefined) return record.old;
    try {
      return this.context.resolve(id).get();
    } catch (err: unknown) {
      if (err instanceof MissingTargetError) return undefined;
      throw err;
    }
  }

  /**
   * Build the wrapper for a target. Arguments are redacted before the
   * original (or fallback) runs; "result" targets redact what it returns.
   */
  private wrap(target: HookTarget, old: Handler | undefined): Wrapper {
    const { scrub } = this.context;
    const passthrough = target.passthrough ?? 0;

    const invoke = (self: unknown, args: unknown[]): unknown => {
      if (old) return Reflect.apply(old, self, args);
      const aliased = target.aliasOf ? this.originalOf(target.aliasOf) : undefined;
      if (aliased) return Reflect.apply(aliased, self, args);
      return Reflect.apply(target.fallback, self, args);
    };

    if (target.redacts === "result") {
      return function scrubbedResult(this: unknown, ...args: unknown[]): unknown {
        const result = invoke(this, args);
        return typeof result === "string" ? scrub([result])[0] : result;
      };
    }

    return function scrubbed(this: unknown, ...args: unknown[]): unknown {
      const clean =
        passthrough > 0
          ? [...args.slice(0, passthrough), ...scrub(args.slice(passthrough))]
          : scrub(args);
      return invoke(this, clean);
    };
  }
}
