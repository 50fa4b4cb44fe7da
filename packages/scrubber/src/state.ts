/**
 * One configuration bundle: flag, patterns and the two registries.
 *
 * Exactly one state is live at a time. Scoped reconfiguration pushes a
 * by-value snapshot whose `parent` is the state it replaced; leaving the
 * scope goes back to a copy of that parent, so nothing done while the
 * scope was active can leak into the restored configuration.
 */

import type { HookRegistry } from "@logscrub/hooks";
import type { PatternSet } from "@logscrub/redact";

export interface ScrubberStateFields {
  enabled: boolean;
  patterns: PatternSet;
  hooks: HookRegistry;
  methods: HookRegistry;
  parent?: ScrubberState | null;
}

export class ScrubberState {
  enabled: boolean;
  readonly patterns: PatternSet;
  readonly hooks: HookRegistry;
  readonly methods: HookRegistry;
  readonly parent: ScrubberState | null;

  constructor(fields: ScrubberStateFields) {
    this.enabled = fields.enabled;
    this.patterns = fields.patterns;
    this.hooks = fields.hooks;
    this.methods = fields.methods;
    this.parent = fields.parent ?? null;
  }

  /** Number of states below this one. */
  get depth(): number {
    let depth = 0;
    for (let state = this.parent; state; state = state.parent) depth++;
    return depth;
  }

  /** New state copying this one by value, with this one as its parent. */
  snapshot(): ScrubberState {
    return this.copy(this);
  }

  /** Copy of this state that keeps this state's own parent. */
  restoreCopy(): ScrubberState {
    return this.copy(this.parent);
  }

  private copy(parent: ScrubberState | null): ScrubberState {
    return new ScrubberState({
      enabled: this.enabled,
      patterns: this.patterns.clone(),
      hooks: this.hooks.clone(),
      methods: this.methods.clone(),
      parent,
    });
  }
}
