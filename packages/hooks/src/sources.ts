/**
 * Sources: named groups of callables that can be intercepted together.
 *
 * A source is any mutable object (a console, a CommonJS module's
 * exports, a logger instance) registered under a name. Its methods are
 * addressed as `source::method`, e.g. `console::warn` or `audit::record`.
 */

import { MissingTargetError, type HookTarget } from "@logscrub/core";

import { propertyTarget } from "./targets.js";

const SEPARATOR = "::";

/** Split "source::method" into its parts, or null when malformed. */
export function parseMethodId(id: string): { source: string; method: string } | null {
  const at = id.lastIndexOf(SEPARATOR);
  if (at <= 0 || at + SEPARATOR.length >= id.length) return null;
  return { source: id.slice(0, at), method: id.slice(at + SEPARATOR.length) };
}

export function methodId(source: string, method: string): string {
  return `${source}${SEPARATOR}${method}`;
}

/**
 * Names of every function-valued data property on `owner`, own and
 * inherited (up to, not including, `Object.prototype`). Capitalized
 * names are constructors (`console.Console`) and are skipped.
 */
function functionNames(owner: object): string[] {
  const names: string[] = [];
  const seen = new Set<string>(["constructor"]);
  let current: object | null = owner;
  while (current !== null && current !== Object.prototype) {
    for (const name of Object.getOwnPropertyNames(current)) {
      if (seen.has(name)) continue;
      seen.add(name);
      const descriptor = Object.getOwnPropertyDescriptor(current, name);
      if (typeof descriptor?.value === "function" && !/^[A-Z]/.test(name)) names.push(name);
    }
    current = Object.getPrototypeOf(current);
  }
  return names;
}

export class SourceRegistry {
  private sources = new Map<string, object>();

  constructor(initial: Iterable<readonly [string, object]> = [["console", console]]) {
    for (const [name, owner] of initial) this.register(name, owner);
  }

  register(name: string, owner: object): void {
    if (name.includes(SEPARATOR)) {
      throw new Error(`Source name "${name}" must not contain "${SEPARATOR}"`);
    }
    this.sources.set(name, owner);
  }

  unregister(name: string): boolean {
    return this.sources.delete(name);
  }

  has(name: string): boolean {
    return this.sources.has(name);
  }

  names(): string[] {
    return [...this.sources.keys()];
  }

  /**
   * Method ids of every callable the source currently exposes.
   */
  methodsOf(name: string): string[] {
    return functionNames(this.owner(name)).map((method) => methodId(name, method));
  }

  /**
   * Capability object for one method.
   *
   * Throws MissingTargetError for an unknown source, or when the
   * member is not a function right now.
   */
  resolve(id: string): HookTarget {
    const parsed = parseMethodId(id);
    if (!parsed) {
      throw new MissingTargetError(id, `method ids look like "source${SEPARATOR}method"`);
    }
    const owner = this.owner(parsed.source);
    if (typeof Reflect.get(owner, parsed.method) !== "function") {
      throw new MissingTargetError(id, `"${parsed.method}" is not a function of ${parsed.source}`);
    }
    return propertyTarget(id, owner, parsed.method, {
      kind: "method",
      fallback: () => undefined,
    });
  }

  private owner(name: string): object {
    const owner = this.sources.get(name);
    if (!owner) throw new MissingTargetError(name, "no such source");
    return owner;
  }
}
