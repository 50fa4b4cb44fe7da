/**
 * @logscrub/hooks
 *
 * Interception points and the registry that wraps them. Targets are
 * capability objects over a mutable slot (`console.warn`,
 * `process.emitWarning`, a method on a registered source); the registry
 * installs redacting wrappers, restores the originals, and reports when
 * another party has taken a slot over.
 *
 * Depends only on Node.js built-ins and `@logscrub/core`.
 *
 * @packageDocumentation
 */

// Registry: wrap / unwrap / idempotence / conflict detection
export { HookRegistry } from "./registry.js";
export type { RegistryContext } from "./registry.js";

// Platform adapter: well-known hooks and generic property targets
export {
  HookCatalog,
  createPlatformHooks,
  formatStack,
  isHandler,
  propertyTarget,
} from "./targets.js";
export type { PlatformHookOptions, PropertyTargetOptions, TextSink } from "./targets.js";

// Sources: named groups of methods for bulk interception
export { SourceRegistry, methodId, parseMethodId } from "./sources.js";
