/**
 * @logscrub/redact - Pattern substitution over arbitrary values.
 *
 * Rewrites every match of a set of sensitive-value patterns inside
 * strings, arrays, plain objects and Maps, at any depth. Keys are
 * scrubbed as well as values. Cycles are safe.
 *
 * ```typescript
 * import { PatternSet, Redactor } from '@logscrub/redact';
 *
 * const patterns = new PatternSet({ "4007000000027": "DELETED" });
 * const redactor = new Redactor(patterns);
 * redactor.redact(["card 4007000000027 ok"]); // ["card DELETED ok"]
 * ```
 */

export type { CompiledPattern } from "./rules.js";
export { applyPattern, compilePattern } from "./rules.js";
export type { PatternKeyInput } from "./patterns.js";
export { PatternSet } from "./patterns.js";
export type { Classified, Scalar } from "./classify.js";
export { classify, isPlainObject } from "./classify.js";
export type { PatternSource, RedactionStats } from "./redact.js";
export { Redactor, createStats, redactValues } from "./redact.js";
export type { PresetName } from "./presets.js";
export { PRESETS, isPresetName } from "./presets.js";
export type { PatternFileJson } from "./policy.js";
export { compilePatternFile, fromPreset, loadPatternFile } from "./policy.js";
