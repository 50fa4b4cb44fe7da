/**
 * Scrubber configuration resolution.
 *
 * Merges programmatic overrides with environment variables and applies
 * defaults. The initial flag, the seed patterns and verbosity are all
 * resolved here before a scrubber is created.
 */

import type { PatternInput } from "@logscrub/core";
import { PatternSet, fromPreset, isPresetName, loadPatternFile, type PresetName } from "@logscrub/redact";

export interface ConfigOverrides {
  /** Start enabled. Default: true. */
  enabled?: boolean;
  /** Explicit patterns. Overrides `patternsFile` and `preset`. */
  patterns?: PatternInput | PatternSet;
  /** Path to a pattern file (JSON with comments). Overrides `preset`. */
  patternsFile?: string;
  /** Built-in preset to seed the pattern set. */
  preset?: PresetName;
  /** Print debug diagnostics. */
  verbose?: boolean;
}

/**
 * Fully resolved config with all defaults applied.
 */
export interface ResolvedConfig {
  enabled: boolean;
  patterns: PatternSet;
  verbose: boolean;
}

function presetFromEnv(value: string | undefined): PresetName | undefined {
  if (!value) return undefined;
  if (!isPresetName(value)) {
    throw new Error(`LOGSCRUB_PRESET: unknown preset "${value}"`);
  }
  return value;
}

/**
 * Resolve final scrubber config from environment variables and overrides.
 *
 * Priority: programmatic overrides > environment variables > defaults.
 *
 * Environment variables:
 * - `LOGSCRUB_DISABLED=1` to start with scrubbing off
 * - `LOGSCRUB_PATTERNS_FILE` for a pattern file path
 * - `LOGSCRUB_PRESET` for a built-in preset (escape, cards, secrets, strict)
 * - `LOGSCRUB_VERBOSE=1` for debug diagnostics on stderr
 */
export function resolveConfig(
  overrides?: ConfigOverrides,
  env: NodeJS.ProcessEnv = process.env,
): ResolvedConfig {
  const enabled = overrides?.enabled ?? env.LOGSCRUB_DISABLED !== "1";
  const verbose = overrides?.verbose ?? env.LOGSCRUB_VERBOSE === "1";

  return { enabled, patterns: resolvePatterns(overrides, env), verbose };
}

function resolvePatterns(overrides: ConfigOverrides | undefined, env: NodeJS.ProcessEnv): PatternSet {
  if (overrides?.patterns) {
    return overrides.patterns instanceof PatternSet
      ? overrides.patterns.clone()
      : new PatternSet(overrides.patterns);
  }
  const patternsFile = overrides?.patternsFile || env.LOGSCRUB_PATTERNS_FILE;
  if (patternsFile) return loadPatternFile(patternsFile);
  const preset = overrides?.preset ?? presetFromEnv(env.LOGSCRUB_PRESET);
  return preset ? fromPreset(preset) : new PatternSet();
}
