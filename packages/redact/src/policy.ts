/**
 * Pattern files for @logscrub/redact.
 *
 * A pattern file is a JSON document describing what to scrub. It can
 * extend a built-in preset and add its own patterns.
 *
 * Pattern file format:
 * {
 *   "extends": "cards",                  // built-in preset (optional)
 *   "patterns": {                        // merged after the preset
 *     "EMP-\\d{5}": "[EMPLOYEE_ID]",
 *     "(?i)session=\\w+": "session=[HIDDEN]"
 *   }
 * }
 */

import fs from "node:fs";

import { PatternSet } from "./patterns.js";
import { PRESETS, isPresetName, type PresetName } from "./presets.js";

export interface PatternFileJson {
  /** Extend a built-in preset. File patterns are added after the preset's. */
  extends?: string;
  /** Pattern text to literal replacement. */
  patterns?: Record<string, string>;
}

/**
 * Strip // comments and trailing commas from JSON-with-comments.
 * Good enough for config files; not a full JSONC parser.
 */
function stripJsonComments(text: string): string {
  // Only whole-line comments are removed, so "//" inside a pattern
  // string on the same line as its key is left alone.
  let result = text.replace(/^\s*\/\/.*$/gm, "");
  result = result.replace(/,\s*([\]}])/g, "$1");
  return result;
}

function isStringRecord(value: unknown): value is Record<string, string> {
  if (value === null || typeof value !== "object" || Array.isArray(value)) return false;
  return Object.values(value).every((v) => typeof v === "string");
}

/**
 * Validate parsed JSON against the pattern file shape.
 */
function parsePatternFile(raw: unknown, origin: string): PatternFileJson {
  if (raw === null || typeof raw !== "object" || Array.isArray(raw)) {
    throw new Error(`Pattern file ${origin} must contain a JSON object`);
  }
  const json: PatternFileJson = {};
  if ("extends" in raw && raw.extends !== undefined) {
    if (typeof raw.extends !== "string") {
      throw new Error(`Pattern file ${origin}: "extends" must be a string`);
    }
    json.extends = raw.extends;
  }
  if ("patterns" in raw && raw.patterns !== undefined) {
    if (!isStringRecord(raw.patterns)) {
      throw new Error(`Pattern file ${origin}: "patterns" must map strings to strings`);
    }
    json.patterns = raw.patterns;
  }
  return json;
}

/**
 * Build a PatternSet from a pattern file document.
 */
export function compilePatternFile(json: PatternFileJson): PatternSet {
  const set = new PatternSet();
  if (json.extends) {
    if (!isPresetName(json.extends)) {
      throw new Error(
        `Unknown preset: "${json.extends}". Available: ${Object.keys(PRESETS).join(", ")}`,
      );
    }
    set.add(PRESETS[json.extends]);
  }
  if (json.patterns) set.add(json.patterns);
  return set;
}

/**
 * Load patterns from a JSON file path. Supports // comments and trailing commas.
 */
export function loadPatternFile(filePath: string): PatternSet {
  const raw = fs.readFileSync(filePath, "utf8");
  const parsed: unknown = JSON.parse(stripJsonComments(raw));
  return compilePatternFile(parsePatternFile(parsed, filePath));
}

/**
 * Create a PatternSet holding a single preset.
 */
export function fromPreset(preset: PresetName): PatternSet {
  return new PatternSet(PRESETS[preset]);
}
