/**
 * Built-in presets for @logscrub/redact.
 *
 * Each preset maps pattern text to a literal replacement. `strict`
 * combines all of them, in the order listed here.
 */

// ---- Escape preset ----
// Terminal escape sequences in log lines can rewrite what an operator
// sees.

const ESCAPE_PATTERNS: Record<string, string> = {
  "\\x1B": "[esc]",
};

// ---- Cards preset ----
// Primary account numbers: 13-19 digits, optionally grouped by single
// spaces or dashes. No Luhn check.

const CARD_PATTERNS: Record<string, string> = {
  "\\b(?:\\d[ -]?){12,18}\\d\\b": "[CARD]",
};

// ---- Secrets preset ----
// High-confidence credential shapes.

const SECRET_PATTERNS: Record<string, string> = {
  "-----BEGIN (?:RSA |EC |DSA |OPENSSH )?PRIVATE KEY-----[\\s\\S]*?-----END (?:RSA |EC |DSA |OPENSSH )?PRIVATE KEY-----":
    "[PRIVATE_KEY]",
  "(?i)(?<=\\bbearer\\s+)[A-Za-z0-9._~+/-]{16,}=*": "[TOKEN]",
  "(?i)(?<=(?:password|passwd|secret|token|api_?key)\\s*[=:]\\s*[\"']?)[^\\s\"']{8,}": "[SECRET]",
};

export type PresetName = "escape" | "cards" | "secrets" | "strict";

export const PRESETS: Record<PresetName, Readonly<Record<string, string>>> = {
  escape: ESCAPE_PATTERNS,
  cards: CARD_PATTERNS,
  secrets: SECRET_PATTERNS,
  strict: { ...ESCAPE_PATTERNS, ...CARD_PATTERNS, ...SECRET_PATTERNS },
};

export function isPresetName(name: string): name is PresetName {
  return Object.hasOwn(PRESETS, name);
}
