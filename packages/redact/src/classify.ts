/**
 * Value classification for the redaction walker.
 *
 * Every value is one of four shapes. Only scalars are rewritten;
 * sequences and mappings are walked; anything else is left alone
 * because its internal state cannot be redacted safely.
 */

export type Scalar = string | number | boolean | bigint;

export type Classified =
  | { kind: "scalar"; value: Scalar }
  | { kind: "sequence"; value: unknown[] }
  | { kind: "record"; value: Record<string, unknown> }
  | { kind: "map"; value: Map<unknown, unknown> }
  | { kind: "opaque"; value: unknown };

/** An object literal or `Object.create(null)`; not a class instance. */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== "object") return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function classify(value: unknown): Classified {
  switch (typeof value) {
    case "string":
    case "number":
    case "boolean":
    case "bigint":
      return { kind: "scalar", value };
  }
  if (Array.isArray(value)) return { kind: "sequence", value };
  if (value instanceof Map) return { kind: "map", value };
  if (isPlainObject(value)) return { kind: "record", value };
  return { kind: "opaque", value };
}
