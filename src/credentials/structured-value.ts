// ============================================================
// Identity Graph Engine — Structured values
//
// Attribute documents are held as Maps so that iteration follows
// the insertion order of the parsed document.
// ============================================================

/** bigint carries integers too large for a number without rounding. */
export type StructuredScalar = string | number | bigint | boolean | null;

export type StructuredValue = StructuredScalar | StructuredList | StructuredMap;

export type StructuredList = StructuredValue[];

export type StructuredMap = Map<string, StructuredValue>;

export function isStructuredMap(value: StructuredValue): value is StructuredMap {
  return value instanceof Map;
}

/**
 * Convert a decoded JSON value. Objects become Maps in key order;
 * bigints (from lossless decoding) are kept; anything else JSON
 * cannot carry (undefined, functions, symbols) becomes null.
 */
export function toStructured(value: unknown): StructuredValue {
  if (value === null) return null;
  if (typeof value === 'string' || typeof value === 'boolean' || typeof value === 'bigint') {
    return value;
  }
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (Array.isArray(value)) return value.map(toStructured);
  if (typeof value === 'object') {
    return new Map(Object.entries(value).map(([k, v]) => [k, toStructured(v)] as const));
  }
  return null;
}

/** Like toStructured, but any non-object input yields an empty mapping. */
export function toStructuredMap(value: unknown): StructuredMap {
  const structured = toStructured(value);
  return isStructuredMap(structured) ? structured : new Map();
}

/** Plain JSON-compatible form. */
export function toPlain(value: StructuredValue): unknown {
  if (isStructuredMap(value)) {
    return Object.fromEntries([...value].map(([k, v]) => [k, toPlain(v)]));
  }
  if (Array.isArray(value)) return value.map(toPlain);
  return value;
}
