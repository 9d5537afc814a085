// ============================================================
// Identity Graph Engine — Lossless JSON
//
// Integers beyond Number.MAX_SAFE_INTEGER decode to bigint so
// that two distinct large identifiers never collapse into the
// same claim value. Everything else decodes as JSON.parse would.
// ============================================================

import { parse, stringify, isInteger, isSafeNumber } from 'lossless-json';

function parseNumber(text: string): number | bigint {
  return isInteger(text) && !isSafeNumber(text) ? BigInt(text) : Number(text);
}

export function parseJson(text: string): unknown {
  return parse(text, null, parseNumber);
}

/** JSON text for a decoded value, bigints written as plain digits. */
export function stringifyJson(value: unknown): string {
  return stringify(value) ?? 'null';
}
