import {
  StructuredMap,
  StructuredScalar,
  isStructuredMap,
  toPlain,
} from './structured-value';
import { stringifyJson } from '../common/json';

/** One flattened attribute: dot-joined path and its leaf value. */
export type ClaimPair = readonly [attribute: string, value: StructuredScalar];

/**
 * Flatten a nested attribute document into (path, value) pairs.
 *
 * Nested mappings recurse with `parent.child` paths. Lists are not
 * recursed into: each becomes a single pair holding the list's JSON
 * text. Order is depth-first, in insertion order.
 *
 * @example
 * extractClaims(toStructuredMap({ name: 'Alice', address: { city: 'NY' } }))
 * // [['name', 'Alice'], ['address.city', 'NY']]
 */
export function extractClaims(document: StructuredMap, prefix = ''): ClaimPair[] {
  const claims: ClaimPair[] = [];

  for (const [key, value] of document) {
    const path = prefix ? `${prefix}.${key}` : key;

    if (isStructuredMap(value)) {
      claims.push(...extractClaims(value, path));
    } else if (Array.isArray(value)) {
      claims.push([path, stringifyJson(toPlain(value))]);
    } else {
      claims.push([path, value]);
    }
  }

  return claims;
}

/** Storage form of a claim value: scalars as strings, null stays null. */
export function stringifyClaimValue(value: StructuredScalar): string | null {
  return value === null ? null : String(value);
}
