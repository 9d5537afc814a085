/**
 * Unit Tests: Claim Extractor
 *
 * Coverage:
 * - Flat and nested attribute paths
 * - Lists kept whole as JSON text
 * - Insertion order
 * - Value stringification for storage
 */

import { extractClaims, stringifyClaimValue } from '../../src/credentials/claim-extractor';
import { toStructuredMap } from '../../src/credentials/structured-value';

describe('extractClaims', () => {
  test('flattens an address document in order', () => {
    expect(
      extractClaims(toStructuredMap({ name: 'Alice', address: { city: 'NY', country: 'USA' } })),
    ).toEqual([
      ['name', 'Alice'],
      ['address.city', 'NY'],
      ['address.country', 'USA'],
    ]);
  });

  test('flattens nested mappings into dot-joined paths', () => {
    const claims = extractClaims(
      toStructuredMap({ name: 'Alice', address: { city: 'NY', geo: { lat: 40.7 } } }),
    );

    expect(claims).toEqual([
      ['name', 'Alice'],
      ['address.city', 'NY'],
      ['address.geo.lat', 40.7],
    ]);
  });

  test('keeps lists whole as JSON text', () => {
    const claims = extractClaims(
      toStructuredMap({ skills: ['ts', 'sql'], history: [{ year: 2020 }] }),
    );

    expect(claims).toEqual([
      ['skills', '["ts","sql"]'],
      ['history', '[{"year":2020}]'],
    ]);
  });

  test('follows document insertion order, depth first', () => {
    const claims = extractClaims(toStructuredMap({ z: 1, a: { c: 2, b: 3 }, m: 4 }));
    expect(claims.map(([path]) => path)).toEqual(['z', 'a.c', 'a.b', 'm']);
  });

  test('emits scalars including null and booleans as is', () => {
    const claims = extractClaims(toStructuredMap({ active: true, nickname: null }));
    expect(claims).toEqual([
      ['active', true],
      ['nickname', null],
    ]);
  });

  test('prefixes paths when given a prefix', () => {
    expect(extractClaims(toStructuredMap({ city: 'NY' }), 'address')).toEqual([
      ['address.city', 'NY'],
    ]);
  });

  test('an empty nested mapping yields nothing', () => {
    expect(extractClaims(toStructuredMap({ extra: {} }))).toEqual([]);
  });
});

describe('stringifyClaimValue', () => {
  test('converts scalars to their string form', () => {
    expect(stringifyClaimValue('Alice')).toBe('Alice');
    expect(stringifyClaimValue(42)).toBe('42');
    expect(stringifyClaimValue(true)).toBe('true');
  });

  test('keeps null as null', () => {
    expect(stringifyClaimValue(null)).toBeNull();
  });
});
