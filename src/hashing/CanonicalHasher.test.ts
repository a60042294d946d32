/**
 * Canonical Hasher Tests
 */

import { describe, it, expect } from 'vitest';
import { createHash } from 'crypto';
import { canonicalize, checkRecordHash, computeRecordHash, hashValue } from './CanonicalHasher.js';
import { SerializationError } from '../core/errors.js';
import { makeSnapshot } from '../testing/fixtures.js';

describe('canonicalize', () => {
  it('sorts keys at every depth and drops whitespace', () => {
    expect(canonicalize({ b: 1, a: { d: [3, 1], c: 'x' } })).toBe('{"a":{"c":"x","d":[3,1]},"b":1}');
  });

  it('keeps array order', () => {
    expect(canonicalize([3, 1, 2])).toBe('[3,1,2]');
  });

  it('drops undefined members and writes dates as ISO strings', () => {
    expect(canonicalize({ a: undefined, at: new Date('2024-01-02T03:04:05Z') })).toBe('{"at":"2024-01-02T03:04:05.000Z"}');
  });

  it('writes negative zero as 0 and keeps shortest number form', () => {
    expect(canonicalize([-0, 0.1, 1e21, 5])).toBe('[0,0.1,1e+21,5]');
  });

  it('rejects non-finite numbers with the offending path', () => {
    expect(() => canonicalize({ odds: { home: Number.NaN } })).toThrow(SerializationError);
    expect(() => canonicalize({ odds: { home: Number.POSITIVE_INFINITY } })).toThrow(/odds\.home/);
  });

  it('rejects functions and undefined array elements', () => {
    expect(() => canonicalize({ f: () => 1 })).toThrow(SerializationError);
    expect(() => canonicalize([1, undefined])).toThrow(/\[1\]/);
  });
});

describe('hashValue', () => {
  it('is SHA-256 of the canonical form in lowercase hex', () => {
    const expected = createHash('sha256').update('{"a":1,"b":2}', 'utf8').digest('hex');
    expect(hashValue({ b: 2, a: 1 })).toBe(expected);
  });

  it('is independent of key insertion order', () => {
    expect(hashValue({ x: 1, y: [1, { q: 2, p: 3 }] })).toBe(hashValue({ y: [1, { p: 3, q: 2 }], x: 1 }));
  });

  it('changes when any value changes', () => {
    expect(hashValue({ a: 1 })).not.toBe(hashValue({ a: 2 }));
  });
});

describe('record hashes', () => {
  it('ignores the generated id so equal content hashes equally', () => {
    const first = makeSnapshot();
    const second = makeSnapshot();
    expect(first.snapshotId).not.toBe(second.snapshotId);
    expect(first.hash).toBe(second.hash);
  });

  it('covers collection time', () => {
    expect(makeSnapshot({ collectedAt: '2024-02-29T18:05:00.000Z' }).hash).not.toBe(makeSnapshot().hash);
  });

  it('detects content that no longer matches the stored hash', () => {
    const snapshot = makeSnapshot();
    const tampered = { ...snapshot, gameId: 'game-2' };
    const check = checkRecordHash('snapshot', tampered);
    expect(check.valid).toBe(false);
    expect(check.expected).toBe(snapshot.hash);
    expect(check.actual).toBe(computeRecordHash('snapshot', tampered));
  });
});
