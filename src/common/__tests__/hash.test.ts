import { describe, it, expect } from 'vitest';
import { deepFreeze, sha256, stableStringify } from '../hash.js';
import { roundTo } from '../numbers.js';

describe('stableStringify', () => {
  it('should ignore key order', () => {
    expect(stableStringify({ b: 1, a: { d: 2, c: 3 } })).toBe('{"a":{"c":3,"d":2},"b":1}');
    expect(sha256({ b: 1, a: 2 })).toBe(sha256({ a: 2, b: 1 }));
  });

  it('should drop undefined fields and keep non-finite numbers distinct', () => {
    expect(stableStringify({ a: undefined, b: null })).toBe('{"b":null}');
    expect(stableStringify([Number.NEGATIVE_INFINITY, 1])).toBe('["-Infinity",1]');
  });
});

describe('deepFreeze', () => {
  it('should freeze nested objects', () => {
    const value = deepFreeze({ outer: { inner: [1, 2] } });
    expect(Object.isFrozen(value.outer.inner)).toBe(true);
  });
});

describe('roundTo', () => {
  it('should round half away from zero', () => {
    expect(roundTo(0.125, 2)).toBe(0.13);
    expect(roundTo(-0.125, 2)).toBe(-0.13);
    expect(roundTo(0.8400000000000001, 2)).toBe(0.84);
  });
});
