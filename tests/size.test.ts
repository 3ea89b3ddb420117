/**
 * Size Estimation Tests
 */

import { describe, it, expect } from 'vitest';
import { estimateBytes } from '../src/size.js';

describe('estimateBytes', () => {
  it('prices primitives', () => {
    expect(estimateBytes('abc')).toBe(6);
    expect(estimateBytes(42)).toBe(8);
    expect(estimateBytes(10n)).toBe(8);
    expect(estimateBytes(true)).toBe(4);
    expect(estimateBytes(null)).toBe(0);
    expect(estimateBytes(undefined)).toBe(0);
  });

  it('prices arrays and objects', () => {
    // 16 overhead + 2 slots + 2 numbers
    expect(estimateBytes([1, 2])).toBe(48);
    // 16 overhead + slot + key "a" + number
    expect(estimateBytes({ a: 1 })).toBe(34);
  });

  it('prices maps and binary data', () => {
    expect(estimateBytes(new Map([['k', 1]]))).toBe(42);
    expect(estimateBytes(new Uint8Array(10))).toBe(26);
  });

  it('counts shared objects once and terminates on cycles', () => {
    const self: Record<string, unknown> = {};
    self['self'] = self;
    expect(estimateBytes(self)).toBe(32);

    const shared = {};
    expect(estimateBytes([shared, shared])).toBe(16 + 16 + 16);
  });
});
