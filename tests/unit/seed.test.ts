import { describe, it, expect } from 'vitest';
import { contentHash, deterministicHash, stableStringify } from '@/core/seed';

describe('seed', () => {
  describe('deterministicHash', () => {
    it('produces consistent hash for same input', () => {
      expect(deterministicHash('test-input')).toBe(deterministicHash('test-input'));
    });

    it('returns 64-character hex string', () => {
      expect(deterministicHash('any-input')).toMatch(/^[a-f0-9]{64}$/);
    });
  });

  describe('stableStringify', () => {
    it('sorts keys at every depth and drops undefined values', () => {
      const text = stableStringify({ b: { y: 2, x: 1 }, a: [3, { d: null, c: undefined }] });
      expect(text).toBe('{"a":[3,{"d":null}],"b":{"x":1,"y":2}}');
    });

    it('orders keys by code unit', () => {
      expect(stableStringify({ b: 1, B: 2, a: 3 })).toBe('{"B":2,"a":3,"b":1}');
    });
  });

  describe('contentHash', () => {
    it('produces same hash regardless of key order', () => {
      expect(contentHash({ a: 1, b: 2 })).toBe(contentHash({ b: 2, a: 1 }));
    });

    it('changes when a value changes', () => {
      expect(contentHash({ a: 1 })).not.toBe(contentHash({ a: 2 }));
    });
  });
});
