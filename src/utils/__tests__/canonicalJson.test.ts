import { describe, it, expect } from 'vitest';
import { canonicalHash, canonicalJson } from '../canonicalJson.js';
import { deepFreeze } from '../freeze.js';

describe('canonicalJson', () => {
  it('sorts keys recursively', () => {
    expect(canonicalJson({ b: 1, a: { d: [2, { z: 1, y: 0 }], c: 'x' } })).toBe(
      '{"a":{"c":"x","d":[2,{"y":0,"z":1}]},"b":1}'
    );
  });

  it('omits undefined members and nulls non-finite numbers', () => {
    expect(canonicalJson({ a: undefined, b: Number.NaN, c: null })).toBe('{"b":null,"c":null}');
  });

  it('hashes equal content the same regardless of key order', () => {
    expect(canonicalHash({ x: 1, y: [1, 2] })).toBe(canonicalHash({ y: [1, 2], x: 1 }));
    expect(canonicalHash({ x: 1 })).not.toBe(canonicalHash({ x: 2 }));
  });
});

describe('deepFreeze', () => {
  it('freezes nested objects and arrays', () => {
    const value = deepFreeze({ list: [{ name: 'a' }] });

    expect(Object.isFrozen(value)).toBe(true);
    expect(Object.isFrozen(value.list)).toBe(true);
    expect(Object.isFrozen(value.list[0])).toBe(true);
  });
});
