import { describe, it, expect } from 'vitest';
import { defaultEquality, jsonEquality } from './equality.js';
import { KeyedMap } from './keyed-map.js';
import type { Equality } from './equality.js';

describe('Equality', () => {
  describe('defaultEquality', () => {
    it('should compare with Object.is', () => {
      expect(defaultEquality.equals(NaN, NaN)).toBe(true);
      expect(defaultEquality.equals(0, -0)).toBe(false);
      expect(defaultEquality.equals({}, {})).toBe(false);
    });

    it('should hash primitives by type and value', () => {
      expect(defaultEquality.hash('1')).toBe('string:1');
      expect(defaultEquality.hash(1)).toBe('number:1');
      expect(defaultEquality.hash(null)).toBe('null');
    });

    it('should hash objects by reference', () => {
      const state = { name: 'idle' };
      expect(defaultEquality.hash(state)).toBe(defaultEquality.hash(state));
      expect(defaultEquality.hash(state)).not.toBe(defaultEquality.hash({ name: 'idle' }));
    });

    it('should hash symbols by identity', () => {
      const a = Symbol('state');
      const b = Symbol('state');
      expect(defaultEquality.hash(a)).toBe(defaultEquality.hash(a));
      expect(defaultEquality.hash(a)).not.toBe(defaultEquality.hash(b));
    });
  });

  describe('jsonEquality', () => {
    it('should ignore key order', () => {
      expect(jsonEquality.equals({ a: 1, b: [1, 2] }, { b: [1, 2], a: 1 })).toBe(true);
      expect(jsonEquality.hash({ b: 2, a: 1 })).toBe('{"a":1,"b":2}');
    });

    it('should distinguish different values', () => {
      expect(jsonEquality.equals({ a: 1 }, { a: 2 })).toBe(false);
      expect(jsonEquality.equals([1, 2], [2, 1])).toBe(false);
    });
  });
});

describe('KeyedMap', () => {
  it('should store values under equal keys', () => {
    const map = new KeyedMap<unknown, number>(jsonEquality);
    map.set({ x: 1 }, 10);

    expect(map.get({ x: 1 })).toBe(10);
    expect(map.has({ x: 2 })).toBe(false);
    expect(map.size).toBe(1);
  });

  it('should overwrite existing keys', () => {
    const map = new KeyedMap<string, number>(defaultEquality);
    map.set('a', 1);
    map.set('a', 2);

    expect(map.get('a')).toBe(2);
    expect(map.size).toBe(1);
  });

  it('should keep colliding keys apart', () => {
    const collide: Equality<string> = {
      equals: (a, b) => a === b,
      hash: () => 'same',
    };
    const map = new KeyedMap<string, number>(collide);
    map.set('a', 1);
    map.set('b', 2);

    expect(map.get('a')).toBe(1);
    expect(map.get('b')).toBe(2);
    expect(map.delete('a')).toBe(true);
    expect(map.get('b')).toBe(2);
    expect(map.size).toBe(1);
  });

  it('should create missing values with ensure()', () => {
    const map = new KeyedMap<string, string[]>(defaultEquality);
    map.ensure('list', () => []).push('first');
    map.ensure('list', () => []).push('second');

    expect(map.get('list')).toEqual(['first', 'second']);
  });

  it('should iterate entries and clear', () => {
    const map = new KeyedMap<string, number>(defaultEquality);
    map.set('a', 1);
    map.set('b', 2);

    expect([...map.entries()]).toEqual([
      ['a', 1],
      ['b', 2],
    ]);
    expect([...map.values()]).toEqual([1, 2]);

    map.clear();
    expect(map.size).toBe(0);
    expect(map.delete('a')).toBe(false);
  });
});
