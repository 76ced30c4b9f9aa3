import { describe, it, expect } from 'vitest';
import { EvaluationError } from '../errors.js';
import {
  getAttribute,
  getIndex,
  isEmpty,
  length,
  stringify,
  toValue,
  truthy,
  valuesEqual
} from '../utils/value.js';

describe('truthy', () => {
  it('treats empty and zero values as false', () => {
    for (const value of [null, false, 0, '', [], {}]) {
      expect(truthy(value)).toBe(false);
    }
  });

  it('treats everything else as true', () => {
    for (const value of [true, 1, -1, 'no', [0], { a: null }]) {
      expect(truthy(value)).toBe(true);
    }
  });
});

describe('isEmpty', () => {
  it('matches null, empty string and empty list only', () => {
    expect(isEmpty(null)).toBe(true);
    expect(isEmpty('')).toBe(true);
    expect(isEmpty([])).toBe(true);
    expect(isEmpty(0)).toBe(false);
    expect(isEmpty(false)).toBe(false);
    expect(isEmpty({})).toBe(false);
  });
});

describe('stringify', () => {
  it('renders scalars and containers', () => {
    expect(stringify(null)).toBe('');
    expect(stringify(true)).toBe('true');
    expect(stringify(false)).toBe('false');
    expect(stringify(1.5)).toBe('1.5');
    expect(stringify('text')).toBe('text');
    expect(stringify([1, 'a'])).toBe('[1,"a"]');
    expect(stringify({ a: 1 })).toBe('{"a":1}');
  });
});

describe('getAttribute / getIndex', () => {
  const map = { name: 'svc', tags: ['a', 'b', 'c'] };

  it('reads map fields and yields null for missing ones', () => {
    expect(getAttribute(map, 'name')).toBe('svc');
    expect(getAttribute(map, 'missing')).toBeNull();
  });

  it('rejects attribute access on non-maps', () => {
    expect(() => getAttribute('text', 'length')).toThrow(EvaluationError);
  });

  it('indexes lists and strings, including from the end', () => {
    expect(getIndex(map.tags, 0)).toBe('a');
    expect(getIndex(map.tags, -1)).toBe('c');
    expect(getIndex('abc', 1)).toBe('b');
  });

  it('fails on out-of-range or non-integer list indexes', () => {
    expect(() => getIndex(map.tags, 3)).toThrow('Index 3 out of range for list of length 3');
    expect(() => getIndex(map.tags, 0.5)).toThrow(EvaluationError);
    expect(() => getIndex(map.tags, 'x')).toThrow(EvaluationError);
  });

  it('indexes maps by string key', () => {
    expect(getIndex(map, 'name')).toBe('svc');
    expect(getIndex(map, 'nope')).toBeNull();
    expect(() => getIndex(map, 1)).toThrow(EvaluationError);
  });

  it('refuses to index scalars', () => {
    expect(() => getIndex(42, 0)).toThrow('Cannot index into number');
  });
});

describe('valuesEqual', () => {
  it('compares containers structurally', () => {
    expect(valuesEqual([1, { a: [2] }], [1, { a: [2] }])).toBe(true);
    expect(valuesEqual({ a: 1 }, { a: 1, b: 2 })).toBe(false);
    expect(valuesEqual([1], ['1'])).toBe(false);
    expect(valuesEqual(null, null)).toBe(true);
  });
});

describe('length', () => {
  it('counts strings, lists and map keys', () => {
    expect(length('abcd')).toBe(4);
    expect(length([1, 2])).toBe(2);
    expect(length({ a: 1, b: 2, c: 3 })).toBe(3);
    expect(() => length(7)).toThrow('len() is not defined for number');
  });
});

describe('toValue', () => {
  it('converts plain data and maps undefined to null', () => {
    expect(toValue(undefined)).toBeNull();
    expect(toValue({ a: [1, undefined], b: 'x' })).toEqual({ a: [1, null], b: 'x' });
  });

  it('rejects functions', () => {
    expect(() => toValue(() => 1)).toThrow('Unsupported value of type function');
  });
});
