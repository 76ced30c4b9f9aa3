import { EvaluationError } from '../errors.js';
import type { Value, ValueMap } from '../types.js';

export function isMap(value: Value): value is ValueMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function typeName(value: Value): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'list';
  if (isMap(value)) return 'map';
  return typeof value;
}

/** null, false, 0, empty string, empty list and empty map are falsy. */
export function truthy(value: Value): boolean {
  if (value === null) return false;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0 && !Number.isNaN(value);
  if (typeof value === 'string') return value.length > 0;
  if (Array.isArray(value)) return value.length > 0;
  return Object.keys(value).length > 0;
}

export function isEmpty(value: Value): boolean {
  return value === null || value === '' || (Array.isArray(value) && value.length === 0);
}

export function stringify(value: Value): string {
  if (value === null) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'boolean' || typeof value === 'number') return String(value);
  return JSON.stringify(value);
}

export function getAttribute(target: Value, name: string): Value {
  if (!isMap(target)) {
    throw new EvaluationError(`Attribute access '.${name}' is only allowed on maps, got ${typeName(target)}`);
  }
  return Object.hasOwn(target, name) ? target[name] : null;
}

export function getIndex(target: Value, key: Value): Value {
  if (Array.isArray(target) || typeof target === 'string') {
    if (typeof key !== 'number' || !Number.isInteger(key)) {
      throw new EvaluationError(`${typeName(target)} index must be an integer, got ${typeName(key)}`);
    }
    const position = key < 0 ? target.length + key : key;
    if (position < 0 || position >= target.length) {
      throw new EvaluationError(`Index ${key} out of range for ${typeName(target)} of length ${target.length}`);
    }
    return Array.isArray(target) ? target[position] : target.charAt(position);
  }
  if (isMap(target)) {
    if (typeof key !== 'string') throw new EvaluationError(`Map key must be a string, got ${typeName(key)}`);
    return Object.hasOwn(target, key) ? target[key] : null;
  }
  throw new EvaluationError(`Cannot index into ${typeName(target)}`);
}

export function valuesEqual(a: Value, b: Value): boolean {
  if (a === b) return true;
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => valuesEqual(item, b[i]));
  }
  if (isMap(a) && isMap(b)) {
    const keys = Object.keys(a);
    return keys.length === Object.keys(b).length && keys.every(k => Object.hasOwn(b, k) && valuesEqual(a[k], b[k]));
  }
  return false;
}

export function length(value: Value): number {
  if (typeof value === 'string' || Array.isArray(value)) return value.length;
  if (isMap(value)) return Object.keys(value).length;
  throw new EvaluationError(`len() is not defined for ${typeName(value)}`);
}

/**
 * Convert caller-supplied data (form values, environment) into a Value.
 * `undefined` becomes null; anything that is not plain data is rejected.
 */
export function toValue(input: unknown): Value {
  if (input === undefined || input === null) return null;
  if (typeof input === 'string' || typeof input === 'boolean' || typeof input === 'number') return input;
  if (Array.isArray(input)) return input.map(toValue);
  if (typeof input === 'object') {
    const out: ValueMap = {};
    for (const [k, v] of Object.entries(input)) out[k] = toValue(v);
    return out;
  }
  throw new EvaluationError(`Unsupported value of type ${typeof input}`);
}

export function toValueMap(input: Record<string, unknown>): ValueMap {
  const out: ValueMap = {};
  for (const [k, v] of Object.entries(input)) out[k] = toValue(v);
  return out;
}
