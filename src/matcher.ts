import type { JsonValue, Query, StoreRecord } from './model';
import { InvalidValueError } from './errors';

/**
 * Check whether a record satisfies every (field, value) pair of a query.
 * A field missing from the record never matches, not even against null.
 */
export function matchesQuery(record: StoreRecord, query: Query): boolean {
  for (const [field, expected] of Object.entries(query)) {
    if (!Object.prototype.hasOwnProperty.call(record, field)) {
      return false;
    }
    if (!valuesEqual(record[field], expected)) {
      return false;
    }
  }
  return true;
}

/**
 * Structural equality over JSON values.
 * Primitives compare strictly, arrays by position, objects by key set.
 */
export function valuesEqual(a: JsonValue, b: JsonValue): boolean {
  if (a === b) return true;
  if (a === null || b === null) return false;
  if (typeof a !== 'object' || typeof b !== 'object') return false;

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b)) return false;
    if (a.length !== b.length) return false;
    return a.every((item, i) => valuesEqual(item, b[i]));
  }

  const aKeys = Object.keys(a);
  if (aKeys.length !== Object.keys(b).length) return false;
  return aKeys.every(
    key => Object.prototype.hasOwnProperty.call(b, key) && valuesEqual(a[key], b[key])
  );
}

/**
 * Throw an InvalidValueError unless `value` is a plain object of JSON values.
 */
export function assertRecord(value: unknown, label: string): asserts value is StoreRecord {
  if (!isPlainObject(value)) {
    throw new InvalidValueError(label, `expected an object, got ${describeType(value)}`);
  }
  assertJsonValue(value, label);
}

/**
 * Throw an InvalidValueError unless `value` belongs to the JSON value domain.
 */
export function assertJsonValue(value: unknown, path: string): asserts value is JsonValue {
  checkValue(value, path, new WeakSet<object>());
}

function checkValue(value: unknown, path: string, ancestors: WeakSet<object>): void {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return;
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new InvalidValueError(path, `${value} is not a finite number`);
    }
    return;
  }
  if (typeof value !== 'object' || value === null) {
    throw new InvalidValueError(path, `${describeType(value)} is not a JSON value`);
  }

  if (ancestors.has(value)) {
    throw new InvalidValueError(path, 'circular reference');
  }

  if (Array.isArray(value)) {
    ancestors.add(value);
    value.forEach((item, i) => checkValue(item, `${path}[${i}]`, ancestors));
    ancestors.delete(value);
    return;
  }

  if (!isPlainObject(value)) {
    throw new InvalidValueError(path, `${describeType(value)} is not a JSON value`);
  }

  ancestors.add(value);
  for (const [key, item] of Object.entries(value)) {
    checkValue(item, appendKey(path, key), ancestors);
  }
  ancestors.delete(value);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function appendKey(path: string, key: string): string {
  return /^[A-Za-z_$][\w$]*$/.test(key) ? `${path}.${key}` : `${path}[${JSON.stringify(key)}]`;
}

function describeType(value: unknown): string {
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'object' && value !== null) {
    const name: unknown = value.constructor?.name;
    return typeof name === 'string' && name !== 'Object' ? name : 'object';
  }
  return value === null ? 'null' : typeof value;
}
