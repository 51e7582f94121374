import { FieldType } from '../../types/enums.js';
import type { JsonValue } from '../../types/gateway.types.js';

/**
 * Outcome of checking one value against a declared field type
 */
export type Coercion<T> = { ok: true; value: T } | { ok: false; reason: string };

export const GUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
const NUMERIC_PATTERN = /^-?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?$/;
// ISO 8601 date or date-time, optionally with a UTC offset
const DATE_TIME_PATTERN = /^\d{4}-\d{2}-\d{2}(?:T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:\d{2})?)?$/;

function ok<T>(value: T): Coercion<T> {
  return { ok: true, value };
}

function fail<T>(reason: string): Coercion<T> {
  return { ok: false, reason };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isDateTime(value: string): boolean {
  return DATE_TIME_PATTERN.test(value) && !Number.isNaN(Date.parse(value));
}

/**
 * Deep check that an upstream value is JSON-serializable as-is
 */
function toJson(value: unknown): JsonValue | undefined {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (Array.isArray(value)) {
    const items: JsonValue[] = [];
    for (const item of value) {
      const converted = toJson(item);
      if (converted === undefined) return undefined;
      items.push(converted);
    }
    return items;
  }
  if (isPlainObject(value)) {
    const result: { [key: string]: JsonValue } = {};
    for (const [key, item] of Object.entries(value)) {
      const converted = toJson(item);
      if (converted === undefined) return undefined;
      result[key] = converted;
    }
    return result;
  }
  return undefined;
}

/**
 * Check a REST body value before it is sent upstream. No conversion takes
 * place: clients must send the declared JSON type.
 */
export function checkRequestValue(type: FieldType, value: unknown): Coercion<unknown> {
  if (value === null) {
    return ok(null);
  }
  switch (type) {
    case FieldType.String:
      return typeof value === 'string' ? ok(value) : fail('expected a string');
    case FieldType.Number:
      return typeof value === 'number' && Number.isFinite(value) ? ok(value) : fail('expected a number');
    case FieldType.Integer:
      return Number.isInteger(value) ? ok(value) : fail('expected an integer');
    case FieldType.Boolean:
      return typeof value === 'boolean' ? ok(value) : fail('expected a boolean');
    case FieldType.DateTime:
      return typeof value === 'string' && isDateTime(value) ? ok(value) : fail('expected a date-time string');
    case FieldType.Object:
      return isPlainObject(value) ? ok(value) : fail('expected an object');
    case FieldType.Array:
      return Array.isArray(value) ? ok(value) : fail('expected an array');
  }
}

/**
 * Convert a query string value into a filter literal of the declared type
 */
export function coerceQueryValue(type: FieldType, raw: string): Coercion<string | number | boolean> {
  switch (type) {
    case FieldType.String:
      return ok(raw);
    case FieldType.Number:
      return NUMERIC_PATTERN.test(raw) ? ok(Number(raw)) : fail('expected a number');
    case FieldType.Integer:
      return /^-?\d+$/.test(raw) ? ok(Number(raw)) : fail('expected an integer');
    case FieldType.Boolean:
      if (raw === 'true') return ok(true);
      if (raw === 'false') return ok(false);
      return fail('expected true or false');
    case FieldType.DateTime:
      return isDateTime(raw) ? ok(raw) : fail('expected a date-time');
    case FieldType.Object:
    case FieldType.Array:
      return fail(`fields of type ${type} cannot be filtered`);
  }
}

/**
 * Normalize a native value into the declared REST type. Numeric strings
 * become numbers and "true"/"false" become booleans.
 */
export function coerceResponseValue(type: FieldType, value: unknown): Coercion<JsonValue> {
  if (value === null) {
    return ok(null);
  }
  switch (type) {
    case FieldType.String:
      if (typeof value === 'string') return ok(value);
      if (typeof value === 'number' && Number.isFinite(value)) return ok(String(value));
      return fail('expected a string');
    case FieldType.Number:
    case FieldType.Integer: {
      const number = typeof value === 'number'
        ? value
        : typeof value === 'string' && NUMERIC_PATTERN.test(value.trim()) ? Number(value.trim()) : NaN;
      if (!Number.isFinite(number)) return fail('expected a number');
      if (type === FieldType.Integer && !Number.isInteger(number)) return fail('expected an integer');
      return ok(number);
    }
    case FieldType.Boolean:
      if (typeof value === 'boolean') return ok(value);
      if (value === 'true') return ok(true);
      if (value === 'false') return ok(false);
      return fail('expected a boolean');
    case FieldType.DateTime:
      return typeof value === 'string' && isDateTime(value) ? ok(value) : fail('expected a date-time string');
    case FieldType.Object: {
      const converted = isPlainObject(value) ? toJson(value) : undefined;
      return converted === undefined ? fail('expected an object') : ok(converted);
    }
    case FieldType.Array: {
      const converted = Array.isArray(value) ? toJson(value) : undefined;
      return converted === undefined ? fail('expected an array') : ok(converted);
    }
  }
}

export { isPlainObject };
