import { fractionToNumber, parseFraction } from '../core/fraction.js';

/** Raises the caller's error type for a malformed field. */
export type FieldFailure = (message: string) => never;

/** Plain YAML mapping. */
export type YamlRecord = Record<string, unknown>;

export function isYamlRecord(value: unknown): value is YamlRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Reject keys outside `allowed` so typos do not silently fall back to defaults. */
export function rejectUnknownKeys(obj: YamlRecord, allowed: readonly string[], fail: FieldFailure, scope = ''): void {
  for (const key of Object.keys(obj)) {
    if (!allowed.includes(key)) {
      fail(`unknown key '${scope}${key}'`);
    }
  }
}

export function readRequiredString(obj: YamlRecord, key: string, fail: FieldFailure): string {
  const value = obj[key];
  if (typeof value !== 'string' || value.trim().length === 0) {
    return fail(`missing or invalid '${key}'`);
  }
  return value;
}

export function readOptionalString(obj: YamlRecord, key: string, fail: FieldFailure): string | undefined {
  const value = obj[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string') {
    return fail(`'${key}' must be a string`);
  }
  return value;
}

export function readOptionalBoolean(obj: YamlRecord, key: string, fail: FieldFailure): boolean | undefined {
  const value = obj[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'boolean') {
    return fail(`'${key}' must be a boolean`);
  }
  return value;
}

/** Finite number; `n/d` strings are accepted and converted. */
export function readOptionalNumber(obj: YamlRecord, key: string, fail: FieldFailure): number | undefined {
  const value = obj[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string') {
    const parsed = parseFraction(value);
    if (parsed) {
      return fractionToNumber(parsed);
    }
  }
  return fail(`'${key}' must be a finite number`);
}

export function readOptionalPositiveNumber(obj: YamlRecord, key: string, fail: FieldFailure): number | undefined {
  const value = readOptionalNumber(obj, key, fail);
  if (value !== undefined && value <= 0) {
    return fail(`'${key}' must be positive`);
  }
  return value;
}

export function readOptionalNonNegativeNumber(obj: YamlRecord, key: string, fail: FieldFailure): number | undefined {
  const value = readOptionalNumber(obj, key, fail);
  if (value !== undefined && value < 0) {
    return fail(`'${key}' must not be negative`);
  }
  return value;
}

export function readOptionalPositiveInteger(obj: YamlRecord, key: string, fail: FieldFailure): number | undefined {
  const value = obj[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    return fail(`'${key}' must be a positive integer`);
  }
  return value;
}

export function readOptionalRecord(obj: YamlRecord, key: string, fail: FieldFailure): YamlRecord | undefined {
  const value = obj[key];
  if (value === undefined) {
    return undefined;
  }
  if (!isYamlRecord(value)) {
    return fail(`'${key}' must be an object`);
  }
  return value;
}

export function readOptionalArray(obj: YamlRecord, key: string, fail: FieldFailure): unknown[] | undefined {
  const value = obj[key];
  if (value === undefined) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    return fail(`'${key}' must be an array`);
  }
  return value;
}
