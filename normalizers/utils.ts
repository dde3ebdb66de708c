/**
 * Field access helpers for untyped payloads
 *
 * Every accessor returns a null-equivalent instead of throwing, so a missing
 * optional field never aborts an extraction.
 */

export type JsonObject = Record<string, unknown>;

export function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Object at `key`, or an empty object
 */
export function getObject(source: unknown, key: string): JsonObject {
  if (!isObject(source)) return {};
  const value = source[key];
  return isObject(value) ? value : {};
}

/**
 * Array at `key`, or an empty array
 */
export function getArray(source: unknown, key: string): unknown[] {
  if (!isObject(source)) return [];
  const value = source[key];
  return Array.isArray(value) ? value : [];
}

/**
 * String at `key`; numbers are rendered (tracker ids arrive as either)
 */
export function getString(source: unknown, key: string): string | null {
  if (!isObject(source)) return null;
  const value = source[key];
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return null;
}

/**
 * Finite number at `key`
 */
export function getNumber(source: unknown, key: string): number | null {
  if (!isObject(source)) return null;
  const value = source[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

/**
 * Number at `key` after coercion; numeric strings are accepted
 */
export function getNumeric(source: unknown, key: string): number | null {
  return isObject(source) ? coerceNumber(source[key]) : null;
}

export function hasKey(source: unknown, key: string): boolean {
  return isObject(source) && key in source && source[key] !== undefined && source[key] !== null;
}

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const TRAILING_OFFSET = /[+-]\d{2}(:?\d{2})?$/;

/**
 * Normalize a timestamp to UTC ISO8601 format
 *
 * - Already UTC (ends with Z): pass through
 * - With timezone offset: convert to UTC
 * - Date only, or date-time without offset: read as UTC
 * - Unparseable: null
 */
export function normalizeToUTC(timestamp: string | null): string | null {
  if (timestamp === null) {
    return null;
  }

  if (timestamp.endsWith('Z')) {
    return timestamp;
  }

  let candidate: string;
  if (DATE_ONLY.test(timestamp)) {
    candidate = `${timestamp}T00:00:00Z`;
  } else if (TRAILING_OFFSET.test(timestamp)) {
    // Offsets without a colon (+0100) are not accepted by every Date parser
    candidate = timestamp.replace(/([+-]\d{2})(\d{2})$/, '$1:$2');
  } else {
    candidate = `${timestamp}Z`;
  }

  const date = new Date(candidate);
  if (isNaN(date.getTime())) {
    return null;
  }

  return date.toISOString();
}

/**
 * Coerce a raw value to a finite float
 *
 * Numeric strings are accepted; NaN, ±Infinity, blanks, booleans and anything
 * else become null and are left out of aggregation rather than counted as 0.
 */
export function coerceNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed.length === 0) return null;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}
