/**
 * Utility functions for working with sample records
 */

import type { FieldValue, SampleRecord } from '../types/index.js';

const FORBIDDEN_RECORD_KEYS = new Set(['__proto__', 'prototype', 'constructor']);

export function isSafeFieldName(name: string): boolean {
  return name.length > 0 && !FORBIDDEN_RECORD_KEYS.has(name);
}

export function hasField(record: Readonly<SampleRecord>, field: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, field);
}

/** Field value, or undefined when absent */
export function getField(record: Readonly<SampleRecord>, field: string): FieldValue | undefined {
  return hasField(record, field) ? record[field] : undefined;
}

/** String form used for rule triggers and join keys */
export function fieldValueToString(value: FieldValue): string {
  return typeof value === 'number' ? String(value) : value;
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Convert a raw cell value to a field value.
 * null/undefined become an explicit empty string; dates become YYYY-MM-DD.
 * Returns undefined for values with no scalar form (objects, arrays).
 */
export function toFieldValue(value: unknown): FieldValue | undefined {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : String(value);
  if (typeof value === 'boolean' || typeof value === 'bigint') return String(value);
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) return '';
    return `${value.getUTCFullYear()}-${pad(value.getUTCMonth() + 1)}-${pad(value.getUTCDate())}`;
  }
  return undefined;
}

/** Keep only the given fields, in the given order */
export function pickFields(
  record: Readonly<SampleRecord>,
  fields: Iterable<string>
): SampleRecord {
  const picked: SampleRecord = {};
  for (const field of fields) {
    if (hasField(record, field)) {
      picked[field] = record[field];
    }
  }
  return picked;
}

/** Per-sample pipeline files replace '-' with '_' in the sample id */
export function toSampleFileName(sampleId: string): string {
  return sampleId.replace(/-/g, '_');
}
