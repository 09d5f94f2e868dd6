/**
 * Utility functions for working with records
 */

import type { Record } from '../types/index.js';

/**
 * Extract all unique field names from an array of records,
 * in order of first appearance
 */
export function extractFieldNames(records: Record[]): string[] {
  const fields = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) {
      fields.add(key);
    }
  }
  return Array.from(fields);
}

/**
 * True when at least one record carries the field as a key
 */
export function hasField(records: Record[], field: string): boolean {
  return records.some((record) => Object.prototype.hasOwnProperty.call(record, field));
}

export function isPlainObject(value: unknown): value is Record {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}
