/**
 * Normalizes a nested field value into a mapping.
 */

import { isPlainObject, type Record as DataRecord } from '@contratos/core';
import { parseLiteral } from './literal.js';

export type NestedValueSource = 'object' | 'string' | 'absent';

export type NormalizeResult =
  | { ok: true; value: DataRecord; source: NestedValueSource }
  | { ok: false; reason: string };

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'an array';
  return `a ${typeof value}`;
}

/**
 * Accepts a plain object as-is, decodes string-encoded mappings, and treats
 * null/undefined/blank strings as an absent (empty) mapping. Anything else
 * is a failure with a reason; it never throws.
 */
export function normalizeNestedValue(value: unknown): NormalizeResult {
  if (value === null || value === undefined) {
    return { ok: true, value: {}, source: 'absent' };
  }

  if (isPlainObject(value)) {
    return { ok: true, value, source: 'object' };
  }

  if (typeof value !== 'string') {
    return { ok: false, reason: `expected a mapping, got ${describe(value)}` };
  }

  if (value.trim() === '') {
    return { ok: true, value: {}, source: 'absent' };
  }

  let decoded: unknown;
  try {
    decoded = parseLiteral(value);
  } catch (err) {
    return {
      ok: false,
      reason: `cannot decode string: ${err instanceof Error ? err.message : String(err)}`,
    };
  }

  if (!isPlainObject(decoded)) {
    return { ok: false, reason: `decoded value is ${describe(decoded)}, not a mapping` };
  }

  return { ok: true, value: decoded, source: 'string' };
}
