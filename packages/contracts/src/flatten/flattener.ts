/**
 * RecordFlattener
 *
 * Hoists values out of nested fields into top-level columns.
 */

import {
  createSilentLogger,
  hasField,
  isPlainObject,
  type Logger,
  type Record as DataRecord,
} from '@contratos/core';
import { validateFlattenSchema, type ColumnPath, type FlattenSchema } from './flatten-schema.js';
import { normalizeNestedValue } from './nested-value.js';

export interface FlattenWarning {
  /** Nested field that could not be decoded */
  field: string;
  /** Index of the record in the input table */
  index: number;
  reason: string;
}

export interface FlattenOutcome {
  records: DataRecord[];
  /** Nested fields that were present and flattened */
  flattenedFields: string[];
  warnings: FlattenWarning[];
}

/**
 * Value at a one- or two-segment path, or null when any step is missing.
 * A string-encoded intermediate mapping is decoded as well.
 */
export function extractPath(mapping: DataRecord, path: ColumnPath): unknown {
  const head = mapping[path[0]];
  const second = path.length === 2 ? path[1] : undefined;

  if (second === undefined) {
    return head ?? null;
  }

  const inner = typeof head === 'string' ? normalizeNestedValue(head) : null;
  const container = inner?.ok ? inner.value : head;
  if (!isPlainObject(container)) {
    return null;
  }
  return container[second] ?? null;
}

export class RecordFlattener {
  readonly schema: FlattenSchema;
  private readonly logger: Logger;

  /**
   * Throws ContractsError (MAPPING_ERROR) when the schema is invalid.
   */
  constructor(schema: unknown, logger?: Logger) {
    this.schema = validateFlattenSchema(schema);
    this.logger = (logger ?? createSilentLogger()).child({ component: 'flattener' });
  }

  /**
   * Flatten every nested field of the schema that is a column of the table.
   * Fields absent from all records are skipped, so re-running on a
   * flattened table changes nothing.
   */
  flatten(records: DataRecord[]): FlattenOutcome {
    let table = records;
    const flattenedFields: string[] = [];
    const warnings: FlattenWarning[] = [];

    for (const nested of this.schema) {
      if (!hasField(table, nested.field)) {
        this.logger.debug('Nested field not present, skipping', { field: nested.field });
        continue;
      }

      table = table.map((record, index) => {
        const normalized = normalizeNestedValue(record[nested.field]);
        let mapping: DataRecord = {};

        if (normalized.ok) {
          mapping = normalized.value;
        } else {
          warnings.push({ field: nested.field, index, reason: normalized.reason });
          this.logger.warn('Could not decode nested field, using empty mapping', {
            field: nested.field,
            index,
            reason: normalized.reason,
          });
        }

        const entries = Object.entries(record).filter(([key]) => key !== nested.field);
        for (const { column, path } of nested.columns) {
          entries.push([column, extractPath(mapping, path)]);
        }
        return Object.fromEntries(entries);
      });

      flattenedFields.push(nested.field);
    }

    return { records: table, flattenedFields, warnings };
  }
}
