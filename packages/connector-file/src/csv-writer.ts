/**
 * CSV Writer
 * Serializes a flattened table to delimited text
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { stringify } from 'csv-stringify/sync';
import type { Record, WriteResult } from '@contratos/core';
import { ConnectorError, createSilentLogger, extractFieldNames, type Logger } from '@contratos/core';

export interface CsvWriterConfig {
  /** Output file path */
  filePath: string;
  /** CSV delimiter (default: ',') */
  delimiter?: string;
  /** Quote character (default: '"') */
  quote?: string;
  /** Character encoding (default: utf-8) */
  encoding?: BufferEncoding;
  /**
   * Mitigate CSV/Excel formula injection by prefixing strings that start
   * with =, +, -, or @ (after optional whitespace). Default: false.
   */
  sanitizeFormulas?: boolean;
  /** Prefix used when sanitizeFormulas is enabled (default: "'"). */
  formulaEscapePrefix?: string;
  logger?: Logger;
}

// Negative amounts, plain or in Brazilian notation, are data rather than formulas
const NUMERIC_TEXT = /^-?(?:\d+(?:\.\d+)?|\d{1,3}(?:\.\d{3})*,\d{2})$/;

function sanitizeFormulaValue(value: unknown, prefix: string): unknown {
  if (typeof value !== 'string') return value;
  if (value.startsWith(prefix)) return value;
  if (NUMERIC_TEXT.test(value)) return value;
  return /^[\t\r\n ]*[=+\-@]/.test(value) ? `${prefix}${value}` : value;
}

export class CsvWriter {
  readonly config: CsvWriterConfig;
  private readonly logger: Logger;

  constructor(config: CsvWriterConfig) {
    this.config = config;
    this.logger = (config.logger ?? createSilentLogger()).child({ component: 'csv-writer' });
  }

  /**
   * Serialize records: header row, then one row per record.
   * Columns are the union of record keys in order of first appearance.
   */
  serialize(records: Record[]): string {
    if (records.length === 0) {
      return '';
    }

    const prefix = this.config.formulaEscapePrefix ?? "'";
    const columns = extractFieldNames(records);

    const rows = this.config.sanitizeFormulas
      ? records.map((record) => {
          const sanitized: Record = Object.create(null);
          for (const key of Object.keys(record)) {
            sanitized[key] = sanitizeFormulaValue(record[key], prefix);
          }
          return sanitized;
        })
      : records;

    return stringify(rows, {
      header: true,
      columns,
      delimiter: this.config.delimiter ?? ',',
      quote: this.config.quote ?? '"',
      cast: {
        boolean: (value) => (value ? 'True' : 'False'),
        date: (value) => value.toISOString(),
        object: (value) => JSON.stringify(value),
      },
    });
  }

  async write(records: Record[]): Promise<WriteResult> {
    const filePath = resolve(this.config.filePath);

    try {
      const content = this.serialize(records);
      await mkdir(dirname(filePath), { recursive: true });
      await writeFile(filePath, content, this.config.encoding ?? 'utf-8');
    } catch (error) {
      throw new ConnectorError({
        code: 'WRITE_FAILED',
        message: `Failed to write CSV ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        connectorId: 'csv',
        suggestion: 'Check that the output directory is writable.',
        cause: error instanceof Error ? error : undefined,
      });
    }

    const columns = extractFieldNames(records);
    this.logger.info('CSV written', { filePath, rows: records.length, columns: columns.length });

    return { rows: records.length, columns, filePath };
  }
}

/**
 * Factory function to create a CSV writer
 */
export function createCsvWriter(config: CsvWriterConfig): CsvWriter {
  return new CsvWriter(config);
}
