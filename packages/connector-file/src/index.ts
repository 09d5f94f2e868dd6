/**
 * @contratos/connector-file
 *
 * File output for flattened tables
 */

export { CsvWriter, createCsvWriter } from './csv-writer.js';
export type { CsvWriterConfig } from './csv-writer.js';

// Re-export core types for convenience
export type { Record, WriteResult } from '@contratos/core';
