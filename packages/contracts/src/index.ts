/**
 * @contratos/contracts
 *
 * Fetches Portal da Transparência contracts for one organization,
 * flattens their nested fields and formats currency columns.
 */

// Errors
export * from './errors/index.js';

// Flattening
export {
  CONTRACT_FLATTEN_SCHEMA,
  CONTRACT_CURRENCY_COLUMNS,
  flattenSchemaSchema,
  validateFlattenSchema,
  formatSchemaIssues,
} from './flatten/flatten-schema.js';
export type { ColumnPath, ColumnMapping, NestedField, FlattenSchema } from './flatten/flatten-schema.js';
export { RecordFlattener, extractPath } from './flatten/flattener.js';
export type { FlattenOutcome, FlattenWarning } from './flatten/flattener.js';
export { normalizeNestedValue } from './flatten/nested-value.js';
export type { NormalizeResult, NestedValueSource } from './flatten/nested-value.js';
export { parseLiteral, LiteralSyntaxError } from './flatten/literal.js';

// Formatting
export { formatBrazilianCurrency, tryFormatBrazilianCurrency } from './formatters/currency.js';
export type { CurrencyFormatResult } from './formatters/currency.js';

// Fetching
export { ContractFetcher, CONTRACTS_ENDPOINT } from './fetcher/contract-fetcher.js';
export type {
  ContractFetcherOptions,
  PageSource,
  FetchReport,
  ProcessReport,
  StopReason,
} from './fetcher/contract-fetcher.js';

// Pipeline
export { ContractPipeline } from './pipeline.js';
export type { ContractPipelineOptions, PipelineResult, PipelineState, RecordSink } from './pipeline.js';
