/**
 * ContractFetcher
 *
 * Pages through /contratos for one organization, accumulates the raw
 * records, then flattens and formats them in place.
 */

import { z } from 'zod';
import {
  ConnectorError,
  createSilentLogger,
  hasField,
  isPlainObject,
  type Logger,
  type Record as DataRecord,
} from '@contratos/core';
import type { ApiResult, QueryParams, RequestOptions } from '@contratos/connector-api';
import { ContractsError } from '../errors/index.js';
import {
  CONTRACT_CURRENCY_COLUMNS,
  CONTRACT_FLATTEN_SCHEMA,
  formatSchemaIssues,
} from '../flatten/flatten-schema.js';
import { RecordFlattener, type FlattenWarning } from '../flatten/flattener.js';
import { tryFormatBrazilianCurrency } from '../formatters/currency.js';

export const CONTRACTS_ENDPOINT = '/contratos';

/** The slice of the API client the fetcher needs */
export interface PageSource {
  get(endpoint: string, params?: QueryParams, options?: RequestOptions): Promise<ApiResult>;
}

export interface ContractFetcherOptions {
  client: PageSource;
  /** Organization code sent as `codigoOrgao` */
  orgCode: string;
  /** First page to request (default: 1) */
  startPage?: number;
  /** Flatten schema (default: CONTRACT_FLATTEN_SCHEMA) */
  schema?: unknown;
  /** Columns rewritten into Brazilian currency notation */
  currencyColumns?: readonly string[];
  /** Use the restricted rate limit for every page */
  restricted?: boolean;
  logger?: Logger;
}

const fetcherOptionsSchema = z.object({
  orgCode: z.string().trim().min(1),
  startPage: z.number().int().min(1),
  currencyColumns: z.array(z.string().min(1)),
});

export type StopReason = 'empty' | 'failed';

export interface FetchReport {
  records: DataRecord[];
  /** Number of page requests issued, including the one that stopped the loop */
  pagesRequested: number;
  /** Page number of the request that stopped the loop */
  lastPage: number;
  stopReason: StopReason;
  /** Cause of the stop when stopReason is 'failed' */
  error?: ConnectorError;
}

export interface ProcessReport {
  records: DataRecord[];
  flattenedFields: string[];
  formattedColumns: string[];
  warnings: FlattenWarning[];
}

export class ContractFetcher {
  readonly orgCode: string;
  readonly startPage: number;
  private readonly client: PageSource;
  private readonly flattener: RecordFlattener;
  private readonly currencyColumns: readonly string[];
  private readonly restricted: boolean;
  private readonly logger: Logger;
  private table: DataRecord[] = [];

  constructor(options: ContractFetcherOptions) {
    const parsed = fetcherOptionsSchema.safeParse({
      orgCode: options.orgCode,
      startPage: options.startPage ?? 1,
      currencyColumns: [...(options.currencyColumns ?? CONTRACT_CURRENCY_COLUMNS)],
    });
    if (!parsed.success) {
      throw new ContractsError({
        code: 'INVALID_OPTIONS',
        message: `Invalid fetcher options:\n${formatSchemaIssues(parsed.error)}`,
      });
    }

    this.client = options.client;
    this.orgCode = parsed.data.orgCode;
    this.startPage = parsed.data.startPage;
    this.currencyColumns = parsed.data.currencyColumns;
    this.restricted = options.restricted ?? false;
    this.logger = (options.logger ?? createSilentLogger()).child({
      component: 'contract-fetcher',
      orgCode: this.orgCode,
    });
    this.flattener = new RecordFlattener(options.schema ?? CONTRACT_FLATTEN_SCHEMA, this.logger);
  }

  /** Current table: raw after fetch(), flattened after process() */
  get records(): readonly DataRecord[] {
    return this.table;
  }

  /**
   * Request pages sequentially from startPage until one yields no records
   * or fails. Replaces the current table with everything accumulated.
   */
  async fetch(): Promise<FetchReport> {
    const accumulated: DataRecord[] = [];
    let page = this.startPage;
    let pagesRequested = 0;

    for (;;) {
      pagesRequested++;
      const result = await this.client.get(
        CONTRACTS_ENDPOINT,
        { codigoOrgao: this.orgCode, pagina: page },
        { restricted: this.restricted }
      );

      if (result.status === 'empty') {
        return this.finish({ records: accumulated, pagesRequested, lastPage: page, stopReason: 'empty' });
      }

      if (result.status === 'failed') {
        this.logger.warn('Page failed, stopping pagination; result may be truncated', {
          page,
          error: result.error,
        });
        return this.finish({
          records: accumulated,
          pagesRequested,
          lastPage: page,
          stopReason: 'failed',
          error: result.error,
        });
      }

      if (!Array.isArray(result.data)) {
        const error = new ConnectorError({
          code: 'READ_FAILED',
          message: `Expected an array of contracts on page ${page}`,
          connectorId: 'transparencia',
          context: { page },
        });
        this.logger.warn('Unexpected payload, stopping pagination', { page, error });
        return this.finish({ records: accumulated, pagesRequested, lastPage: page, stopReason: 'failed', error });
      }

      const pageRecords = result.data.filter(isPlainObject);
      if (pageRecords.length === 0) {
        return this.finish({ records: accumulated, pagesRequested, lastPage: page, stopReason: 'empty' });
      }

      accumulated.push(...pageRecords);
      this.logger.info('Page fetched', { page, records: pageRecords.length, total: accumulated.length });
      page++;
    }
  }

  /**
   * Flatten nested fields and rewrite currency columns as Brazilian-notation
   * text. Safe to call again on an already processed table.
   */
  process(): ProcessReport {
    const { records, flattenedFields, warnings } = this.flattener.flatten(this.table);
    const formattedColumns: string[] = [];

    for (const column of this.currencyColumns) {
      if (!hasField(records, column)) continue;

      let unformatted = 0;
      for (const record of records) {
        const result = tryFormatBrazilianCurrency(record[column]);
        if (!result.formatted) {
          unformatted++;
        }
        record[column] = result.value;
      }

      if (unformatted > 0) {
        this.logger.warn('Some currency values could not be formatted', { column, count: unformatted });
      }
      this.logger.info(`Column '${column}' formatted in Brazilian notation`, { column });
      formattedColumns.push(column);
    }

    this.table = records;
    return { records, flattenedFields, formattedColumns, warnings };
  }

  private finish(report: FetchReport): FetchReport {
    this.table = report.records;
    this.logger.info('Pagination finished', {
      stopReason: report.stopReason,
      pagesRequested: report.pagesRequested,
      lastPage: report.lastPage,
      records: report.records.length,
    });
    return report;
  }
}
