/**
 * ContractPipeline
 *
 * fetch -> process -> persist, in that order, once.
 */

import {
  ConnectorError,
  createSilentLogger,
  type Logger,
  type Record as DataRecord,
  type WriteResult,
} from '@contratos/core';
import { ContractsError } from './errors/index.js';
import type { ContractFetcher, FetchReport, ProcessReport } from './fetcher/contract-fetcher.js';

export type PipelineState = 'idle' | 'fetching' | 'processed' | 'persisted' | 'empty';

/** Where the processed table goes; CsvWriter implements this */
export interface RecordSink {
  write(records: DataRecord[]): Promise<WriteResult>;
}

export interface ContractPipelineOptions {
  fetcher: ContractFetcher;
  sink: RecordSink;
  logger?: Logger;
  /** Rows included in the debug preview after processing (default: 5) */
  previewRows?: number;
}

export interface PipelineResult {
  state: PipelineState;
  fetch: FetchReport;
  process?: ProcessReport;
  write?: WriteResult;
}

export class ContractPipeline {
  private _state: PipelineState = 'idle';
  private readonly fetcher: ContractFetcher;
  private readonly sink: RecordSink;
  private readonly logger: Logger;
  private readonly previewRows: number;

  constructor(options: ContractPipelineOptions) {
    this.fetcher = options.fetcher;
    this.sink = options.sink;
    this.logger = (options.logger ?? createSilentLogger()).child({ component: 'pipeline' });
    this.previewRows = options.previewRows ?? 5;
  }

  get state(): PipelineState {
    return this._state;
  }

  async run(): Promise<PipelineResult> {
    if (this._state !== 'idle') {
      throw new ContractsError({
        code: 'INVALID_OPTIONS',
        message: `Pipeline already ran (state: ${this._state})`,
        suggestion: 'Create a new pipeline for each run.',
      });
    }

    this._state = 'fetching';
    this.logger.info('Fetching contracts', {
      orgCode: this.fetcher.orgCode,
      startPage: this.fetcher.startPage,
    });
    const fetchReport = await this.fetcher.fetch();

    if (fetchReport.stopReason === 'failed') {
      this.logger.warn('Pagination stopped on a failed page; the output may be incomplete', {
        lastPage: fetchReport.lastPage,
        error: fetchReport.error,
      });
    }

    if (fetchReport.records.length === 0) {
      this._state = 'empty';
      this.logger.warn('No contracts found');
      return { state: this._state, fetch: fetchReport };
    }

    this.logger.info(`Contracts found: ${fetchReport.records.length} records`);
    const processReport = this.fetcher.process();
    this._state = 'processed';

    if (processReport.warnings.length > 0) {
      this.logger.warn('Some nested fields could not be decoded', {
        count: processReport.warnings.length,
      });
    }

    let writeResult: WriteResult;
    try {
      writeResult = await this.sink.write(processReport.records);
    } catch (error) {
      throw new ContractsError({
        code: 'PERSIST_FAILED',
        message: `Failed to persist ${processReport.records.length} contracts: ${error instanceof Error ? error.message : String(error)}`,
        suggestion: error instanceof ConnectorError ? error.suggestion : undefined,
        cause: error instanceof Error ? error : undefined,
      });
    }
    this._state = 'persisted';

    this.logger.info('Contracts saved', { filePath: writeResult.filePath, rows: writeResult.rows });
    if (this.logger.isLevelEnabled('debug')) {
      this.logger.debug('First rows', { rows: processReport.records.slice(0, this.previewRows) });
    }

    return { state: this._state, fetch: fetchReport, process: processReport, write: writeResult };
  }
}
