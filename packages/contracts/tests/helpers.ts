import { ConnectorError, Logger, type Record as DataRecord } from '@contratos/core';
import type { ApiResult, QueryParams, RequestOptions } from '@contratos/connector-api';
import type { PageSource } from '../src/index.js';

export type PageCall = {
  endpoint: string;
  params?: QueryParams;
  options?: RequestOptions;
};

/**
 * In-memory page source: page N of the queue answers request N
 */
export class FakePageSource implements PageSource {
  readonly calls: PageCall[] = [];

  constructor(private readonly results: ApiResult[]) {}

  async get(endpoint: string, params?: QueryParams, options?: RequestOptions): Promise<ApiResult> {
    this.calls.push({ endpoint, params, options });
    return this.results.shift() ?? { status: 'empty' };
  }
}

export function page(records: DataRecord[]): ApiResult {
  return records.length === 0 ? { status: 'empty' } : { status: 'ok', data: records };
}

export function failedPage(message = 'HTTP 503'): ApiResult {
  return {
    status: 'failed',
    error: new ConnectorError({ code: 'READ_FAILED', message, connectorId: 'transparencia' }),
  };
}

export function contracts(count: number, offset = 0): DataRecord[] {
  return Array.from({ length: count }, (_, i) => ({ id: offset + i + 1, numero: `CT-${offset + i + 1}` }));
}

export function captureLogger() {
  const lines: string[] = [];
  const logger = new Logger({ format: 'json', level: 'debug', sink: (line) => lines.push(line) });
  const records = (): Array<{ level: string; msg: string; [key: string]: unknown }> =>
    lines.map((line) => JSON.parse(line));
  return { logger, records };
}
