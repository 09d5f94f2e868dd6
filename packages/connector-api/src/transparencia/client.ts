/**
 * Portal da Transparência API Client
 *
 * Throttled GET client for https://api.portaldatransparencia.gov.br/api-de-dados.
 * Authenticates with the `chave-api-dados` header.
 */

import { ConnectorError, createSilentLogger, isPlainObject, wrapError, type Logger } from '@contratos/core';
import { loadApiKey } from './credentials.js';
import { computeRequestDelayMs, sleep as defaultSleep } from './rate-limit.js';

export const DEFAULT_BASE_URL = 'https://api.portaldatransparencia.gov.br/api-de-dados';

export interface TransparenciaClientConfig {
  /** Value of the `chave-api-dados` header */
  apiKey: string;
  /** API base URL (default: DEFAULT_BASE_URL) */
  baseUrl?: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeoutMs?: number;
  logger?: Logger;
  /** fetch implementation (default: global fetch) */
  fetch?: typeof fetch;
  /** Used for the throttle delay (default: setTimeout based) */
  sleep?: (ms: number) => Promise<void>;
  /** Clock used to pick the hourly rate limit */
  now?: () => Date;
}

export type QueryParams = {
  [key: string]: string | number | boolean | undefined;
};

export interface RequestOptions {
  /** Apply the most conservative rate limit regardless of the hour */
  restricted?: boolean;
}

/**
 * Outcome of a GET. `empty` is a successful response without data and is
 * distinct from `failed`, so pagination can tell end-of-data from an error.
 */
export type ApiResult =
  | { status: 'ok'; data: unknown }
  | { status: 'empty' }
  | { status: 'failed'; error: ConnectorError };

function isEmptyPayload(data: unknown): boolean {
  if (data === null || data === undefined) return true;
  if (Array.isArray(data)) return data.length === 0;
  if (isPlainObject(data)) return Object.keys(data).length === 0;
  return false;
}

function buildQuery(params?: QueryParams): string {
  if (!params) return '';
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      search.set(key, String(value));
    }
  }
  const query = search.toString();
  return query ? `?${query}` : '';
}

export class TransparenciaClient {
  readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => Date;

  constructor(config: TransparenciaClientConfig) {
    const apiKey = config.apiKey.trim();
    if (!apiKey) {
      throw new ConnectorError({
        code: 'AUTHENTICATION_FAILED',
        message: 'Portal da Transparência API key is empty',
        connectorId: 'transparencia',
        suggestion: 'Register at portaldatransparencia.gov.br/api-de-dados and put the key in api_key.txt.',
      });
    }

    this.apiKey = apiKey;
    this.baseUrl = (config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.timeoutMs = config.timeoutMs ?? 30_000;
    this.logger = (config.logger ?? createSilentLogger()).child({ component: 'transparencia-client' });
    this.fetchImpl = config.fetch ?? ((input, init) => fetch(input, init));
    this.sleep = config.sleep ?? defaultSleep;
    this.now = config.now ?? (() => new Date());
  }

  /**
   * Create a client with the key read from a `name=value` key file.
   * Throws ConnectorError when the file is missing or malformed.
   */
  static async fromKeyFile(
    filePath: string,
    config: Omit<TransparenciaClientConfig, 'apiKey'> = {}
  ): Promise<TransparenciaClient> {
    const apiKey = await loadApiKey(filePath);
    return new TransparenciaClient({ ...config, apiKey });
  }

  /** Delay applied before the next request, in milliseconds */
  currentDelayMs(restricted = false): number {
    return computeRequestDelayMs(this.now().getHours(), restricted);
  }

  /**
   * GET an endpoint. Never throws: transport and HTTP errors come back as
   * `{ status: 'failed' }` and are logged.
   */
  async get(endpoint: string, params?: QueryParams, options: RequestOptions = {}): Promise<ApiResult> {
    await this.sleep(this.currentDelayMs(options.restricted ?? false));

    const path = endpoint.startsWith('/') ? endpoint : `/${endpoint}`;
    const url = `${this.baseUrl}${path}${buildQuery(params)}`;

    try {
      const data = await this.request(url);
      if (isEmptyPayload(data)) {
        this.logger.info('No data returned', { endpoint: path, params });
        return { status: 'empty' };
      }
      this.logger.info('Data received', { endpoint: path, params });
      return { status: 'ok', data };
    } catch (err) {
      const error = wrapError(err, 'transparencia');
      this.logger.error('API request failed', { endpoint: path, params, error });
      return { status: 'failed', error };
    }
  }

  private async request(url: string): Promise<unknown> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'GET',
        headers: {
          accept: '*/*',
          'chave-api-dados': this.apiKey,
        },
        signal: controller.signal,
      });
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') {
        throw new ConnectorError({
          code: 'TIMEOUT',
          message: `Portal da Transparência request timed out after ${this.timeoutMs}ms`,
          connectorId: 'transparencia',
          suggestion: 'Increase timeoutMs or check network connectivity.',
        });
      }

      throw new ConnectorError({
        code: 'CONNECTION_FAILED',
        message: `Failed to connect to Portal da Transparência API: ${err instanceof Error ? err.message : String(err)}`,
        connectorId: 'transparencia',
        cause: err instanceof Error ? err : undefined,
      });
    } finally {
      clearTimeout(timeout);
    }

    if (!response.ok) {
      const context = { status: response.status, url };

      if (response.status === 401 || response.status === 403) {
        throw new ConnectorError({
          code: 'AUTHENTICATION_FAILED',
          message: `Portal da Transparência rejected the API key (HTTP ${response.status})`,
          connectorId: 'transparencia',
          suggestion: 'Check the key in the key file.',
          context,
        });
      }

      if (response.status === 429) {
        throw new ConnectorError({
          code: 'RATE_LIMITED',
          message: 'Portal da Transparência API rate limit exceeded',
          connectorId: 'transparencia',
          suggestion: 'Mark the call as restricted or run outside business hours.',
          context,
        });
      }

      throw new ConnectorError({
        code: 'READ_FAILED',
        message: `Portal da Transparência API error: HTTP ${response.status}`,
        connectorId: 'transparencia',
        context,
      });
    }

    if (response.status === 204) {
      return null;
    }

    const body = await response.text();
    if (body.trim() === '') {
      return null;
    }

    try {
      const parsed: unknown = JSON.parse(body);
      return parsed;
    } catch (err) {
      throw new ConnectorError({
        code: 'READ_FAILED',
        message: 'Portal da Transparência returned a body that is not JSON',
        connectorId: 'transparencia',
        cause: err instanceof Error ? err : undefined,
        context: { status: response.status, url },
      });
    }
  }
}
