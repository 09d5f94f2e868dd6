export { TransparenciaClient, DEFAULT_BASE_URL } from './client.js';
export type { TransparenciaClientConfig, QueryParams, RequestOptions, ApiResult } from './client.js';
export { loadApiKey, parseApiKey, DEFAULT_KEY_FILE } from './credentials.js';
export {
  resolveRequestsPerMinute,
  computeRequestDelayMs,
  sleep,
  RESTRICTED_REQUESTS_PER_MINUTE,
  NIGHT_REQUESTS_PER_MINUTE,
  DAY_REQUESTS_PER_MINUTE,
  NIGHT_WINDOW,
} from './rate-limit.js';
