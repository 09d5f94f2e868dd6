export { Logger, createSilentLogger, createRunId, redactSecrets } from './logger.js';
export type { LogLevel, LogFormat, LogSink, LoggerOptions } from './logger.js';
