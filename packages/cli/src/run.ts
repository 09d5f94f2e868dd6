import { resolve } from 'node:path';
import { createRunId, Logger, type LogSink } from '@contratos/core';
import { TransparenciaClient } from '@contratos/connector-api';
import { createCsvWriter } from '@contratos/connector-file';
import { ContractFetcher, ContractPipeline } from '@contratos/contracts';
import { parseArgs, USAGE } from './args.js';
import { loadConfigFile, resolveConfig } from './config.js';

export interface RunDependencies {
  /** Working directory for relative paths (default: process.cwd()) */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Receives help text */
  stdout?: (text: string) => void;
  logSink?: LogSink;
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

function describeError(error: unknown): string {
  if (
    typeof error === 'object' &&
    error !== null &&
    'toActionableMessage' in error &&
    typeof error.toActionableMessage === 'function'
  ) {
    return String(error.toActionableMessage());
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Run the ETL once. Resolves to the process exit code; never rejects.
 */
export async function run(argv: string[], deps: RunDependencies = {}): Promise<number> {
  const cwd = deps.cwd ?? process.cwd();
  const stdout = deps.stdout ?? ((text: string) => process.stdout.write(text));
  let logger = new Logger({ sink: deps.logSink, now: deps.now });

  try {
    const args = parseArgs(argv);
    if (args.help) {
      stdout(USAGE);
      return 0;
    }

    const file = args.configPath ? await loadConfigFile(args.configPath, { cwd, env: deps.env }) : {};
    const config = resolveConfig(file, args.overrides);

    logger = new Logger({
      level: config.logging.level,
      format: config.logging.format,
      sink: deps.logSink,
      now: deps.now,
    }).child({ run: createRunId() });

    const client = await TransparenciaClient.fromKeyFile(resolve(cwd, config.keyFile), {
      baseUrl: config.baseUrl,
      timeoutMs: config.timeoutMs,
      logger,
      fetch: deps.fetch,
      sleep: deps.sleep,
      now: deps.now,
    });

    const pipeline = new ContractPipeline({
      fetcher: new ContractFetcher({
        client,
        orgCode: config.orgCode,
        startPage: config.startPage,
        restricted: config.restricted,
        logger,
      }),
      sink: createCsvWriter({
        filePath: resolve(cwd, config.output),
        delimiter: config.csv.delimiter,
        sanitizeFormulas: config.csv.sanitizeFormulas,
        logger,
      }),
      logger,
    });

    await pipeline.run();
    return 0;
  } catch (error) {
    logger.error('Contracts ETL failed', { error, details: describeError(error) });
    return 1;
  }
}
