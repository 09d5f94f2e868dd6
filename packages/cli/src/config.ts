import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import { DEFAULT_BASE_URL, DEFAULT_KEY_FILE } from '@contratos/connector-api';
import { isPlainObject } from '@contratos/core';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type EnvExpansionOptions = {
  /**
   * If true, missing env vars leave placeholders unchanged instead of erroring.
   * Default: false (fail-fast).
   */
  allowMissing?: boolean;
  /** Environment to read from (default: process.env) */
  env?: NodeJS.ProcessEnv;
};

function expandEnvInString(input: string, options?: EnvExpansionOptions): string {
  const env = options?.env ?? process.env;
  return input.replace(/\$\{([^}]+)\}/g, (match, inner: string) => {
    const [rawName, rawDefault] = inner.split(':-', 2);
    const name = (rawName ?? '').trim();
    if (!name) return match;

    const envValue = env[name];
    if (envValue !== undefined && envValue !== '') return envValue;

    if (rawDefault !== undefined) return rawDefault;

    if (options?.allowMissing) return match;

    throw new ConfigError(`Missing required environment variable: ${name}`);
  });
}

/**
 * Replace `${VAR}` and `${VAR:-default}` placeholders in every string of a
 * parsed JSON value
 */
export function expandEnvVars(value: unknown, options?: EnvExpansionOptions): unknown {
  if (typeof value === 'string') {
    return expandEnvInString(value, options);
  }
  if (Array.isArray(value)) {
    return value.map((v) => expandEnvVars(v, options));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnvVars(v, options);
    }
    return out;
  }
  return value;
}

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
const logFormatSchema = z.enum(['text', 'json']);
const orgCodeSchema = z.union([z.string().trim().min(1), z.number().int().nonnegative()]).transform(String);

export const configFileSchema = z
  .object({
    orgCode: orgCodeSchema.optional(),
    startPage: z.number().int().min(1).optional(),
    keyFile: z.string().min(1).optional(),
    output: z.string().min(1).optional(),
    baseUrl: z.string().url().optional(),
    timeoutMs: z.number().int().min(1).max(300_000).optional(),
    restricted: z.boolean().optional(),
    csv: z
      .object({
        delimiter: z.string().length(1).optional(),
        sanitizeFormulas: z.boolean().optional(),
      })
      .strict()
      .optional(),
    logging: z
      .object({
        level: logLevelSchema.optional(),
        format: logFormatSchema.optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

/** Values taken from command line flags; strings until validated */
export const cliOverridesSchema = z
  .object({
    orgCode: orgCodeSchema.optional(),
    startPage: z.coerce.number().int().min(1).optional(),
    keyFile: z.string().min(1).optional(),
    output: z.string().min(1).optional(),
    restricted: z.boolean().optional(),
    delimiter: z.string().length(1).optional(),
    logLevel: logLevelSchema.optional(),
    logFormat: logFormatSchema.optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;
export type CliOverrides = z.infer<typeof cliOverridesSchema>;

export interface EtlConfig {
  orgCode: string;
  startPage: number;
  keyFile: string;
  output: string;
  baseUrl: string;
  timeoutMs: number;
  restricted: boolean;
  csv: {
    delimiter: string;
    sanitizeFormulas: boolean;
  };
  logging: {
    level: z.infer<typeof logLevelSchema>;
    format: z.infer<typeof logFormatSchema>;
  };
}

export const DEFAULT_CONFIG: EtlConfig = {
  orgCode: '20701',
  startPage: 1,
  keyFile: DEFAULT_KEY_FILE,
  output: 'contratos_FULL.csv',
  baseUrl: DEFAULT_BASE_URL,
  timeoutMs: 30_000,
  restricted: false,
  csv: {
    delimiter: ',',
    sanitizeFormulas: false,
  },
  logging: {
    level: 'info',
    format: 'text',
  },
};

export function formatZodError(err: z.ZodError, label = 'Invalid config'): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `${label}:\n${issues}`;
}

export async function loadConfigFile(
  configPath: string,
  options: { cwd?: string; env?: NodeJS.ProcessEnv } = {}
): Promise<ConfigFile> {
  const absolutePath = resolve(options.cwd ?? process.cwd(), configPath);

  let content: string;
  try {
    content = await readFile(absolutePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(
      `Cannot read config file ${absolutePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  let parsed: unknown;
  try {
    // Handle UTF-8 BOM (common on Windows) to avoid JSON.parse failures.
    parsed = JSON.parse(content.replace(/^\uFEFF/, ''));
  } catch (error) {
    throw new ConfigError(
      `Config file ${absolutePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const result = configFileSchema.safeParse(expandEnvVars(parsed, { env: options.env }));
  if (!result.success) {
    throw new ConfigError(formatZodError(result.error, `Invalid config file ${absolutePath}`));
  }
  return result.data;
}

/**
 * Defaults, then config file, then command line flags
 */
export function resolveConfig(file: ConfigFile = {}, overrides: CliOverrides = {}): EtlConfig {
  return {
    orgCode: overrides.orgCode ?? file.orgCode ?? DEFAULT_CONFIG.orgCode,
    startPage: overrides.startPage ?? file.startPage ?? DEFAULT_CONFIG.startPage,
    keyFile: overrides.keyFile ?? file.keyFile ?? DEFAULT_CONFIG.keyFile,
    output: overrides.output ?? file.output ?? DEFAULT_CONFIG.output,
    baseUrl: file.baseUrl ?? DEFAULT_CONFIG.baseUrl,
    timeoutMs: file.timeoutMs ?? DEFAULT_CONFIG.timeoutMs,
    restricted: overrides.restricted ?? file.restricted ?? DEFAULT_CONFIG.restricted,
    csv: {
      delimiter: overrides.delimiter ?? file.csv?.delimiter ?? DEFAULT_CONFIG.csv.delimiter,
      sanitizeFormulas: file.csv?.sanitizeFormulas ?? DEFAULT_CONFIG.csv.sanitizeFormulas,
    },
    logging: {
      level: overrides.logLevel ?? file.logging?.level ?? DEFAULT_CONFIG.logging.level,
      format: overrides.logFormat ?? file.logging?.format ?? DEFAULT_CONFIG.logging.format,
    },
  };
}
