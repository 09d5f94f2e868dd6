/**
 * @contratos/cli
 *
 * Configuration loading and the run() entry used by the command line
 */

export { run } from './run.js';
export type { RunDependencies } from './run.js';
export { parseArgs, USAGE } from './args.js';
export type { ParsedArgs } from './args.js';
export {
  ConfigError,
  DEFAULT_CONFIG,
  configFileSchema,
  cliOverridesSchema,
  expandEnvVars,
  formatZodError,
  loadConfigFile,
  resolveConfig,
} from './config.js';
export type { ConfigFile, CliOverrides, EtlConfig, EnvExpansionOptions } from './config.js';
