import { cliOverridesSchema, ConfigError, formatZodError, type CliOverrides } from './config.js';

export const USAGE = `Usage: contratos-etl [options]

Fetches Portal da Transparência contracts for one organization and writes
them, flattened, to a CSV file.

Options:
  --config <file>        JSON config file (values support \${ENV_VAR} placeholders)
  --org-code <code>      Organization code sent as codigoOrgao (default: 20701)
  --start-page <n>       First page to request (default: 1)
  --key-file <file>      API key file, "name=value" on the first line (default: api_key.txt)
  --output <file>        Output CSV path (default: contratos_FULL.csv)
  --delimiter <char>     CSV delimiter (default: ",")
  --restricted[=bool]    Use the restricted rate limit for every request
  --log-level <level>    debug | info | warn | error (default: info)
  --log-format <format>  text | json (default: text)
  -h, --help             Show this help
`;

export interface ParsedArgs {
  help: boolean;
  configPath?: string;
  overrides: CliOverrides;
}

const VALUE_FLAGS: { [flag: string]: string } = {
  '--org-code': 'orgCode',
  '--start-page': 'startPage',
  '--key-file': 'keyFile',
  '--output': 'output',
  '--delimiter': 'delimiter',
  '--log-level': 'logLevel',
  '--log-format': 'logFormat',
};

/**
 * Parse `--flag value` and `--flag=value` arguments
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const raw: { [key: string]: unknown } = {};
  let configPath: string | undefined;
  let help = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    const eq = arg.indexOf('=');
    const flag = arg.startsWith('--') && eq !== -1 ? arg.slice(0, eq) : arg;
    const inline = arg.startsWith('--') && eq !== -1 ? arg.slice(eq + 1) : undefined;

    if (flag === '-h' || flag === '--help') {
      help = true;
      continue;
    }

    if (flag === '--restricted') {
      if (inline === undefined || inline === 'true') {
        raw.restricted = true;
      } else if (inline === 'false') {
        raw.restricted = false;
      } else {
        throw new ConfigError(`Invalid value for --restricted: ${inline} (expected true or false)`);
      }
      continue;
    }

    const key = flag === '--config' ? 'config' : VALUE_FLAGS[flag];
    if (key === undefined) {
      throw new ConfigError(`Unknown argument: ${arg}`);
    }

    let value = inline;
    if (value === undefined) {
      value = argv[i + 1];
      i++;
    }
    if (value === undefined || value === '') {
      throw new ConfigError(`Missing value for ${flag}`);
    }

    if (key === 'config') {
      configPath = value;
    } else {
      raw[key] = value;
    }
  }

  const result = cliOverridesSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(formatZodError(result.error, 'Invalid arguments'));
  }

  return { help, configPath, overrides: result.data };
}
