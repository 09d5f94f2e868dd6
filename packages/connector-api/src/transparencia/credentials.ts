/**
 * API key file loading.
 *
 * The key file holds a single `name=value` line; the value is sent as the
 * `chave-api-dados` header.
 */

import { readFile } from 'node:fs/promises';
import { ConnectorError } from '@contratos/core';

export const DEFAULT_KEY_FILE = 'api_key.txt';

/**
 * Extract the key from the file content: everything after the first `=`
 * on line 1, trimmed.
 */
export function parseApiKey(content: string, source = DEFAULT_KEY_FILE): string {
  const firstLine = content.replace(/^\uFEFF/, '').split(/\r?\n/, 1)[0]?.trim() ?? '';
  const separator = firstLine.indexOf('=');

  if (separator === -1) {
    throw new ConnectorError({
      code: 'AUTHENTICATION_FAILED',
      message: `API key file ${source} is malformed: expected "name=value" on the first line`,
      connectorId: 'transparencia',
      suggestion: 'Write the key as e.g. "chave=<your key>" on the first line.',
    });
  }

  const key = firstLine.slice(separator + 1).trim();
  if (!key) {
    throw new ConnectorError({
      code: 'AUTHENTICATION_FAILED',
      message: `API key file ${source} has an empty key`,
      connectorId: 'transparencia',
      suggestion: 'Put the key after the "=" on the first line.',
    });
  }

  return key;
}

export async function loadApiKey(filePath: string = DEFAULT_KEY_FILE): Promise<string> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? error.code : undefined;
    throw new ConnectorError({
      code: 'CONFIGURATION_ERROR',
      message:
        code === 'ENOENT'
          ? `API key file not found: ${filePath}`
          : `Cannot read API key file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      connectorId: 'transparencia',
      suggestion: 'Create the key file or pass --key-file with its location.',
      cause: error instanceof Error ? error : undefined,
    });
  }

  return parseApiKey(content, filePath);
}
