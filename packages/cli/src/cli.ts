#!/usr/bin/env node
/**
 * CLI entry point
 *
 * Usage:
 *   contratos-etl --org-code 20701 --output contratos_FULL.csv
 */

import { run } from './run.js';

process.exitCode = await run(process.argv.slice(2));
