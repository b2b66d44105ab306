#!/usr/bin/env node
/**
 * bozon-parse CLI
 *
 * Parses Bozon source files and prints their s-expressions, or the first
 * syntax error of each file.
 *
 * Usage:
 *   npx tsx packages/cli/src/cli.ts <file...>
 *   echo "(+ 1 1)" | npx tsx packages/cli/src/cli.ts -
 */

import * as fs from 'node:fs';
import {
  type CliIO,
  type ParsedCliArgs,
  parseCliArgs,
  runParse,
} from './cli-run.js';
import { readVersion } from './cli-shared.js';
import { type CliConfig, loadConfig } from './config.js';

const USAGE = `Usage: bozon-parse [options] <file...>

Parse Bozon source files. Use - to read from stdin.

Options:
  --format <sexp|json>  Output format (default: sexp)
  --max-depth <n>       Maximum list nesting depth
  --verbose             Log query executions to stderr
  -h, --help            Show this help
  -v, --version         Show version`;

// ============================================================
// ENTRY POINT
// ============================================================

const processIO: CliIO = {
  readFile: (path) => fs.readFileSync(path, 'utf-8'),
  readStdin: () => fs.readFileSync(0, 'utf-8'),
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
};

function main(): number {
  let args: ParsedCliArgs;
  let config: CliConfig | null;
  try {
    args = parseCliArgs(process.argv.slice(2));
    config = loadConfig(process.cwd());
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    console.error(USAGE);
    return 2;
  }

  if (args.mode === 'help') {
    console.log(USAGE);
    return 0;
  }
  if (args.mode === 'version') {
    console.log(readVersion());
    return 0;
  }

  return runParse(args, config, processIO);
}

// Only run main if this is the entry point (not imported)
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  process.exitCode = main();
}
