/**
 * CLI Shared Utilities
 * Common formatting functions for the bozon-parse CLI
 */

import { readFileSync } from 'node:fs';
import type { Program } from '@bozon/core';
import type { Diagnostic } from '@bozon/queries';

/**
 * Read the CLI package version from its package.json.
 */
export function readVersion(): string {
  const content = readFileSync(
    new URL('../package.json', import.meta.url),
    'utf-8'
  );
  const data: unknown = JSON.parse(content);
  if (
    typeof data === 'object' &&
    data !== null &&
    'version' in data &&
    typeof data.version === 'string'
  ) {
    return data.version;
  }
  throw new Error('package.json has no version field');
}

/** Outcome of one file in a JSON run */
export type FileReport =
  | {
      readonly file: string;
      readonly success: true;
      readonly program: Program;
    }
  | {
      readonly file: string;
      readonly success: false;
      readonly diagnostics: readonly Diagnostic[];
    };

/**
 * Render the JSON report of a run: one entry per file, atoms with their spans.
 */
export function formatJsonReport(report: readonly FileReport[]): string {
  return JSON.stringify(report, null, 2);
}

/**
 * Detect help or version flags in CLI argument array.
 * Checks for --help, -h, --version, -v in any position.
 *
 * @param argv - Command-line arguments (process.argv.slice(2))
 * @returns Object with mode if flag found, null otherwise
 */
export function detectHelpVersionFlag(
  argv: readonly string[]
): { mode: 'help' | 'version' } | null {
  // Help takes precedence over version
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }
  return null;
}
