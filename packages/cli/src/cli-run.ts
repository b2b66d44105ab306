/**
 * bozon-parse Command
 * Argument parsing and the parse run, free of process side effects
 */

import { printProgram } from '@bozon/core';
import {
  BozonDatabase,
  type QueryCallbacks,
  type QueryEvent,
} from '@bozon/queries';
import { formatDiagnostic } from './cli-error-formatter.js';
import {
  detectHelpVersionFlag,
  type FileReport,
  formatJsonReport,
} from './cli-shared.js';
import { type CliConfig, isOutputFormat, type OutputFormat } from './config.js';

// ============================================================
// ARGUMENTS
// ============================================================

export interface ParseCommand {
  mode: 'parse';
  files: string[];
  format?: OutputFormat | undefined;
  maxDepth?: number | undefined;
  verbose: boolean;
}

export type ParsedCliArgs = ParseCommand | { mode: 'help' } | { mode: 'version' };

/**
 * Parse command-line arguments for bozon-parse
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @throws Error on unknown flags, bad flag values or missing files
 */
export function parseCliArgs(argv: readonly string[]): ParsedCliArgs {
  const flag = detectHelpVersionFlag(argv);
  if (flag) return flag;

  const files: string[] = [];
  let format: OutputFormat | undefined;
  let maxDepth: number | undefined;
  let verbose = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';

    if (arg === '--verbose') {
      verbose = true;
    } else if (arg === '--format') {
      const value = argv[++i];
      if (!isOutputFormat(value)) {
        throw new Error('--format requires argument: sexp or json');
      }
      format = value;
    } else if (arg === '--max-depth') {
      const value = Number(argv[++i]);
      if (!Number.isSafeInteger(value) || value < 1) {
        throw new Error('--max-depth requires a positive integer');
      }
      maxDepth = value;
    } else if (arg.startsWith('-') && arg !== '-') {
      throw new Error(`Unknown option: ${arg}`);
    } else {
      files.push(arg);
    }
  }

  if (files.length === 0) {
    throw new Error('Missing file argument');
  }

  return { mode: 'parse', files, format, maxDepth, verbose };
}

// ============================================================
// EXECUTION
// ============================================================

/** Side effects of a run, injectable for tests */
export interface CliIO {
  readFile(path: string): string;
  readStdin(): string;
  stdout(text: string): void;
  stderr(text: string): void;
}

const STDIN_ID = '<stdin>';

function verboseCallbacks(io: CliIO): QueryCallbacks {
  const log =
    (action: string) =>
    (event: QueryEvent): void =>
      io.stderr(
        `[query] ${action} ${event.query}(${event.key}) @${event.revision}`
      );
  return { onQueryExecute: log('execute'), onQueryReuse: log('reuse') };
}

/**
 * Parse every file and report results.
 *
 * @returns exit code: 0 all parsed, 1 syntax errors, 2 unreadable input
 */
export function runParse(
  command: ParseCommand,
  config: CliConfig | null,
  io: CliIO
): number {
  const format = command.format ?? config?.format ?? 'sexp';
  const maxDepth = command.maxDepth ?? config?.maxDepth;

  const db = new BozonDatabase({
    callbacks: command.verbose ? verboseCallbacks(io) : {},
  });
  if (maxDepth !== undefined) {
    db.setParserOptions({ maxDepth });
  }

  const sources = new Map<string, string>();
  for (const file of command.files) {
    const id = file === '-' ? STDIN_ID : file;
    let text: string;
    try {
      text = file === '-' ? io.readStdin() : io.readFile(file);
    } catch (err) {
      io.stderr(
        `Error: cannot read ${file}: ${err instanceof Error ? err.message : String(err)}`
      );
      return 2;
    }
    sources.set(id, text);
    db.setSourceText(id, text);
  }

  let failed = false;
  const report: FileReport[] = [];

  for (const id of db.files()) {
    const source = sources.get(id) ?? '';
    const result = db.parseFile(id);

    if (result.success) {
      if (format === 'json') {
        report.push({ file: id, success: true, program: result.program });
      } else {
        if (command.files.length > 1) io.stdout(`==> ${id} <==`);
        io.stdout(printProgram(result.program));
      }
      continue;
    }

    failed = true;
    const diagnostics = db.diagnostics(id);
    if (format === 'json') {
      report.push({ file: id, success: false, diagnostics });
    } else {
      for (const diagnostic of diagnostics) {
        io.stderr(formatDiagnostic(diagnostic, source));
      }
    }
  }

  if (format === 'json') {
    io.stdout(formatJsonReport(report));
  }

  return failed ? 1 : 0;
}
