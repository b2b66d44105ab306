/**
 * Bozon Query Groups
 * Inputs and derived queries for source files
 */

import {
  computeLineStarts,
  locate,
  type ParseOptions,
  type ParseResult,
  programEquals,
  safeParse,
} from '@bozon/core';
import { DerivedQuery } from './engine/derived.js';
import { InputQuery } from './engine/input.js';

// ============================================================
// DIAGNOSTICS
// ============================================================

export interface Diagnostic {
  readonly file: string;
  readonly errorId: string;
  readonly severity: 'error';
  readonly message: string;
  /** UTF-8 byte offset */
  readonly offset: number;
  /** 1-based */
  readonly line: number;
  /** 1-based, in characters */
  readonly column: number;
}

// ============================================================
// EQUALITY
// ============================================================

function parseResultEquals(a: ParseResult, b: ParseResult): boolean {
  if (a.success && b.success) return programEquals(a.program, b.program);
  if (!a.success && !b.success) {
    return (
      a.error.errorId === b.error.errorId &&
      a.error.offset === b.error.offset &&
      a.error.message === b.error.message
    );
  }
  return false;
}

function numbersEqual(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((n, i) => n === b[i]);
}

function diagnosticsEqual(
  a: readonly Diagnostic[],
  b: readonly Diagnostic[]
): boolean {
  return (
    a.length === b.length &&
    a.every((d, i) => {
      const other = b[i];
      return (
        other !== undefined &&
        d.file === other.file &&
        d.errorId === other.errorId &&
        d.message === other.message &&
        d.offset === other.offset &&
        d.line === other.line &&
        d.column === other.column
      );
    })
  );
}

function optionsEqual(a: ParseOptions, b: ParseOptions): boolean {
  return a.maxDepth === b.maxDepth;
}

// ============================================================
// VFS GROUP
// ============================================================

/** File contents, keyed by file id */
export const sourceText = new InputQuery<string>('sourceText');

/** Key of the singleton parserOptions input */
export const DEFAULT_OPTIONS_KEY = 'default';

/** Parser options shared by every file; unset means parser defaults */
export const parserOptions = new InputQuery<ParseOptions>(
  'parserOptions',
  optionsEqual
);

/** Byte offsets of line starts, for offset to line/column conversion */
export const lineStarts = new DerivedQuery<readonly number[]>(
  'lineStarts',
  (db, file) => computeLineStarts(sourceText.get(db, file)),
  numbersEqual
);

// ============================================================
// PARSER GROUP
// ============================================================

export const parseFile = new DerivedQuery<ParseResult>(
  'parseFile',
  (db, file) =>
    safeParse(
      sourceText.get(db, file),
      parserOptions.getOptional(db, DEFAULT_OPTIONS_KEY)
    ),
  parseResultEquals
);

// ============================================================
// DIAGNOSTICS GROUP
// ============================================================

export const fileDiagnostics = new DerivedQuery<readonly Diagnostic[]>(
  'fileDiagnostics',
  (db, file) => {
    const result = parseFile.get(db, file);
    if (result.success) return [];

    const { errorId, message, offset = 0 } = result.error.toData();
    const location = locate(
      sourceText.get(db, file),
      offset,
      lineStarts.get(db, file)
    );
    return [
      {
        file,
        errorId,
        severity: 'error',
        message,
        offset,
        line: location.line,
        column: location.column,
      },
    ];
  },
  diagnosticsEqual
);
