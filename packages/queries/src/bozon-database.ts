/**
 * Bozon Database
 * Source-file facade over the query engine
 */

import type { ParseOptions, ParseResult } from '@bozon/core';
import { Database, type DatabaseOptions } from './engine/database.js';
import {
  DEFAULT_OPTIONS_KEY,
  type Diagnostic,
  fileDiagnostics,
  lineStarts,
  parseFile,
  parserOptions,
  sourceText,
} from './groups.js';

/**
 * Owns one query database and the set of known files.
 *
 * @example
 * ```typescript
 * const db = new BozonDatabase();
 * db.setSourceText('main.bz', '(+ 1 1)');
 * db.parseFile('main.bz'); // parsed once, memoized until main.bz changes
 * ```
 */
export class BozonDatabase {
  readonly db: Database;
  private readonly known = new Set<string>();

  constructor(options?: DatabaseOptions) {
    this.db = new Database(options);
  }

  setSourceText(file: string, text: string): void {
    this.known.add(file);
    sourceText.set(this.db, file, text);
  }

  removeFile(file: string): void {
    this.known.delete(file);
    sourceText.remove(this.db, file);
  }

  /** Known file ids in insertion order */
  files(): string[] {
    return [...this.known];
  }

  setParserOptions(options: ParseOptions): void {
    parserOptions.set(this.db, DEFAULT_OPTIONS_KEY, options);
  }

  parseFile(file: string): ParseResult {
    return parseFile.get(this.db, file);
  }

  lineStarts(file: string): readonly number[] {
    return lineStarts.get(this.db, file);
  }

  diagnostics(file: string): readonly Diagnostic[] {
    return fileDiagnostics.get(this.db, file);
  }
}
