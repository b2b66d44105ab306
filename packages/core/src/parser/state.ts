/**
 * Parser State
 * Scanner position, nesting depth and error construction
 */

import { ParseError } from '../error-classes.js';
import { createLexerState, type LexerState, peek } from '../lexer/index.js';

// ============================================================
// PARSER STATE
// ============================================================

/** Default limit on list nesting */
export const DEFAULT_MAX_DEPTH = 256;

export interface ParseOptions {
  /** Deepest list nesting accepted before failing with BOZON-P002 */
  maxDepth?: number | undefined;
}

export interface ParserState {
  readonly lexer: LexerState;
  readonly maxDepth: number;
  /** Number of lists currently open */
  depth: number;
}

export function createParserState(
  source: string,
  options: ParseOptions = {}
): ParserState {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  if (!Number.isSafeInteger(maxDepth) || maxDepth < 1) {
    throw new TypeError(
      `maxDepth must be a positive integer, got: ${String(maxDepth)}`
    );
  }
  return { lexer: createLexerState(source), maxDepth, depth: 0 };
}

// ============================================================
// EXPECTED ALTERNATIVES
// ============================================================

/** Labels reported in ParseError.expected */
export const EXPECTED = {
  PREFIX: 'prefix',
  LIST: 'list',
  STRING: 'string',
  IDENT: 'ident',
  END: 'end of input',
} as const;

/** Alternatives for the body of an s-expression */
export const BODY_ALTERNATIVES: readonly string[] = Object.freeze([
  EXPECTED.LIST,
  EXPECTED.STRING,
  EXPECTED.IDENT,
]);

/** Alternatives where a whole s-expression may start */
export const SEXP_ALTERNATIVES: readonly string[] = Object.freeze([
  EXPECTED.PREFIX,
  ...BODY_ALTERNATIVES,
]);

export function closingLabel(close: string): string {
  return `'${close}'`;
}

// ============================================================
// ERRORS
// ============================================================

/** @internal */
export function unexpected(
  state: ParserState,
  expected: readonly string[]
): ParseError {
  const ch = peek(state.lexer);
  return new ParseError(
    'BOZON-P001',
    state.lexer.offset,
    expected,
    ch === '' ? null : ch
  );
}

/** @internal */
export function tooDeep(state: ParserState): ParseError {
  return new ParseError(
    'BOZON-P002',
    state.lexer.offset,
    [],
    peek(state.lexer),
    { maxDepth: state.maxDepth }
  );
}
