/**
 * Parser Extension: Program Parsing
 * Top-level program, s-expressions with optional prefix, atom bodies
 */

import { Parser } from './parser.js';
import type { Atom, AtomKind, Program } from '../ast-nodes.js';
import { makeAtom } from '../ast-nodes.js';
import {
  isAtEnd,
  OPENING_BRACKETS,
  peek,
  readIdent,
  readPrefix,
  readString,
  skipWhitespace,
  type Lexeme,
} from '../lexer/index.js';
import { mergeSpans } from '../span.js';
import {
  BODY_ALTERNATIVES,
  EXPECTED,
  SEXP_ALTERNATIVES,
  unexpected,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseProgram(): Program;
    parseSexp(expected: readonly string[]): Atom;
    parseBody(expected: readonly string[]): Lexeme<AtomKind>;
  }
}

// ============================================================
// PROGRAM
// ============================================================

/**
 * program := whitespace* (s-expression whitespace*)* end-of-input
 */
Parser.prototype.parseProgram = function (this: Parser): Program {
  const lexer = this.state.lexer;
  const atoms: Atom[] = [];

  skipWhitespace(lexer);
  while (!isAtEnd(lexer)) {
    atoms.push(this.parseSexp([...SEXP_ALTERNATIVES, EXPECTED.END]));
    skipWhitespace(lexer);
  }

  return Object.freeze(atoms);
};

// ============================================================
// S-EXPRESSIONS
// ============================================================

/**
 * s-expression := prefix? whitespace* (list | string | ident)
 *
 * `expected` is reported when nothing at all matches here; once a prefix
 * has been read only the body alternatives remain.
 */
Parser.prototype.parseSexp = function (
  this: Parser,
  expected: readonly string[]
): Atom {
  const prefix = readPrefix(this.state.lexer);
  if (prefix === null) {
    const body = this.parseBody(expected);
    return makeAtom(null, body.kind, body.span);
  }

  skipWhitespace(this.state.lexer);
  const body = this.parseBody(BODY_ALTERNATIVES);
  return makeAtom(prefix.kind, body.kind, mergeSpans(prefix.span, body.span));
};

/**
 * Alternatives in order: list, string, ident.
 * An unterminated string falls through to ident.
 */
Parser.prototype.parseBody = function (
  this: Parser,
  expected: readonly string[]
): Lexeme<AtomKind> {
  const lexer = this.state.lexer;

  const bracket = OPENING_BRACKETS[peek(lexer)];
  if (bracket !== undefined) {
    return this.parseList(bracket);
  }

  const str = readString(lexer);
  if (str) return str;

  const ident = readIdent(lexer);
  if (ident) return ident;

  throw unexpected(this.state, expected);
};
