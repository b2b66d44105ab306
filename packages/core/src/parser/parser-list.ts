/**
 * Parser Extension: List Parsing
 * Bracketed lists of nested s-expressions
 */

import { Parser } from './parser.js';
import type { Atom, BracketKind, ListKind } from '../ast-nodes.js';
import { listKind } from '../ast-nodes.js';
import {
  advance,
  BRACKET_PAIRS,
  isAtEnd,
  peek,
  skipWhitespace,
  type Lexeme,
} from '../lexer/index.js';
import { createSpan } from '../span.js';
import {
  closingLabel,
  SEXP_ALTERNATIVES,
  tooDeep,
  unexpected,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseList(bracket: BracketKind): Lexeme<ListKind>;
  }
}

/**
 * list := open whitespace* (s-expression whitespace*)* close whitespace*
 *
 * The span covers the opening delimiter through the closing one, plus the
 * whitespace consumed after it.
 */
Parser.prototype.parseList = function (
  this: Parser,
  bracket: BracketKind
): Lexeme<ListKind> {
  const lexer = this.state.lexer;
  const [, close] = BRACKET_PAIRS[bracket];
  const itemAlternatives = [...SEXP_ALTERNATIVES, closingLabel(close)];

  if (this.state.depth >= this.state.maxDepth) {
    throw tooDeep(this.state);
  }

  const start = lexer.offset;
  advance(lexer); // consume opening delimiter
  this.state.depth++;
  skipWhitespace(lexer);

  const items: Atom[] = [];
  while (peek(lexer) !== close) {
    if (isAtEnd(lexer)) {
      throw unexpected(this.state, itemAlternatives);
    }
    items.push(this.parseSexp(itemAlternatives));
    skipWhitespace(lexer);
  }

  advance(lexer); // consume closing delimiter
  skipWhitespace(lexer);
  this.state.depth--;

  return {
    kind: listKind(items, bracket),
    span: createSpan(start, lexer.offset),
  };
};
