/**
 * Lexeme Readers
 * Functions to read the lexical forms at the current position.
 * Each returns null and leaves the state untouched when its form does not match.
 */

import type { IdentKind, PrefixKind, StringKind } from '../ast-nodes.js';
import { identKind, stringKind } from '../ast-nodes.js';
import { createSpan, type Span } from '../span.js';
import { isIdentChar, isWhitespace } from './helpers.js';
import { PREFIX_MARKERS } from './markers.js';
import {
  advance,
  createLexerState,
  currentPosition,
  isAtEnd,
  type LexerState,
  peek,
  peekString,
  resetPosition,
} from './state.js';

export interface Lexeme<K> {
  readonly kind: K;
  readonly span: Span;
}

export function skipWhitespace(state: LexerState): void {
  while (!isAtEnd(state) && isWhitespace(peek(state))) {
    advance(state);
  }
}

export function readPrefix(state: LexerState): Lexeme<PrefixKind> | null {
  for (const [marker, kind] of PREFIX_MARKERS) {
    if (peekString(state, marker.length) === marker) {
      const start = state.offset;
      for (let i = 0; i < marker.length; i++) advance(state);
      return { kind, span: createSpan(start, state.offset) };
    }
  }
  return null;
}

export function readIdent(state: LexerState): Lexeme<IdentKind> | null {
  const start = currentPosition(state);
  while (!isAtEnd(state) && isIdentChar(peek(state))) {
    advance(state);
  }
  if (state.pos === start.pos) return null;

  const text = state.source.slice(start.pos, state.pos);
  return { kind: identKind(text), span: createSpan(start.offset, state.offset) };
}

/** Span includes both quotes; an unterminated literal does not match */
export function readString(state: LexerState): Lexeme<StringKind> | null {
  if (peek(state) !== '"') return null;

  const start = currentPosition(state);
  advance(state); // consume opening "
  while (!isAtEnd(state) && peek(state) !== '"') {
    advance(state);
  }

  if (isAtEnd(state)) {
    resetPosition(state, start);
    return null;
  }

  const text = state.source.slice(start.pos + 1, state.pos);
  advance(state); // consume closing "
  return {
    kind: stringKind(text),
    span: createSpan(start.offset, state.offset),
  };
}

/**
 * Run a single reader against the start of `text`.
 * Used to re-lex the slice of source a span points at.
 */
export function lexWith<K>(
  text: string,
  reader: (state: LexerState) => Lexeme<K> | null
): Lexeme<K> | null {
  return reader(createLexerState(text));
}
