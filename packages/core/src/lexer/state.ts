/**
 * Lexer State
 * Tracks position in source text during scanning
 */

export interface LexerPosition {
  /** UTF-16 index into the source string */
  readonly pos: number;
  /** UTF-8 byte offset of the same position */
  readonly offset: number;
}

export interface LexerState {
  readonly source: string;
  pos: number;
  offset: number;
}

export function createLexerState(source: string): LexerState {
  return { source, pos: 0, offset: 0 };
}

export function currentPosition(state: LexerState): LexerPosition {
  return { pos: state.pos, offset: state.offset };
}

/** Rewind to a position taken earlier from the same state */
export function resetPosition(state: LexerState, mark: LexerPosition): void {
  state.pos = mark.pos;
  state.offset = mark.offset;
}

export function peek(state: LexerState, offset = 0): string {
  return state.source[state.pos + offset] ?? '';
}

export function peekString(state: LexerState, length: number): string {
  return state.source.slice(state.pos, state.pos + length);
}

/** Number of bytes a code point takes in UTF-8 */
export function utf8Length(codePoint: number): number {
  if (codePoint < 0x80) return 1;
  if (codePoint < 0x800) return 2;
  if (codePoint < 0x10000) return 3;
  return 4;
}

/** Consume one code point (one or two UTF-16 units) and return it */
export function advance(state: LexerState): string {
  const codePoint = state.source.codePointAt(state.pos);
  if (codePoint === undefined) return '';
  const width = codePoint > 0xffff ? 2 : 1;
  const ch = state.source.slice(state.pos, state.pos + width);
  state.pos += width;
  state.offset += utf8Length(codePoint);
  return ch;
}

export function isAtEnd(state: LexerState): boolean {
  return state.pos >= state.source.length;
}
