/**
 * Lexer Module
 * Lexical forms of the s-expression grammar
 */

export { isBracket, isIdentChar, isWhitespace } from './helpers.js';
export {
  BRACKET_PAIRS,
  OPENING_BRACKETS,
  PREFIX_MARKERS,
  prefixMarker,
} from './markers.js';
export {
  type Lexeme,
  lexWith,
  readIdent,
  readPrefix,
  readString,
  skipWhitespace,
} from './readers.js';
export {
  advance,
  createLexerState,
  currentPosition,
  isAtEnd,
  type LexerPosition,
  type LexerState,
  peek,
  utf8Length,
} from './state.js';
