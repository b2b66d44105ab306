/**
 * Lexer Helper Functions
 * Character classification
 */

export function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r';
}

export function isBracket(ch: string): boolean {
  return (
    ch === '(' ||
    ch === ')' ||
    ch === '[' ||
    ch === ']' ||
    ch === '{' ||
    ch === '}'
  );
}

export function isIdentChar(ch: string): boolean {
  return ch !== '' && !isWhitespace(ch) && !isBracket(ch);
}
