/**
 * Marker Lookup Tables
 */

import type { BracketKind, PrefixKind } from '../ast-nodes.js';
import { BRACKET_KINDS, PREFIX_KINDS } from '../ast-nodes.js';

/**
 * Prefix markers, longest first.
 * `,@` must be tried before `,` or it would split into Unquote + "@...".
 */
export const PREFIX_MARKERS: ReadonlyArray<
  readonly [marker: string, kind: PrefixKind]
> = [
  [',@', PREFIX_KINDS.UNQUOTE_SPLICING],
  ["'", PREFIX_KINDS.QUOTE],
  ['`', PREFIX_KINDS.QUASI_QUOTE],
  [',', PREFIX_KINDS.UNQUOTE],
];

/** Opening delimiter lookup table */
export const OPENING_BRACKETS: Readonly<Record<string, BracketKind>> = {
  '(': BRACKET_KINDS.ROUND,
  '{': BRACKET_KINDS.CURLY,
  '[': BRACKET_KINDS.SQUARE,
};

/** Delimiter pair for each bracket kind */
export const BRACKET_PAIRS: Readonly<
  Record<BracketKind, readonly [open: string, close: string]>
> = {
  [BRACKET_KINDS.ROUND]: ['(', ')'],
  [BRACKET_KINDS.CURLY]: ['{', '}'],
  [BRACKET_KINDS.SQUARE]: ['[', ']'],
};

export function prefixMarker(kind: PrefixKind): string {
  const entry = PREFIX_MARKERS.find(([, k]) => k === kind);
  return entry ? entry[0] : '';
}
