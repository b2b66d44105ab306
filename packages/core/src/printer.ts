/**
 * Printer
 * Canonical source text for parsed atoms
 */

import type { Atom, Program } from './ast-nodes.js';
import { BRACKET_PAIRS, PREFIX_MARKERS, prefixMarker } from './lexer/index.js';

/**
 * Render an atom with single spaces between list items.
 *
 * @example
 * printAtom(parse("'( a   [b] )")[0]) // "'(a [b])"
 */
export function printAtom(atom: Atom): string {
  const marker = atom.prefix ? prefixMarker(atom.prefix) : '';
  const kind = atom.kind;

  switch (kind.type) {
    case 'Ident':
      return identWithMarker(marker, kind.text);
    case 'String':
      return `${marker}"${kind.text}"`;
    case 'List': {
      const [open, close] = BRACKET_PAIRS[kind.bracket];
      return marker + open + kind.items.map(printAtom).join(' ') + close;
    }
  }
}

/**
 * `,` before `@x` would read back as `,@` + `x`, so a marker that would
 * merge into a longer one is followed by a space.
 */
function identWithMarker(marker: string, text: string): string {
  const joined = marker + text;
  if (marker === '') return joined;
  const merges = PREFIX_MARKERS.some(
    ([longer]) => longer.length > marker.length && joined.startsWith(longer)
  );
  return merges ? `${marker} ${text}` : joined;
}

/** One top-level atom per line */
export function printProgram(program: Program): string {
  return program.map(printAtom).join('\n');
}
