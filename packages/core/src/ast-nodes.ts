import type { Span } from './span.js';

// ============================================================
// SYNTACTIC TAGS
// ============================================================

/** Quoting marker that preceded an atom */
export const PREFIX_KINDS = {
  QUOTE: 'Quote', // '
  QUASI_QUOTE: 'QuasiQuote', // `
  UNQUOTE: 'Unquote', // ,
  UNQUOTE_SPLICING: 'UnquoteSplicing', // ,@
} as const;

export type PrefixKind = (typeof PREFIX_KINDS)[keyof typeof PREFIX_KINDS];

/** Delimiter pair that enclosed a list */
export const BRACKET_KINDS = {
  ROUND: 'Round', // ( )
  CURLY: 'Curly', // { }
  SQUARE: 'Square', // [ ]
} as const;

export type BracketKind = (typeof BRACKET_KINDS)[keyof typeof BRACKET_KINDS];

// ============================================================
// ATOMS
// ============================================================

export interface IdentKind {
  readonly type: 'Ident';
  readonly text: string;
}

/** String literal contents, without the quotes and with no escape processing */
export interface StringKind {
  readonly type: 'String';
  readonly text: string;
}

export interface ListKind {
  readonly type: 'List';
  readonly items: readonly Atom[];
  readonly bracket: BracketKind;
}

export type AtomKind = IdentKind | StringKind | ListKind;

/**
 * One parsed s-expression.
 * For lists, `span` runs from the opening delimiter through the closing one
 * and any whitespace the grammar consumed after it.
 */
export interface Atom {
  readonly prefix: PrefixKind | null;
  readonly kind: AtomKind;
  readonly span: Span;
}

/** Top-level atoms of one source unit, in source order */
export type Program = readonly Atom[];

// ============================================================
// CONSTRUCTORS
// ============================================================

export function identKind(text: string): IdentKind {
  return { type: 'Ident', text };
}

export function stringKind(text: string): StringKind {
  return { type: 'String', text };
}

export function listKind(
  items: readonly Atom[],
  bracket: BracketKind
): ListKind {
  return { type: 'List', items: Object.freeze([...items]), bracket };
}

/**
 * Build an immutable atom.
 *
 * @throws TypeError for an identifier with no characters
 */
export function makeAtom(
  prefix: PrefixKind | null,
  kind: AtomKind,
  span: Span
): Atom {
  if (kind.type === 'Ident' && kind.text.length === 0) {
    throw new TypeError('Identifier must contain at least one character');
  }
  return Object.freeze({ prefix, kind: Object.freeze(kind), span });
}

// ============================================================
// TRAVERSAL
// ============================================================

/**
 * Depth-first, pre-order walk over atoms and their list items.
 * Uses an explicit stack so deeply nested input cannot overflow the call stack.
 */
export function walkAtoms(
  program: Program,
  visit: (atom: Atom, depth: number) => void
): void {
  const stack: Array<{ atom: Atom; depth: number }> = [];
  for (let i = program.length - 1; i >= 0; i--) {
    const atom = program[i];
    if (atom) stack.push({ atom, depth: 0 });
  }

  let entry = stack.pop();
  while (entry) {
    visit(entry.atom, entry.depth);
    const kind = entry.atom.kind;
    if (kind.type === 'List') {
      for (let i = kind.items.length - 1; i >= 0; i--) {
        const item = kind.items[i];
        if (item) stack.push({ atom: item, depth: entry.depth + 1 });
      }
    }
    entry = stack.pop();
  }
}

// ============================================================
// EQUALITY
// ============================================================

/** Structural equality of two atoms, spans included */
export function atomEquals(a: Atom, b: Atom): boolean {
  if (a.prefix !== b.prefix) return false;
  if (a.span.start !== b.span.start || a.span.length !== b.span.length) {
    return false;
  }

  const x = a.kind;
  const y = b.kind;
  if (x.type === 'List' && y.type === 'List') {
    return x.bracket === y.bracket && programEquals(x.items, y.items);
  }
  if (x.type === 'Ident' && y.type === 'Ident') return x.text === y.text;
  if (x.type === 'String' && y.type === 'String') return x.text === y.text;
  return false;
}

export function programEquals(a: Program, b: Program): boolean {
  if (a.length !== b.length) return false;
  return a.every((atom, i) => {
    const other = b[i];
    return other !== undefined && atomEquals(atom, other);
  });
}
