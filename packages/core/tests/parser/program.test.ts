/**
 * Parser Tests: Programs, Lists and Atoms
 * Node shapes and byte spans for well-formed input
 */

import { describe, expect, it } from 'vitest';

import {
  type Atom,
  type BracketKind,
  parse,
  type PrefixKind,
  safeParse,
  SpanRangeError,
} from '@bozon/core';

function ident(
  text: string,
  start: number,
  length: number,
  prefix: PrefixKind | null = null
): Atom {
  return { prefix, kind: { type: 'Ident', text }, span: { start, length } };
}

function str(
  text: string,
  start: number,
  length: number,
  prefix: PrefixKind | null = null
): Atom {
  return { prefix, kind: { type: 'String', text }, span: { start, length } };
}

function list(
  items: Atom[],
  start: number,
  length: number,
  bracket: BracketKind = 'Round',
  prefix: PrefixKind | null = null
): Atom {
  return {
    prefix,
    kind: { type: 'List', items, bracket },
    span: { start, length },
  };
}

describe('Parser: programs', () => {
  it('parses empty input to an empty program', () => {
    expect(parse('')).toEqual([]);
  });

  it('parses whitespace-only input to an empty program', () => {
    expect(parse('  \n\t\r ')).toEqual([]);
  });

  it('parses several top-level atoms in source order', () => {
    expect(parse('  foo "bar" (baz)')).toEqual([
      ident('foo', 2, 3),
      str('bar', 6, 5),
      list([ident('baz', 13, 3)], 12, 5),
    ]);
  });

  it('returns a frozen program', () => {
    expect(Object.isFrozen(parse('a b'))).toBe(true);
  });

  it('is deterministic', () => {
    const source = "(define (f x) `(g ,x ,@rest))";
    expect(parse(source)).toEqual(parse(source));
  });
});

describe('Parser: lists', () => {
  it('parses an empty list', () => {
    expect(parse('()')).toEqual([list([], 0, 2)]);
  });

  it('includes inner whitespace in an empty list span', () => {
    expect(parse('( )')).toEqual([list([], 0, 3)]);
  });

  it('parses a call with identifier arguments', () => {
    expect(parse('(+ 1 1)')).toEqual([
      list([ident('+', 1, 1), ident('1', 3, 1), ident('1', 5, 1)], 0, 7),
    ]);
  });

  it('parses a list holding a string', () => {
    expect(parse('( "Hello")')).toEqual([list([str('Hello', 2, 7)], 0, 10)]);
  });

  it('skips leading whitespace of every kind', () => {
    expect(parse('\t\r\n (\t\r\n )')).toEqual([list([], 4, 6)]);
  });

  const singleItemLists: Array<[string, Atom, number]> = [
    ['(1)', ident('1', 1, 1), 3],
    ['( 1)', ident('1', 2, 1), 4],
    ['(1 )', ident('1', 1, 1), 4],
    ['( 1 )', ident('1', 2, 1), 5],
  ];

  it.each(singleItemLists)('spans the whole of %j', (source, item, length) => {
    expect(parse(source)).toEqual([list([item], 0, length)]);
  });

  it('extends a list span over whitespace after the closing delimiter', () => {
    expect(parse('(a) b')).toEqual([
      list([ident('a', 1, 1)], 0, 4),
      ident('b', 4, 1),
    ]);
  });

  it('parses nested lists of mixed brackets', () => {
    expect(parse('(a (b c) [d])')).toEqual([
      list(
        [
          ident('a', 1, 1),
          list([ident('b', 4, 1), ident('c', 6, 1)], 3, 6),
          list([ident('d', 10, 1)], 9, 3, 'Square'),
        ],
        0,
        13
      ),
    ]);
  });

  it('parses lists without separating whitespace', () => {
    expect(parse('(a(b))')).toEqual([
      list([ident('a', 1, 1), list([ident('b', 3, 1)], 2, 3)], 0, 6),
    ]);
  });

  it('parses curly and square brackets', () => {
    expect(parse('{a}')).toEqual([list([ident('a', 1, 1)], 0, 3, 'Curly')]);
    expect(parse('[a]')).toEqual([list([ident('a', 1, 1)], 0, 3, 'Square')]);
  });

  it('freezes list items', () => {
    const [atom] = parse('(a b)');
    expect(atom?.kind.type).toBe('List');
    if (atom?.kind.type === 'List') {
      expect(Object.isFrozen(atom.kind.items)).toBe(true);
    }
  });
});

describe('Parser: strings', () => {
  it('keeps string contents without the quotes', () => {
    expect(parse('"a b" c')).toEqual([str('a b', 0, 5), ident('c', 6, 1)]);
  });

  it('parses an empty string', () => {
    expect(parse('""  ')).toEqual([str('', 0, 2)]);
  });

  it('does not process escapes', () => {
    expect(parse('"\\n"')).toEqual([str('\\n', 0, 4)]);
  });

  it('ends a string at the first closing quote', () => {
    expect(parse('"a"b')).toEqual([str('a', 0, 3), ident('b', 3, 1)]);
  });

  it('reads an unterminated string as an identifier', () => {
    expect(parse('"abc')).toEqual([ident('"abc', 0, 4)]);
  });

  it('allows quotes inside identifiers', () => {
    expect(parse('a"b')).toEqual([ident('a"b', 0, 3)]);
  });
});

describe('Parser: prefixes', () => {
  const singleMarkers: Array<[string, PrefixKind]> = [
    ["'a", 'Quote'],
    ['`a', 'QuasiQuote'],
    [',a', 'Unquote'],
  ];

  it.each(singleMarkers)('parses %s with a %s prefix', (source, prefix) => {
    expect(parse(source)).toEqual([ident('a', 0, 2, prefix)]);
  });

  it('matches ,@ before ,', () => {
    expect(parse(',@xs')).toEqual([ident('xs', 0, 4, 'UnquoteSplicing')]);
  });

  it('reads "@" after a separated comma as part of the identifier', () => {
    expect(parse(', @x')).toEqual([ident('@x', 0, 4, 'Unquote')]);
  });

  it('allows whitespace between prefix and body', () => {
    expect(parse("' a")).toEqual([ident('a', 0, 3, 'Quote')]);
  });

  it('spans prefix and list together', () => {
    expect(parse("'(a) ")).toEqual([
      list([ident('a', 2, 1)], 0, 5, 'Round', 'Quote'),
    ]);
  });

  it('reads a second quote as part of the identifier', () => {
    expect(parse("''a")).toEqual([ident("'a", 0, 3, 'Quote')]);
  });

  it('parses prefixes inside lists', () => {
    expect(parse('`(f ,x ,@ys)')).toEqual([
      list(
        [
          ident('f', 2, 1),
          ident('x', 4, 2, 'Unquote'),
          ident('ys', 7, 4, 'UnquoteSplicing'),
        ],
        0,
        12,
        'Round',
        'QuasiQuote'
      ),
    ]);
  });
});

describe('Parser: byte offsets', () => {
  it('counts multi-byte characters in UTF-8 bytes', () => {
    expect(parse('(λ x)')).toEqual([
      list([ident('λ', 1, 2), ident('x', 4, 1)], 0, 6),
    ]);
  });

  it('treats non-ASCII spaces as identifier characters', () => {
    expect(parse('(\u00A0a)')).toEqual([
      list([ident('\u00A0a', 1, 3)], 0, 5),
    ]);
  });

  it('counts astral characters as four bytes', () => {
    expect(parse('"😀" z')).toEqual([str('😀', 0, 6), ident('z', 7, 1)]);
  });
});

describe('Parser: span limits', () => {
  it('rejects a string longer than a span can encode', () => {
    const source = `"${'a'.repeat(70000)}"`;
    expect(() => parse(source)).toThrow(SpanRangeError);
  });

  it('rejects a list longer than a span can encode', () => {
    const result = safeParse(`(${'a '.repeat(40000)})`);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(SpanRangeError);
      expect(result.error.errorId).toBe('BOZON-S002');
      expect(result.error.offset).toBe(0);
    }
  });

  it('accepts an atom exactly at the limit', () => {
    const source = 'a'.repeat(65535);
    const [atom] = parse(source);
    expect(atom?.span).toEqual({ start: 0, length: 65535 });
  });
});
