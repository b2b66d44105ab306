/**
 * Error Taxonomy Tests
 * Registry contents, template rendering and error classes
 */

import { describe, expect, it } from 'vitest';

import {
  BozonError,
  ERROR_REGISTRY,
  formatErrorMessage,
  ParseError,
  renderMessage,
  SpanRangeError,
} from '@bozon/core';

describe('ERROR_REGISTRY', () => {
  it('holds every span, parse and query error', () => {
    expect([...ERROR_REGISTRY.entries()].map(([id]) => id)).toEqual([
      'BOZON-S001',
      'BOZON-S002',
      'BOZON-P001',
      'BOZON-P002',
      'BOZON-Q001',
      'BOZON-Q002',
    ]);
    expect(ERROR_REGISTRY.size).toBe(6);
  });

  it('uses BOZON-{category}{3 digits} IDs', () => {
    for (const [errorId, definition] of ERROR_REGISTRY.entries()) {
      expect(errorId).toMatch(/^BOZON-[SPQ]\d{3}$/);
      expect(errorId).toBe(definition.errorId);
      expect(errorId[6]).toBe(definition.category[0]?.toUpperCase());
    }
  });

  it('returns undefined for unknown IDs', () => {
    expect(ERROR_REGISTRY.get('BOZON-X999')).toBeUndefined();
    expect(ERROR_REGISTRY.has('BOZON-X999')).toBe(false);
  });
});

describe('renderMessage', () => {
  it('substitutes placeholders', () => {
    expect(renderMessage('Expected {a}, got {b}', { a: 'x', b: 1 })).toBe(
      'Expected x, got 1'
    );
  });

  it('joins array values with commas', () => {
    expect(renderMessage('one of: {xs}', { xs: ['a', 'b'] })).toBe(
      'one of: a, b'
    );
  });

  it('renders missing values as empty strings', () => {
    expect(renderMessage('Hello {name}!', {})).toBe('Hello !');
  });

  it('returns templates with an unclosed brace unchanged', () => {
    expect(renderMessage('oops {x', { x: 1 })).toBe('oops {x');
  });

  it('formats registry templates by ID', () => {
    expect(formatErrorMessage('BOZON-P002', { maxDepth: 8 })).toBe(
      'List nesting exceeds maximum depth of 8'
    );
  });
});

describe('error classes', () => {
  it('appends the offset to the message and strips it from toData', () => {
    const err = new ParseError('BOZON-P001', 4, ['ident'], ')');
    expect(err.message).toBe(
      "Unexpected ')', expected one of: ident at offset 4"
    );
    expect(err.toData()).toEqual({
      errorId: 'BOZON-P001',
      message: "Unexpected ')', expected one of: ident",
      offset: 4,
      context: { expected: ['ident'], found: "')'" },
    });
  });

  it('keeps the class hierarchy', () => {
    const err = new SpanRangeError('BOZON-S001', 2, 1, 65535);
    expect(err).toBeInstanceOf(BozonError);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('SpanRangeError');
  });

  it('omits the offset suffix when there is no position', () => {
    const err = new BozonError({
      errorId: 'BOZON-Q001',
      message: 'No value set for input text(a)',
    });
    expect(err.message).toBe('No value set for input text(a)');
    expect(err.offset).toBeUndefined();
  });

  it('rejects unknown error IDs', () => {
    expect(() => new ParseError('BOZON-X999', 0, [], null)).toThrow(
      'Unknown error ID: BOZON-X999'
    );
  });

  it('rejects IDs from another category', () => {
    expect(() => new ParseError('BOZON-S001', 0, [], null)).toThrow(
      'Expected parse error ID, got: BOZON-S001'
    );
    expect(() => new SpanRangeError('BOZON-P001', 0, 1, 65535)).toThrow(
      'Expected span error ID, got: BOZON-P001'
    );
  });
});
