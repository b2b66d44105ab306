/**
 * Span Tests
 * Construction, bounds checking and merge laws
 */

import { describe, expect, it } from 'vitest';

import {
  createSpan,
  MAX_SPAN_LENGTH,
  mergeSpans,
  spanContains,
  spanEnd,
  spanLength,
  spanStart,
  SpanRangeError,
  spanToRange,
} from '@bozon/core';

describe('createSpan', () => {
  it('stores start and length of the half-open range', () => {
    const span = createSpan(3, 8);
    expect(span).toEqual({ start: 3, length: 5 });
    expect(spanStart(span)).toBe(3);
    expect(spanEnd(span)).toBe(8);
    expect(spanLength(span)).toBe(5);
  });

  it('allows empty spans', () => {
    expect(createSpan(4, 4)).toEqual({ start: 4, length: 0 });
  });

  it('returns frozen spans', () => {
    expect(Object.isFrozen(createSpan(0, 1))).toBe(true);
  });

  it('accepts the largest encodable length', () => {
    expect(spanLength(createSpan(10, 10 + MAX_SPAN_LENGTH))).toBe(65535);
  });

  it('rejects start after end with BOZON-S001', () => {
    expect(() => createSpan(5, 3)).toThrow(SpanRangeError);
    try {
      createSpan(5, 3);
    } catch (err) {
      expect(err).toBeInstanceOf(SpanRangeError);
      if (err instanceof SpanRangeError) {
        expect(err.errorId).toBe('BOZON-S001');
        expect(err.message).toBe('Invalid span [5, 3) at offset 5');
      }
    }
  });

  it('rejects negative and fractional offsets', () => {
    expect(() => createSpan(-1, 2)).toThrow('Invalid span [-1, 2)');
    expect(() => createSpan(1.5, 2)).toThrow('Invalid span [1.5, 2)');
  });

  it('rejects lengths past the limit with BOZON-S002', () => {
    try {
      createSpan(0, 65536);
      expect.unreachable('createSpan should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(SpanRangeError);
      if (err instanceof SpanRangeError) {
        expect(err.errorId).toBe('BOZON-S002');
        expect(err.start).toBe(0);
        expect(err.end).toBe(65536);
        expect(err.toData()).toEqual({
          errorId: 'BOZON-S002',
          message: 'Span length 65536 exceeds limit of 65535 bytes',
          offset: 0,
          context: { start: 0, end: 65536, length: 65536, limit: 65535 },
        });
      }
    }
  });
});

describe('mergeSpans', () => {
  it('covers both inputs', () => {
    const merged = mergeSpans(createSpan(10, 10000), createSpan(100, 1000));
    expect(merged).toEqual({ start: 10, length: 9990 });
  });

  it('covers the gap between disjoint spans', () => {
    expect(mergeSpans(createSpan(0, 1), createSpan(5, 7))).toEqual({
      start: 0,
      length: 7,
    });
  });

  it('is commutative', () => {
    const a = createSpan(3, 8);
    const b = createSpan(5, 20);
    expect(mergeSpans(a, b)).toEqual(mergeSpans(b, a));
    expect(mergeSpans(a, b)).toEqual({ start: 3, length: 17 });
  });

  it('is idempotent', () => {
    const a = createSpan(7, 12);
    expect(mergeSpans(a, a)).toEqual(a);
  });

  it('fails when the union is too long', () => {
    expect(() => mergeSpans(createSpan(0, 10), createSpan(65530, 65540))).toThrow(
      SpanRangeError
    );
  });
});

describe('span queries', () => {
  it('spanContains treats the end as exclusive', () => {
    const span = createSpan(2, 5);
    expect(spanContains(span, 1)).toBe(false);
    expect(spanContains(span, 2)).toBe(true);
    expect(spanContains(span, 4)).toBe(true);
    expect(spanContains(span, 5)).toBe(false);
  });

  it('spanToRange returns start and end', () => {
    expect(spanToRange(createSpan(6, 9))).toEqual([6, 9]);
  });
});
