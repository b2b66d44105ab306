/**
 * Span
 * Half-open UTF-8 byte range annotating every parsed node
 */

import { SpanRangeError } from './error-classes.js';

// ============================================================
// SPAN
// ============================================================

/**
 * Largest byte length a single span can cover.
 * Lengths are stored as 16-bit values; anything longer is rejected with
 * SpanRangeError rather than truncated.
 */
export const MAX_SPAN_LENGTH = 0xffff;

export interface Span {
  /** Byte offset of the first byte covered */
  readonly start: number;
  /** Number of bytes covered, at most MAX_SPAN_LENGTH */
  readonly length: number;
}

function isOffset(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

/**
 * Create a span covering [start, end).
 *
 * @throws SpanRangeError (BOZON-S001) if the bounds are invalid
 * @throws SpanRangeError (BOZON-S002) if the length exceeds MAX_SPAN_LENGTH
 */
export function createSpan(start: number, end: number): Span {
  if (!isOffset(start) || !isOffset(end) || start > end) {
    throw new SpanRangeError('BOZON-S001', start, end, MAX_SPAN_LENGTH);
  }
  if (end - start > MAX_SPAN_LENGTH) {
    throw new SpanRangeError('BOZON-S002', start, end, MAX_SPAN_LENGTH);
  }
  return Object.freeze({ start, length: end - start });
}

export function spanStart(span: Span): number {
  return span.start;
}

export function spanEnd(span: Span): number {
  return span.start + span.length;
}

export function spanLength(span: Span): number {
  return span.length;
}

/**
 * Smallest span covering both arguments.
 * Commutative and idempotent; fails like createSpan when the union is too
 * long to encode.
 */
export function mergeSpans(a: Span, b: Span): Span {
  return createSpan(
    Math.min(a.start, b.start),
    Math.max(spanEnd(a), spanEnd(b))
  );
}

/** True when `offset` lies inside the half-open range */
export function spanContains(span: Span, offset: number): boolean {
  return offset >= span.start && offset < spanEnd(span);
}

export function spanToRange(span: Span): [start: number, end: number] {
  return [span.start, spanEnd(span)];
}
