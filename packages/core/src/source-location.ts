import type { Span } from './span.js';
import { spanEnd } from './span.js';

// ============================================================
// SOURCE LOCATION
// ============================================================

/** Human-facing position: 1-based line and column (in characters) */
export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  /** UTF-8 byte offset */
  readonly offset: number;
}

export function byteLength(source: string): number {
  return Buffer.byteLength(source, 'utf8');
}

/** Text covered by a span; spans are byte ranges, not string indices */
export function sliceSpan(source: string, span: Span): string {
  return Buffer.from(source, 'utf8')
    .subarray(span.start, spanEnd(span))
    .toString('utf8');
}

/** Byte offset at which each line begins; always starts with 0 */
export function computeLineStarts(source: string): number[] {
  const bytes = Buffer.from(source, 'utf8');
  const starts = [0];
  for (let i = 0; i < bytes.length; i++) {
    if (bytes[i] === 0x0a) starts.push(i + 1);
  }
  return starts;
}

/**
 * Convert a byte offset into a line/column location.
 * Pass precomputed `lineStarts` to avoid rescanning the source.
 */
export function locate(
  source: string,
  offset: number,
  lineStarts: readonly number[] = computeLineStarts(source)
): SourceLocation {
  let low = 0;
  let high = lineStarts.length - 1;
  while (low < high) {
    const mid = (low + high + 1) >> 1;
    if ((lineStarts[mid] ?? 0) <= offset) {
      low = mid;
    } else {
      high = mid - 1;
    }
  }

  const lineStart = lineStarts[low] ?? 0;
  const prefix = Buffer.from(source, 'utf8')
    .subarray(lineStart, offset)
    .toString('utf8');
  return { line: low + 1, column: [...prefix].length + 1, offset };
}
