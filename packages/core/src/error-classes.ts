/**
 * Bozon Error Classes
 * Structured error types with registry-based error codes
 */

import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
} from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface BozonErrorData {
  readonly errorId: string;
  readonly message: string;
  /** UTF-8 byte offset into the source, when the error has a position */
  readonly offset?: number | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Looks up a registry entry and checks it belongs to the expected category.
 *
 * @throws TypeError if errorId is not found or has the wrong category
 */
export function lookupDefinition(
  errorId: string,
  category?: ErrorCategory
): ErrorDefinition {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (category !== undefined && definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
  return definition;
}

/**
 * Renders the registry message template for an error ID.
 *
 * @example
 * formatErrorMessage('BOZON-P002', { maxDepth: 8 })
 * // "List nesting exceeds maximum depth of 8"
 */
export function formatErrorMessage(
  errorId: string,
  context: Record<string, unknown>
): string {
  return renderMessage(lookupDefinition(errorId).messageTemplate, context);
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all Bozon errors.
 * Provides structured data for host applications to format as needed.
 */
export class BozonError extends Error {
  readonly errorId: string;
  readonly offset?: number | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: BozonErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }
    lookupDefinition(data.errorId);

    const offsetStr =
      data.offset !== undefined ? ` at offset ${data.offset}` : '';
    super(`${data.message}${offsetStr}`);
    this.name = 'BozonError';
    this.errorId = data.errorId;
    this.offset = data.offset;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): BozonErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(/ at offset \d+$/, ''),
      offset: this.offset,
      context: this.context,
    };
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** A span that cannot be represented (bad bounds or too long) */
export class SpanRangeError extends BozonError {
  readonly start: number;
  readonly end: number;

  constructor(errorId: string, start: number, end: number, limit: number) {
    lookupDefinition(errorId, 'span');
    const context = { start, end, length: end - start, limit };
    super({
      errorId,
      message: formatErrorMessage(errorId, context),
      offset: start,
      context,
    });
    this.name = 'SpanRangeError';
    this.start = start;
    this.end = end;
  }
}

/** Syntax errors: no grammar alternative matched at `offset` */
export class ParseError extends BozonError {
  // Parse errors always carry a position
  override readonly offset: number;
  /** Labelled alternatives that were being attempted */
  readonly expected: readonly string[];
  /** Offending character, or null at end of input */
  readonly found: string | null;

  constructor(
    errorId: string,
    offset: number,
    expected: readonly string[],
    found: string | null,
    context: Record<string, unknown> = {}
  ) {
    lookupDefinition(errorId, 'parse');
    const fullContext = {
      ...context,
      expected: [...expected],
      found: describeFound(found),
    };
    super({
      errorId,
      message: formatErrorMessage(errorId, fullContext),
      offset,
      context: fullContext,
    });
    this.name = 'ParseError';
    this.offset = offset;
    this.expected = Object.freeze([...expected]);
    this.found = found;
  }
}

function describeFound(found: string | null): string {
  if (found === null) return 'end of input';
  return `'${found}'`;
}
