/**
 * Bozon Parser
 * Main entry point and re-exports
 */

import type { Program } from '../ast-nodes.js';
import { BozonError } from '../error-classes.js';
import { Parser } from './parser.js';
import type { ParseOptions } from './state.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-program.js';
import './parser-list.js';

// ============================================================
// MAIN ENTRY POINT
// ============================================================

/** Outcome of safeParse */
export type ParseResult =
  | { readonly success: true; readonly program: Program }
  | { readonly success: false; readonly error: BozonError };

/**
 * Parse source text into its top-level atoms.
 *
 * Pure: the same source and options always give the same program, or the
 * same error. Stops at the first syntax error.
 *
 * @throws ParseError when no grammar alternative matches
 * @throws SpanRangeError when a token or list is too long for a span
 *
 * @example
 * ```typescript
 * const [call] = parse('(+ 1 1)');
 * ```
 */
export function parse(source: string, options?: ParseOptions): Program {
  return new Parser(source, options).parse();
}

/**
 * Parse without throwing Bozon errors.
 * Anything that is not a BozonError still propagates.
 *
 * @example
 * ```typescript
 * const result = safeParse(source);
 * if (!result.success) {
 *   console.log(result.error.errorId, result.error.offset);
 * }
 * ```
 */
export function safeParse(source: string, options?: ParseOptions): ParseResult {
  try {
    return { success: true, program: parse(source, options) };
  } catch (err) {
    if (err instanceof BozonError) {
      return { success: false, error: err };
    }
    throw err;
  }
}

// ============================================================
// RE-EXPORTS
// ============================================================

export {
  createParserState,
  DEFAULT_MAX_DEPTH,
  EXPECTED,
  type ParseOptions,
  type ParserState,
} from './state.js';

export { Parser } from './parser.js';
