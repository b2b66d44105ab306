/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Grammar rules are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety:
 * - parser-program.ts: program, s-expression and atom bodies
 * - parser-list.ts: bracketed lists
 *
 * @example
 * ```typescript
 * const parser = new Parser('(+ 1 1)', { maxDepth: 64 });
 * const program = parser.parse();
 * ```
 */

import type { Program } from '../ast-nodes.js';
import {
  createParserState,
  type ParseOptions,
  type ParserState,
} from './state.js';

export class Parser {
  /** Scanner position and nesting depth; private to one parse */
  state: ParserState;

  constructor(source: string, options?: ParseOptions) {
    this.state = createParserState(source, options);
  }

  /**
   * Parse the whole source into top-level atoms.
   */
  parse(): Program {
    return this.parseProgram();
  }
}
