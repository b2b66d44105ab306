/**
 * Bozon Core
 * Exports spans, AST types, lexer, parser and error taxonomy
 */

export {
  createSpan,
  MAX_SPAN_LENGTH,
  mergeSpans,
  type Span,
  spanContains,
  spanEnd,
  spanLength,
  spanStart,
  spanToRange,
} from './span.js';

export {
  type Atom,
  atomEquals,
  type AtomKind,
  BRACKET_KINDS,
  type BracketKind,
  type IdentKind,
  identKind,
  type ListKind,
  listKind,
  makeAtom,
  PREFIX_KINDS,
  type PrefixKind,
  type Program,
  programEquals,
  type StringKind,
  stringKind,
  walkAtoms,
} from './ast-nodes.js';

export {
  createLexerState,
  type Lexeme,
  type LexerState,
  lexWith,
  PREFIX_MARKERS,
  readIdent,
  readPrefix,
  readString,
  skipWhitespace,
} from './lexer/index.js';

export {
  DEFAULT_MAX_DEPTH,
  EXPECTED,
  parse,
  type ParseOptions,
  type ParseResult,
  safeParse,
} from './parser/index.js';

export { printAtom, printProgram } from './printer.js';

export {
  byteLength,
  computeLineStarts,
  locate,
  sliceSpan,
  type SourceLocation,
} from './source-location.js';

// ============================================================
// ERROR TAXONOMY
// ============================================================
export {
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorRegistry,
  ERROR_REGISTRY,
  renderMessage,
} from './error-registry.js';

export {
  BozonError,
  type BozonErrorData,
  formatErrorMessage,
  lookupDefinition,
  ParseError,
  SpanRangeError,
} from './error-classes.js';
