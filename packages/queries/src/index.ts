/**
 * Bozon Queries
 * Memoizing query engine and the source-file query groups
 */

export { Database, type DatabaseOptions } from './engine/database.js';
export { type Compute, DerivedQuery } from './engine/derived.js';
export { InputQuery } from './engine/input.js';
export type {
  Dependency,
  Equality,
  QueryCallbacks,
  QueryEvent,
  QueryKey,
  QueryNode,
} from './engine/types.js';

export { QueryError } from './errors.js';

export {
  DEFAULT_OPTIONS_KEY,
  type Diagnostic,
  fileDiagnostics,
  lineStarts,
  parseFile,
  parserOptions,
  sourceText,
} from './groups.js';

export { BozonDatabase } from './bozon-database.js';
