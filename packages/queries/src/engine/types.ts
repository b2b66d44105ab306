/**
 * Query Engine Types
 */

import type { Database } from './database.js';

/** Keys are plain strings: file ids, or a fixed key for singleton inputs */
export type QueryKey = string;

export type Equality<V> = (a: V, b: V) => boolean;

/**
 * Anything a memo can depend on.
 * `refresh` brings the slot up to date at the current revision and returns
 * the revision at which its value last changed.
 */
export interface QueryNode {
  readonly name: string;
  refresh(db: Database, key: QueryKey): number;
}

/** One edge of the dependency graph */
export interface Dependency {
  readonly node: QueryNode;
  readonly key: QueryKey;
}

// ============================================================
// OBSERVABILITY
// ============================================================

export interface QueryEvent {
  /** Query name */
  query: string;
  key: QueryKey;
  /** Database revision at the time of the event */
  revision: number;
}

export interface QueryCallbacks {
  /** Called before a derived query's computation runs */
  onQueryExecute?: (event: QueryEvent) => void;
  /** Called when a memoized value is returned without recomputing */
  onQueryReuse?: (event: QueryEvent) => void;
  /** Called when an input is set or removed and the revision advances */
  onInputChange?: (event: QueryEvent) => void;
}
