/**
 * Query Database
 * Revision counter, active-query stack and dependency recording
 */

import { QueryError } from '../errors.js';
import type {
  Dependency,
  QueryCallbacks,
  QueryEvent,
  QueryKey,
  QueryNode,
} from './types.js';

export interface DatabaseOptions {
  callbacks?: QueryCallbacks | undefined;
}

interface ActiveQuery {
  readonly node: QueryNode;
  readonly key: QueryKey;
  readonly deps: Dependency[];
}

/**
 * Holds the revision shared by all queries and tracks which query is
 * currently computing, so reads inside a computation become dependency edges.
 * Memoized values live in the query handles, keyed by database.
 */
export class Database {
  private currentRevision = 0;
  private readonly active: ActiveQuery[] = [];
  readonly callbacks: QueryCallbacks;

  constructor(options: DatabaseOptions = {}) {
    this.callbacks = options.callbacks ?? {};
  }

  get revision(): number {
    return this.currentRevision;
  }

  /** @internal Advance the revision after an input changed */
  bumpRevision(node: QueryNode, key: QueryKey): number {
    this.currentRevision++;
    this.callbacks.onInputChange?.(this.event(node, key));
    return this.currentRevision;
  }

  /** @internal Record that the running query read `node(key)` */
  recordRead(node: QueryNode, key: QueryKey): void {
    const top = this.active[this.active.length - 1];
    if (!top) return;
    if (!top.deps.some((dep) => dep.node === node && dep.key === key)) {
      top.deps.push({ node, key });
    }
  }

  /**
   * @internal Run a computation with dependency tracking.
   * @throws QueryError (BOZON-Q002) if node(key) is already computing
   */
  execute<V>(
    node: QueryNode,
    key: QueryKey,
    compute: () => V
  ): { value: V; deps: Dependency[] } {
    if (this.active.some((frame) => frame.node === node && frame.key === key)) {
      throw new QueryError('BOZON-Q002', node.name, key);
    }

    this.callbacks.onQueryExecute?.(this.event(node, key));
    const frame: ActiveQuery = { node, key, deps: [] };
    this.active.push(frame);
    try {
      return { value: compute(), deps: frame.deps };
    } finally {
      this.active.pop();
    }
  }

  /** @internal */
  notifyReuse(node: QueryNode, key: QueryKey): void {
    this.callbacks.onQueryReuse?.(this.event(node, key));
  }

  private event(node: QueryNode, key: QueryKey): QueryEvent {
    return { query: node.name, key, revision: this.currentRevision };
  }
}
