/**
 * Derived Queries
 * Memoized pure computations over other queries
 */

import type { Database } from './database.js';
import type { Dependency, Equality, QueryKey, QueryNode } from './types.js';

interface Memo<V> {
  readonly value: V;
  /** Revision at which the value last changed */
  readonly changedAt: number;
  /** Revision at which the value was last known to be current */
  verifiedAt: number;
  readonly deps: readonly Dependency[];
}

export type Compute<V> = (db: Database, key: QueryKey) => V;

/**
 * A memoized query. A memo is reused while none of its dependencies changed
 * after it was last verified; a recomputed value equal to the previous one
 * keeps its old `changedAt`, so queries depending on it stay valid.
 */
export class DerivedQuery<V> implements QueryNode {
  private readonly memos = new WeakMap<Database, Map<QueryKey, Memo<V>>>();

  constructor(
    readonly name: string,
    private readonly compute: Compute<V>,
    private readonly equals: Equality<V> = Object.is
  ) {}

  get(db: Database, key: QueryKey): V {
    db.recordRead(this, key);
    return this.fetch(db, key).value;
  }

  refresh(db: Database, key: QueryKey): number {
    return this.fetch(db, key).changedAt;
  }

  /** Drop every memo held for `db` */
  clear(db: Database): void {
    this.memos.delete(db);
  }

  private fetch(db: Database, key: QueryKey): Memo<V> {
    const memos = this.memosFor(db);
    const memo = memos.get(key);

    if (memo && (memo.verifiedAt === db.revision || this.isCurrent(db, memo))) {
      memo.verifiedAt = db.revision;
      db.notifyReuse(this, key);
      return memo;
    }

    const { value, deps } = db.execute(this, key, () =>
      this.compute(db, key)
    );
    const changedAt =
      memo && this.equals(memo.value, value) ? memo.changedAt : db.revision;
    const next: Memo<V> = {
      value,
      changedAt,
      verifiedAt: db.revision,
      deps,
    };
    memos.set(key, next);
    return next;
  }

  /** Deep-verify: every dependency unchanged since the memo was verified */
  private isCurrent(db: Database, memo: Memo<V>): boolean {
    return memo.deps.every(
      (dep) => dep.node.refresh(db, dep.key) <= memo.verifiedAt
    );
  }

  private memosFor(db: Database): Map<QueryKey, Memo<V>> {
    let memos = this.memos.get(db);
    if (!memos) {
      memos = new Map();
      this.memos.set(db, memos);
    }
    return memos;
  }
}
