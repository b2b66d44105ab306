/**
 * Input Queries
 * Values set from outside; every change advances the database revision
 */

import { QueryError } from '../errors.js';
import type { Database } from './database.js';
import type { Equality, QueryKey, QueryNode } from './types.js';

type InputSlot<V> =
  | { readonly present: true; readonly value: V; readonly changedAt: number }
  | { readonly present: false; readonly changedAt: number };

export class InputQuery<V> implements QueryNode {
  private readonly slots = new WeakMap<Database, Map<QueryKey, InputSlot<V>>>();

  constructor(
    readonly name: string,
    private readonly equals: Equality<V> = Object.is
  ) {}

  /** Store a value; setting an equal value leaves the revision unchanged */
  set(db: Database, key: QueryKey, value: V): void {
    const slots = this.slotsFor(db);
    const slot = slots.get(key);
    if (slot?.present && this.equals(slot.value, value)) return;

    const changedAt = db.bumpRevision(this, key);
    slots.set(key, { present: true, value, changedAt });
  }

  /** Remove the value; queries that read it are invalidated */
  remove(db: Database, key: QueryKey): void {
    const slots = this.slotsFor(db);
    if (!slots.get(key)?.present) return;

    const changedAt = db.bumpRevision(this, key);
    slots.set(key, { present: false, changedAt });
  }

  has(db: Database, key: QueryKey): boolean {
    return this.slotsFor(db).get(key)?.present ?? false;
  }

  /**
   * Read the value, recording the dependency for the running query.
   * @throws QueryError (BOZON-Q001) if no value is set
   */
  get(db: Database, key: QueryKey): V {
    db.recordRead(this, key);
    const slot = this.slotsFor(db).get(key);
    if (!slot?.present) {
      throw new QueryError('BOZON-Q001', this.name, key);
    }
    return slot.value;
  }

  /** Like get, but an unset input reads as undefined */
  getOptional(db: Database, key: QueryKey): V | undefined {
    db.recordRead(this, key);
    const slot = this.slotsFor(db).get(key);
    return slot?.present ? slot.value : undefined;
  }

  refresh(db: Database, key: QueryKey): number {
    return this.slotsFor(db).get(key)?.changedAt ?? 0;
  }

  private slotsFor(db: Database): Map<QueryKey, InputSlot<V>> {
    let slots = this.slots.get(db);
    if (!slots) {
      slots = new Map();
      this.slots.set(db, slots);
    }
    return slots;
  }
}
