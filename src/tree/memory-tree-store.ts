import type { BoundField, IntervalFilter, ShiftRange, TreeNode } from './tree-types.js';
import { inShiftRange, matchesFilter } from './tree-types.js';
import type { BoundAggregate, TreeStore } from './tree-store.js';
import { NestedSetStrategy } from './nested-set-strategy.js';

/**
 * Options for creating a MemoryTreeStore.
 */
export interface MemoryTreeStoreOptions<T extends TreeNode> {
  /** Rows present from the start */
  rows?: T[];
  /** Copies a row; defaults to a shallow spread */
  clone?: (node: T) => T;
}

/**
 * Tree store keeping its rows in process.
 * Rows are copied on the way in and out, so callers never share
 * instances with the store.
 */
export class MemoryTreeStore<T extends TreeNode> implements TreeStore<T> {
  private rows: T[];
  private readonly clone: (node: T) => T;
  private inTransaction = false;

  constructor(options: MemoryTreeStoreOptions<T> = {}) {
    this.clone = options.clone ?? (node => ({ ...node }));
    this.rows = (options.rows ?? []).map(this.clone);
  }

  /** Number of persisted rows. */
  get size(): number {
    return this.rows.length;
  }

  async readAll(): Promise<T[]> {
    return this.rows.map(this.clone);
  }

  async rangeQuery(filter: IntervalFilter): Promise<T[]> {
    return this.rows
      .filter(row => matchesFilter(row, filter))
      .sort((a, b) => NestedSetStrategy.compareByLeft(a, b))
      .map(this.clone);
  }

  async bulkUpdate(range: ShiftRange, field: BoundField, delta: number): Promise<void> {
    for (const row of this.rows) {
      if (inShiftRange(row[field], range)) {
        row[field] += delta;
      }
    }
  }

  async insert(nodes: T[]): Promise<void> {
    this.rows.push(...nodes.map(this.clone));
  }

  async aggregate(fn: BoundAggregate, field: BoundField): Promise<number | null> {
    if (this.rows.length === 0) return null;
    const pick = fn === 'min' ? Math.min : Math.max;
    return this.rows.reduce((acc, row) => pick(acc, row[field]), this.rows[0][field]);
  }

  async transaction<R>(action: () => Promise<R>): Promise<R> {
    if (this.inTransaction) {
      return action();
    }

    const saved = this.rows.map(this.clone);
    this.inTransaction = true;
    try {
      return await action();
    } catch (error) {
      this.rows = saved;
      throw error;
    } finally {
      this.inTransaction = false;
    }
  }
}
