import type { BoundField, IntervalFilter, ShiftRange, TreeNode } from './tree-types.js';

/**
 * Aggregate functions a store computes over a boundary field.
 */
export type BoundAggregate = 'min' | 'max';

/**
 * Durable side of a tree: the ordered store holding persisted rows.
 *
 * Reads return fresh objects on every call; the manager takes care of
 * mapping them onto instances it already tracks.
 */
export interface TreeStore<T extends TreeNode> {
  /** Every persisted node, in no particular order. */
  readAll(): Promise<T[]>;

  /** Persisted nodes matching `filter`, ordered by left. */
  rangeQuery(filter: IntervalFilter): Promise<T[]>;

  /** Adds `delta` to `field` of every persisted node whose value lies in `range`. */
  bulkUpdate(range: ShiftRange, field: BoundField, delta: number): Promise<void>;

  /** Persists new nodes. */
  insert(nodes: T[]): Promise<void>;

  /** Minimum or maximum of a field, null for an empty store. */
  aggregate(fn: BoundAggregate, field: BoundField): Promise<number | null>;

  /**
   * Runs `action` as one atomic unit. Changes made by `action` are undone
   * when it rejects.
   */
  transaction<R>(action: () => Promise<R>): Promise<R>;

  /**
   * Walks the contiguous sibling chain starting at `startLeft`
   * (`next.left = previous.right + 1`), keeping rights below `endRight`
   * when given, in one round-trip. Stores without recursive queries leave
   * it out.
   */
  siblingChain?(startLeft: number, endRight?: number): Promise<T[]>;
}
