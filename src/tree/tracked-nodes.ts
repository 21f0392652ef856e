import type { BoundField, ShiftRange, TreeNode } from './tree-types.js';
import { inShiftRange } from './tree-types.js';

/**
 * Lifecycle of a node known to the manager.
 */
export enum NodeStatus {
  /** Node is staged for insertion and not yet persisted */
  New = 'new',
  /** Node mirrors a persisted row */
  Managed = 'managed',
}

/**
 * Captured boundaries of every tracked node, used to undo a failed operation.
 */
export type IntervalSnapshot<T> = Map<T, { left: number; right: number }>;

/**
 * Local tier of the tree: every node instance the manager has staged or
 * handed out. Shifts are applied here in lock-step with the store so that
 * in-memory nodes keep matching their rows, and staged nodes stay valid
 * relative to persisted ones.
 *
 * Persisted rows are identified by their left boundary, which is unique
 * across the tree at any time.
 */
export class TrackedNodeSet<T extends TreeNode> {
  private readonly tracked = new Map<T, NodeStatus>();

  get hasStaged(): boolean {
    for (const status of this.tracked.values()) {
      if (status === NodeStatus.New) return true;
    }
    return false;
  }

  /**
   * A node is attached once it is staged or was loaded through the manager.
   */
  isAttached(node: T): boolean {
    return this.tracked.has(node);
  }

  statusOf(node: T): NodeStatus | undefined {
    return this.tracked.get(node);
  }

  stage(node: T): void {
    this.tracked.set(node, NodeStatus.New);
  }

  markManaged(nodes: Iterable<T>): void {
    for (const node of nodes) {
      this.tracked.set(node, NodeStatus.Managed);
    }
  }

  detach(node: T): boolean {
    return this.tracked.delete(node);
  }

  all(): T[] {
    return Array.from(this.tracked.keys());
  }

  staged(): T[] {
    const result: T[] = [];
    for (const [node, status] of this.tracked) {
      if (status === NodeStatus.New) result.push(node);
    }
    return result;
  }

  /**
   * Swaps freshly loaded rows for the instances already tracked for them,
   * and starts tracking the rest.
   */
  mergeLoaded(rows: T[]): T[] {
    const byLeft = new Map<number, T>();
    for (const [node, status] of this.tracked) {
      if (status === NodeStatus.Managed) byLeft.set(node.left, node);
    }

    return rows.map(row => {
      const existing = byLeft.get(row.left);
      if (existing) return existing;
      this.tracked.set(row, NodeStatus.Managed);
      byLeft.set(row.left, row);
      return row;
    });
  }

  /**
   * Adds `offset` to `field` of every tracked node whose value lies in `range`.
   * @returns Number of nodes changed
   */
  shift(field: BoundField, range: ShiftRange, offset: number): number {
    let changed = 0;
    for (const node of this.tracked.keys()) {
      if (inShiftRange(node[field], range)) {
        node[field] += offset;
        changed++;
      }
    }
    return changed;
  }

  /**
   * Smallest left and largest right among tracked nodes.
   */
  extent(): { minLeft: number; maxRight: number } | null {
    let minLeft: number | null = null;
    let maxRight: number | null = null;
    for (const node of this.tracked.keys()) {
      minLeft = minLeft === null ? node.left : Math.min(minLeft, node.left);
      maxRight = maxRight === null ? node.right : Math.max(maxRight, node.right);
    }
    return minLeft === null || maxRight === null ? null : { minLeft, maxRight };
  }

  snapshot(): IntervalSnapshot<T> {
    const snapshot: IntervalSnapshot<T> = new Map();
    for (const node of this.tracked.keys()) {
      snapshot.set(node, { left: node.left, right: node.right });
    }
    return snapshot;
  }

  /**
   * Puts every node back to its captured boundaries and forgets nodes
   * tracked after the snapshot was taken.
   */
  restore(snapshot: IntervalSnapshot<T>): void {
    for (const node of this.all()) {
      if (!snapshot.has(node)) this.tracked.delete(node);
    }
    for (const [node, bounds] of snapshot) {
      node.left = bounds.left;
      node.right = bounds.right;
    }
  }
}
