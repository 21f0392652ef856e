/**
 * Nested Set Strategy
 *
 * Interval arithmetic behind every tree operation. All methods are pure:
 * they compute shifts and placements from boundary values and never touch
 * a store.
 *
 * @see https://en.wikipedia.org/wiki/Nested_set_model
 */

import type { GapDirection, ShiftRange, ThreadedNode, TreeNode } from './tree-types.js';
import { IllegalRelocationError } from './tree-errors.js';

/**
 * One constant-offset renumbering of every boundary inside `range`.
 */
export interface ShiftStep {
  offset: number;
  range: ShiftRange;
}

/**
 * How a gap is opened: the shift to issue and where the gap starts afterwards.
 */
export interface GapPlan {
  step: ShiftStep;
  gapStart: number;
}

/**
 * The three shifts relocating a subtree.
 */
export interface MovePlan {
  /** Width of the relocated subtree */
  width: number;
  /** Left boundary of the subtree once the plan is applied */
  landing: number;
  /** Evacuate, close/open, reinsert */
  steps: [ShiftStep, ShiftStep, ShiftStep];
}

/**
 * Extreme boundary values of a tree.
 */
export interface TreeExtent {
  minLeft: number;
  maxRight: number;
}

/**
 * Core nested set calculations and algorithms.
 */
export class NestedSetStrategy {
  /**
   * Calculates the number of descendants for a node.
   * Formula: (right - left - 1) / 2
   */
  static descendantCount(left: number, right: number): number {
    return (right - left - 1) / 2;
  }

  /**
   * Determines if a node is a leaf (has no children).
   */
  static isLeaf(left: number, right: number): boolean {
    return right - left === 1;
  }

  static hasChildren(node: TreeNode): boolean {
    return node.right - node.left > 1;
  }

  /**
   * Checks if nodeA is an ancestor of nodeB.
   */
  static isAncestorOf(nodeA: TreeNode, nodeB: TreeNode): boolean {
    return nodeA.left < nodeB.left && nodeA.right > nodeB.right;
  }

  /**
   * Checks if nodeA is a descendant of nodeB.
   */
  static isDescendantOf(nodeA: TreeNode, nodeB: TreeNode): boolean {
    return nodeA.left > nodeB.left && nodeA.right < nodeB.right;
  }

  /**
   * Calculates the width of a subtree (number of boundary values it occupies).
   */
  static subtreeWidth(left: number, right: number): number {
    return right - left + 1;
  }

  static compareByLeft(a: TreeNode, b: TreeNode): number {
    return a.left - b.left;
  }

  /**
   * Decides how to open a gap of `gapSize` at `position`.
   *
   * A backward shift pulls every value below `position` down and the gap
   * starts at `position - gapSize`; a forward shift pushes every value from
   * `position` up and the gap starts at `position`. In `auto` mode the side
   * spanning fewer values is shifted, ties going backward.
   */
  static planGap(
    position: number,
    gapSize: number,
    extent: TreeExtent,
    direction: GapDirection = 'auto'
  ): GapPlan {
    const backward =
      direction === 'backward' ||
      (direction === 'auto' && position - extent.minLeft <= extent.maxRight - position);

    if (backward) {
      return {
        step: { offset: -gapSize, range: { to: position } },
        gapStart: position - gapSize,
      };
    }

    return {
      step: { offset: gapSize, range: { from: position } },
      gapStart: position,
    };
  }

  /**
   * Plans relocating the subtree `source` so that it ends right before `boundary`.
   *
   * `boundary` is the target's right value, or `maxRight + 1` for the root level.
   * The subtree is first parked below `minLeft`, the hole it leaves is closed
   * (or a hole is opened at a boundary lying before it), then the parked
   * subtree is shifted into place.
   *
   * @returns null when the subtree already ends right before `boundary`
   */
  static planMove(source: TreeNode, boundary: number, minLeft: number): MovePlan | null {
    if (boundary > source.left && boundary <= source.right) {
      throw new IllegalRelocationError();
    }

    const width = this.subtreeWidth(source.left, source.right);
    const after = source.right + 1;
    if (after === boundary) return null;

    const parked = minLeft - width;
    const evacuate: ShiftStep = { offset: parked - source.left, range: { from: source.left, to: after } };

    let reposition: ShiftStep;
    let landing: number;
    if (boundary > source.right) {
      reposition = { offset: -width, range: { from: after, to: boundary } };
      landing = boundary - width;
    } else {
      reposition = { offset: width, range: { from: boundary, to: source.left } };
      landing = boundary;
    }

    const reinsert: ShiftStep = { offset: landing - parked, range: { from: parked, to: minLeft } };

    return { width, landing, steps: [evacuate, reposition, reinsert] };
  }

  /**
   * Converts a flat list of nodes (ordered by left) into a threaded tree structure.
   */
  static toThreaded<T extends TreeNode>(nodes: T[]): ThreadedNode<T>[] {
    const result: ThreadedNode<T>[] = [];
    const stack: ThreadedNode<T>[] = [];

    for (const node of nodes) {
      const threadedNode: ThreadedNode<T> = { node, children: [] };

      while (stack.length > 0) {
        const parent = stack[stack.length - 1];
        if (parent.node.right > node.right) {
          break;
        }
        stack.pop();
      }

      if (stack.length === 0) {
        result.push(threadedNode);
      } else {
        stack[stack.length - 1].children.push(threadedNode);
      }

      if (!this.isLeaf(node.left, node.right)) {
        stack.push(threadedNode);
      }
    }

    return result;
  }

  /**
   * Checks the nested set invariants over a complete node set.
   *
   * Reports inverted or non-integer intervals, repeated boundary values,
   * partial overlaps, and gaps between a parent and its children or
   * between consecutive siblings (roots included).
   *
   * @returns Validation errors (empty if valid)
   */
  static validateTree(nodes: TreeNode[]): string[] {
    const errors: string[] = [];
    const label = (node: TreeNode) => `[${node.left},${node.right}]`;
    const seen = new Set<number>();

    for (const node of nodes) {
      if (!Number.isSafeInteger(node.left) || !Number.isSafeInteger(node.right)) {
        errors.push(`Node ${label(node)}: boundaries must be integers`);
      }
      if (node.left >= node.right) {
        errors.push(`Node ${label(node)}: left must be less than right`);
      }
      for (const value of [node.left, node.right]) {
        if (seen.has(value)) {
          errors.push(`Node ${label(node)}: boundary ${value} is used more than once`);
        }
        seen.add(value);
      }
    }

    const sorted = [...nodes].sort((a, b) => this.compareByLeft(a, b));
    if (sorted.length === 0) return errors;

    const stack: Array<{ node: TreeNode; next: number }> = [];
    let nextRoot = sorted[0].left;

    const close = (frame: { node: TreeNode; next: number }) => {
      if (frame.next !== frame.node.right) {
        errors.push(`Node ${label(frame.node)}: expected right ${frame.next}`);
      }
    };

    for (const node of sorted) {
      while (stack.length > 0 && stack[stack.length - 1].node.right < node.left) {
        const frame = stack.pop();
        if (frame) close(frame);
      }

      const parent = stack[stack.length - 1];
      if (parent && node.right > parent.node.right) {
        errors.push(`Node ${label(node)} partially overlaps node ${label(parent.node)}`);
      }

      const expected = parent ? parent.next : nextRoot;
      if (node.left !== expected) {
        errors.push(`Node ${label(node)}: expected left ${expected}`);
      }

      if (parent) {
        parent.next = node.right + 1;
      } else {
        nextRoot = node.right + 1;
      }
      stack.push({ node, next: node.left + 1 });
    }

    while (stack.length > 0) {
      const frame = stack.pop();
      if (frame) close(frame);
    }

    return errors;
  }
}
