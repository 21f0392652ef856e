/**
 * Tree Types
 *
 * Core type definitions for the nested set tree implementation.
 * A node's interval `[left, right]` encodes its position: descendants are
 * exactly the nodes whose interval sits strictly inside it.
 */

/**
 * The capability every tree record must carry.
 * Payload types extend it with their own identity and data fields.
 */
export interface TreeNode {
  /** Left boundary value */
  left: number;
  /** Right boundary value */
  right: number;
}

/** Interval field of a node. */
export type BoundField = 'left' | 'right';

/**
 * Direction used to open a gap in the interval space.
 * - `auto`: shift whichever side of the position holds fewer values
 * - `forward`: always push values at or after the position up
 * - `backward`: always pull values before the position down
 */
export type GapDirection = 'auto' | 'forward' | 'backward';

export const GAP_DIRECTIONS: readonly GapDirection[] = ['auto', 'forward', 'backward'];

/**
 * Configuration options for tree behavior.
 */
export interface TreeConfig {
  /** How gaps are opened for new nodes (default: 'auto') */
  gapDirection: GapDirection;
  /** Column name for left boundary (default: 'lft') */
  leftKey: string;
  /** Column name for right boundary (default: 'rght') */
  rightKey: string;
}

/**
 * Default tree configuration values.
 */
export const DEFAULT_TREE_CONFIG: Readonly<TreeConfig> = {
  gapDirection: 'auto',
  leftKey: 'lft',
  rightKey: 'rght',
};

/**
 * Half-open range of boundary values, `from <= value < to`.
 * A missing side is unbounded.
 */
export interface ShiftRange {
  from?: number;
  to?: number;
}

/**
 * Comparison constraints on a single boundary field.
 */
export interface BoundCondition {
  eq?: number;
  gt?: number;
  gte?: number;
  lt?: number;
  lte?: number;
}

/**
 * Range predicate over a node's interval. All given conditions must hold.
 */
export interface IntervalFilter {
  left?: BoundCondition;
  right?: BoundCondition;
}

/**
 * Represents a node with its children in a threaded tree structure.
 * @typeParam T - The node type
 */
export interface ThreadedNode<T> {
  /** The node data */
  node: T;
  /** Child nodes */
  children: ThreadedNode<T>[];
}

/**
 * A single shift as applied by the manager.
 */
export interface ShiftLogEntry {
  operation: 'shift';
  offset: number;
  from?: number;
  to?: number;
}

/**
 * A node placed by a mutation, with its resulting interval.
 */
export interface PlacementLogEntry {
  operation: 'addChild' | 'insertBeforeSibling' | 'move' | 'detach';
  left: number;
  right: number;
}

/**
 * A flush of staged nodes to the store.
 */
export interface FlushLogEntry {
  operation: 'saveChanges';
  count: number;
}

export type TreeLogEntry = ShiftLogEntry | PlacementLogEntry | FlushLogEntry;

/**
 * Function type for tree logging callbacks
 * @param entry - The log entry to process
 */
export type TreeLogger = (entry: TreeLogEntry) => void;

/**
 * Type guard to check if a value is a valid TreeConfig.
 */
export function isTreeConfig(value: unknown): value is TreeConfig {
  if (typeof value !== 'object' || value === null) return false;
  if (!('gapDirection' in value) || !('leftKey' in value) || !('rightKey' in value)) return false;
  return (
    GAP_DIRECTIONS.some(direction => direction === value.gapDirection) &&
    typeof value.leftKey === 'string' &&
    typeof value.rightKey === 'string'
  );
}

/**
 * Merges partial config with defaults.
 */
export function resolveTreeConfig(partial: Partial<TreeConfig>): TreeConfig {
  return {
    gapDirection: partial.gapDirection ?? DEFAULT_TREE_CONFIG.gapDirection,
    leftKey: partial.leftKey ?? DEFAULT_TREE_CONFIG.leftKey,
    rightKey: partial.rightKey ?? DEFAULT_TREE_CONFIG.rightKey,
  };
}

/**
 * Validates a resolved configuration.
 * @returns Validation messages (empty when valid)
 */
export function validateTreeConfig(config: TreeConfig): string[] {
  const errors: string[] = [];

  if (!GAP_DIRECTIONS.includes(config.gapDirection)) {
    errors.push(`Unknown gap direction '${String(config.gapDirection)}'`);
  }
  if (config.leftKey.trim() === '') {
    errors.push('Left column name must not be empty');
  }
  if (config.rightKey.trim() === '') {
    errors.push('Right column name must not be empty');
  }
  if (config.leftKey === config.rightKey) {
    errors.push(`Left and right columns must differ (both '${config.leftKey}')`);
  }

  return errors;
}

/**
 * Checks a value against a field condition.
 */
export function matchesCondition(value: number, condition: BoundCondition | undefined): boolean {
  if (!condition) return true;
  if (condition.eq !== undefined && value !== condition.eq) return false;
  if (condition.gt !== undefined && value <= condition.gt) return false;
  if (condition.gte !== undefined && value < condition.gte) return false;
  if (condition.lt !== undefined && value >= condition.lt) return false;
  if (condition.lte !== undefined && value > condition.lte) return false;
  return true;
}

/**
 * Checks a node against an interval filter.
 */
export function matchesFilter(node: TreeNode, filter: IntervalFilter): boolean {
  return matchesCondition(node.left, filter.left) && matchesCondition(node.right, filter.right);
}

/**
 * Checks a boundary value against a half-open shift range.
 */
export function inShiftRange(value: number, range: ShiftRange): boolean {
  return (range.from === undefined || range.from <= value) && (range.to === undefined || value < range.to);
}
