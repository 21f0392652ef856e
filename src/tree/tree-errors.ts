/**
 * Error Types for tree operations
 *
 * Every error is raised before the store is touched, so a rejected
 * operation leaves all intervals as they were.
 */

export type TreeErrorCode =
  | 'DETACHED_REFERENCE'
  | 'ILLEGAL_RELOCATION'
  | 'MALFORMED_SHIFT'
  | 'INVALID_NODE_STATE'
  | 'INVALID_TREE_CONFIG';

/** Role of a node reference passed to a tree operation. */
export type NodeRole = 'parent' | 'sibling' | 'source' | 'target' | 'node';

/**
 * Base class of all tree errors.
 */
export class TreeError extends Error {
  constructor(
    message: string,
    public readonly code: TreeErrorCode
  ) {
    super(message);
    this.name = 'TreeError';
  }
}

/**
 * A node reference is not tracked by the manager.
 */
export class DetachedReferenceError extends TreeError {
  constructor(public readonly role: NodeRole) {
    super(`${role} node has not been added yet`, 'DETACHED_REFERENCE');
    this.name = 'DetachedReferenceError';
  }
}

/**
 * A move would place a node under itself or one of its descendants.
 */
export class IllegalRelocationError extends TreeError {
  constructor(message = 'Can not move a node under itself or one of its descendants') {
    super(message, 'ILLEGAL_RELOCATION');
    this.name = 'IllegalRelocationError';
  }
}

/**
 * A shift was requested without any bound.
 */
export class MalformedShiftRequestError extends TreeError {
  constructor() {
    super('Both from and to bounds of a shift can not be omitted', 'MALFORMED_SHIFT');
    this.name = 'MalformedShiftRequestError';
  }
}

/**
 * An entity handed in for insertion is already part of the tree.
 */
export class InvalidNodeStateError extends TreeError {
  constructor(message: string) {
    super(message, 'INVALID_NODE_STATE');
    this.name = 'InvalidNodeStateError';
  }
}

/**
 * Tree configuration failed validation.
 */
export class InvalidTreeConfigError extends TreeError {
  constructor(public readonly problems: string[]) {
    super(`Invalid tree configuration: ${problems.join('; ')}`, 'INVALID_TREE_CONFIG');
    this.name = 'InvalidTreeConfigError';
  }
}

/**
 * Type guard for tree errors.
 */
export function isTreeError(error: unknown): error is TreeError {
  return error instanceof TreeError;
}
