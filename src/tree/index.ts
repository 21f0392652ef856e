/**
 * Tree Behavior
 *
 * Provides support for hierarchical data using the nested set model.
 *
 * @module tree
 */

export * from './tree-types.js';
export * from './tree-errors.js';
export * from './nested-set-strategy.js';
export * from './tracked-nodes.js';
export * from './tree-store.js';
export * from './memory-tree-store.js';
export * from './sql-tree-store.js';
export * from './tree-manager.js';
