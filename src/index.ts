/**
 * interval-tree-manager exports.
 * Provides the tree manager, its stores, and SQL execution helpers.
 */
export * from './tree/index.js';

export * from './core/dialect/abstract.js';
export * from './core/dialect/dialect-factory.js';
export * from './core/dialect/sqlite/index.js';
export * from './core/dialect/postgres/index.js';
export * from './core/dialect/mysql/index.js';

export * from './core/execution/db-executor.js';
export * from './core/execution/executors/sqlite-executor.js';
export * from './core/execution/executors/postgres-executor.js';
export * from './core/execution/executors/mysql-executor.js';

export * from './orm/query-logger.js';
export * from './orm/transaction-runner.js';
