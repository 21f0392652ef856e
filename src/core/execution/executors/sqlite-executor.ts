// src/core/execution/executors/sqlite-executor.ts
import {
  type DbExecutor,
  createExecutorFromQueryRunner,
  createStatementTransactions
} from '../db-executor.js';

/**
 * Promise-based view of a SQLite connection (e.g. a wrapped sqlite3 Database).
 */
export interface SqliteClientLike {
  /** Runs a statement and resolves every returned row */
  all(
    sql: string,
    params?: unknown[]
  ): Promise<Array<Record<string, unknown>>>;
  /** Runs statements without parameters; enables transactions when present */
  exec?(sql: string): Promise<void>;
}

export interface SqliteExecutorOptions {
  /**
   * Statement opening a transaction. `BEGIN IMMEDIATE` takes the write lock
   * up front.
   */
  beginStatement?: 'BEGIN' | 'BEGIN IMMEDIATE' | 'BEGIN EXCLUSIVE';
}

/**
 * Creates a database executor for SQLite.
 * Transactions are available when the client can `exec`.
 */
export function createSqliteExecutor(
  client: SqliteClientLike,
  options: SqliteExecutorOptions = {}
): DbExecutor {
  const exec = client.exec?.bind(client);
  return createExecutorFromQueryRunner({
    query: (sql, params) => client.all(sql, params),
    ...(exec ? createStatementTransactions(exec, options.beginStatement) : {}),
  });
}
