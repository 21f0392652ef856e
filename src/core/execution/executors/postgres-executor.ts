// src/core/execution/executors/postgres-executor.ts
import {
  type DbExecutor,
  createExecutorFromQueryRunner,
  createStatementTransactions
} from '../db-executor.js';

/**
 * Anything with a `pg`-style `query` (a pg Client, a PGlite instance).
 * Transactions require every call to reach the same connection.
 */
export interface PostgresClientLike {
  query(
    text: string,
    params?: unknown[]
  ): Promise<{ rows: Array<Record<string, unknown>> }>;
}

export type PostgresIsolationLevel = 'READ COMMITTED' | 'REPEATABLE READ' | 'SERIALIZABLE';

export interface PostgresExecutorOptions {
  /** Isolation level of transactions; the server default when omitted */
  isolationLevel?: PostgresIsolationLevel;
}

export function createPostgresExecutor(
  client: PostgresClientLike,
  options: PostgresExecutorOptions = {}
): DbExecutor {
  const begin = options.isolationLevel ? `BEGIN ISOLATION LEVEL ${options.isolationLevel}` : 'BEGIN';
  return createExecutorFromQueryRunner({
    async query(sql, params) {
      const { rows } = await client.query(sql, params);
      return rows;
    },
    ...createStatementTransactions(sql => client.query(sql), begin),
  });
}
