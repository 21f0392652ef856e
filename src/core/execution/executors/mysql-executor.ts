// src/core/execution/executors/mysql-executor.ts
import {
  type DbExecutor,
  createExecutorFromQueryRunner
} from '../db-executor.js';

export interface MysqlClientLike {
  query(
    sql: string,
    params?: unknown[]
  ): Promise<[unknown, unknown?]>; // rows, metadata
  beginTransaction?(): Promise<void>;
  commit?(): Promise<void>;
  rollback?(): Promise<void>;
}

const isRowArray = (rows: unknown): rows is Array<Record<string, unknown>> =>
  Array.isArray(rows) && rows.every(row => typeof row === 'object' && row !== null);

export function createMysqlExecutor(
  client: MysqlClientLike
): DbExecutor {
  return createExecutorFromQueryRunner({
    async query(sql, params) {
      const [rows] = await client.query(sql, params);
      // insert/update return a result header instead of rows
      return isRowArray(rows) ? rows : [];
    },
    beginTransaction: client.beginTransaction?.bind(client),
    commitTransaction: client.commit?.bind(client),
    rollbackTransaction: client.rollback?.bind(client),
  });
}
