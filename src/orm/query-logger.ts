import { performance } from 'node:perf_hooks';
import type { DbExecutor } from '../core/execution/db-executor.js';

/**
 * One executed SQL statement.
 */
export interface QueryLogEntry {
  /** The SQL statement */
  sql: string;
  /** Bound parameters */
  params?: unknown[];
  /** Wall-clock time spent in the executor, in milliseconds */
  durationMs: number;
  /** Rows returned across all result sets; absent when the statement failed */
  rowCount?: number;
  /** Error raised by the executor */
  error?: unknown;
}

/**
 * Receives an entry after each statement settles.
 */
export type QueryLogger = (entry: QueryLogEntry) => void;

/**
 * Wraps an executor so every statement is reported to `logger` once it
 * completes or fails. Errors are reported, then rethrown unchanged.
 * Transaction control is passed through without logging.
 */
export const createQueryLoggingExecutor = (
  executor: DbExecutor,
  logger?: QueryLogger
): DbExecutor => {
  if (!logger) {
    return executor;
  }

  const wrapped: DbExecutor = {
    capabilities: executor.capabilities,
    async executeSql(sql, params) {
      const started = performance.now();
      try {
        const results = await executor.executeSql(sql, params);
        const rowCount = results.reduce((total, result) => total + result.values.length, 0);
        logger({ sql, params, durationMs: performance.now() - started, rowCount });
        return results;
      } catch (error) {
        logger({ sql, params, durationMs: performance.now() - started, error });
        throw error;
      }
    },
  };

  const { beginTransaction, commitTransaction, rollbackTransaction } = executor;
  if (beginTransaction) wrapped.beginTransaction = () => beginTransaction.call(executor);
  if (commitTransaction) wrapped.commitTransaction = () => commitTransaction.call(executor);
  if (rollbackTransaction) wrapped.rollbackTransaction = () => rollbackTransaction.call(executor);

  return wrapped;
};
