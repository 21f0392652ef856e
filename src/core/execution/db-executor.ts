// src/core/execution/db-executor.ts

// low-level canonical shape
export type QueryResult = {
  columns: string[];
  values: unknown[][];
};

export interface ExecutorCapabilities {
  /** True when begin/commit/rollback are available */
  transactions: boolean;
}

export interface DbExecutor {
  readonly capabilities: ExecutorCapabilities;

  executeSql(sql: string, params?: unknown[]): Promise<QueryResult[]>;

  beginTransaction?(): Promise<void>;
  commitTransaction?(): Promise<void>;
  rollbackTransaction?(): Promise<void>;
}

// --- helpers ---

/**
 * Convert an array of row objects into a QueryResult.
 */
export function rowsToQueryResult(
  rows: Array<Record<string, unknown>>
): QueryResult {
  if (rows.length === 0) {
    return { columns: [], values: [] };
  }

  const columns = Object.keys(rows[0]);
  const values = rows.map(row => columns.map(c => row[c]));
  return { columns, values };
}

/**
 * Converts QueryResult[] to row objects.
 * Handles the canonical { columns, values } format.
 */
export function queryResultsToRows(results: QueryResult[]): Record<string, unknown>[] {
  const rows: Record<string, unknown>[] = [];

  for (const result of results) {
    const { columns, values } = result;
    for (const valueRow of values) {
      const row: Record<string, unknown> = {};
      for (let i = 0; i < columns.length; i++) {
        row[columns[i]] = valueRow[i];
      }
      rows.push(row);
    }
  }

  return rows;
}

/**
 * Minimal contract that most SQL clients can implement.
 */
export interface SimpleQueryRunner {
  query(
    sql: string,
    params?: unknown[]
  ): Promise<Array<Record<string, unknown>>>;
  beginTransaction?(): Promise<void>;
  commitTransaction?(): Promise<void>;
  rollbackTransaction?(): Promise<void>;
}

/**
 * Generic factory: turn any SimpleQueryRunner into a DbExecutor.
 */
export function createExecutorFromQueryRunner(
  runner: SimpleQueryRunner
): DbExecutor {
  const { beginTransaction, commitTransaction, rollbackTransaction } = runner;
  if (!beginTransaction || !commitTransaction || !rollbackTransaction) {
    return {
      capabilities: { transactions: false },
      async executeSql(sql, params) {
        const rows = await runner.query(sql, params);
        return [rowsToQueryResult(rows)];
      },
    };
  }

  return {
    capabilities: { transactions: true },
    async executeSql(sql, params) {
      const rows = await runner.query(sql, params);
      return [rowsToQueryResult(rows)];
    },
    beginTransaction: () => beginTransaction.call(runner),
    commitTransaction: () => commitTransaction.call(runner),
    rollbackTransaction: () => rollbackTransaction.call(runner),
  };
}

/**
 * Transaction methods issuing plain BEGIN/COMMIT/ROLLBACK statements on a
 * single connection.
 * @param run - Runs one statement on the connection
 * @param begin - Statement opening the transaction
 */
export function createStatementTransactions(
  run: (sql: string) => Promise<unknown>,
  begin: string = 'BEGIN'
): Required<Pick<SimpleQueryRunner, 'beginTransaction' | 'commitTransaction' | 'rollbackTransaction'>> {
  return {
    async beginTransaction() {
      await run(begin);
    },
    async commitTransaction() {
      await run('COMMIT');
    },
    async rollbackTransaction() {
      await run('ROLLBACK');
    },
  };
}
