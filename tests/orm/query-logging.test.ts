import { describe, it, expect, vi } from 'vitest';
import type { DbExecutor, QueryResult } from '../../src/core/execution/db-executor.js';
import { createQueryLoggingExecutor, type QueryLogEntry } from '../../src/orm/query-logger.js';
import { isInTransaction, runInTransaction } from '../../src/orm/transaction-runner.js';

class MockExecutor implements DbExecutor {
  readonly events: string[] = [];

  constructor(readonly capabilities = { transactions: true }) {}

  async executeSql(sql: string): Promise<QueryResult[]> {
    this.events.push(sql);
    if (sql.startsWith('INSERT')) {
      throw new Error('UNIQUE constraint failed: categories.lft');
    }
    if (sql.startsWith('SELECT')) {
      return [{ columns: ['lft'], values: [[1], [2]] }, { columns: ['lft'], values: [[3]] }];
    }
    return [{ columns: [], values: [] }];
  }

  async beginTransaction() {
    this.events.push('begin');
  }

  async commitTransaction() {
    this.events.push('commit');
  }

  async rollbackTransaction() {
    this.events.push('rollback');
  }
}

describe('createQueryLoggingExecutor', () => {
  it('returns the executor untouched without a logger', () => {
    const executor = new MockExecutor();
    expect(createQueryLoggingExecutor(executor)).toBe(executor);
  });

  it('logs each statement once it completes', async () => {
    const executor = new MockExecutor();
    const entries: QueryLogEntry[] = [];
    const logged = createQueryLoggingExecutor(executor, entry => entries.push(entry));

    await logged.executeSql('UPDATE "categories" SET "lft" = "lft" + ? WHERE "lft" >= ?', [2, 12]);
    await logged.executeSql('SELECT "lft" FROM "categories"');

    expect(entries).toHaveLength(2);
    expect(entries[0]).toMatchObject({
      sql: 'UPDATE "categories" SET "lft" = "lft" + ? WHERE "lft" >= ?',
      params: [2, 12],
      rowCount: 0,
    });
    expect(entries[1]).toMatchObject({ sql: 'SELECT "lft" FROM "categories"', rowCount: 3 });
    expect(entries[0].durationMs).toBeGreaterThanOrEqual(0);
  });

  it('reports failures and rethrows them', async () => {
    const executor = new MockExecutor();
    const entries: QueryLogEntry[] = [];
    const logged = createQueryLoggingExecutor(executor, entry => entries.push(entry));

    await expect(logged.executeSql('INSERT INTO "categories" DEFAULT VALUES')).rejects.toThrow(
      'UNIQUE constraint failed: categories.lft'
    );

    expect(entries).toHaveLength(1);
    expect(entries[0].rowCount).toBeUndefined();
    expect(entries[0].error).toBeInstanceOf(Error);
  });

  it('passes transaction control through without logging it', async () => {
    const executor = new MockExecutor();
    const logger = vi.fn();
    const logged = createQueryLoggingExecutor(executor, logger);

    await logged.beginTransaction?.();
    await logged.commitTransaction?.();

    expect(logged.capabilities.transactions).toBe(true);
    expect(executor.events).toEqual(['begin', 'commit']);
    expect(logger).not.toHaveBeenCalled();
  });
});

describe('runInTransaction', () => {
  it('commits when the action resolves', async () => {
    const executor = new MockExecutor();

    const result = await runInTransaction(executor, async () => {
      expect(isInTransaction(executor)).toBe(true);
      await executor.executeSql('UPDATE "categories" SET "rght" = "rght" + 2');
      return 42;
    });

    expect(result).toBe(42);
    expect(isInTransaction(executor)).toBe(false);
    expect(executor.events).toEqual(['begin', 'UPDATE "categories" SET "rght" = "rght" + 2', 'commit']);
  });

  it('rolls back and rethrows when the action rejects', async () => {
    const executor = new MockExecutor();

    await expect(
      runInTransaction(executor, () => executor.executeSql('INSERT INTO "categories" DEFAULT VALUES'))
    ).rejects.toThrow('UNIQUE constraint failed');

    expect(executor.events).toEqual(['begin', 'INSERT INTO "categories" DEFAULT VALUES', 'rollback']);
    expect(isInTransaction(executor)).toBe(false);
  });

  it('joins an enclosing transaction on the same executor', async () => {
    const executor = new MockExecutor();

    await expect(
      runInTransaction(executor, async () => {
        await runInTransaction(executor, () => executor.executeSql('UPDATE "categories" SET "lft" = 1'));
        await runInTransaction(executor, () => executor.executeSql('INSERT INTO "categories" DEFAULT VALUES'));
      })
    ).rejects.toThrow('UNIQUE constraint failed');

    expect(executor.events).toEqual([
      'begin',
      'UPDATE "categories" SET "lft" = 1',
      'INSERT INTO "categories" DEFAULT VALUES',
      'rollback',
    ]);
  });

  it('runs the action directly on executors without transactions', async () => {
    const executor = new MockExecutor({ transactions: false });

    await runInTransaction(executor, () => executor.executeSql('UPDATE "categories" SET "lft" = 1'));

    expect(executor.events).toEqual(['UPDATE "categories" SET "lft" = 1']);
  });
});
