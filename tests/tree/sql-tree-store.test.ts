import { describe, expect, it } from 'vitest';
import { SqlTreeStore, type SqlRow, type SqlTreeStoreOptions } from '../../src/tree/sql-tree-store.js';
import { InvalidTreeConfigError } from '../../src/tree/tree-errors.js';
import { PostgresDialect } from '../../src/core/dialect/postgres/index.js';
import {
  type DbExecutor,
  type QueryResult,
  rowsToQueryResult,
} from '../../src/core/execution/db-executor.js';
import type { Category } from '../fixtures/category-tree.js';

class RecordingExecutor implements DbExecutor {
  readonly capabilities = { transactions: true };
  readonly statements: Array<{ sql: string; params?: unknown[] }> = [];
  readonly events: string[] = [];
  private readonly responses: SqlRow[][] = [];

  respond(rows: SqlRow[]): this {
    this.responses.push(rows);
    return this;
  }

  async executeSql(sql: string, params?: unknown[]): Promise<QueryResult[]> {
    this.statements.push({ sql, params });
    this.events.push('sql');
    return [rowsToQueryResult(this.responses.shift() ?? [])];
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

const createStore = (
  executor: DbExecutor,
  overrides: Partial<SqlTreeStoreOptions<Category>> = {}
) =>
  new SqlTreeStore<Category>({
    executor,
    dialect: 'sqlite',
    table: 'categories',
    toRow: node => ({ name: node.name }),
    fromRow: (row, bounds) => ({ id: Number(row.id), name: String(row.name), ...bounds }),
    ...overrides,
  });

describe('SqlTreeStore', () => {
  describe('configuration', () => {
    it('rejects an empty table name', () => {
      expect(() => createStore(new RecordingExecutor(), { table: ' ' })).toThrow(
        'Invalid tree configuration: Table name must not be empty'
      );
    });

    it('rejects identical boundary columns', () => {
      let error: unknown;
      try {
        createStore(new RecordingExecutor(), { config: { leftKey: 'pos', rightKey: 'pos' } });
      } catch (caught) {
        error = caught;
      }

      expect(error).toBeInstanceOf(InvalidTreeConfigError);
      expect(error).toMatchObject({ problems: ["Left and right columns must differ (both 'pos')"] });
    });
  });

  describe('reads', () => {
    it('reads every row ordered by left and decodes boundaries', async () => {
      const executor = new RecordingExecutor().respond([
        { id: 1, name: 'Electronics', lft: 1, rght: 4 },
        { id: 2, name: 'Laptops', lft: 2n, rght: '3' },
      ]);
      const store = createStore(executor);

      const rows = await store.readAll();

      expect(executor.statements).toEqual([{ sql: 'SELECT * FROM "categories" ORDER BY "lft"', params: [] }]);
      expect(rows).toEqual([
        { id: 1, name: 'Electronics', left: 1, right: 4 },
        { id: 2, name: 'Laptops', left: 2, right: 3 },
      ]);
    });

    it('compiles interval filters in a fixed order', async () => {
      const executor = new RecordingExecutor();
      const store = createStore(executor);

      await store.rangeQuery({ left: { gt: 2 }, right: { lt: 11 } });
      await store.rangeQuery({ right: { lte: 9, gte: 4 }, left: { eq: 3 } });
      await store.rangeQuery({});

      expect(executor.statements).toEqual([
        { sql: 'SELECT * FROM "categories" WHERE "lft" > ? AND "rght" < ? ORDER BY "lft"', params: [2, 11] },
        {
          sql: 'SELECT * FROM "categories" WHERE "lft" = ? AND "rght" >= ? AND "rght" <= ? ORDER BY "lft"',
          params: [3, 4, 9],
        },
        { sql: 'SELECT * FROM "categories" ORDER BY "lft"', params: [] },
      ]);
    });

    it('uses configured column names', async () => {
      const executor = new RecordingExecutor().respond([{ id: 1, name: 'Electronics', lo: 1, hi: 2 }]);
      const store = createStore(executor, { config: { leftKey: 'lo', rightKey: 'hi' } });

      const rows = await store.rangeQuery({ left: { gte: 1 } });

      expect(executor.statements[0].sql).toBe('SELECT * FROM "categories" WHERE "lo" >= ? ORDER BY "lo"');
      expect(rows).toEqual([{ id: 1, name: 'Electronics', left: 1, right: 2 }]);
    });

    it('rejects rows holding a non-integer boundary', async () => {
      const executor = new RecordingExecutor().respond([{ id: 1, name: 'Electronics', lft: 1.5, rght: 4 }]);
      const store = createStore(executor);

      await expect(store.readAll()).rejects.toThrow(
        "Column 'lft' of table 'categories' holds a non-integer boundary: 1.5"
      );
    });

    it('walks sibling chains with a recursive query', async () => {
      const executor = new RecordingExecutor();
      const store = createStore(executor);

      await store.siblingChain(3, 11);
      await store.siblingChain(1);

      expect(executor.statements).toEqual([
        {
          sql:
            'WITH RECURSIVE "sibling_chain" AS (' +
            'SELECT * FROM "categories" WHERE "lft" = ? AND "rght" < ? ' +
            'UNION ALL ' +
            'SELECT "n".* FROM "categories" "n" INNER JOIN "sibling_chain" "c" ON "n"."lft" = "c"."rght" + 1 AND "n"."rght" < ?' +
            ') SELECT * FROM "sibling_chain" ORDER BY "lft"',
          params: [3, 11, 11],
        },
        {
          sql:
            'WITH RECURSIVE "sibling_chain" AS (' +
            'SELECT * FROM "categories" WHERE "lft" = ? ' +
            'UNION ALL ' +
            'SELECT "n".* FROM "categories" "n" INNER JOIN "sibling_chain" "c" ON "n"."lft" = "c"."rght" + 1' +
            ') SELECT * FROM "sibling_chain" ORDER BY "lft"',
          params: [1],
        },
      ]);
    });
  });

  describe('aggregates', () => {
    it('selects the minimum of a boundary column', async () => {
      const executor = new RecordingExecutor().respond([{ value: 1 }]);
      const store = createStore(executor);

      expect(await store.aggregate('min', 'left')).toBe(1);
      expect(executor.statements).toEqual([{ sql: 'SELECT MIN("lft") AS "value" FROM "categories"', params: [] }]);
    });

    it('returns null for an empty table', async () => {
      const executor = new RecordingExecutor().respond([{ value: null }]);
      const store = createStore(executor);

      expect(await store.aggregate('max', 'right')).toBeNull();
      expect(executor.statements[0].sql).toBe('SELECT MAX("rght") AS "value" FROM "categories"');
    });
  });

  describe('writes', () => {
    it('shifts a half-open range of one column', async () => {
      const executor = new RecordingExecutor();
      const store = createStore(executor);

      await store.bulkUpdate({ from: 10, to: 20 }, 'right', 5);
      await store.bulkUpdate({ to: 4 }, 'left', -2);

      expect(executor.statements).toEqual([
        { sql: 'UPDATE "categories" SET "rght" = "rght" + ? WHERE "rght" >= ? AND "rght" < ?', params: [5, 10, 20] },
        { sql: 'UPDATE "categories" SET "lft" = "lft" + ? WHERE "lft" < ?', params: [-2, 4] },
      ]);
    });

    it('numbers placeholders on postgres', async () => {
      const executor = new RecordingExecutor();
      const store = createStore(executor, { dialect: new PostgresDialect() });

      await store.bulkUpdate({ from: 3 }, 'left', 2);

      expect(executor.statements).toEqual([
        { sql: 'UPDATE "categories" SET "lft" = "lft" + $1 WHERE "lft" >= $2', params: [2, 3] },
      ]);
    });

    it('inserts nodes and hands back the stored row', async () => {
      const executor = new RecordingExecutor().respond([{ id: 7, name: 'Laptops', lft: 2, rght: 3 }]);
      const store = createStore(executor, {
        onInserted: (node, row) => {
          node.id = Number(row.id);
        },
      });
      const laptops: Category = { name: 'Laptops', left: 2, right: 3 };

      await store.insert([laptops]);

      expect(executor.statements).toEqual([
        {
          sql: 'INSERT INTO "categories" ("name", "lft", "rght") VALUES (?, ?, ?) RETURNING *',
          params: ['Laptops', 2, 3],
        },
      ]);
      expect(laptops.id).toBe(7);
    });

    it('inserts without RETURNING on mysql', async () => {
      const executor = new RecordingExecutor();
      const store = createStore(executor, { dialect: 'mysql', onInserted: () => undefined });

      await store.insert([{ name: 'Clothing', left: 5, right: 6 }]);

      expect(executor.statements).toEqual([
        { sql: 'INSERT INTO `categories` (`name`, `lft`, `rght`) VALUES (?, ?, ?)', params: ['Clothing', 5, 6] },
      ]);
    });
  });

  describe('transaction', () => {
    it('commits after the action', async () => {
      const executor = new RecordingExecutor();
      const store = createStore(executor);

      const result = await store.transaction(async () => {
        await store.bulkUpdate({ from: 1 }, 'left', 1);
        return 'done';
      });

      expect(result).toBe('done');
      expect(executor.events).toEqual(['begin', 'sql', 'commit']);
    });

    it('rolls back and rethrows on failure', async () => {
      const executor = new RecordingExecutor();
      const store = createStore(executor);

      await expect(
        store.transaction(async () => {
          throw new Error('boom');
        })
      ).rejects.toThrow('boom');

      expect(executor.events).toEqual(['begin', 'rollback']);
    });

    it('joins an enclosing transaction', async () => {
      const executor = new RecordingExecutor();
      const store = createStore(executor);

      await store.transaction(() => store.transaction(() => store.bulkUpdate({ to: 1 }, 'right', 1)));

      expect(executor.events).toEqual(['begin', 'sql', 'commit']);
    });
  });
});
