/**
 * SQL Tree Store
 *
 * Persists tree nodes in a relational table through a DbExecutor.
 * Boundary columns are updated with range-predicated bulk UPDATE statements;
 * the sibling chain is walked with a recursive common table expression.
 */

import type { DbExecutor } from '../core/execution/db-executor.js';
import { queryResultsToRows } from '../core/execution/db-executor.js';
import type { CompiledQuery, CompilerContext, Dialect } from '../core/dialect/abstract.js';
import { resolveDialectInput, type DialectKey } from '../core/dialect/dialect-factory.js';
import { runInTransaction } from '../orm/transaction-runner.js';
import type {
  BoundCondition,
  BoundField,
  IntervalFilter,
  ShiftRange,
  TreeConfig,
  TreeNode,
} from './tree-types.js';
import { resolveTreeConfig, validateTreeConfig } from './tree-types.js';
import type { BoundAggregate, TreeStore } from './tree-store.js';
import { InvalidTreeConfigError } from './tree-errors.js';

/**
 * Row shape as returned by the executor.
 */
export type SqlRow = Record<string, unknown>;

/**
 * Options for creating a SqlTreeStore.
 */
export interface SqlTreeStoreOptions<T extends TreeNode> {
  /** Database executor for running queries */
  executor: DbExecutor;
  /** SQL dialect, as an instance or a registered key */
  dialect: Dialect | DialectKey;
  /** Table holding the nodes */
  table: string;
  /** Boundary column names */
  config?: Partial<Pick<TreeConfig, 'leftKey' | 'rightKey'>>;
  /** Payload columns of a node, boundary columns excluded */
  toRow(node: T): SqlRow;
  /** Builds a node from a row and its decoded boundaries */
  fromRow(row: SqlRow, bounds: TreeNode): T;
  /**
   * Receives the stored row of each inserted node, e.g. to copy generated keys.
   * Only called on dialects supporting RETURNING.
   */
  onInserted?(node: T, row: SqlRow): void;
}

const COMPARISONS: ReadonlyArray<[keyof BoundCondition, string]> = [
  ['eq', '='],
  ['gt', '>'],
  ['gte', '>='],
  ['lt', '<'],
  ['lte', '<='],
];

/**
 * Tree store backed by a SQL table.
 *
 * @example
 * ```ts
 * const store = new SqlTreeStore<Category>({
 *   executor: createSqliteExecutor(client),
 *   dialect: 'sqlite',
 *   table: 'categories',
 *   toRow: node => ({ name: node.name }),
 *   fromRow: (row, bounds) => ({ name: String(row.name), ...bounds }),
 * });
 * ```
 */
export class SqlTreeStore<T extends TreeNode> implements TreeStore<T> {
  readonly table: string;
  readonly leftKey: string;
  readonly rightKey: string;

  private readonly executor: DbExecutor;
  private readonly dialect: Dialect;
  private readonly options: SqlTreeStoreOptions<T>;

  constructor(options: SqlTreeStoreOptions<T>) {
    const config = resolveTreeConfig(options.config ?? {});
    const problems = validateTreeConfig(config);
    if (options.table.trim() === '') {
      problems.push('Table name must not be empty');
    }
    if (problems.length > 0) {
      throw new InvalidTreeConfigError(problems);
    }

    this.executor = options.executor;
    this.dialect = resolveDialectInput(options.dialect);
    this.table = options.table;
    this.leftKey = config.leftKey;
    this.rightKey = config.rightKey;
    this.options = options;
  }

  async readAll(): Promise<T[]> {
    const rows = await this.run({
      sql: `SELECT * FROM ${this.quoteTable()} ORDER BY ${this.quoteCol(this.leftKey)}`,
      params: [],
    });
    return rows.map(row => this.hydrate(row));
  }

  async rangeQuery(filter: IntervalFilter): Promise<T[]> {
    const ctx = this.dialect.createCompilerContext();
    const conditions = [
      ...this.compileCondition(this.leftKey, filter.left, ctx),
      ...this.compileCondition(this.rightKey, filter.right, ctx),
    ];
    const where = conditions.length > 0 ? ` WHERE ${conditions.join(' AND ')}` : '';
    const rows = await this.run({
      sql: `SELECT * FROM ${this.quoteTable()}${where} ORDER BY ${this.quoteCol(this.leftKey)}`,
      params: ctx.params,
    });
    return rows.map(row => this.hydrate(row));
  }

  async bulkUpdate(range: ShiftRange, field: BoundField, delta: number): Promise<void> {
    const column = this.quoteCol(this.columnFor(field));
    const ctx = this.dialect.createCompilerContext();
    const set = `${column} = ${column} + ${ctx.addParameter(delta)}`;
    const conditions = this.compileCondition(this.columnFor(field), { gte: range.from, lt: range.to }, ctx);
    const where = conditions.length > 0 ? ` WHERE ${conditions.join(' AND ')}` : '';

    await this.run({
      sql: `UPDATE ${this.quoteTable()} SET ${set}${where}`,
      params: ctx.params,
    });
  }

  async insert(nodes: T[]): Promise<void> {
    for (const node of nodes) {
      const data: SqlRow = {
        ...this.options.toRow(node),
        [this.leftKey]: node.left,
        [this.rightKey]: node.right,
      };
      const ctx = this.dialect.createCompilerContext();
      const columns = Object.keys(data).map(name => this.quoteCol(name));
      const values = Object.values(data).map(value => ctx.addParameter(value));
      const returning = this.options.onInserted && this.dialect.supportsReturning();

      const rows = await this.run({
        sql:
          `INSERT INTO ${this.quoteTable()} (${columns.join(', ')}) VALUES (${values.join(', ')})` +
          (returning ? ' RETURNING *' : ''),
        params: ctx.params,
      });

      if (returning && rows.length > 0) {
        this.options.onInserted?.(node, rows[0]);
      }
    }
  }

  async aggregate(fn: BoundAggregate, field: BoundField): Promise<number | null> {
    const rows = await this.run({
      sql: `SELECT ${fn.toUpperCase()}(${this.quoteCol(this.columnFor(field))}) AS ${this.dialect.quoteIdentifier('value')} FROM ${this.quoteTable()}`,
      params: [],
    });
    const value = rows[0]?.value;
    return value === null || value === undefined ? null : this.toBound(value, 'value');
  }

  /**
   * Joins a transaction already open on the executor.
   */
  transaction<R>(action: () => Promise<R>): Promise<R> {
    return runInTransaction(this.executor, action);
  }

  async siblingChain(startLeft: number, endRight?: number): Promise<T[]> {
    const ctx = this.dialect.createCompilerContext();
    const table = this.quoteTable();
    const left = this.quoteCol(this.leftKey);
    const right = this.quoteCol(this.rightKey);
    const chain = this.dialect.quoteIdentifier('sibling_chain');
    const n = this.dialect.quoteIdentifier('n');
    const c = this.dialect.quoteIdentifier('c');

    const seed = [`${left} = ${ctx.addParameter(startLeft)}`];
    const step = [`${n}.${left} = ${c}.${right} + 1`];
    if (endRight !== undefined) {
      seed.push(`${right} < ${ctx.addParameter(endRight)}`);
      step.push(`${n}.${right} < ${ctx.addParameter(endRight)}`);
    }

    const sql =
      `${this.dialect.recursiveWith()} ${chain} AS (` +
      `SELECT * FROM ${table} WHERE ${seed.join(' AND ')} ` +
      `UNION ALL ` +
      `SELECT ${n}.* FROM ${table} ${n} INNER JOIN ${chain} ${c} ON ${step.join(' AND ')}` +
      `) SELECT * FROM ${chain} ORDER BY ${left}`;

    const rows = await this.run({ sql, params: ctx.params });
    return rows.map(row => this.hydrate(row));
  }

  // ===== Private Helpers =====

  private async run(query: CompiledQuery): Promise<SqlRow[]> {
    const results = await this.executor.executeSql(query.sql, query.params);
    return queryResultsToRows(results);
  }

  private hydrate(row: SqlRow): T {
    const bounds: TreeNode = {
      left: this.toBound(row[this.leftKey], this.leftKey),
      right: this.toBound(row[this.rightKey], this.rightKey),
    };
    return this.options.fromRow(row, bounds);
  }

  private toBound(value: unknown, column: string): number {
    const num = typeof value === 'bigint' || typeof value === 'string' ? Number(value) : value;
    if (typeof num !== 'number' || !Number.isSafeInteger(num)) {
      throw new Error(`Column '${column}' of table '${this.table}' holds a non-integer boundary: ${String(value)}`);
    }
    return num;
  }

  private compileCondition(column: string, condition: BoundCondition | undefined, ctx: CompilerContext): string[] {
    if (!condition) return [];
    const quoted = this.quoteCol(column);
    const parts: string[] = [];
    for (const [key, operator] of COMPARISONS) {
      const value = condition[key];
      if (value !== undefined) {
        parts.push(`${quoted} ${operator} ${ctx.addParameter(value)}`);
      }
    }
    return parts;
  }

  private columnFor(field: BoundField): string {
    return field === 'left' ? this.leftKey : this.rightKey;
  }

  private quoteTable(): string {
    return this.dialect.quoteIdentifier(this.table);
  }

  private quoteCol(name: string): string {
    return this.dialect.quoteIdentifier(name);
  }
}
