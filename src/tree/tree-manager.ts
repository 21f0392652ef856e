/**
 * Tree Manager
 *
 * Maintains nested set intervals on top of a TreeStore. Every mutation is
 * expressed as constant-offset shifts of boundary ranges, applied to the
 * store with bulk updates and to the in-memory nodes in lock-step.
 */

import type { QueryLogger } from '../orm/query-logger.js';
import { createQueryLoggingExecutor } from '../orm/query-logger.js';
import type {
  IntervalFilter,
  ThreadedNode,
  TreeConfig,
  TreeLogger,
  TreeNode,
} from './tree-types.js';
import { matchesFilter, resolveTreeConfig, validateTreeConfig } from './tree-types.js';
import { NestedSetStrategy, type TreeExtent } from './nested-set-strategy.js';
import { NodeStatus, TrackedNodeSet } from './tracked-nodes.js';
import type { TreeStore } from './tree-store.js';
import { SqlTreeStore, type SqlTreeStoreOptions } from './sql-tree-store.js';
import {
  DetachedReferenceError,
  IllegalRelocationError,
  InvalidNodeStateError,
  InvalidTreeConfigError,
  MalformedShiftRequestError,
  type NodeRole,
} from './tree-errors.js';

/**
 * Options for creating a TreeManager.
 */
export interface TreeManagerOptions<T extends TreeNode> {
  /** Durable store of the tree */
  store: TreeStore<T>;
  /** Tree configuration */
  config?: Partial<Pick<TreeConfig, 'gapDirection'>>;
  /** Receives shifts, placements and flushes */
  logger?: TreeLogger;
}

/**
 * Tree Manager: the only writer of `left` and `right`.
 *
 * Nodes become attached when they are staged by `addChild` or
 * `insertBeforeSibling`, or handed out by a query. Staged nodes are written
 * to the store by `saveChanges`; shifts reach the store immediately.
 *
 * @typeParam T - The node type
 *
 * @example
 * ```ts
 * const manager = new TreeManager({ store: new MemoryTreeStore<Category>() });
 *
 * const electronics = await manager.addChild({ name: 'Electronics', left: 0, right: 0 }, null);
 * await manager.addChild({ name: 'Laptops', left: 0, right: 0 }, electronics);
 * await manager.saveChanges();
 * ```
 */
export class TreeManager<T extends TreeNode> {
  readonly store: TreeStore<T>;
  readonly config: Pick<TreeConfig, 'gapDirection'>;

  private readonly local = new TrackedNodeSet<T>();
  private readonly logger?: TreeLogger;

  constructor(options: TreeManagerOptions<T>) {
    const config = resolveTreeConfig(options.config ?? {});
    const problems = validateTreeConfig(config);
    if (problems.length > 0) {
      throw new InvalidTreeConfigError(problems);
    }

    this.store = options.store;
    this.config = { gapDirection: config.gapDirection };
    this.logger = options.logger;
  }

  /**
   * Whether the manager tracks `node`, staged or loaded.
   */
  isAttached(node: T): boolean {
    return this.local.isAttached(node);
  }

  /**
   * Whether staged nodes wait for `saveChanges`.
   */
  get hasPendingChanges(): boolean {
    return this.local.hasStaged;
  }

  /**
   * Stops tracking a node. A staged leaf is dropped without being persisted
   * and the nodes after it close its gap. A loaded node keeps its row.
   * @returns Whether the node was tracked
   */
  async detach(node: T): Promise<boolean> {
    const status = this.local.statusOf(node);
    if (status !== NodeStatus.New) {
      return this.local.detach(node);
    }
    if (!NestedSetStrategy.isLeaf(node.left, node.right)) {
      throw new InvalidNodeStateError('Only a staged leaf can be detached');
    }

    await this.mutate(() => this.shift(-2, node.right + 1));
    this.logger?.({ operation: 'detach', left: node.left, right: node.right });
    return this.local.detach(node);
  }

  /**
   * Adds `entity` as the last child of `parent`, or as the last root when
   * `parent` is null.
   * @returns The entity, with its interval assigned
   */
  async addChild(entity: T, parent: T | null): Promise<T> {
    this.assertInsertable(entity);
    if (parent !== null) {
      this.assertAttached(parent, 'parent');
    }

    return this.mutate(async () => {
      const position = parent !== null
        ? await this.shiftFromPosition(parent.right, 2)
        : (await this.extent()).maxRight + 1;

      this.place(entity, position);
      this.logger?.({ operation: 'addChild', left: entity.left, right: entity.right });
      return entity;
    });
  }

  /**
   * Inserts `entity` right before `sibling`, under the same parent.
   * @returns The entity, with its interval assigned
   */
  async insertBeforeSibling(entity: T, sibling: T): Promise<T> {
    this.assertInsertable(entity);
    this.assertAttached(sibling, 'sibling');

    return this.mutate(async () => {
      const position = await this.shiftFromPosition(sibling.left, 2);

      this.place(entity, position);
      this.logger?.({ operation: 'insertBeforeSibling', left: entity.left, right: entity.right });
      return entity;
    });
  }

  /**
   * Moves the subtree rooted at `source` to become the last child of
   * `target`, or the last root when `target` is null.
   */
  async move(source: T, target: T | null): Promise<void> {
    this.assertAttached(source, 'source');
    if (target !== null) {
      this.assertAttached(target, 'target');
      if (target === source || target.left === source.left || NestedSetStrategy.isDescendantOf(target, source)) {
        throw new IllegalRelocationError();
      }
    }

    await this.mutate(async () => {
      const extent = await this.extent();
      const boundary = target !== null ? target.right : extent.maxRight + 1;
      const plan = NestedSetStrategy.planMove(source, boundary, extent.minLeft);
      if (!plan) return;

      for (const step of plan.steps) {
        await this.shift(step.offset, step.range.from, step.range.to);
      }
      this.logger?.({ operation: 'move', left: source.left, right: source.right });
    });
  }

  /**
   * Gets the immediate children of a node, left to right.
   */
  async directChildren(node: T): Promise<T[]> {
    this.assertAttached(node, 'node');
    return this.walkSiblings(node.left + 1, node.right);
  }

  /**
   * Gets all descendants of a node, ordered by left.
   */
  async allDescendants(node: T): Promise<T[]> {
    this.assertAttached(node, 'node');
    return this.findMatching({ left: { gt: node.left }, right: { lt: node.right } });
  }

  /**
   * Gets the root nodes, left to right.
   */
  async roots(): Promise<T[]> {
    const extent = await this.extent();
    return this.walkSiblings(extent.minLeft);
  }

  /**
   * Gets the path from the root down to a node.
   */
  async ancestors(node: T, includeSelf: boolean = false): Promise<T[]> {
    this.assertAttached(node, 'node');
    const path = await this.findMatching({ left: { lt: node.left }, right: { gt: node.right } });
    return includeSelf ? [...path, node] : path;
  }

  /**
   * Gets the parent of a node, null for roots.
   */
  async parentOf(node: T): Promise<T | null> {
    const path = await this.ancestors(node);
    return path[path.length - 1] ?? null;
  }

  /**
   * Gets every node of the tree, ordered by left.
   */
  async findAll(): Promise<T[]> {
    const loaded = this.local.mergeLoaded(await this.store.readAll());
    return this.withStaged(loaded, {});
  }

  /**
   * Gets the whole tree, or the subtree of `node`, as a nested structure.
   */
  async threaded(node?: T): Promise<ThreadedNode<T>[]> {
    const nodes = node ? [node, ...(await this.allDescendants(node))] : await this.findAll();
    return NestedSetStrategy.toThreaded(nodes);
  }

  /**
   * Validates the tree structure.
   * @returns Array of validation errors (empty if valid)
   */
  async validate(): Promise<string[]> {
    return NestedSetStrategy.validateTree(await this.findAll());
  }

  /**
   * Writes every staged node to the store.
   * @returns Number of nodes written
   */
  async saveChanges(): Promise<number> {
    const staged = this.local.staged().sort((a, b) => NestedSetStrategy.compareByLeft(a, b));
    if (staged.length === 0) return 0;

    await this.store.transaction(() => this.store.insert(staged));
    this.local.markManaged(staged);
    this.logger?.({ operation: 'saveChanges', count: staged.length });
    return staged.length;
  }

  /**
   * Adds `offset` to every left in `[from, to)`, then to every right in `[from, to)`.
   * A missing bound leaves that side open.
   */
  protected async shift(offset: number, from?: number, to?: number): Promise<void> {
    if (from === undefined && to === undefined) {
      throw new MalformedShiftRequestError();
    }

    const range = { from, to };
    this.logger?.({ operation: 'shift', offset, from, to });

    await this.store.bulkUpdate(range, 'left', offset);
    this.local.shift('left', range, offset);
    await this.store.bulkUpdate(range, 'right', offset);
    this.local.shift('right', range, offset);
  }

  /**
   * Opens a gap of `gapSize` at `position`, shifting the cheaper side
   * unless the configured gap direction pins it.
   * @returns The left edge of the opened gap
   */
  protected async shiftFromPosition(position: number, gapSize: number): Promise<number> {
    const plan = NestedSetStrategy.planGap(position, gapSize, await this.extent(), this.config.gapDirection);
    await this.shift(plan.step.offset, plan.step.range.from, plan.step.range.to);
    return plan.gapStart;
  }

  /**
   * Smallest left and largest right across the store and tracked nodes,
   * 0 for an empty tree.
   */
  protected async extent(): Promise<TreeExtent> {
    const storedMin = await this.store.aggregate('min', 'left');
    const storedMax = await this.store.aggregate('max', 'right');
    const local = this.local.extent();

    const minCandidates = [storedMin, local?.minLeft].filter((value): value is number => typeof value === 'number');
    const maxCandidates = [storedMax, local?.maxRight].filter((value): value is number => typeof value === 'number');

    return {
      minLeft: minCandidates.length > 0 ? Math.min(...minCandidates) : 0,
      maxRight: maxCandidates.length > 0 ? Math.max(...maxCandidates) : 0,
    };
  }

  // ===== Private Helpers =====

  /**
   * Runs a mutation atomically: the store undoes its side through its
   * transaction, tracked nodes are put back from a snapshot.
   */
  private async mutate<R>(action: () => Promise<R>): Promise<R> {
    const snapshot = this.local.snapshot();
    try {
      return await this.store.transaction(action);
    } catch (error) {
      this.local.restore(snapshot);
      throw error;
    }
  }

  private place(entity: T, position: number): void {
    entity.left = position;
    entity.right = position + 1;
    this.local.stage(entity);
  }

  /**
   * Follows the chain `left = previous.right + 1` from `startLeft`, stopping
   * at `endRight` when given.
   */
  private async walkSiblings(startLeft: number, endRight?: number): Promise<T[]> {
    if (!this.local.hasStaged && this.store.siblingChain) {
      return this.local.mergeLoaded(await this.store.siblingChain(startLeft, endRight));
    }

    const chain: T[] = [];
    let position = startLeft;
    while (endRight === undefined || position < endRight) {
      const next = await this.nodeAt(position);
      if (!next) break;
      chain.push(next);
      position = next.right + 1;
    }
    return chain;
  }

  private async nodeAt(left: number): Promise<T | null> {
    const tracked = this.local.all().find(node => node.left === left);
    if (tracked) return tracked;

    const [row] = await this.store.rangeQuery({ left: { eq: left } });
    return row ? this.local.mergeLoaded([row])[0] : null;
  }

  private async findMatching(filter: IntervalFilter): Promise<T[]> {
    const loaded = this.local.mergeLoaded(await this.store.rangeQuery(filter));
    return this.withStaged(loaded, filter);
  }

  private withStaged(loaded: T[], filter: IntervalFilter): T[] {
    const staged = this.local.staged().filter(node => matchesFilter(node, filter));
    return [...loaded, ...staged].sort((a, b) => NestedSetStrategy.compareByLeft(a, b));
  }

  private assertAttached(node: T, role: NodeRole): void {
    if (!this.local.isAttached(node)) {
      throw new DetachedReferenceError(role);
    }
  }

  private assertInsertable(entity: T): void {
    if (this.local.isAttached(entity)) {
      throw new InvalidNodeStateError('Entity is already part of the tree');
    }
  }
}

/**
 * Options for createSqlTreeManager.
 */
export interface SqlTreeManagerOptions<T extends TreeNode> extends SqlTreeStoreOptions<T> {
  /** Gap direction */
  gapDirection?: TreeConfig['gapDirection'];
  /** Receives shifts, placements and flushes */
  logger?: TreeLogger;
  /** Receives every SQL statement before it runs */
  queryLogger?: QueryLogger;
}

/**
 * Creates a TreeManager persisting to a SQL table.
 */
export function createSqlTreeManager<T extends TreeNode>(options: SqlTreeManagerOptions<T>): TreeManager<T> {
  const { gapDirection, logger, queryLogger, ...storeOptions } = options;
  const store = new SqlTreeStore<T>({
    ...storeOptions,
    executor: createQueryLoggingExecutor(storeOptions.executor, queryLogger),
  });
  return new TreeManager({ store, config: { gapDirection }, logger });
}
