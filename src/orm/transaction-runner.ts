import type { DbExecutor } from '../core/execution/db-executor.js';

const openTransactions = new WeakSet<DbExecutor>();

/**
 * Runs `action` inside a transaction on `executor`.
 *
 * A call made while the same executor already has a transaction open by
 * this runner joins it: only the outermost call commits or rolls back.
 * Executors without transaction support run `action` as is.
 *
 * @throws Rethrows the action's error after rolling back
 */
export const runInTransaction = async <R>(executor: DbExecutor, action: () => Promise<R>): Promise<R> => {
  const { beginTransaction, commitTransaction, rollbackTransaction } = executor;
  if (
    !executor.capabilities.transactions ||
    !beginTransaction ||
    !commitTransaction ||
    !rollbackTransaction ||
    openTransactions.has(executor)
  ) {
    return action();
  }

  await beginTransaction.call(executor);
  openTransactions.add(executor);
  try {
    const result = await action();
    openTransactions.delete(executor);
    await commitTransaction.call(executor);
    return result;
  } catch (error) {
    if (openTransactions.delete(executor)) {
      await rollbackTransaction.call(executor);
    }
    throw error;
  }
};

/**
 * Whether `executor` is inside a transaction opened by runInTransaction.
 */
export const isInTransaction = (executor: DbExecutor): boolean => openTransactions.has(executor);
