/**
 * Run work inside a transaction: commit when it resolves, roll back when it
 * throws. The work's error is rethrown; a failed rollback is reported as a
 * TransactionError carrying the rollback failure as its cause.
 *
 * @example
 * ```typescript
 * const order = await withTransaction(executor, async (tx) => {
 *   const created = await orders.insert().exec(record, { tx });
 *   await stock.modify().setExpr('quantity', '-', 'qty').where('sku', '=', 'sku').exec(line, { tx });
 *   return created;
 * });
 * ```
 */

import { TransactionError, toError } from '../errors';

import type { Transaction, TransactionalExecutor, TransactionOptions } from '../types';

export async function withTransaction<R>(
  executor: TransactionalExecutor,
  work: (tx: Transaction) => Promise<R>,
  options?: TransactionOptions,
): Promise<R> {
  const tx = await executor.beginTransaction(options);

  let result: R;
  try {
    result = await work(tx);
  } catch (error) {
    if (tx.isActive) {
      await rollbackAfter(tx, toError(error));
    }
    throw error;
  }

  await tx.commit();
  return result;
}

async function rollbackAfter(tx: Transaction, original: Error): Promise<void> {
  try {
    await tx.rollback();
  } catch (rollbackError) {
    throw new TransactionError(
      `Rollback failed after error: ${original.message}`,
      tx.id,
      toError(rollbackError),
    );
  }
}
