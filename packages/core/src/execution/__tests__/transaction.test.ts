import { describe, it, expect, vi } from 'vitest';

import { IsolationLevel } from '../../types';
import { TransactionError } from '../../errors';
import { withTransaction } from '../transaction';

import type { Transaction, TransactionalExecutor } from '../../types';

function createTransactional() {
  const state = { isActive: true };
  const commit = vi.fn(async () => {
    state.isActive = false;
  });
  const rollback = vi.fn(async () => {
    state.isActive = false;
  });
  const tx: Transaction = {
    id: 'tx-1',
    get isActive() {
      return state.isActive;
    },
    query: vi.fn(),
    execute: vi.fn(),
    commit,
    rollback,
  };
  const beginTransaction = vi.fn(async () => tx);
  const executor: TransactionalExecutor = { query: vi.fn(), execute: vi.fn(), beginTransaction };
  return { executor, tx, commit, rollback, beginTransaction };
}

describe('withTransaction', () => {
  it('should commit and return the work result', async () => {
    const { executor, tx, commit, rollback, beginTransaction } = createTransactional();

    const result = await withTransaction(executor, async (active) => {
      expect(active).toBe(tx);
      return 42;
    }, { isolationLevel: IsolationLevel.SERIALIZABLE });

    expect(result).toBe(42);
    expect(beginTransaction).toHaveBeenCalledWith({ isolationLevel: 'SERIALIZABLE' });
    expect(commit).toHaveBeenCalledTimes(1);
    expect(rollback).not.toHaveBeenCalled();
  });

  it('should roll back and rethrow when the work fails', async () => {
    const { executor, commit, rollback } = createTransactional();
    const error = new Error('constraint violated');

    await expect(withTransaction(executor, async () => Promise.reject(error))).rejects.toBe(error);
    expect(rollback).toHaveBeenCalledTimes(1);
    expect(commit).not.toHaveBeenCalled();
  });

  it('should not roll back a transaction the work already closed', async () => {
    const { executor, commit, rollback } = createTransactional();

    await expect(
      withTransaction(executor, async (active) => {
        await active.rollback();
        throw new Error('gave up');
      }),
    ).rejects.toThrow('gave up');
    expect(rollback).toHaveBeenCalledTimes(1);
    expect(commit).not.toHaveBeenCalled();
  });

  it('should report a failed rollback', async () => {
    const { executor, rollback } = createTransactional();
    const rollbackError = new Error('connection lost');
    rollback.mockRejectedValueOnce(rollbackError);

    const result = withTransaction(executor, async () => Promise.reject(new Error('deadlock')));

    await expect(result).rejects.toBeInstanceOf(TransactionError);
    await expect(result).rejects.toMatchObject({
      message: 'Rollback failed after error: deadlock',
      transactionId: 'tx-1',
      cause: rollbackError,
    });
  });
});
