import { describe, it, expect } from 'vitest';

import { BatchError, QueryError } from '../../errors';
import { createExecutor, createTestTable, NO_SIGNAL } from '../../__tests__/helpers';
import { executeBatch } from '../batch';

import type { QueryCompletedEvent, QueryFailedEvent } from '../../events';

const SQL = 'UPDATE "users" SET "status" = :status WHERE "id" = :id';

describe('executeBatch', () => {
  it('should bind and run each parameter set in order', async () => {
    const { table, execute } = createTestTable();
    execute.mockResolvedValue({ affectedRows: 1 });

    const total = await executeBatch(table.context, 'UPDATE', SQL, [
      { status: 'a', id: 1 },
      { status: 'b', id: 2 },
    ]);

    expect(total).toBe(2);
    expect(execute.mock.calls).toEqual([
      ['UPDATE "users" SET "status" = $1 WHERE "id" = $2', ['a', 1], NO_SIGNAL],
      ['UPDATE "users" SET "status" = $1 WHERE "id" = $2', ['b', 2], NO_SIGNAL],
    ]);
  });

  it('should report one completed event with the total', async () => {
    const { table, execute, events } = createTestTable();
    const completed: QueryCompletedEvent[] = [];
    events.on('query:completed', (event) => completed.push(event));
    execute.mockResolvedValueOnce({ affectedRows: 2 }).mockResolvedValueOnce({ affectedRows: 3 });

    await executeBatch(table.context, 'UPDATE', SQL, [
      { status: 'a', id: 1 },
      { status: 'b', id: 2 },
    ]);

    expect(completed).toHaveLength(1);
    expect(completed[0]).toMatchObject({ operation: 'UPDATE', sql: SQL, rowsAffected: 5 });
  });

  it('should wrap the first failure with its index', async () => {
    const { table, execute, events } = createTestTable('mysql');
    const failed: QueryFailedEvent[] = [];
    events.on('query:failed', (event) => failed.push(event));
    execute.mockResolvedValueOnce({ affectedRows: 4 }).mockRejectedValueOnce(new Error('Duplicate entry'));

    const error: unknown = await executeBatch(table.context, 'UPDATE', SQL, [
      { status: 'a', id: 1 },
      { status: 'b', id: 2 },
      { status: 'c', id: 3 },
    ]).catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(BatchError);
    expect(error).toMatchObject({ index: 1, rowsAffected: 4 });
    expect(error instanceof BatchError && error.cause).toBeInstanceOf(QueryError);
    expect(execute).toHaveBeenCalledTimes(2);
    expect(failed[0]?.error).toBe('batch UPDATE failed at index 1 after 4 rows: UPDATE failed: Duplicate entry');
  });

  it('should run on the transaction executor', async () => {
    const { table, execute } = createTestTable();
    const tx = createExecutor();
    tx.execute.mockResolvedValue({ affectedRows: 1 });

    await executeBatch(table.context, 'DELETE', 'DELETE FROM "users" WHERE "id" = :id', [{ id: 1 }], { tx: tx.executor });

    expect(tx.execute).toHaveBeenCalledWith('DELETE FROM "users" WHERE "id" = $1', [1], NO_SIGNAL);
    expect(execute).not.toHaveBeenCalled();
  });
});
