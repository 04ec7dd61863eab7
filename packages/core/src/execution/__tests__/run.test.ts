import { describe, it, expect } from 'vitest';

import { CardinalityError } from '../../errors';
import { createTestTable } from '../../__tests__/helpers';
import { exactlyOne, executeMany, executeOne, executeWrite, observe, UPDATE_MESSAGES } from '../run';

import type { QueryCompletedEvent, QueryFailedEvent, QueryStartedEvent } from '../../events';

function recordEvents(events: ReturnType<typeof createTestTable>['events']) {
  const started: QueryStartedEvent[] = [];
  const completed: QueryCompletedEvent[] = [];
  const failed: QueryFailedEvent[] = [];
  events.on('query:started', (event) => started.push(event));
  events.on('query:completed', (event) => completed.push(event));
  events.on('query:failed', (event) => failed.push(event));
  return { started, completed, failed };
}

describe('exactlyOne', () => {
  it('should return the only row', () => {
    expect(exactlyOne([{ id: 1 }], 'SELECT')).toEqual({ id: 1 });
  });

  it('should use the operation\'s messages', () => {
    expect(() => exactlyOne([], 'UPDATE', UPDATE_MESSAGES)).toThrow(new CardinalityError('no rows updated', 'UPDATE', 'none'));
    expect(() => exactlyOne([1, 2], 'SELECT')).toThrow('expected exactly one row, found multiple');
  });
});

describe('observe', () => {
  it('should emit started then completed with details', async () => {
    const { table, events } = createTestTable();
    const recorded = recordEvents(events);

    const result = await observe(table.context, { operation: 'SELECT', sql: 'SELECT 1' }, async () => 7, (value) => ({
      rowsReturned: value,
    }));

    expect(result).toBe(7);
    expect(recorded.started).toEqual([{ table: 'users', operation: 'SELECT', sql: 'SELECT 1' }]);
    expect(recorded.completed).toHaveLength(1);
    expect(recorded.completed[0]).toMatchObject({ table: 'users', operation: 'SELECT', rowsReturned: 7 });
    expect(recorded.completed[0]?.durationMs).toBeGreaterThanOrEqual(0);
    expect(recorded.failed).toEqual([]);
  });

  it('should emit failed and rethrow', async () => {
    const { table, events } = createTestTable();
    const recorded = recordEvents(events);
    const error = new Error('broken');

    await expect(
      observe(table.context, { operation: 'DELETE', sql: 'DELETE' }, async () => Promise.reject(error), () => ({})),
    ).rejects.toBe(error);

    expect(recorded.completed).toEqual([]);
    expect(recorded.failed).toHaveLength(1);
    expect(recorded.failed[0]).toMatchObject({ operation: 'DELETE', error: 'broken' });
  });
});

describe('runners', () => {
  it('executeMany should return rows and count them', async () => {
    const { table, query, events } = createTestTable();
    const recorded = recordEvents(events);
    query.mockResolvedValue({ rows: [{ id: 1 }, { id: 2 }], rowCount: 2 });

    await expect(executeMany(table.context, 'SELECT', 'SELECT * FROM "users"', {})).resolves.toHaveLength(2);
    expect(recorded.completed[0]?.rowsReturned).toBe(2);
  });

  it('executeOne should enforce a single row', async () => {
    const { table, query } = createTestTable();
    query.mockResolvedValue({ rows: [], rowCount: 0 });

    await expect(executeOne(table.context, 'SELECT', 'SELECT * FROM "users"', {})).rejects.toThrow('no rows found');
  });

  it('executeWrite should report affected rows', async () => {
    const { table, execute, events } = createTestTable();
    const recorded = recordEvents(events);
    execute.mockResolvedValue({ affectedRows: 6 });

    await expect(executeWrite(table.context, 'DELETE', 'DELETE FROM "users"', {})).resolves.toBe(6);
    expect(recorded.completed[0]?.rowsAffected).toBe(6);
  });
});
