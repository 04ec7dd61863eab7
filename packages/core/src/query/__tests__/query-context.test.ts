import { describe, it, expect } from 'vitest';

import { CancellationError, MissingParameterError, QueryError, TimeoutError } from '../../errors';
import { createTestTable, NO_SIGNAL } from '../../__tests__/helpers';
import { wrapExecutionError } from '../query-context';

import type { QueryMiddleware, QueryMiddlewareContext } from '../../middleware';

const never = () => new Promise<never>(() => {});

describe('QueryContext', () => {
  it('should bind named parameters before calling the executor', async () => {
    const { table, query } = createTestTable('mysql');
    query.mockResolvedValue({ rows: [], rowCount: 0 });

    await table.context.query('SELECT', 'SELECT * FROM `users` WHERE `age` > :n OR `id` = :n', { n: 3 });

    expect(query).toHaveBeenCalledWith('SELECT * FROM `users` WHERE `age` > ? OR `id` = ?', [3, 3], NO_SIGNAL);
  });

  it('should return the executor\'s affected rows', async () => {
    const { table, execute } = createTestTable();
    execute.mockResolvedValue({ affectedRows: 4 });

    await expect(table.context.execute('DELETE', 'DELETE FROM "users" WHERE "age" < :n', { n: 1 })).resolves.toEqual({
      affectedRows: 4,
    });
  });

  it('should throw a missing parameter without wrapping it', async () => {
    const { table } = createTestTable();

    await expect(table.context.query('SELECT', 'SELECT :a', {})).rejects.toThrow(new MissingParameterError('a'));
  });

  it('should hand middleware the operation, table and statement kind', async () => {
    const seen: Array<Pick<QueryMiddlewareContext, 'operation' | 'table' | 'kind' | 'sql' | 'params'>> = [];
    const spy: QueryMiddleware = async (context, next) => {
      seen.push({
        operation: context.operation,
        table: context.table,
        kind: context.kind,
        sql: context.sql,
        params: context.params,
      });
      return next(context);
    };
    const { table, execute } = createTestTable('postgresql', undefined, { middleware: [spy] });
    execute.mockResolvedValue({ affectedRows: 1 });

    await table.remove().where('id', '=', 'id').exec({ id: 5 });

    expect(seen).toEqual([
      { operation: 'DELETE', table: 'users', kind: 'execute', sql: 'DELETE FROM "users" WHERE "id" = $1', params: [5] },
    ]);
  });

  it('should fail with TimeoutError when the statement outlives the timeout', async () => {
    const { table, query } = createTestTable();
    query.mockImplementation(never);

    const result = table.query().exec({}, { timeout: 20 });

    await expect(result).rejects.toBeInstanceOf(TimeoutError);
    await expect(result).rejects.toMatchObject({ timeout: 20 });
  });

  it('should apply the table default timeout', async () => {
    const { table, query } = createTestTable('postgresql', undefined, { defaultTimeout: 15 });
    query.mockImplementation(never);

    await expect(table.count().exec()).rejects.toBeInstanceOf(TimeoutError);
  });

  it('should pass an abortable signal to the executor when a timeout applies', async () => {
    const { table, query } = createTestTable();
    query.mockResolvedValue({ rows: [], rowCount: 0 });

    await table.query().exec({}, { timeout: 1_000 });

    const options: unknown = query.mock.calls[0]?.[2];
    expect(options).toEqual({ signal: expect.any(AbortSignal) });
  });

  it('should fail with CancellationError when the caller aborts', async () => {
    const { table, query } = createTestTable();
    const controller = new AbortController();
    query.mockImplementation(() => {
      controller.abort();
      return never();
    });

    const result = table.query().exec({}, { signal: controller.signal });

    await expect(result).rejects.toBeInstanceOf(CancellationError);
    await expect(result).rejects.toThrow('query was cancelled');
  });

  it('should not start a statement for an already aborted signal', async () => {
    const { table, query } = createTestTable();
    const controller = new AbortController();
    controller.abort();

    await expect(table.query().exec({}, { signal: controller.signal })).rejects.toBeInstanceOf(CancellationError);
    expect(query).not.toHaveBeenCalled();
  });
});

describe('wrapExecutionError', () => {
  it('should wrap driver errors with the operation and SQL', () => {
    const cause = new Error('syntax error');
    const error = wrapExecutionError('UPDATE', 'UPDATE x', cause);

    expect(error).toBeInstanceOf(QueryError);
    expect(error).toMatchObject({ message: 'UPDATE failed: syntax error', operation: 'UPDATE', sql: 'UPDATE x', cause });
  });

  it('should wrap non-error values', () => {
    expect(wrapExecutionError('SELECT', 'SELECT 1', 'socket hang up').message).toBe('SELECT failed: socket hang up');
  });

  it('should pass timeouts and cancellations through', () => {
    const timeout = new TimeoutError('Query timed out', 10);
    const cancelled = new CancellationError();

    expect(wrapExecutionError('SELECT', 'SELECT 1', timeout)).toBe(timeout);
    expect(wrapExecutionError('SELECT', 'SELECT 1', cancelled)).toBe(cancelled);
  });
});
