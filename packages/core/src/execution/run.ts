/**
 * Operation runners shared by the builders. Each runs one logical operation
 * and reports it through the table's query events.
 */

import { CardinalityError, toError } from '../errors';

import type { QueryCompletedEvent } from '../events';
import type { QueryContext } from '../query/query-context';
import type { ExecOptions, Params } from '../types';

export interface OperationInfo {
  operation: string;
  sql: string;
  field?: string;
}

export interface CardinalityMessages {
  none: string;
  multiple: string;
}

export const SELECT_MESSAGES: CardinalityMessages = {
  none: 'no rows found',
  multiple: 'expected exactly one row, found multiple',
};

export const UPDATE_MESSAGES: CardinalityMessages = {
  none: 'no rows updated',
  multiple: 'expected exactly one row updated, found multiple',
};

export const INSERT_MESSAGES: CardinalityMessages = {
  none: 'INSERT returned no rows',
  multiple: 'expected exactly one row inserted, found multiple',
};

type CompletionDetails = Pick<QueryCompletedEvent, 'rowsReturned' | 'rowsAffected' | 'resultValue'>;

/**
 * Emit started, then completed or failed, around `work`.
 */
export async function observe<R>(
  ctx: QueryContext,
  info: OperationInfo,
  work: () => Promise<R>,
  describe: (result: R) => CompletionDetails,
): Promise<R> {
  const base = { table: ctx.table, ...info };
  const startTime = Date.now();
  ctx.events.started(base);

  try {
    const result = await work();
    ctx.events.completed({ ...base, durationMs: Date.now() - startTime, ...describe(result) });
    return result;
  } catch (error) {
    ctx.events.failed({ ...base, durationMs: Date.now() - startTime, error: toError(error).message });
    throw error;
  }
}

export function exactlyOne<T>(
  rows: readonly T[],
  operation: string,
  messages: CardinalityMessages = SELECT_MESSAGES,
): T {
  const [first] = rows;
  if (rows.length === 0 || first === undefined) {
    throw new CardinalityError(messages.none, operation, 'none');
  }
  if (rows.length > 1) {
    throw new CardinalityError(messages.multiple, operation, 'multiple');
  }
  return first;
}

export async function executeMany<T>(
  ctx: QueryContext,
  operation: string,
  sql: string,
  params: Params,
  options?: ExecOptions,
): Promise<T[]> {
  return observe(
    ctx,
    { operation, sql },
    async () => (await ctx.query<T>(operation, sql, params, options)).rows,
    (rows) => ({ rowsReturned: rows.length }),
  );
}

export async function executeOne<T>(
  ctx: QueryContext,
  operation: string,
  sql: string,
  params: Params,
  options?: ExecOptions,
): Promise<T> {
  return observe(
    ctx,
    { operation, sql },
    async () => exactlyOne((await ctx.query<T>(operation, sql, params, options)).rows, operation),
    () => ({ rowsReturned: 1 }),
  );
}

export async function executeWrite(
  ctx: QueryContext,
  operation: string,
  sql: string,
  params: Params,
  options?: ExecOptions,
): Promise<number> {
  return observe(
    ctx,
    { operation, sql },
    async () => (await ctx.execute(operation, sql, params, options)).affectedRows,
    (rowsAffected) => ({ rowsAffected }),
  );
}
