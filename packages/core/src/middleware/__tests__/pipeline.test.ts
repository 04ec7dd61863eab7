import { describe, it, expect, vi, beforeEach } from 'vitest';

import { runMiddleware } from '../pipeline';

import type { QueryMiddleware, QueryMiddlewareContext } from '../types';
import type { QueryResult } from '../../types';

const rows: QueryResult<unknown> = { rows: [{ id: 1 }], rowCount: 1 };

describe('runMiddleware', () => {
  let context: QueryMiddlewareContext;

  beforeEach(() => {
    context = {
      sql: 'SELECT * FROM "users"',
      params: [],
      kind: 'query',
      operation: 'SELECT',
      table: 'users',
      startTime: Date.now(),
      metadata: {},
    };
  });

  it('should call the handler directly when there is no middleware', async () => {
    const handler = vi.fn(async (_ctx: QueryMiddlewareContext) => ({ result: rows }));

    const outcome = await runMiddleware([], context, handler);

    expect(outcome.result).toBe(rows);
    expect(handler).toHaveBeenCalledWith(context);
  });

  it('should run middleware outermost first', async () => {
    const order: string[] = [];
    const record =
      (name: string): QueryMiddleware =>
      async (ctx, next) => {
        order.push(`${name}:before`);
        const result = await next(ctx);
        order.push(`${name}:after`);
        return result;
      };

    await runMiddleware([record('first'), record('second')], context, async () => {
      order.push('handler');
      return { result: rows };
    });

    expect(order).toEqual([
      'first:before',
      'second:before',
      'handler',
      'second:after',
      'first:after',
    ]);
  });

  it('should pass a rewritten context to the handler', async () => {
    const tag: QueryMiddleware = (ctx, next) =>
      next({ ...ctx, metadata: { ...ctx.metadata, tagged: true } });
    const handler = vi.fn(async (_ctx: QueryMiddlewareContext) => ({ result: rows }));

    await runMiddleware([tag], context, handler);

    expect(handler.mock.calls[0]?.[0].metadata).toEqual({ tagged: true });
  });

  it('should propagate handler errors through middleware', async () => {
    const passThrough: QueryMiddleware = (ctx, next) => next(ctx);

    await expect(
      runMiddleware([passThrough], context, () => Promise.reject(new Error('connection lost'))),
    ).rejects.toThrow('connection lost');
  });
});
