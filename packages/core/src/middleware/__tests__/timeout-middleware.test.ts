import { describe, it, expect, vi, beforeEach } from 'vitest';

import { CancellationError, TimeoutError } from '../../errors';
import { createTimeoutMiddleware } from '../timeout-middleware';

import type { QueryMiddlewareContext } from '../types';

const delayed = (ms: number) => () =>
  new Promise((resolve) =>
    setTimeout(() => resolve({ result: { rows: [], rowCount: 0 } }), ms),
  );

describe('createTimeoutMiddleware', () => {
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

  it('should return result when query completes quickly', async () => {
    const middleware = createTimeoutMiddleware({ defaultTimeout: 5000 });
    const next = vi.fn().mockResolvedValue({ result: { rows: [{ id: 1 }], rowCount: 1 } });

    const result = await middleware(context, next);

    expect(result.result).toEqual({ rows: [{ id: 1 }], rowCount: 1 });
    expect(next).toHaveBeenCalledTimes(1);
  });

  it('should skip timeout handling when timeout is 0 and there is no signal', async () => {
    context.timeout = 0;
    const middleware = createTimeoutMiddleware({ defaultTimeout: 5000 });
    const next = vi.fn().mockResolvedValue({ result: { rows: [], rowCount: 0 } });

    await middleware(context, next);

    expect(next).toHaveBeenCalledWith(context);
  });

  it('should hand downstream handlers an abort signal', async () => {
    const middleware = createTimeoutMiddleware({ defaultTimeout: 5000 });
    const next = vi.fn().mockResolvedValue({ result: { affectedRows: 1 } });

    await middleware(context, next);

    expect(next.mock.calls[0]?.[0].signal).toBeInstanceOf(AbortSignal);
  });

  it('should update duration in result', async () => {
    const middleware = createTimeoutMiddleware({ defaultTimeout: 5000 });
    const next = vi.fn().mockResolvedValue({ result: { rows: [], rowCount: 0 } });

    const result = await middleware(context, next);

    expect(result.duration).toBeGreaterThanOrEqual(0);
  });

  it('should throw TimeoutError when query exceeds timeout', async () => {
    const middleware = createTimeoutMiddleware({ defaultTimeout: 10 });

    await expect(middleware(context, vi.fn().mockImplementation(delayed(100)))).rejects.toThrow(
      TimeoutError,
    );
  });

  it('should prefer the context timeout over the default', async () => {
    context.timeout = 10;
    const middleware = createTimeoutMiddleware({ defaultTimeout: 60_000 });

    await expect(middleware(context, vi.fn().mockImplementation(delayed(100)))).rejects.toThrow(
      TimeoutError,
    );
  });

  it('should store timeout info in metadata and abort the downstream signal', async () => {
    const middleware = createTimeoutMiddleware({ defaultTimeout: 10 });
    const next = vi.fn().mockImplementation(delayed(100));

    await expect(middleware(context, next)).rejects.toThrow(TimeoutError);

    expect(context.metadata['timedOut']).toBe(true);
    expect(context.metadata['timeoutMs']).toBe(10);
    expect(next.mock.calls[0]?.[0].signal.aborted).toBe(true);
  });

  it('should reject with CancellationError when the caller aborts', async () => {
    const controller = new AbortController();
    context.signal = controller.signal;
    const middleware = createTimeoutMiddleware({ defaultTimeout: 5000 });

    const pending = middleware(context, vi.fn().mockImplementation(delayed(100)));
    controller.abort();

    await expect(pending).rejects.toThrow(CancellationError);
  });

  it('should not start the statement when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    context.signal = controller.signal;
    const next = vi.fn();

    await expect(createTimeoutMiddleware()(context, next)).rejects.toThrow('query was cancelled');
    expect(next).not.toHaveBeenCalled();
  });
});
