/**
 * Timeout Middleware
 *
 * Enforces statement execution time limits and caller cancellation.
 * Throws TimeoutError when the limit passes and CancellationError when the
 * caller's signal aborts. Downstream handlers receive a signal that fires in
 * both cases.
 *
 * @example
 * ```typescript
 * const middleware = createTimeoutMiddleware({
 *   defaultTimeout: 30000, // 30 seconds
 * });
 * ```
 */

import { EXECUTION_DEFAULTS } from '../constants';
import { CancellationError, TimeoutError } from '../errors';

import type { QueryMiddleware, TimeoutMiddlewareOptions } from './types';

/**
 * Create a timeout middleware with the given options
 */
export function createTimeoutMiddleware(options: TimeoutMiddlewareOptions = {}): QueryMiddleware {
  const { defaultTimeout = EXECUTION_DEFAULTS.timeout } = options;

  return async (context, next) => {
    // Get timeout from context or use default
    const timeout = context.timeout ?? defaultTimeout;
    const parent = context.signal;

    if (parent?.aborted) {
      throw new CancellationError();
    }

    // If timeout is 0 or negative and nothing can cancel, skip
    if (timeout <= 0 && !parent) {
      return next(context);
    }

    // Create abort controller for cancellation
    const controller = new AbortController();
    let timeoutId: NodeJS.Timeout | undefined;
    let onAbort: (() => void) | undefined;

    const interrupted = new Promise<never>((_, reject) => {
      if (timeout > 0) {
        timeoutId = setTimeout(() => {
          const elapsed = Date.now() - context.startTime;

          // Store timeout info in context
          context.metadata['timedOut'] = true;
          context.metadata['timeoutMs'] = timeout;
          context.metadata['elapsedMs'] = elapsed;

          controller.abort();
          reject(new TimeoutError(`Query timed out after ${elapsed}ms (limit: ${timeout}ms)`, timeout));
        }, timeout);
      }

      if (parent) {
        onAbort = () => {
          controller.abort();
          reject(new CancellationError());
        };
        parent.addEventListener('abort', onAbort, { once: true });
      }
    });

    try {
      // Race between statement and interruption
      const result = await Promise.race([next({ ...context, signal: controller.signal }), interrupted]);

      // Store timing in result
      result.duration = Date.now() - context.startTime;

      return result;
    } finally {
      if (timeoutId) {
        clearTimeout(timeoutId);
      }
      if (parent && onAbort) {
        parent.removeEventListener('abort', onAbort);
      }
    }
  };
}
