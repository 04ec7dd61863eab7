import type {
  NextMiddleware,
  QueryMiddleware,
  QueryMiddlewareContext,
  QueryMiddlewareResult,
  StatementOutcome,
} from './types';

/**
 * Run one statement through the table's middleware, first entry outermost,
 * ending in `handler` (the driver call). Middleware may rewrite the context
 * or answer without calling next.
 */
export async function runMiddleware<R extends StatementOutcome>(
  middleware: readonly QueryMiddleware[],
  context: QueryMiddlewareContext,
  handler: NextMiddleware<R>,
): Promise<QueryMiddlewareResult<R>> {
  const dispatch = (index: number, current: QueryMiddlewareContext): Promise<QueryMiddlewareResult<R>> => {
    const middlewareAt = middleware[index];
    if (!middlewareAt) {
      return handler(current);
    }
    return middlewareAt(current, (next) => dispatch(index + 1, next));
  };

  return dispatch(0, context);
}
