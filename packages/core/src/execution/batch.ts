/**
 * Sequential batch execution of one rendered statement over many parameter sets.
 */

import { BatchError, CancellationError, toError } from '../errors';
import { observe } from './run';

import type { QueryContext } from '../query/query-context';
import type { ExecOptions, Params } from '../types';

/**
 * Execute `sql` once per parameter set, in order, and sum affected rows.
 * The first failure stops the batch; statements already run are not undone,
 * so callers wanting all-or-nothing pass a transaction in `options.tx`.
 */
export async function executeBatch(
  ctx: QueryContext,
  operation: string,
  sql: string,
  paramsList: readonly Params[],
  options: ExecOptions = {},
): Promise<number> {
  return observe(
    ctx,
    { operation, sql },
    async () => {
      let total = 0;
      for (const [index, params] of paramsList.entries()) {
        try {
          if (options.signal?.aborted) {
            throw new CancellationError();
          }
          const { affectedRows } = await ctx.execute(operation, sql, params, options);
          total += affectedRows;
        } catch (error) {
          throw new BatchError(operation, index, total, toError(error));
        }
      }
      return total;
    },
    (rowsAffected) => ({ rowsAffected }),
  );
}
