/**
 * Select Builder
 *
 * SELECT that must yield exactly one row. Zero rows and more than one row
 * fail with distinguishable CardinalityErrors (NO_ROWS / MULTIPLE_ROWS).
 *
 * @example
 * ```typescript
 * const user = await users.select()
 *   .where('email', '=', 'email')
 *   .exec({ email: 'ada@example.com' });
 * ```
 */

import { AstBuilder } from '../ast';
import { executeOne } from '../execution/run';
import { SelectChain } from './select-chain';

import type { QueryContext } from './query-context';
import type { ExecOptions, Params, Row } from '../types';

export class SelectBuilder<T = Row> extends SelectChain {
  constructor(ctx: QueryContext) {
    super(ctx, AstBuilder.select(ctx.schema.tableRef()));
  }

  /**
   * Execute and return the single matching row
   */
  async exec(params: Params = {}, options: ExecOptions = {}): Promise<T> {
    const { sql } = this.prepare();
    return executeOne<T>(this.ctx, 'SELECT', sql, params, options);
  }
}
