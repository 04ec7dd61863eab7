/**
 * Delete Query Builder
 *
 * DELETE returning affected rows. Refuses to run without a WHERE condition.
 *
 * @example
 * ```typescript
 * const removed = await users.remove()
 *   .where('id', '=', 'user_id')
 *   .exec({ user_id: 1 });
 *
 * const total = await users.remove()
 *   .where('id', '=', 'user_id')
 *   .execBatch([{ user_id: 1 }, { user_id: 2 }]);
 * ```
 */

import { AstBuilder } from '../ast';
import { MutationSafetyError } from '../errors';
import { executeBatch } from '../execution/batch';
import { executeWrite } from '../execution/run';
import { WhereBuilder } from './where-builder';

import type { QueryContext } from './query-context';
import type { DeleteSpec } from './query-spec';
import type { ExecOptions, Params } from '../types';

export class DeleteBuilder extends WhereBuilder {
  constructor(ctx: QueryContext) {
    super(ctx, AstBuilder.create('DELETE', ctx.schema.tableRef()));
  }

  applySpec(spec: DeleteSpec): this {
    return this.whereSpecs(spec.where);
  }

  /**
   * Execute and return affected rows
   */
  async exec(params: Params = {}, options: ExecOptions = {}): Promise<number> {
    const { sql } = this.prepare();
    return executeWrite(this.ctx, 'DELETE', sql, params, options);
  }

  /**
   * Run the delete once per parameter set, in order. Returns total affected rows.
   */
  async execBatch(paramSets: readonly Params[], options: ExecOptions = {}): Promise<number> {
    this.checkReady();
    if (paramSets.length === 0) {
      return 0;
    }
    const { sql } = this.renderQuery();
    return executeBatch(this.ctx, 'DELETE', sql, paramSets, options);
  }

  protected override assertExecutable(): void {
    if (!this.hasWhere) {
      throw new MutationSafetyError('DELETE');
    }
  }
}
