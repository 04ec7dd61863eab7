/**
 * Update Query Builder
 *
 * UPDATE of exactly one row, returning it, or a batch of UPDATEs returning
 * the total affected rows. Refuses to run without a WHERE condition.
 *
 * @example
 * ```typescript
 * const user = await users.modify()
 *   .set('email', 'new_email')
 *   .where('id', '=', 'user_id')
 *   .exec({ new_email: 'ada@example.com', user_id: 1 });
 *
 * // Increment a value
 * await posts.modify()
 *   .setExpr('views', '+', 'increment')
 *   .where('id', '=', 'post_id')
 *   .exec({ increment: 1, post_id: 7 });
 * ```
 */

import { AstBuilder } from '../ast';
import { MutationSafetyError } from '../errors';
import { executeBatch } from '../execution/batch';
import { executeUpdate } from '../execution/mutation';
import { resolveArithmeticOperator } from './operators';
import { WhereBuilder } from './where-builder';

import type { QueryContext } from './query-context';
import type { UpdateSpec } from './query-spec';
import type { RenderedQuery } from '../dialect/sql-dialect';
import type { ExecOptions, Params, Row } from '../types';

export class UpdateBuilder<T = Row> extends WhereBuilder {
  constructor(ctx: QueryContext) {
    super(ctx, AstBuilder.create('UPDATE', ctx.schema.tableRef()).returning(ctx.schema.columns()));
  }

  /**
   * SET field = :param
   */
  set(field: string, param: string): this {
    return this.apply(() => {
      const { schema } = this.ctx;
      this.ast = this.ast.assign({
        field: schema.tryField(field),
        value: { kind: 'param', param: schema.tryParam(param) },
      });
    });
  }

  /**
   * SET field = field <operator> :param, arithmetic operators only
   */
  setExpr(field: string, operator: string, param: string): this {
    return this.apply(() => {
      const { schema } = this.ctx;
      const target = schema.tryField(field);
      this.ast = this.ast.assign({
        field: target,
        value: {
          kind: 'expression',
          field: target,
          operator: resolveArithmeticOperator(operator),
          param: schema.tryParam(param),
        },
      });
    });
  }

  /**
   * Apply a JSON update spec. SET entries are applied in key order.
   */
  applySpec(spec: UpdateSpec): this {
    for (const [field, param] of Object.entries(spec.set)) {
      this.set(field, param);
    }
    return this.whereSpecs(spec.where);
  }

  /**
   * Update exactly one row and return it
   */
  async exec(params: Params = {}, options: ExecOptions = {}): Promise<T> {
    this.checkReady();
    return executeUpdate<T>(this.ctx, this.ast.build(), this.whereNodes, params, options);
  }

  /**
   * Run the update once per parameter set, in order. Returns total affected rows.
   */
  async execBatch(paramSets: readonly Params[], options: ExecOptions = {}): Promise<number> {
    this.checkReady();
    if (paramSets.length === 0) {
      return 0;
    }
    const { sql } = this.ctx.dialect.render({ ...this.ast.build(), returning: [] });
    return executeBatch(this.ctx, 'UPDATE', sql, paramSets, options);
  }

  protected override assertExecutable(): void {
    if (!this.hasWhere) {
      throw new MutationSafetyError('UPDATE');
    }
  }

  /**
   * RETURNING is dropped where the dialect lacks it; exec() reads the row back instead.
   */
  protected override renderQuery(): RenderedQuery {
    const ast = this.ast.build();
    if (this.ctx.dialect.capabilities.updateReturning) {
      return this.ctx.dialect.render(ast);
    }
    return this.ctx.dialect.render({ ...ast, returning: [] });
  }
}
