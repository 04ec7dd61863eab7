/**
 * Aggregate Builder
 *
 * COUNT(*), SUM, AVG, MIN and MAX over the rows matching the WHERE chain,
 * returned as a number. SQL NULL (nothing to aggregate) yields 0; numeric
 * strings, as drivers return DECIMAL and BIGINT, are converted with Number().
 *
 * @example
 * ```typescript
 * const adults = await users.count().where('age', '>=', 'min_age').exec({ min_age: 18 });
 * const average = await users.avg('age').exec();
 * ```
 */

import { AstBuilder } from '../ast';
import { CardinalityError, QueryError } from '../errors';
import { observe } from '../execution/run';
import { WhereBuilder } from './where-builder';

import type { QueryContext } from './query-context';
import type { AggregateSpec } from './query-spec';
import type { ExecOptions, Params, Row } from '../types';

export type AggregateKind = 'COUNT' | 'SUM' | 'AVG' | 'MIN' | 'MAX';

const RESULT_ALIAS = 'result';

export class AggregateBuilder extends WhereBuilder {
  /**
   * `field` is ignored for COUNT, which always counts rows
   */
  constructor(
    ctx: QueryContext,
    readonly func: AggregateKind,
    readonly field = '',
  ) {
    super(ctx, AstBuilder.select(ctx.schema.tableRef()));

    this.apply(() => {
      const target = func === 'COUNT' ? undefined : ctx.schema.tryField(field);
      this.ast = this.ast.expression({ kind: 'aggregate', func, field: target, alias: RESULT_ALIAS });
    });
  }

  applySpec(spec: AggregateSpec): this {
    return spec.where ? this.whereSpecs(spec.where) : this;
  }

  /**
   * Execute and return the aggregate value
   */
  async exec(params: Params = {}, options: ExecOptions = {}): Promise<number> {
    const { sql } = this.prepare();
    const field = this.func === 'COUNT' ? undefined : this.field;

    return observe(
      this.ctx,
      { operation: this.func, sql, field },
      async () => {
        const { rows } = await this.ctx.query<Row>(this.func, sql, params, options);
        const [row] = rows;
        if (!row) {
          throw new CardinalityError(`${this.func} query returned no rows`, this.func, 'none');
        }
        return toNumber(row[RESULT_ALIAS], this.func);
      },
      (resultValue) => ({ resultValue }),
    );
  }
}

function toNumber(value: unknown, func: AggregateKind): number {
  if (value === null || value === undefined) {
    return 0;
  }
  const result = typeof value === 'number' ? value : Number(value);
  if (Number.isNaN(result)) {
    throw new QueryError(`${func} returned a non-numeric value: ${String(value)}`, func);
  }
  return result;
}
