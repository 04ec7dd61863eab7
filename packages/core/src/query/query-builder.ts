/**
 * Query Builder
 *
 * SELECT returning any number of rows, and the entry point for set
 * operations. Combining two queries yields a CompoundBuilder; further
 * combinators on it apply left to right.
 *
 * @example
 * ```typescript
 * const rows = await users.query()
 *   .where('age', '>=', 'min_age')
 *   .union(users.query().whereNull('email'))
 *   .orderBy('id', 'asc')
 *   .exec({ q0_min_age: 18 });
 * ```
 */

import { AstBuilder } from '../ast';
import { executeMany } from '../execution/run';
import { CompoundBuilder } from './compound-builder';
import { SelectChain } from './select-chain';

import type { QueryContext } from './query-context';
import type { QueryAst, SetOperator } from '../ast';
import type { KeyqlError } from '../errors';
import type { ExecOptions, Params, Row } from '../types';

export type OperandOutcome = { ok: true; ast: QueryAst } | { ok: false; error: KeyqlError };

export class QueryBuilder<T = Row> extends SelectChain {
  constructor(ctx: QueryContext) {
    super(ctx, AstBuilder.select(ctx.schema.tableRef()));
  }

  /**
   * Execute and return every matching row
   */
  async exec(params: Params = {}, options: ExecOptions = {}): Promise<T[]> {
    const { sql } = this.prepare();
    return executeMany<T>(this.ctx, 'SELECT', sql, params, options);
  }

  // ============ Set Operations ============

  union(other: QueryBuilder<T>): CompoundBuilder<T> {
    return this.combine('UNION', other);
  }

  unionAll(other: QueryBuilder<T>): CompoundBuilder<T> {
    return this.combine('UNION ALL', other);
  }

  intersect(other: QueryBuilder<T>): CompoundBuilder<T> {
    return this.combine('INTERSECT', other);
  }

  intersectAll(other: QueryBuilder<T>): CompoundBuilder<T> {
    return this.combine('INTERSECT ALL', other);
  }

  except(other: QueryBuilder<T>): CompoundBuilder<T> {
    return this.combine('EXCEPT', other);
  }

  exceptAll(other: QueryBuilder<T>): CompoundBuilder<T> {
    return this.combine('EXCEPT ALL', other);
  }

  /**
   * The statement tree as a set-operation operand, or the stored error
   */
  operand(): OperandOutcome {
    return this.error ? { ok: false, error: this.error } : { ok: true, ast: this.ast.build() };
  }

  private combine(operator: SetOperator, other: QueryBuilder<T>): CompoundBuilder<T> {
    return CompoundBuilder.from<T>(this.ctx, this.operand()).add(operator, other);
  }
}
