/**
 * Compound Builder
 *
 * Set operations over SELECT-many queries. Operand i has its parameters
 * renamed q{i}_name at render time, so callers supply `q0_status`,
 * `q1_status`, ... The trailing ORDER BY / LIMIT / OFFSET apply to the
 * combined result and keep plain names. Operand trees are never mutated.
 */

import { CompoundAstBuilder } from '../ast';
import { ConditionError, KeyqlError } from '../errors';
import { executeMany } from '../execution/run';
import {
  resolveCount,
  resolveDirection,
  resolveNulls,
  resolveOperator,
  resolveSetOperation,
} from './operators';

import type { QueryBuilder, OperandOutcome } from './query-builder';
import type { QueryContext } from './query-context';
import type { RenderOutcome } from './statement-builder';
import type { QueryAst, SetOperator } from '../ast';
import type { RenderedQuery } from '../dialect/sql-dialect';
import type { ExecOptions, Params, Row } from '../types';

export class CompoundBuilder<T = Row> {
  private error?: KeyqlError;

  private constructor(
    private readonly ctx: QueryContext,
    private ast?: CompoundAstBuilder,
  ) {}

  static from<T>(ctx: QueryContext, base: OperandOutcome): CompoundBuilder<T> {
    const builder = new CompoundBuilder<T>(ctx, base.ok ? CompoundAstBuilder.from(base.ast) : undefined);
    if (!base.ok) {
      builder.error = base.error;
    }
    return builder;
  }

  // ============ Set Operations ============

  union(other: QueryBuilder<T>): this {
    return this.add('UNION', other);
  }

  unionAll(other: QueryBuilder<T>): this {
    return this.add('UNION ALL', other);
  }

  intersect(other: QueryBuilder<T>): this {
    return this.add('INTERSECT', other);
  }

  intersectAll(other: QueryBuilder<T>): this {
    return this.add('INTERSECT ALL', other);
  }

  except(other: QueryBuilder<T>): this {
    return this.add('EXCEPT', other);
  }

  exceptAll(other: QueryBuilder<T>): this {
    return this.add('EXCEPT ALL', other);
  }

  /**
   * Add an operand by operation name: union, union_all, intersect, ...
   */
  combine(operation: string, other: QueryBuilder<T>): this {
    return this.step((ast) => ast.add(resolveSetOperation(operation), requireOperand(other)));
  }

  add(operator: SetOperator, other: QueryBuilder<T>): this {
    return this.step((ast) => ast.add(operator, requireOperand(other)));
  }

  // ============ Final Stage ============

  orderBy(field: string, direction: string): this {
    return this.step((ast) =>
      ast.orderBy({
        kind: 'field',
        field: this.ctx.schema.tryField(field),
        direction: resolveDirection(direction),
      }),
    );
  }

  orderByNulls(field: string, direction: string, nulls: string): this {
    return this.step((ast) =>
      ast.orderBy({
        kind: 'field',
        field: this.ctx.schema.tryField(field),
        direction: resolveDirection(direction),
        nulls: resolveNulls(nulls),
      }),
    );
  }

  /**
   * ORDER BY field <operator> :param over the combined result
   */
  orderByExpr(field: string, operator: string, param: string, direction: string): this {
    return this.step((ast) =>
      ast.orderBy({
        kind: 'expression',
        field: this.ctx.schema.tryField(field),
        operator: resolveOperator(operator),
        param: this.ctx.schema.tryParam(param),
        direction: resolveDirection(direction),
      }),
    );
  }

  limit(n: number): this {
    return this.step((ast) => ast.limit({ kind: 'literal', value: resolveCount('limit', n) }));
  }

  limitParam(param: string): this {
    return this.step((ast) => ast.limit({ kind: 'param', param: this.ctx.schema.tryParam(param) }));
  }

  offset(n: number): this {
    return this.step((ast) => ast.offset({ kind: 'literal', value: resolveCount('offset', n) }));
  }

  offsetParam(param: string): this {
    return this.step((ast) => ast.offset({ kind: 'param', param: this.ctx.schema.tryParam(param) }));
  }

  // ============ Rendering & Execution ============

  render(): RenderOutcome {
    try {
      return { ok: true, query: this.renderQuery() };
    } catch (error) {
      if (error instanceof KeyqlError) {
        return { ok: false, error };
      }
      throw error;
    }
  }

  mustRender(): RenderedQuery {
    const outcome = this.render();
    if (!outcome.ok) {
      throw outcome.error;
    }
    return outcome.query;
  }

  async exec(params: Params = {}, options: ExecOptions = {}): Promise<T[]> {
    const { sql } = this.renderQuery();
    return executeMany<T>(this.ctx, 'COMPOUND', sql, params, options);
  }

  private renderQuery(): RenderedQuery {
    if (this.error) {
      throw this.error;
    }
    const compound = this.ast?.build();
    if (!compound || compound.operands.length === 0) {
      throw new ConditionError('compound query requires at least one set operation');
    }
    return this.ctx.dialect.renderCompound(compound);
  }

  private step(fn: (ast: CompoundAstBuilder) => CompoundAstBuilder): this {
    if (this.error || !this.ast) {
      return this;
    }
    try {
      this.ast = fn(this.ast);
    } catch (error) {
      if (!(error instanceof KeyqlError)) {
        throw error;
      }
      this.error = error;
    }
    return this;
  }
}

function requireOperand<T>(other: QueryBuilder<T>): QueryAst {
  const outcome = other.operand();
  if (!outcome.ok) {
    throw outcome.error;
  }
  return outcome.ast;
}

