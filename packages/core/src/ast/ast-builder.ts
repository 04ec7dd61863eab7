/**
 * AstBuilder
 *
 * Immutable statement tree builder. Every method returns a new builder and
 * leaves the receiver untouched, so a builder can be captured mid-chain and
 * reused (the update fallback re-reads with the WHERE nodes it captured).
 *
 * @example
 * ```typescript
 * const ast = AstBuilder.select(table)
 *   .fields([id, email])
 *   .where({ kind: 'compare', field: age, operator: '>=', param: minAge })
 *   .build();
 * ```
 */

import type { FieldRef, TableRef } from './tokens';
import type {
  Assignment,
  CompoundAst,
  ConditionNode,
  ConflictClause,
  InsertValue,
  LockMode,
  Operation,
  OrderItem,
  Pagination,
  QueryAst,
  SelectExpression,
  SetOperator,
} from './types';

export class AstBuilder {
  private constructor(private readonly ast: QueryAst) {}

  static create(operation: Operation, table: TableRef): AstBuilder {
    return new AstBuilder({
      operation,
      table,
      fields: [],
      expressions: [],
      distinct: false,
      distinctOn: [],
      where: [],
      groupBy: [],
      having: [],
      orderBy: [],
      assignments: [],
      rows: [],
      returning: [],
    });
  }

  static select(table: TableRef): AstBuilder {
    return AstBuilder.create('SELECT', table);
  }

  get operation(): Operation {
    return this.ast.operation;
  }

  fields(fields: readonly FieldRef[]): AstBuilder {
    return this.with({ fields: [...this.ast.fields, ...fields] });
  }

  expression(expression: SelectExpression): AstBuilder {
    return this.with({ expressions: [...this.ast.expressions, expression] });
  }

  distinct(): AstBuilder {
    return this.with({ distinct: true });
  }

  distinctOn(fields: readonly FieldRef[]): AstBuilder {
    return this.with({ distinctOn: [...this.ast.distinctOn, ...fields] });
  }

  where(condition: ConditionNode): AstBuilder {
    return this.with({ where: [...this.ast.where, condition] });
  }

  groupBy(fields: readonly FieldRef[]): AstBuilder {
    return this.with({ groupBy: [...this.ast.groupBy, ...fields] });
  }

  having(condition: ConditionNode): AstBuilder {
    return this.with({ having: [...this.ast.having, condition] });
  }

  orderBy(item: OrderItem): AstBuilder {
    return this.with({ orderBy: [...this.ast.orderBy, item] });
  }

  limit(limit: Pagination): AstBuilder {
    return this.with({ limit });
  }

  offset(offset: Pagination): AstBuilder {
    return this.with({ offset });
  }

  lock(mode: LockMode): AstBuilder {
    return this.with({ lock: mode });
  }

  assign(assignment: Assignment): AstBuilder {
    return this.with({ assignments: [...this.ast.assignments, assignment] });
  }

  values(row: readonly InsertValue[]): AstBuilder {
    return this.with({ rows: [...this.ast.rows, row] });
  }

  conflict(clause: ConflictClause): AstBuilder {
    return this.with({ conflict: clause });
  }

  returning(fields: readonly FieldRef[]): AstBuilder {
    return this.with({ returning: [...fields] });
  }

  build(): QueryAst {
    return this.ast;
  }

  private with(patch: Partial<QueryAst>): AstBuilder {
    return new AstBuilder({ ...this.ast, ...patch });
  }
}

/**
 * Immutable builder for set-operation statements.
 */
export class CompoundAstBuilder {
  private constructor(private readonly ast: CompoundAst) {}

  static from(base: QueryAst): CompoundAstBuilder {
    return new CompoundAstBuilder({ base, operands: [], orderBy: [] });
  }

  add(operator: SetOperator, query: QueryAst): CompoundAstBuilder {
    return this.with({ operands: [...this.ast.operands, { operator, query }] });
  }

  orderBy(item: OrderItem): CompoundAstBuilder {
    return this.with({ orderBy: [...this.ast.orderBy, item] });
  }

  limit(limit: Pagination): CompoundAstBuilder {
    return this.with({ limit });
  }

  offset(offset: Pagination): CompoundAstBuilder {
    return this.with({ offset });
  }

  build(): CompoundAst {
    return this.ast;
  }

  private with(patch: Partial<CompoundAst>): CompoundAstBuilder {
    return new CompoundAstBuilder({ ...this.ast, ...patch });
  }
}
