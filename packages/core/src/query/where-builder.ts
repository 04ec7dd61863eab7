/**
 * Where Builder
 *
 * WHERE chain shared by the select, query, update, delete and aggregate
 * builders. Resolved condition nodes are kept so an update can re-read the
 * rows it changed with the same WHERE.
 *
 * Supports:
 * - Comparison: where('age', '>=', 'min_age')
 * - Grouping: whereAnd(C(...), C(...)), whereOr(C(...), Null(...))
 * - NULL checks: whereNull, whereNotNull
 * - Ranges: whereBetween, whereNotBetween
 * - Column comparison: whereFields('updated_at', '>', 'created_at')
 * - JSON condition specs: whereSpecs([{ field, operator, param }])
 */

import { C, Between, NotBetween, NotNull, Null, resolveCondition } from './condition';
import { resolveConditionOperator } from './operators';
import { resolveConditionSpec } from './query-spec';
import { StatementBuilder } from './statement-builder';

import type { Condition } from './condition';
import type { ConditionSpec } from './query-spec';
import type { ConditionNode } from '../ast';

export abstract class WhereBuilder extends StatementBuilder {
  protected readonly whereNodes: ConditionNode[] = [];

  get hasWhere(): boolean {
    return this.whereNodes.length > 0;
  }

  // ============ WHERE Methods ============

  /**
   * WHERE field <operator> :param
   */
  where(field: string, operator: string, param: string): this {
    return this.whereCondition(C(field, operator, param));
  }

  /**
   * AND-group of conditions. An empty call leaves WHERE unchanged.
   */
  whereAnd(...conditions: Condition[]): this {
    return this.whereGroup('AND', conditions);
  }

  /**
   * OR-group of conditions. An empty call leaves WHERE unchanged.
   */
  whereOr(...conditions: Condition[]): this {
    return this.whereGroup('OR', conditions);
  }

  whereNull(field: string): this {
    return this.whereCondition(Null(field));
  }

  whereNotNull(field: string): this {
    return this.whereCondition(NotNull(field));
  }

  /**
   * WHERE field BETWEEN :low AND :high
   */
  whereBetween(field: string, lowParam: string, highParam: string): this {
    return this.whereCondition(Between(field, lowParam, highParam));
  }

  whereNotBetween(field: string, lowParam: string, highParam: string): this {
    return this.whereCondition(NotBetween(field, lowParam, highParam));
  }

  /**
   * WHERE left <operator> right, comparing two columns
   */
  whereFields(leftField: string, operator: string, rightField: string): this {
    return this.apply(() => {
      const { schema } = this.ctx;
      this.addWhere({
        kind: 'field-compare',
        left: schema.tryField(leftField),
        operator: resolveConditionOperator(operator),
        right: schema.tryField(rightField),
      });
    });
  }

  /**
   * Apply JSON condition specs, including nested AND/OR groups
   */
  whereSpecs(specs: readonly ConditionSpec[]): this {
    return this.apply(() => {
      const nodes = specs.flatMap((spec) => resolveConditionSpec(this.ctx.schema, spec) ?? []);
      nodes.forEach((node) => this.addWhere(node));
    });
  }

  protected addWhere(node: ConditionNode): void {
    this.ast = this.ast.where(node);
    this.whereNodes.push(node);
  }

  private whereCondition(condition: Condition): this {
    return this.apply(() => this.addWhere(resolveCondition(this.ctx.schema, condition)));
  }

  private whereGroup(logic: 'AND' | 'OR', conditions: readonly Condition[]): this {
    if (conditions.length === 0) {
      return this;
    }
    return this.apply(() => {
      const nodes = conditions.map((condition) => resolveCondition(this.ctx.schema, condition));
      this.addWhere({ kind: 'group', logic, conditions: nodes });
    });
  }
}
