/**
 * Select Chain
 *
 * Chain shared by SelectBuilder (one row) and QueryBuilder (many rows):
 * projection, derived columns, ordering, pagination, grouping, locking,
 * CASE and window expressions.
 *
 * @example
 * ```typescript
 * const top = await users.query()
 *   .fields('id', 'email')
 *   .selectUpper('email', 'email_upper')
 *   .where('age', '>=', 'min_age')
 *   .orderByNulls('last_login', 'desc', 'last')
 *   .limit(10)
 *   .exec({ min_age: 18 });
 * ```
 */

import { ValidationError } from '../errors';
import { CaseBuilder } from './case-builder';
import { C, resolveCondition } from './condition';
import {
  resolveAggregate,
  resolveCastType,
  resolveConditionOperator,
  resolveCount,
  resolveDirection,
  resolveLock,
  resolveNulls,
  resolveOperator,
} from './operators';
import { resolveConditionSpec } from './query-spec';
import { WhereBuilder } from './where-builder';
import { WindowBuilder } from './window-builder';

import type { ExpressionOutcome } from './case-builder';
import type { Condition } from './condition';
import type { OrderBySpec, QuerySpec } from './query-spec';
import type {
  AggregateFunction,
  DateKeyword,
  FieldRef,
  LockMode,
  Operand,
  ParamRef,
  ScalarFunction,
  SelectExpression,
  WindowFunction,
} from '../ast';

export abstract class SelectChain extends WhereBuilder {
  // ============ Projection ============

  fields(...names: string[]): this {
    return this.apply(() => {
      this.ast = this.ast.fields(names.map((name) => this.field(name)));
    });
  }

  distinct(): this {
    return this.apply(() => {
      this.ast = this.ast.distinct();
    });
  }

  /**
   * DISTINCT ON (fields), PostgreSQL only
   */
  distinctOn(...fields: string[]): this {
    return this.apply(() => {
      this.ast = this.ast.distinctOn(fields.map((name) => this.field(name)));
    });
  }

  // ============ Ordering ============

  orderBy(field: string, direction: string): this {
    return this.apply(() => {
      const resolved = resolveDirection(direction);
      this.ast = this.ast.orderBy({ kind: 'field', field: this.field(field), direction: resolved });
    });
  }

  /**
   * ORDER BY field direction NULLS FIRST|LAST
   */
  orderByNulls(field: string, direction: string, nulls: string): this {
    return this.apply(() => {
      const resolved = resolveDirection(direction);
      this.ast = this.ast.orderBy({
        kind: 'field',
        field: this.field(field),
        direction: resolved,
        nulls: resolveNulls(nulls),
      });
    });
  }

  /**
   * ORDER BY field <operator> :param direction, e.g. vector distance
   * `embedding <-> :query_vec`
   */
  orderByExpr(field: string, operator: string, param: string, direction: string): this {
    return this.apply(() => {
      this.ast = this.ast.orderBy({
        kind: 'expression',
        field: this.field(field),
        operator: resolveOperator(operator),
        param: this.param(param),
        direction: resolveDirection(direction),
      });
    });
  }

  // ============ Pagination ============

  limit(n: number): this {
    return this.apply(() => {
      this.ast = this.ast.limit({ kind: 'literal', value: resolveCount('limit', n) });
    });
  }

  limitParam(param: string): this {
    return this.apply(() => {
      this.ast = this.ast.limit({ kind: 'param', param: this.param(param) });
    });
  }

  offset(n: number): this {
    return this.apply(() => {
      this.ast = this.ast.offset({ kind: 'literal', value: resolveCount('offset', n) });
    });
  }

  offsetParam(param: string): this {
    return this.apply(() => {
      this.ast = this.ast.offset({ kind: 'param', param: this.param(param) });
    });
  }

  // ============ Grouping ============

  groupBy(...fields: string[]): this {
    return this.apply(() => {
      this.ast = this.ast.groupBy(fields.map((name) => this.field(name)));
    });
  }

  /**
   * HAVING field <operator> :param
   */
  having(field: string, operator: string, param: string): this {
    return this.apply(() => {
      this.ast = this.ast.having(resolveCondition(this.ctx.schema, C(field, operator, param)));
    });
  }

  /**
   * HAVING FUNC(field) <operator> :param. An empty field means COUNT(*).
   */
  havingAgg(func: string, field: string, operator: string, param: string): this {
    return this.apply(() => {
      const aggregate = resolveAggregate(func);
      this.ast = this.ast.having({
        kind: 'aggregate',
        func: aggregate,
        field: this.aggregateField(aggregate, func, field),
        operator: resolveConditionOperator(operator),
        param: this.param(param),
      });
    });
  }

  // ============ Locking ============

  forUpdate(): this {
    return this.lock('UPDATE');
  }

  forNoKeyUpdate(): this {
    return this.lock('NO KEY UPDATE');
  }

  forShare(): this {
    return this.lock('SHARE');
  }

  forKeyShare(): this {
    return this.lock('KEY SHARE');
  }

  // ============ String Functions ============

  selectUpper(field: string, alias = ''): this {
    return this.scalar('UPPER', field, alias);
  }

  selectLower(field: string, alias = ''): this {
    return this.scalar('LOWER', field, alias);
  }

  selectLength(field: string, alias = ''): this {
    return this.scalar('LENGTH', field, alias);
  }

  selectTrim(field: string, alias = ''): this {
    return this.scalar('TRIM', field, alias);
  }

  selectLTrim(field: string, alias = ''): this {
    return this.scalar('LTRIM', field, alias);
  }

  selectRTrim(field: string, alias = ''): this {
    return this.scalar('RTRIM', field, alias);
  }

  /**
   * SUBSTRING(field, :start, :length)
   */
  selectSubstring(field: string, startParam: string, lengthParam: string, alias = ''): this {
    return this.addExpression(() => ({
      kind: 'function',
      name: 'SUBSTRING',
      args: [this.field(field), this.param(startParam), this.param(lengthParam)],
      alias: this.aliasOf(alias),
    }));
  }

  /**
   * REPLACE(field, :search, :replacement)
   */
  selectReplace(field: string, searchParam: string, replacementParam: string, alias = ''): this {
    return this.addExpression(() => ({
      kind: 'function',
      name: 'REPLACE',
      args: [this.field(field), this.param(searchParam), this.param(replacementParam)],
      alias: this.aliasOf(alias),
    }));
  }

  /**
   * CONCAT of two or more fields
   */
  selectConcat(alias: string, ...fields: string[]): this {
    return this.addExpression(() => {
      if (fields.length < 2) {
        throw new ValidationError('arguments', 'CONCAT', 'CONCAT requires at least 2 fields');
      }
      return {
        kind: 'function',
        name: 'CONCAT',
        args: fields.map((name) => this.field(name)),
        alias: this.aliasOf(alias),
      };
    });
  }

  // ============ Math Functions ============

  selectAbs(field: string, alias = ''): this {
    return this.scalar('ABS', field, alias);
  }

  selectCeil(field: string, alias = ''): this {
    return this.scalar('CEIL', field, alias);
  }

  selectFloor(field: string, alias = ''): this {
    return this.scalar('FLOOR', field, alias);
  }

  selectRound(field: string, alias = ''): this {
    return this.scalar('ROUND', field, alias);
  }

  selectSqrt(field: string, alias = ''): this {
    return this.scalar('SQRT', field, alias);
  }

  /**
   * POWER(field, :exponent)
   */
  selectPower(field: string, exponentParam: string, alias = ''): this {
    return this.addExpression(() => ({
      kind: 'function',
      name: 'POWER',
      args: [this.field(field), this.param(exponentParam)],
      alias: this.aliasOf(alias),
    }));
  }

  /**
   * field <operator> :param, e.g. `price * :rate`
   */
  selectExpr(field: string, operator: string, param: string, alias = ''): this {
    return this.addExpression(() => ({
      kind: 'binary',
      field: this.field(field),
      operator: resolveOperator(operator),
      param: this.param(param),
      alias: this.aliasOf(alias),
    }));
  }

  // ============ NULL Functions ============

  /**
   * COALESCE of two or more params
   */
  selectCoalesce(alias: string, ...params: string[]): this {
    return this.addExpression(() => {
      if (params.length < 2) {
        throw new ValidationError(
          'arguments',
          'COALESCE',
          `COALESCE requires at least 2 parameters, got ${params.length}`,
        );
      }
      return {
        kind: 'function',
        name: 'COALESCE',
        args: params.map((name) => this.param(name)),
        alias: this.aliasOf(alias),
      };
    });
  }

  selectNullIf(param1: string, param2: string, alias = ''): this {
    return this.addExpression(() => ({
      kind: 'function',
      name: 'NULLIF',
      args: [this.param(param1), this.param(param2)],
      alias: this.aliasOf(alias),
    }));
  }

  // ============ Casts & Dates ============

  /**
   * CAST(field AS type); type is one of the CastType names, case-insensitive
   */
  selectCast(field: string, castType: string, alias = ''): this {
    return this.addExpression(() => ({
      kind: 'cast',
      field: this.field(field),
      type: resolveCastType(castType),
      alias: this.aliasOf(alias),
    }));
  }

  selectNow(alias = ''): this {
    return this.keyword('NOW', alias);
  }

  selectCurrentDate(alias = ''): this {
    return this.keyword('CURRENT_DATE', alias);
  }

  selectCurrentTime(alias = ''): this {
    return this.keyword('CURRENT_TIME', alias);
  }

  selectCurrentTimestamp(alias = ''): this {
    return this.keyword('CURRENT_TIMESTAMP', alias);
  }

  // ============ Aggregates ============

  selectCountStar(alias = ''): this {
    return this.addExpression(() => ({ kind: 'aggregate', func: 'COUNT', alias: this.aliasOf(alias) }));
  }

  selectCount(field: string, alias = ''): this {
    return this.aggregate('COUNT', field, alias);
  }

  selectCountDistinct(field: string, alias = ''): this {
    return this.aggregate('COUNT_DISTINCT', field, alias);
  }

  selectSum(field: string, alias = ''): this {
    return this.aggregate('SUM', field, alias);
  }

  selectAvg(field: string, alias = ''): this {
    return this.aggregate('AVG', field, alias);
  }

  selectMin(field: string, alias = ''): this {
    return this.aggregate('MIN', field, alias);
  }

  selectMax(field: string, alias = ''): this {
    return this.aggregate('MAX', field, alias);
  }

  /**
   * SUM(field) FILTER (WHERE condField <condOp> :condParam)
   */
  selectSumFilter(field: string, condField: string, condOp: string, condParam: string, alias = ''): this {
    return this.filtered('SUM', field, C(condField, condOp, condParam), alias);
  }

  selectAvgFilter(field: string, condField: string, condOp: string, condParam: string, alias = ''): this {
    return this.filtered('AVG', field, C(condField, condOp, condParam), alias);
  }

  selectMinFilter(field: string, condField: string, condOp: string, condParam: string, alias = ''): this {
    return this.filtered('MIN', field, C(condField, condOp, condParam), alias);
  }

  selectMaxFilter(field: string, condField: string, condOp: string, condParam: string, alias = ''): this {
    return this.filtered('MAX', field, C(condField, condOp, condParam), alias);
  }

  selectCountFilter(field: string, condField: string, condOp: string, condParam: string, alias = ''): this {
    return this.filtered('COUNT', field, C(condField, condOp, condParam), alias);
  }

  selectCountDistinctFilter(
    field: string,
    condField: string,
    condOp: string,
    condParam: string,
    alias = '',
  ): this {
    return this.filtered('COUNT_DISTINCT', field, C(condField, condOp, condParam), alias);
  }

  // ============ CASE ============

  selectCase(): CaseBuilder<this> {
    return new CaseBuilder(this.ctx.schema, (outcome) => this.attach(outcome));
  }

  // ============ Window Functions ============

  selectRowNumber(): WindowBuilder<this> {
    return this.window('ROW_NUMBER', () => []);
  }

  selectRank(): WindowBuilder<this> {
    return this.window('RANK', () => []);
  }

  selectDenseRank(): WindowBuilder<this> {
    return this.window('DENSE_RANK', () => []);
  }

  selectNtile(nParam: string): WindowBuilder<this> {
    return this.window('NTILE', () => [this.param(nParam)]);
  }

  selectLag(field: string, offsetParam: string): WindowBuilder<this> {
    return this.window('LAG', () => [this.field(field), this.param(offsetParam)]);
  }

  selectLead(field: string, offsetParam: string): WindowBuilder<this> {
    return this.window('LEAD', () => [this.field(field), this.param(offsetParam)]);
  }

  selectFirstValue(field: string): WindowBuilder<this> {
    return this.window('FIRST_VALUE', () => [this.field(field)]);
  }

  selectLastValue(field: string): WindowBuilder<this> {
    return this.window('LAST_VALUE', () => [this.field(field)]);
  }

  selectSumOver(field: string): WindowBuilder<this> {
    return this.window('SUM', () => [this.field(field)]);
  }

  selectAvgOver(field: string): WindowBuilder<this> {
    return this.window('AVG', () => [this.field(field)]);
  }

  /**
   * COUNT(*) OVER (...)
   */
  selectCountOver(): WindowBuilder<this> {
    return this.window('COUNT', () => []);
  }

  selectMinOver(field: string): WindowBuilder<this> {
    return this.window('MIN', () => [this.field(field)]);
  }

  selectMaxOver(field: string): WindowBuilder<this> {
    return this.window('MAX', () => [this.field(field)]);
  }

  // ============ Specs ============

  /**
   * Apply a JSON query spec to this chain
   */
  applySpec(spec: QuerySpec): this {
    if (spec.fields && spec.fields.length > 0) {
      this.fields(...spec.fields);
    }
    if (spec.where) {
      this.whereSpecs(spec.where);
    }
    for (const order of spec.order_by ?? []) {
      this.applyOrderSpec(order);
    }
    if (spec.group_by && spec.group_by.length > 0) {
      this.groupBy(...spec.group_by);
    }
    for (const having of spec.having ?? []) {
      this.apply(() => {
        const node = resolveConditionSpec(this.ctx.schema, having);
        if (node) {
          this.ast = this.ast.having(node);
        }
      });
    }
    for (const agg of spec.having_agg ?? []) {
      this.havingAgg(agg.func, agg.field ?? '', agg.operator, agg.param);
    }
    if (spec.limit !== undefined) {
      this.limit(spec.limit);
    }
    if (spec.offset !== undefined) {
      this.offset(spec.offset);
    }
    if (spec.distinct) {
      this.distinct();
    }
    if (spec.distinct_on && spec.distinct_on.length > 0) {
      this.distinctOn(...spec.distinct_on);
    }
    if (spec.for_locking) {
      const mode = spec.for_locking;
      this.apply(() => {
        this.ast = this.ast.lock(resolveLock(mode));
      });
    }
    return this;
  }

  // ============ Internals ============

  protected field(name: string): FieldRef {
    return this.ctx.schema.tryField(name);
  }

  protected param(name: string): ParamRef {
    return this.ctx.schema.tryParam(name);
  }

  private aliasOf(alias: string): string {
    return alias === '' ? '' : this.ctx.schema.tryAlias(alias);
  }

  private applyOrderSpec(order: OrderBySpec): void {
    if (order.operator && order.param) {
      this.orderByExpr(order.field, order.operator, order.param, order.direction);
    } else if (order.nulls) {
      this.orderByNulls(order.field, order.direction, order.nulls);
    } else {
      this.orderBy(order.field, order.direction);
    }
  }

  private lock(mode: LockMode): this {
    return this.apply(() => {
      this.ast = this.ast.lock(mode);
    });
  }

  private addExpression(build: () => SelectExpression): this {
    return this.apply(() => {
      this.ast = this.ast.expression(build());
    });
  }

  private attach(outcome: ExpressionOutcome): this {
    if ('error' in outcome) {
      return this.fail(outcome.error);
    }
    return this.addExpression(() => outcome.expression);
  }

  private scalar(name: ScalarFunction, field: string, alias: string): this {
    return this.addExpression(() => ({
      kind: 'function',
      name,
      args: [this.field(field)],
      alias: this.aliasOf(alias),
    }));
  }

  private keyword(keyword: DateKeyword, alias: string): this {
    return this.addExpression(() => ({ kind: 'keyword', keyword, alias: this.aliasOf(alias) }));
  }

  private aggregate(func: AggregateFunction, field: string, alias: string): this {
    return this.addExpression(() => ({
      kind: 'aggregate',
      func,
      field: this.field(field),
      alias: this.aliasOf(alias),
    }));
  }

  private filtered(
    func: AggregateFunction,
    field: string,
    condition: Condition,
    alias: string,
  ): this {
    return this.addExpression(() => ({
      kind: 'aggregate',
      func,
      field: this.field(field),
      filter: resolveCondition(this.ctx.schema, condition),
      alias: this.aliasOf(alias),
    }));
  }

  private window(func: WindowFunction, resolveArgs: () => Operand[]): WindowBuilder<this> {
    return new WindowBuilder(this.ctx.schema, func, resolveArgs, (outcome) => this.attach(outcome));
  }

  private aggregateField(aggregate: AggregateFunction, func: string, field: string): FieldRef | undefined {
    if (field !== '') {
      return this.field(field);
    }
    if (aggregate !== 'COUNT') {
      throw new ValidationError('aggregate', func, `invalid aggregate "${func}": ${aggregate} requires a field`);
    }
    return undefined;
  }
}
