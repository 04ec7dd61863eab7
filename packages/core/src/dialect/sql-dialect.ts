/**
 * SQL Dialect Base Class
 *
 * Renders statement trees to SQL with named `:param` placeholders, then binds
 * named values to the dialect's positional placeholder syntax. Subclasses
 * override identifier quoting, placeholders, and the clauses whose syntax
 * differs between databases.
 */

import { ParamRef } from '../ast/tokens';
import { COMPOUND_PARAM_PREFIX } from '../constants';
import { MissingParameterError, RenderError } from '../errors';

import type {
  AggregateFunction,
  Assignment,
  CastType,
  CompoundAst,
  ConditionNode,
  DateKeyword,
  LockMode,
  Operand,
  OrderItem,
  Pagination,
  QueryAst,
  SelectExpression,
  SqlOperator,
  WindowExpression,
} from '../ast';
import type { Params } from '../types';

export interface DialectConfig {
  /** Character used to escape identifiers (e.g., ` for MySQL, " for PostgreSQL) */
  identifierQuote: string;
  /** Repeated named parameters share one positional slot ($1 reused) */
  reuseRepeatedParameters: boolean;
  /** Date/time keyword rendering */
  dateFunctions: Record<DateKeyword, string>;
  /** CAST target type names; a missing entry is unsupported */
  castTypes: Partial<Record<CastType, string>>;
}

export interface DialectCapabilities {
  insertReturning: boolean;
  updateReturning: boolean;
  deleteReturning: boolean;
  distinctOn: boolean;
  nullsOrdering: boolean;
  aggregateFilter: boolean;
  operators: ReadonlySet<SqlOperator>;
  lockModes: ReadonlySet<LockMode>;
}

export interface RenderedQuery {
  sql: string;
  /** Unique parameter names in order of first appearance */
  requiredParams: string[];
}

export interface BoundStatement {
  sql: string;
  values: unknown[];
}

export type ParamMapper = (name: string) => string;

const identity: ParamMapper = (name) => name;

const NAMED_PARAMETER = /(?<![:\w]):([A-Za-z_]\w*)/g;

export class RenderState {
  constructor(
    private readonly mapParam: ParamMapper,
    private readonly seen: Set<string> = new Set(),
  ) {}

  param(ref: ParamRef): string {
    const name = this.mapParam(ref.name);
    this.seen.add(name);
    return `:${name}`;
  }

  withMapper(mapParam: ParamMapper): RenderState {
    return new RenderState(mapParam, this.seen);
  }

  required(): string[] {
    return [...this.seen];
  }
}

export abstract class SQLDialect {
  abstract readonly name: string;
  abstract readonly config: DialectConfig;
  abstract readonly capabilities: DialectCapabilities;

  /**
   * Positional placeholder for the 1-based value position
   * MySQL: ?
   * PostgreSQL: $1, $2, $3...
   */
  abstract getParameterPlaceholder(position: number): string;

  /**
   * Escape an identifier (table name, column name)
   */
  escapeIdentifier(identifier: string): string {
    const quote = this.config.identifierQuote;
    // Handle schema.table format
    if (identifier.includes('.')) {
      return identifier
        .split('.')
        .map((part) => `${quote}${part}${quote}`)
        .join('.');
    }
    return `${quote}${identifier}${quote}`;
  }

  /**
   * Render a statement. `mapParam` renames every parameter reference.
   */
  render(ast: QueryAst, mapParam: ParamMapper = identity): RenderedQuery {
    const state = new RenderState(mapParam);
    const sql = this.renderStatement(ast, state);
    return { sql, requiredParams: state.required() };
  }

  /**
   * Render a set-operation statement. Operand i has its parameters renamed
   * to q{i}_name; the trailing ORDER BY / LIMIT / OFFSET keep plain names.
   */
  renderCompound(compound: CompoundAst, prefix: string = COMPOUND_PARAM_PREFIX): RenderedQuery {
    const state = new RenderState(identity);
    const parts: string[] = [];

    const queries = [compound.base, ...compound.operands.map((operand) => operand.query)];
    queries.forEach((query, index) => {
      if (query.operation !== 'SELECT') {
        throw new RenderError(`set operations require SELECT operands, got ${query.operation}`, this.name);
      }
      const operandState = state.withMapper((name) => `${prefix}${index}_${name}`);
      const sql = `(${this.renderSelect(query, operandState)})`;
      const operator = index === 0 ? undefined : compound.operands[index - 1]?.operator;
      parts.push(operator ? `${operator} ${sql}` : sql);
    });

    this.appendOrderBy(parts, compound.orderBy, state);
    this.appendLimitOffset(parts, state, compound.limit, compound.offset);

    return { sql: parts.join(' '), requiredParams: state.required() };
  }

  /**
   * Replace named placeholders with positional ones and collect values in order.
   */
  bindParameters(sql: string, params: Params): BoundStatement {
    const values: unknown[] = [];
    const positions = new Map<string, number>();

    const text = sql.replace(NAMED_PARAMETER, (_match, name: string) => {
      const value = params[name];
      if (value === undefined) {
        throw new MissingParameterError(name);
      }

      if (this.config.reuseRepeatedParameters) {
        const existing = positions.get(name);
        if (existing !== undefined) {
          return this.getParameterPlaceholder(existing);
        }
      }

      values.push(value);
      positions.set(name, values.length);
      return this.getParameterPlaceholder(values.length);
    });

    return { sql: text, values };
  }

  // ============ Statements ============

  protected renderStatement(ast: QueryAst, state: RenderState): string {
    switch (ast.operation) {
      case 'SELECT': {
        return this.renderSelect(ast, state);
      }
      case 'INSERT': {
        return this.renderInsert(ast, state);
      }
      case 'UPDATE': {
        return this.renderUpdate(ast, state);
      }
      case 'DELETE': {
        return this.renderDelete(ast, state);
      }
    }
  }

  protected renderSelect(ast: QueryAst, state: RenderState): string {
    const parts: string[] = ['SELECT'];

    if (ast.distinctOn.length > 0) {
      this.requireCapability(this.capabilities.distinctOn, 'DISTINCT ON');
      parts.push(`DISTINCT ON (${this.renderFieldList(ast.distinctOn)})`);
    } else if (ast.distinct) {
      parts.push('DISTINCT');
    }

    const projection = [
      ...ast.fields.map((field) => this.escapeIdentifier(field.name)),
      ...ast.expressions.map((expression) => this.renderExpression(expression, state)),
    ];
    parts.push(projection.length > 0 ? projection.join(', ') : '*');

    parts.push('FROM', this.escapeIdentifier(ast.table.name));

    this.appendWhere(parts, ast.where, state);

    if (ast.groupBy.length > 0) {
      parts.push('GROUP BY', this.renderFieldList(ast.groupBy));
    }

    if (ast.having.length > 0) {
      parts.push('HAVING', this.renderConditionList(ast.having, state));
    }

    this.appendOrderBy(parts, ast.orderBy, state);
    this.appendLimitOffset(parts, state, ast.limit, ast.offset);

    if (ast.lock) {
      this.requireCapability(this.capabilities.lockModes.has(ast.lock), `FOR ${ast.lock}`);
      parts.push(`FOR ${ast.lock}`);
    }

    return parts.join(' ');
  }

  protected renderInsert(ast: QueryAst, state: RenderState): string {
    const [first] = ast.rows;
    if (!first || first.length === 0) {
      throw new RenderError('INSERT requires at least one row of values', this.name);
    }

    const parts: string[] = [this.insertKeyword(ast), this.escapeIdentifier(ast.table.name)];
    parts.push(`(${this.renderFieldList(first.map((value) => value.field))})`, 'VALUES');
    parts.push(
      ast.rows
        .map((row) => `(${row.map((value) => state.param(value.param)).join(', ')})`)
        .join(', '),
    );

    this.appendConflict(parts, ast, state);
    this.appendReturning(parts, ast, this.capabilities.insertReturning);

    return parts.join(' ');
  }

  protected renderUpdate(ast: QueryAst, state: RenderState): string {
    if (ast.assignments.length === 0) {
      throw new RenderError('UPDATE requires at least one SET clause', this.name);
    }

    const parts: string[] = ['UPDATE', this.escapeIdentifier(ast.table.name), 'SET'];
    parts.push(this.renderAssignments(ast.assignments, state));
    this.appendWhere(parts, ast.where, state);
    this.appendReturning(parts, ast, this.capabilities.updateReturning);

    return parts.join(' ');
  }

  protected renderDelete(ast: QueryAst, state: RenderState): string {
    const parts: string[] = ['DELETE FROM', this.escapeIdentifier(ast.table.name)];
    this.appendWhere(parts, ast.where, state);
    this.appendReturning(parts, ast, this.capabilities.deleteReturning);

    return parts.join(' ');
  }

  protected insertKeyword(_ast: QueryAst): string {
    return 'INSERT INTO';
  }

  /**
   * Append the dialect's conflict clause (ON CONFLICT / ON DUPLICATE KEY)
   */
  protected abstract appendConflict(parts: string[], ast: QueryAst, state: RenderState): void;

  protected renderAssignments(assignments: readonly Assignment[], state: RenderState): string {
    return assignments
      .map(({ field, value }) => {
        const target = this.escapeIdentifier(field.name);
        if (value.kind === 'param') {
          return `${target} = ${state.param(value.param)}`;
        }
        const source = this.escapeIdentifier(value.field.name);
        return `${target} = ${this.renderOperation(source, value.operator, state.param(value.param))}`;
      })
      .join(', ');
  }

  // ============ Conditions ============

  protected renderConditionList(conditions: readonly ConditionNode[], state: RenderState): string {
    return conditions.map((condition) => this.renderCondition(condition, state)).join(' AND ');
  }

  protected renderCondition(node: ConditionNode, state: RenderState): string {
    switch (node.kind) {
      case 'compare': {
        return this.renderOperation(
          this.escapeIdentifier(node.field.name),
          node.operator,
          state.param(node.param),
        );
      }
      case 'field-compare': {
        return this.renderOperation(
          this.escapeIdentifier(node.left.name),
          node.operator,
          this.escapeIdentifier(node.right.name),
        );
      }
      case 'null': {
        return `${this.escapeIdentifier(node.field.name)} ${node.negated ? 'IS NOT NULL' : 'IS NULL'}`;
      }
      case 'between': {
        const keyword = node.negated ? 'NOT BETWEEN' : 'BETWEEN';
        return `${this.escapeIdentifier(node.field.name)} ${keyword} ${state.param(node.low)} AND ${state.param(node.high)}`;
      }
      case 'group': {
        const members = node.conditions.map((condition) => this.renderCondition(condition, state));
        if (members.length === 1 && members[0] !== undefined) {
          return members[0];
        }
        return `(${members.join(` ${node.logic} `)})`;
      }
      case 'aggregate': {
        return this.renderOperation(
          this.renderAggregateCall(node.func, node.field?.name),
          node.operator,
          state.param(node.param),
        );
      }
    }
  }

  protected renderOperation(left: string, operator: SqlOperator, right: string): string {
    this.requireCapability(this.capabilities.operators.has(operator), `operator ${operator}`);
    if (operator === 'IN' || operator === 'NOT IN') {
      return this.renderMembership(left, operator, right);
    }
    return `${left} ${operator} ${right}`;
  }

  protected renderMembership(left: string, operator: 'IN' | 'NOT IN', right: string): string {
    return `${left} ${operator} (${right})`;
  }

  // ============ Expressions ============

  protected renderExpression(expression: SelectExpression, state: RenderState): string {
    switch (expression.kind) {
      case 'function': {
        const args = expression.args.map((arg) => this.renderOperand(arg, state)).join(', ');
        return this.withAlias(`${expression.name}(${args})`, expression.alias);
      }
      case 'cast': {
        const type = this.config.castTypes[expression.type];
        this.requireCapability(type !== undefined, `CAST to ${expression.type}`);
        return this.withAlias(
          `CAST(${this.escapeIdentifier(expression.field.name)} AS ${type ?? expression.type})`,
          expression.alias,
        );
      }
      case 'keyword': {
        return this.withAlias(this.config.dateFunctions[expression.keyword], expression.alias);
      }
      case 'aggregate': {
        let sql = this.renderAggregateCall(expression.func, expression.field?.name);
        if (expression.filter) {
          this.requireCapability(this.capabilities.aggregateFilter, 'FILTER (WHERE ...)');
          sql += ` FILTER (WHERE ${this.renderCondition(expression.filter, state)})`;
        }
        return this.withAlias(sql, expression.alias);
      }
      case 'binary': {
        return this.withAlias(
          this.renderOperation(
            this.escapeIdentifier(expression.field.name),
            expression.operator,
            state.param(expression.param),
          ),
          expression.alias,
        );
      }
      case 'case': {
        if (expression.whens.length === 0) {
          throw new RenderError('CASE requires at least one WHEN clause', this.name);
        }
        const parts = ['CASE'];
        for (const when of expression.whens) {
          parts.push(
            `WHEN ${this.renderCondition(when.condition, state)} THEN ${state.param(when.result)}`,
          );
        }
        if (expression.otherwise) {
          parts.push(`ELSE ${state.param(expression.otherwise)}`);
        }
        parts.push('END');
        return this.withAlias(parts.join(' '), expression.alias);
      }
      case 'window': {
        return this.withAlias(this.renderWindow(expression, state), expression.alias);
      }
    }
  }

  protected renderWindow(expression: WindowExpression, state: RenderState): string {
    let call: string;
    if (expression.func === 'COUNT_DISTINCT') {
      throw new RenderError('COUNT DISTINCT cannot be used as a window function', this.name);
    } else if (expression.func === 'COUNT' && expression.args.length === 0) {
      call = 'COUNT(*)';
    } else {
      call = `${expression.func}(${expression.args.map((arg) => this.renderOperand(arg, state)).join(', ')})`;
    }

    const over: string[] = [];
    if (expression.partitionBy.length > 0) {
      over.push(`PARTITION BY ${this.renderFieldList(expression.partitionBy)}`);
    }
    if (expression.orderBy.length > 0) {
      over.push(`ORDER BY ${expression.orderBy.map((item) => this.renderOrderItem(item, state)).join(', ')}`);
    }
    if (expression.frame) {
      over.push(`ROWS BETWEEN ${expression.frame.start} AND ${expression.frame.end}`);
    }

    return `${call} OVER (${over.join(' ')})`;
  }

  protected renderAggregateCall(func: AggregateFunction, field?: string): string {
    if (field === undefined) {
      if (func !== 'COUNT') {
        throw new RenderError(`${func} requires a field`, this.name);
      }
      return 'COUNT(*)';
    }
    const column = this.escapeIdentifier(field);
    return func === 'COUNT_DISTINCT' ? `COUNT(DISTINCT ${column})` : `${func}(${column})`;
  }

  protected renderOperand(operand: Operand, state: RenderState): string {
    return operand instanceof ParamRef ? state.param(operand) : this.escapeIdentifier(operand.name);
  }

  // ============ Clauses ============

  protected appendWhere(parts: string[], where: readonly ConditionNode[], state: RenderState): void {
    if (where.length > 0) {
      parts.push('WHERE', this.renderConditionList(where, state));
    }
  }

  protected appendOrderBy(parts: string[], orderBy: readonly OrderItem[], state: RenderState): void {
    if (orderBy.length > 0) {
      parts.push('ORDER BY', orderBy.map((item) => this.renderOrderItem(item, state)).join(', '));
    }
  }

  protected renderOrderItem(item: OrderItem, state: RenderState): string {
    if (item.kind === 'expression') {
      const expression = this.renderOperation(
        this.escapeIdentifier(item.field.name),
        item.operator,
        state.param(item.param),
      );
      return `${expression} ${item.direction}`;
    }

    let sql = `${this.escapeIdentifier(item.field.name)} ${item.direction}`;
    if (item.nulls) {
      this.requireCapability(this.capabilities.nullsOrdering, `NULLS ${item.nulls}`);
      sql += ` NULLS ${item.nulls}`;
    }
    return sql;
  }

  /**
   * Append LIMIT/OFFSET
   */
  protected appendLimitOffset(
    parts: string[],
    state: RenderState,
    limit?: Pagination,
    offset?: Pagination,
  ): void {
    if (limit) {
      parts.push(`LIMIT ${this.renderPagination(limit, state)}`);
    }
    if (offset) {
      parts.push(`OFFSET ${this.renderPagination(offset, state)}`);
    }
  }

  protected renderPagination(value: Pagination, state: RenderState): string {
    return value.kind === 'literal' ? String(value.value) : state.param(value.param);
  }

  protected appendReturning(parts: string[], ast: QueryAst, supported: boolean): void {
    if (ast.returning.length > 0) {
      this.requireCapability(supported, `${ast.operation} ... RETURNING`);
      parts.push('RETURNING', this.renderFieldList(ast.returning));
    }
  }

  protected renderFieldList(fields: readonly { name: string }[]): string {
    return fields.map((field) => this.escapeIdentifier(field.name)).join(', ');
  }

  protected withAlias(sql: string, alias: string): string {
    return alias ? `${sql} AS ${this.escapeIdentifier(alias)}` : sql;
  }

  protected requireCapability(supported: boolean, feature: string): void {
    if (!supported) {
      throw new RenderError(`${feature} is not supported by ${this.name}`, this.name);
    }
  }
}
