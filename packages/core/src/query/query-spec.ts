/**
 * Query Specs
 *
 * JSON-serialisable statement descriptions. Keys follow the wire format
 * (snake_case) so specs can be stored or produced outside TypeScript and
 * loaded with JSON.parse. Table factory methods (queryFromSpec,
 * modifyFromSpec, ...) turn them into builders; an invalid name surfaces
 * exactly like a chain error.
 *
 * @example
 * ```typescript
 * const spec: QuerySpec = {
 *   fields: ['id', 'email'],
 *   where: [
 *     { field: 'age', operator: '>=', param: 'min_age' },
 *     { logic: 'OR', group: [
 *       { field: 'status', operator: '=', param: 'active' },
 *       { field: 'deleted_at', is_null: true },
 *     ] },
 *   ],
 *   order_by: [{ field: 'email', direction: 'asc' }],
 *   limit: 10,
 * };
 * const rows = await users.queryFromSpec(spec).exec({ min_age: 18, active: 'active' });
 * ```
 */

import { ValidationError } from '../errors';
import { C, NotNull, Null, resolveCondition } from './condition';

import type { ConditionNode } from '../ast';
import type { SchemaInstance } from '../schema';

export interface ConditionSpec {
  field?: string;
  operator?: string;
  param?: string;
  /** IS NULL, or IS NOT NULL when operator is "IS NOT NULL" */
  is_null?: boolean;

  /** "AND" or "OR"; with a non-empty group this spec is a nested group */
  logic?: string;
  group?: ConditionSpec[];
}

export interface OrderBySpec {
  field: string;
  direction: string;
  /** "first" or "last" */
  nulls?: string;
  /** With param, orders by field <operator> :param (vector distance) */
  operator?: string;
  param?: string;
}

export interface HavingAggSpec {
  /** count, sum, avg, min, max, count_distinct */
  func: string;
  /** Empty for COUNT(*) */
  field?: string;
  operator: string;
  param: string;
}

export interface QuerySpec {
  fields?: string[];
  where?: ConditionSpec[];
  order_by?: OrderBySpec[];
  group_by?: string[];
  having?: ConditionSpec[];
  having_agg?: HavingAggSpec[];
  limit?: number;
  offset?: number;
  distinct?: boolean;
  distinct_on?: string[];
  /** update, no_key_update, share, key_share */
  for_locking?: string;
}

export type SelectSpec = QuerySpec;

export interface UpdateSpec {
  /** column -> param */
  set: Record<string, string>;
  where: ConditionSpec[];
}

export interface DeleteSpec {
  where: ConditionSpec[];
}

export interface CreateSpec {
  on_conflict?: string[];
  /** "nothing" or "update" */
  conflict_action?: string;
  /** column -> param, for conflict_action "update" */
  conflict_set?: Record<string, string>;
}

export interface AggregateSpec {
  /** Required for sum/avg/min/max, unused for count */
  field?: string;
  where?: ConditionSpec[];
}

export interface SetOperandSpec {
  /** union, union_all, intersect, intersect_all, except, except_all */
  operation: string;
  query: QuerySpec;
}

export interface CompoundQuerySpec {
  base: QuerySpec;
  operands: SetOperandSpec[];
  order_by?: OrderBySpec[];
  limit?: number;
  offset?: number;
}

export function isGroupSpec(spec: ConditionSpec): boolean {
  return Boolean(spec.logic) && (spec.group?.length ?? 0) > 0;
}

/**
 * Resolve one condition spec. Returns undefined for a group whose members
 * all resolve to nothing.
 */
export function resolveConditionSpec(schema: SchemaInstance, spec: ConditionSpec): ConditionNode | undefined {
  if (isGroupSpec(spec)) {
    const logic = resolveLogic(spec.logic ?? '');
    const conditions = (spec.group ?? []).flatMap((member) => resolveConditionSpec(schema, member) ?? []);
    return conditions.length > 0 ? { kind: 'group', logic, conditions } : undefined;
  }

  if (spec.logic) {
    return undefined;
  }

  const field = spec.field ?? '';
  if (spec.is_null) {
    const negated = spec.operator?.trim().toUpperCase() === 'IS NOT NULL';
    return resolveCondition(schema, negated ? NotNull(field) : Null(field));
  }
  return resolveCondition(schema, C(field, spec.operator ?? '', spec.param ?? ''));
}

function resolveLogic(logic: string): 'AND' | 'OR' {
  const normalized = logic.trim().toUpperCase();
  if (normalized !== 'AND' && normalized !== 'OR') {
    throw new ValidationError('spec', logic, `invalid group logic "${logic}": must be AND or OR`);
  }
  return normalized;
}
