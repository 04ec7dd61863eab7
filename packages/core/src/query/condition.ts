/**
 * Condition algebra
 *
 * Unresolved, string-keyed conditions. Builders resolve them against the
 * schema when they are added; nothing is validated at construction time.
 *
 * @example
 * ```typescript
 * users.query()
 *   .whereOr(C('status', '=', 'active'), Null('deleted_at'))
 *   .whereAnd(Between('age', 'min_age', 'max_age'), C('email', 'LIKE', 'domain'));
 * ```
 */

import { ValidationError } from '../errors';
import { isValidIdentifier } from '../utils/validation';
import { resolveConditionOperator } from './operators';

import type { ConditionNode, ParamRef } from '../ast';
import type { SchemaInstance } from '../schema';

export interface CompareCondition {
  kind: 'compare';
  field: string;
  operator: string;
  param: string;
}

export interface NullCondition {
  kind: 'null';
  field: string;
  negated: boolean;
}

export interface BetweenCondition {
  kind: 'between';
  field: string;
  low: string;
  high: string;
  negated: boolean;
}

export type Condition = CompareCondition | NullCondition | BetweenCondition;

/** field <operator> :param */
export function C(field: string, operator: string, param: string): Condition {
  return { kind: 'compare', field, operator, param };
}

export function Null(field: string): Condition {
  return { kind: 'null', field, negated: false };
}

export function NotNull(field: string): Condition {
  return { kind: 'null', field, negated: true };
}

export function Between(field: string, low: string, high: string): Condition {
  return { kind: 'between', field, low, high, negated: false };
}

export function NotBetween(field: string, low: string, high: string): Condition {
  return { kind: 'between', field, low, high, negated: true };
}

/**
 * Resolve a condition's names against the schema.
 * Throws a ValidationError naming the first name that fails.
 */
export function resolveCondition(schema: SchemaInstance, condition: Condition): ConditionNode {
  switch (condition.kind) {
    case 'compare': {
      return {
        kind: 'compare',
        field: schema.tryField(condition.field),
        operator: resolveConditionOperator(condition.operator),
        param: schema.tryParam(condition.param),
      };
    }
    case 'null': {
      return { kind: 'null', field: schema.tryField(condition.field), negated: condition.negated };
    }
    case 'between': {
      const field = schema.tryField(condition.field);
      return {
        kind: 'between',
        field,
        low: resolveBound(schema, condition.low, 'low param'),
        high: resolveBound(schema, condition.high, 'high param'),
        negated: condition.negated,
      };
    }
  }
}

function resolveBound(
  schema: SchemaInstance,
  name: string,
  kind: 'low param' | 'high param',
): ParamRef {
  if (!isValidIdentifier(name)) {
    throw new ValidationError(kind, name);
  }
  return schema.tryParam(name);
}
