/**
 * String vocabulary accepted by the builders, mapped to AST enums.
 * Word operators and keywords are matched case-insensitively.
 */

import { ValidationError } from '../errors';

import type {
  AggregateFunction,
  CastType,
  FrameBound,
  LockMode,
  NullsOrdering,
  SetOperator,
  SortDirection,
  SqlOperator,
} from '../ast';

const OPERATORS: Record<string, SqlOperator> = {
  '=': '=',
  '!=': '!=',
  '>': '>',
  '>=': '>=',
  '<': '<',
  '<=': '<=',
  LIKE: 'LIKE',
  'NOT LIKE': 'NOT LIKE',
  ILIKE: 'ILIKE',
  'NOT ILIKE': 'NOT ILIKE',
  IN: 'IN',
  'NOT IN': 'NOT IN',
  '~': '~',
  '~*': '~*',
  '!~': '!~',
  '!~*': '!~*',
  '@>': '@>',
  '<@': '<@',
  '&&': '&&',
  '<->': '<->',
  '<#>': '<#>',
  '<=>': '<=>',
  '<+>': '<+>',
  '+': '+',
  '-': '-',
  '*': '*',
  '/': '/',
  '%': '%',
};

const DIRECTIONS: Record<string, SortDirection> = { asc: 'ASC', desc: 'DESC' };

const NULLS: Record<string, NullsOrdering> = { first: 'FIRST', last: 'LAST' };

const AGGREGATES: Record<string, AggregateFunction> = {
  count: 'COUNT',
  count_distinct: 'COUNT_DISTINCT',
  sum: 'SUM',
  avg: 'AVG',
  min: 'MIN',
  max: 'MAX',
};

const CAST_TYPES: ReadonlySet<string> = new Set<CastType>([
  'TEXT',
  'INTEGER',
  'BIGINT',
  'SMALLINT',
  'NUMERIC',
  'REAL',
  'DOUBLE PRECISION',
  'BOOLEAN',
  'DATE',
  'TIME',
  'TIMESTAMP',
  'TIMESTAMPTZ',
  'INTERVAL',
  'UUID',
  'JSON',
  'JSONB',
  'BYTEA',
]);

const FRAME_BOUNDS: ReadonlySet<string> = new Set<FrameBound>([
  'UNBOUNDED PRECEDING',
  'CURRENT ROW',
  'UNBOUNDED FOLLOWING',
]);

const LOCKS: Record<string, LockMode> = {
  update: 'UPDATE',
  no_key_update: 'NO KEY UPDATE',
  share: 'SHARE',
  key_share: 'KEY SHARE',
};

const SET_OPERATIONS: Record<string, SetOperator> = {
  union: 'UNION',
  union_all: 'UNION ALL',
  intersect: 'INTERSECT',
  intersect_all: 'INTERSECT ALL',
  except: 'EXCEPT',
  except_all: 'EXCEPT ALL',
};

function normalizeWord(value: string): string {
  return value.trim().replaceAll(/\s+/g, ' ').toUpperCase();
}

function lookup<T>(table: Record<string, T>, key: string): T | undefined {
  return Object.hasOwn(table, key) ? table[key] : undefined;
}

export function resolveOperator(operator: string): SqlOperator {
  const resolved = lookup(OPERATORS, normalizeWord(operator));
  if (resolved === undefined) {
    throw new ValidationError('operator', operator);
  }
  return resolved;
}

const ARITHMETIC: ReadonlySet<SqlOperator> = new Set<SqlOperator>(['+', '-', '*', '/', '%']);

/**
 * Operators usable in a condition: everything except arithmetic, which only
 * appears in expressions (ORDER BY, SELECT and SET).
 */
export function resolveConditionOperator(operator: string): SqlOperator {
  const resolved = resolveOperator(operator);
  if (ARITHMETIC.has(resolved)) {
    throw new ValidationError(
      'operator',
      operator,
      `invalid operator "${operator}": arithmetic is only valid in expressions`,
    );
  }
  return resolved;
}

/**
 * Operators usable in SET field = field <op> :param
 */
export function resolveArithmeticOperator(operator: string): SqlOperator {
  const resolved = resolveOperator(operator);
  if (!ARITHMETIC.has(resolved)) {
    throw new ValidationError(
      'operator',
      operator,
      `invalid operator "${operator}": only arithmetic operators are valid in SET expressions`,
    );
  }
  return resolved;
}

export function resolveDirection(direction: string): SortDirection {
  const resolved = lookup(DIRECTIONS, direction.toLowerCase());
  if (resolved === undefined) {
    throw new ValidationError('direction', direction);
  }
  return resolved;
}

export function resolveNulls(nulls: string): NullsOrdering {
  const resolved = lookup(NULLS, nulls.toLowerCase());
  if (resolved === undefined) {
    throw new ValidationError('nulls', nulls);
  }
  return resolved;
}

export function resolveAggregate(func: string): AggregateFunction {
  const resolved = lookup(AGGREGATES, func.toLowerCase());
  if (resolved === undefined) {
    throw new ValidationError('aggregate', func);
  }
  return resolved;
}

export function isCastType(value: string): value is CastType {
  return CAST_TYPES.has(value);
}

export function resolveCastType(type: string): CastType {
  const normalized = normalizeWord(type);
  if (!isCastType(normalized)) {
    throw new ValidationError('cast', type);
  }
  return normalized;
}

export function isFrameBound(value: string): value is FrameBound {
  return FRAME_BOUNDS.has(value);
}

export function resolveFrameBound(bound: string): FrameBound {
  const normalized = normalizeWord(bound);
  if (!isFrameBound(normalized)) {
    throw new ValidationError('frame', bound);
  }
  return normalized;
}

export function resolveLock(lock: string): LockMode {
  const resolved = lookup(LOCKS, lock.toLowerCase());
  if (resolved === undefined) {
    throw new ValidationError('lock', lock);
  }
  return resolved;
}

export function resolveSetOperation(operation: string): SetOperator {
  const resolved = lookup(SET_OPERATIONS, operation.toLowerCase());
  if (resolved === undefined) {
    throw new ValidationError('set operation', operation);
  }
  return resolved;
}

/**
 * Literal LIMIT / OFFSET: a non-negative integer
 */
export function resolveCount(kind: 'limit' | 'offset', n: number): number {
  if (!Number.isInteger(n) || n < 0) {
    throw new ValidationError(kind, String(n), `invalid ${kind} ${n}: must be a non-negative integer`);
  }
  return n;
}
