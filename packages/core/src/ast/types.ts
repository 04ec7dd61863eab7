import type { FieldRef, Operand, ParamRef, TableRef } from './tokens';

// ============ Vocabulary ============

export type ComparisonOperator = '=' | '!=' | '>' | '>=' | '<' | '<=';
export type PatternOperator = 'LIKE' | 'NOT LIKE' | 'ILIKE' | 'NOT ILIKE';
export type MembershipOperator = 'IN' | 'NOT IN';
export type RegexOperator = '~' | '~*' | '!~' | '!~*';
export type ArrayOperator = '@>' | '<@' | '&&';
export type VectorOperator = '<->' | '<#>' | '<=>' | '<+>';
export type ArithmeticOperator = '+' | '-' | '*' | '/' | '%';

export type SqlOperator =
  | ComparisonOperator
  | PatternOperator
  | MembershipOperator
  | RegexOperator
  | ArrayOperator
  | VectorOperator
  | ArithmeticOperator;

export type SortDirection = 'ASC' | 'DESC';
export type NullsOrdering = 'FIRST' | 'LAST';

export type AggregateFunction = 'COUNT' | 'COUNT_DISTINCT' | 'SUM' | 'AVG' | 'MIN' | 'MAX';

export type StringFunction =
  | 'UPPER'
  | 'LOWER'
  | 'LENGTH'
  | 'TRIM'
  | 'LTRIM'
  | 'RTRIM'
  | 'SUBSTRING'
  | 'REPLACE'
  | 'CONCAT';

export type MathFunction = 'ABS' | 'CEIL' | 'FLOOR' | 'ROUND' | 'SQRT' | 'POWER';

export type NullFunction = 'COALESCE' | 'NULLIF';

export type ScalarFunction = StringFunction | MathFunction | NullFunction;

export type DateKeyword = 'NOW' | 'CURRENT_DATE' | 'CURRENT_TIME' | 'CURRENT_TIMESTAMP';

export type CastType =
  | 'TEXT'
  | 'INTEGER'
  | 'BIGINT'
  | 'SMALLINT'
  | 'NUMERIC'
  | 'REAL'
  | 'DOUBLE PRECISION'
  | 'BOOLEAN'
  | 'DATE'
  | 'TIME'
  | 'TIMESTAMP'
  | 'TIMESTAMPTZ'
  | 'INTERVAL'
  | 'UUID'
  | 'JSON'
  | 'JSONB'
  | 'BYTEA';

export type WindowFunction =
  | 'ROW_NUMBER'
  | 'RANK'
  | 'DENSE_RANK'
  | 'NTILE'
  | 'LAG'
  | 'LEAD'
  | 'FIRST_VALUE'
  | 'LAST_VALUE'
  | AggregateFunction;

export type FrameBound = 'UNBOUNDED PRECEDING' | 'CURRENT ROW' | 'UNBOUNDED FOLLOWING';

export type LockMode = 'UPDATE' | 'NO KEY UPDATE' | 'SHARE' | 'KEY SHARE';

export type SetOperator =
  | 'UNION'
  | 'UNION ALL'
  | 'INTERSECT'
  | 'INTERSECT ALL'
  | 'EXCEPT'
  | 'EXCEPT ALL';

export type Operation = 'SELECT' | 'INSERT' | 'UPDATE' | 'DELETE';

// ============ Conditions ============

export interface CompareNode {
  kind: 'compare';
  field: FieldRef;
  operator: SqlOperator;
  param: ParamRef;
}

export interface FieldCompareNode {
  kind: 'field-compare';
  left: FieldRef;
  operator: SqlOperator;
  right: FieldRef;
}

export interface NullNode {
  kind: 'null';
  field: FieldRef;
  negated: boolean;
}

export interface BetweenNode {
  kind: 'between';
  field: FieldRef;
  low: ParamRef;
  high: ParamRef;
  negated: boolean;
}

export interface GroupNode {
  kind: 'group';
  logic: 'AND' | 'OR';
  conditions: readonly ConditionNode[];
}

/** Aggregate comparison, only meaningful inside HAVING. A missing field means COUNT(*). */
export interface AggregateConditionNode {
  kind: 'aggregate';
  func: AggregateFunction;
  field?: FieldRef;
  operator: SqlOperator;
  param: ParamRef;
}

export type ConditionNode =
  | CompareNode
  | FieldCompareNode
  | NullNode
  | BetweenNode
  | GroupNode
  | AggregateConditionNode;

// ============ Select Expressions ============

export interface FunctionExpression {
  kind: 'function';
  name: ScalarFunction;
  args: readonly Operand[];
  alias: string;
}

export interface CastExpression {
  kind: 'cast';
  field: FieldRef;
  type: CastType;
  alias: string;
}

export interface KeywordExpression {
  kind: 'keyword';
  keyword: DateKeyword;
  alias: string;
}

export interface AggregateExpression {
  kind: 'aggregate';
  func: AggregateFunction;
  field?: FieldRef;
  filter?: ConditionNode;
  alias: string;
}

export interface BinaryExpression {
  kind: 'binary';
  field: FieldRef;
  operator: SqlOperator;
  param: ParamRef;
  alias: string;
}

export interface CaseWhen {
  condition: ConditionNode;
  result: ParamRef;
}

export interface CaseExpression {
  kind: 'case';
  whens: readonly CaseWhen[];
  otherwise?: ParamRef;
  alias: string;
}

export interface WindowFrame {
  start: FrameBound;
  end: FrameBound;
}

export interface WindowExpression {
  kind: 'window';
  func: WindowFunction;
  args: readonly Operand[];
  partitionBy: readonly FieldRef[];
  orderBy: readonly OrderItem[];
  frame?: WindowFrame;
  alias: string;
}

export type SelectExpression =
  | FunctionExpression
  | CastExpression
  | KeywordExpression
  | AggregateExpression
  | BinaryExpression
  | CaseExpression
  | WindowExpression;

// ============ Ordering & Pagination ============

export interface FieldOrder {
  kind: 'field';
  field: FieldRef;
  direction: SortDirection;
  nulls?: NullsOrdering;
}

/** ORDER BY field <op> :param, used for vector distance */
export interface ExpressionOrder {
  kind: 'expression';
  field: FieldRef;
  operator: SqlOperator;
  param: ParamRef;
  direction: SortDirection;
}

export type OrderItem = FieldOrder | ExpressionOrder;

export type Pagination = { kind: 'literal'; value: number } | { kind: 'param'; param: ParamRef };

// ============ Mutations ============

export type AssignmentValue =
  | { kind: 'param'; param: ParamRef }
  | { kind: 'expression'; field: FieldRef; operator: SqlOperator; param: ParamRef };

export interface Assignment {
  field: FieldRef;
  value: AssignmentValue;
}

export interface InsertValue {
  field: FieldRef;
  param: ParamRef;
}

export type ConflictClause =
  | { columns: readonly FieldRef[]; action: 'nothing' }
  | { columns: readonly FieldRef[]; action: 'update'; assignments: readonly Assignment[] };

// ============ Statements ============

export interface QueryAst {
  readonly operation: Operation;
  readonly table: TableRef;
  readonly fields: readonly FieldRef[];
  readonly expressions: readonly SelectExpression[];
  readonly distinct: boolean;
  readonly distinctOn: readonly FieldRef[];
  readonly where: readonly ConditionNode[];
  readonly groupBy: readonly FieldRef[];
  readonly having: readonly ConditionNode[];
  readonly orderBy: readonly OrderItem[];
  readonly limit?: Pagination;
  readonly offset?: Pagination;
  readonly lock?: LockMode;
  readonly assignments: readonly Assignment[];
  readonly rows: readonly (readonly InsertValue[])[];
  readonly conflict?: ConflictClause;
  readonly returning: readonly FieldRef[];
}

export interface CompoundOperand {
  readonly operator: SetOperator;
  readonly query: QueryAst;
}

export interface CompoundAst {
  readonly base: QueryAst;
  readonly operands: readonly CompoundOperand[];
  readonly orderBy: readonly OrderItem[];
  readonly limit?: Pagination;
  readonly offset?: Pagination;
}
