/**
 * PostgreSQL Dialect Implementation
 *
 * Handles PostgreSQL-specific SQL syntax:
 * - Double quote (") identifier quoting
 * - Numbered ($1, $2) parameter placeholders, reused for repeated names
 * - Array membership via = ANY / != ALL
 * - RETURNING and ON CONFLICT support
 */

import { SQLDialect } from './sql-dialect';

import type { DialectCapabilities, DialectConfig, RenderState } from './sql-dialect';
import type { QueryAst, SqlOperator } from '../ast';

const OPERATORS: readonly SqlOperator[] = [
  '=', '!=', '>', '>=', '<', '<=',
  'LIKE', 'NOT LIKE', 'ILIKE', 'NOT ILIKE',
  'IN', 'NOT IN',
  '~', '~*', '!~', '!~*',
  '@>', '<@', '&&',
  '<->', '<#>', '<=>', '<+>',
  '+', '-', '*', '/', '%',
];

export class PostgreSQLDialect extends SQLDialect {
  readonly name = 'postgresql';

  readonly config: DialectConfig = {
    identifierQuote: '"',
    reuseRepeatedParameters: true,
    dateFunctions: {
      NOW: 'NOW()',
      CURRENT_DATE: 'CURRENT_DATE',
      CURRENT_TIME: 'CURRENT_TIME',
      CURRENT_TIMESTAMP: 'CURRENT_TIMESTAMP',
    },
    castTypes: {
      TEXT: 'TEXT',
      INTEGER: 'INTEGER',
      BIGINT: 'BIGINT',
      SMALLINT: 'SMALLINT',
      NUMERIC: 'NUMERIC',
      REAL: 'REAL',
      'DOUBLE PRECISION': 'DOUBLE PRECISION',
      BOOLEAN: 'BOOLEAN',
      DATE: 'DATE',
      TIME: 'TIME',
      TIMESTAMP: 'TIMESTAMP',
      TIMESTAMPTZ: 'TIMESTAMPTZ',
      INTERVAL: 'INTERVAL',
      UUID: 'UUID',
      JSON: 'JSON',
      JSONB: 'JSONB',
      BYTEA: 'BYTEA',
    },
  };

  readonly capabilities: DialectCapabilities = {
    insertReturning: true,
    updateReturning: true,
    deleteReturning: true,
    distinctOn: true,
    nullsOrdering: true,
    aggregateFilter: true,
    operators: new Set(OPERATORS),
    lockModes: new Set(['UPDATE', 'NO KEY UPDATE', 'SHARE', 'KEY SHARE']),
  };

  /**
   * PostgreSQL uses $1, $2, $3... for positional parameters
   */
  getParameterPlaceholder(position: number): string {
    return `$${position}`;
  }

  /**
   * The bound value is an array: IN becomes = ANY($n), NOT IN becomes != ALL($n)
   */
  protected override renderMembership(left: string, operator: 'IN' | 'NOT IN', right: string): string {
    return operator === 'IN' ? `${left} = ANY(${right})` : `${left} != ALL(${right})`;
  }

  /**
   * PostgreSQL-specific: INSERT ... ON CONFLICT
   */
  protected appendConflict(parts: string[], ast: QueryAst, state: RenderState): void {
    const { conflict } = ast;
    if (!conflict) {
      return;
    }

    parts.push('ON CONFLICT');
    if (conflict.columns.length > 0) {
      parts.push(`(${this.renderFieldList(conflict.columns)})`);
    }

    if (conflict.action === 'nothing') {
      parts.push('DO NOTHING');
    } else {
      parts.push('DO UPDATE SET', this.renderAssignments(conflict.assignments, state));
    }
  }
}
