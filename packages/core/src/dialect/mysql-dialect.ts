/**
 * MySQL Dialect Implementation
 *
 * Handles MySQL-specific SQL syntax:
 * - Backtick (`) identifier quoting
 * - Positional (?) parameter placeholders, one per occurrence
 * - INSERT IGNORE / ON DUPLICATE KEY UPDATE for conflicts
 *
 * MySQL has no RETURNING, so mutations that must yield a row are followed by
 * a read (see execution/mutation).
 */

import { SQLDialect } from './sql-dialect';

import type { DialectCapabilities, DialectConfig, RenderState } from './sql-dialect';
import type { QueryAst, SqlOperator } from '../ast';

const OPERATORS: readonly SqlOperator[] = [
  '=', '!=', '>', '>=', '<', '<=',
  'LIKE', 'NOT LIKE',
  'IN', 'NOT IN',
  '+', '-', '*', '/', '%',
];

export class MySQLDialect extends SQLDialect {
  readonly name = 'mysql';

  readonly config: DialectConfig = {
    identifierQuote: '`',
    reuseRepeatedParameters: false,
    dateFunctions: {
      NOW: 'NOW()',
      CURRENT_DATE: 'CURDATE()',
      CURRENT_TIME: 'CURTIME()',
      CURRENT_TIMESTAMP: 'CURRENT_TIMESTAMP',
    },
    castTypes: {
      TEXT: 'CHAR',
      INTEGER: 'SIGNED',
      BIGINT: 'SIGNED',
      SMALLINT: 'SIGNED',
      NUMERIC: 'DECIMAL',
      REAL: 'FLOAT',
      'DOUBLE PRECISION': 'DOUBLE',
      DATE: 'DATE',
      TIME: 'TIME',
      TIMESTAMP: 'DATETIME',
      JSON: 'JSON',
      BYTEA: 'BINARY',
    },
  };

  readonly capabilities: DialectCapabilities = {
    insertReturning: false,
    updateReturning: false,
    deleteReturning: false,
    distinctOn: false,
    nullsOrdering: false,
    aggregateFilter: false,
    operators: new Set(OPERATORS),
    lockModes: new Set(['UPDATE', 'SHARE']),
  };

  /**
   * MySQL uses ? for all positional parameters
   */
  getParameterPlaceholder(): string {
    return '?';
  }

  protected override insertKeyword(ast: QueryAst): string {
    return ast.conflict?.action === 'nothing' ? 'INSERT IGNORE INTO' : 'INSERT INTO';
  }

  /**
   * MySQL-specific: ON DUPLICATE KEY UPDATE. MySQL matches any unique key,
   * so the conflict columns are not rendered.
   */
  protected appendConflict(parts: string[], ast: QueryAst, state: RenderState): void {
    if (ast.conflict?.action === 'update') {
      parts.push('ON DUPLICATE KEY UPDATE', this.renderAssignments(ast.conflict.assignments, state));
    }
  }
}
