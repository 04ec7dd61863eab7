import { ValidationError } from '../errors';
import { MySQLDialect } from './mysql-dialect';
import { PostgreSQLDialect } from './postgresql-dialect';

import type { SQLDialect } from './sql-dialect';

export type DialectDatabaseType = 'mysql' | 'mariadb' | 'postgresql' | 'postgres';

// Dialects keep no per-table state; tables of one database type share an instance.
let mysqlDialect: MySQLDialect | undefined;
let postgresDialect: PostgreSQLDialect | undefined;

/**
 * The renderer for a database type name, as accepted by `createTable({ dialect })`.
 * MariaDB renders as MySQL.
 */
export function resolveDialect(type: DialectDatabaseType): SQLDialect {
  switch (type) {
    case 'mysql':
    case 'mariadb': {
      if (!mysqlDialect) {
        mysqlDialect = new MySQLDialect();
      }
      return mysqlDialect;
    }
    case 'postgresql':
    case 'postgres': {
      if (!postgresDialect) {
        postgresDialect = new PostgreSQLDialect();
      }
      return postgresDialect;
    }
    default: {
      throw new ValidationError('config', String(type), `Unknown database type: ${String(type)}`);
    }
  }
}
