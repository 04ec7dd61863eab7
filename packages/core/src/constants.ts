/**
 * Constants
 *
 * Centralized configuration constants to eliminate magic numbers.
 * All timing values are in milliseconds unless otherwise noted.
 */

// ============ Connection Defaults ============

export const CONNECTION_DEFAULTS = {
  /** Default MySQL port */
  MYSQL_PORT: 3306,
  /** Default PostgreSQL port */
  POSTGRESQL_PORT: 5432,
  /** Default connection timeout (10 seconds) */
  CONNECTION_TIMEOUT: 10_000,
  /** Maximum port number */
  MAX_PORT: 65_535,
  /** Minimum port number */
  MIN_PORT: 1,
} as const;

// ============ Pool Defaults ============

export const POOL_DEFAULTS = {
  max: 10,
  idleTimeout: 60_000,
  queueLimit: 0,
} as const;

// ============ Execution Defaults ============

export const EXECUTION_DEFAULTS = {
  /** Statement timeout (30 seconds) */
  timeout: 30_000,
  /** Statements slower than this are logged as warnings (1 second) */
  slowQueryThreshold: 1_000,
  /** SQL longer than this is truncated in log lines */
  maxSqlLength: 200,
} as const;

// ============ Naming ============

export const IDENTIFIER_PATTERN = /^[A-Za-z_]\w*$/;

export const MAX_IDENTIFIER_LENGTH = 63;

/** Prefix for operand parameters of a compound query: q0_, q1_, ... */
export const COMPOUND_PARAM_PREFIX = 'q';
