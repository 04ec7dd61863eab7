/**
 * Database connection configuration shared by the driver packages
 * @example
 * ```typescript
 * const config: ConnectionConfig = {
 *   host: 'localhost',
 *   port: 5432,
 *   user: 'app',
 *   password: 'test-secret',
 *   database: 'shop',
 *   pool: { max: 20, idleTimeout: 60000 }
 * };
 * ```
 */
export interface ConnectionConfig {
  host?: string;
  port?: number;
  database?: string;
  user?: string;
  password?: string;
  connectionString?: string;
  ssl?: boolean | SslOptions;

  /** Pool configuration */
  pool?: PoolConfig;

  connectionTimeout?: number;
  idleTimeout?: number;
}

/**
 * TLS settings shared by the pg and mysql2 drivers
 */
export interface SslOptions {
  rejectUnauthorized?: boolean;
  ca?: string;
  cert?: string;
  key?: string;
}

/**
 * Connection pool configuration
 */
export interface PoolConfig {
  /** Maximum number of connections in pool */
  max?: number;

  /** Time before idle connection is closed (ms) */
  idleTimeout?: number;

  /** Maximum waiting requests in queue (0 = unlimited); pg has no queue limit */
  queueLimit?: number;
}

export type Row = Record<string, unknown>;

/**
 * Named parameter values keyed by parameter name.
 */
export type Params = Record<string, unknown>;

export interface QueryResult<T = unknown> {
  rows: T[];
  rowCount: number;
  fields?: FieldInfo[];
  command?: string;
  duration?: number;
}

export interface ExecuteResult {
  affectedRows: number;
  insertId?: number | string;
  changedRows?: number;
}

export interface PoolStats {
  total: number;
  idle: number;
  active: number;
  waiting: number;
}

export interface FieldInfo {
  name: string;
  type: string;
}

export interface StatementOptions {
  signal?: AbortSignal;
}

/**
 * The seam to a database driver. Receives positional SQL produced by the dialect.
 */
export interface QueryExecutor {
  query<T = Row>(sql: string, values: unknown[], options?: StatementOptions): Promise<QueryResult<T>>;
  execute(sql: string, values: unknown[], options?: StatementOptions): Promise<ExecuteResult>;
}

export interface Transaction extends QueryExecutor {
  readonly id: string;
  readonly isActive: boolean;
  commit(): Promise<void>;
  rollback(): Promise<void>;
}

/**
 * An executor that can open transactions. Statements run on the returned
 * Transaction until it is committed or rolled back.
 */
export interface TransactionalExecutor extends QueryExecutor {
  beginTransaction(options?: TransactionOptions): Promise<Transaction>;
}

export interface TransactionOptions {
  isolationLevel?: IsolationLevel;
  readOnly?: boolean;
}

export enum IsolationLevel {
  READ_UNCOMMITTED = 'READ UNCOMMITTED',
  READ_COMMITTED = 'READ COMMITTED',
  REPEATABLE_READ = 'REPEATABLE READ',
  SERIALIZABLE = 'SERIALIZABLE',
}

/**
 * Per-call execution options.
 */
export interface ExecOptions {
  /** Run against this executor (an open transaction) instead of the table's own */
  tx?: QueryExecutor;
  /** Cancels the in-flight statement */
  signal?: AbortSignal;
  /** Overrides the table's default timeout (ms) */
  timeout?: number;
}

export interface Logger {
  error(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}
