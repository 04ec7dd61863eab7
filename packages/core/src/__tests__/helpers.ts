/**
 * Shared fixtures for core tests: two table schemas and tables wired to
 * vi.fn() executors. Timeouts are disabled so executors see `{ signal: undefined }`.
 */

import { vi } from 'vitest';

import { QueryEvents } from '../events';
import { createTable } from '../query/query-factory';

import type { DialectDatabaseType } from '../dialect/resolve-dialect';
import type { TableOptions } from '../query/query-factory';
import type { TableSchema } from '../schema';
import type { Logger, QueryExecutor } from '../types';

export interface User {
  id: number;
  email: string;
  age: number | null;
  status: string;
}

export const usersSchema: TableSchema = {
  name: 'users',
  columns: {
    id: { type: 'integer', primary: true },
    email: { type: 'string', unique: true },
    age: { type: 'integer', nullable: true },
    status: { type: 'string' },
  },
};

export const postsSchema: TableSchema = {
  name: 'posts',
  columns: {
    id: { type: 'integer', primary: true },
    user_id: { type: 'integer' },
    title: { type: 'string' },
    views: { type: 'integer' },
    created_at: { type: 'timestamp' },
    updated_at: { type: 'timestamp', nullable: true },
    embedding: { type: 'vector', nullable: true },
  },
};

export function createLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

export function createExecutor() {
  const query = vi.fn();
  const execute = vi.fn();
  const executor: QueryExecutor = { query, execute };
  return { executor, query, execute };
}

export function createTestTable<T = User>(
  dialect: DialectDatabaseType = 'postgresql',
  schema: TableSchema = usersSchema,
  overrides: Partial<TableOptions> = {},
) {
  const { executor, query, execute } = createExecutor();
  const logger = createLogger();
  const events = new QueryEvents(logger);
  const table = createTable<T>({ schema, dialect, executor, events, logger, defaultTimeout: 0, ...overrides });
  return { table, executor, query, execute, events, logger };
}

/** Executor options as seen by the driver when no timeout or signal applies */
export const NO_SIGNAL = { signal: undefined };
