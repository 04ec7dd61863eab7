/**
 * Middleware Module
 *
 * Wraps every statement a table runs:
 * - Timeout: statement time limits and caller cancellation
 * - Logging: statement logging with slow query detection
 *
 * @module middleware
 */

// Types
export * from './types';

// Pipeline
export { runMiddleware } from './pipeline';

// Middleware factories
export { createTimeoutMiddleware } from './timeout-middleware';
export {
  createLoggingMiddleware,
  consoleLogger,
  truncateSql,
  formatParams,
} from './logging-middleware';
