/**
 * Query Events
 *
 * Structured start/completion/failure events, one set per logical operation
 * (a batch or an update with its fallback read counts as one). Listener
 * failures are logged and never reach the query.
 *
 * @example
 * ```typescript
 * const events = new QueryEvents();
 * events.on('query:completed', (event) => {
 *   metrics.observe(event.table, event.operation, event.durationMs);
 * });
 * ```
 */

import { EventEmitter } from 'eventemitter3';

import { toError } from '../errors';
import { consoleLogger } from '../middleware/logging-middleware';

import type { Logger } from '../types';

export interface QueryStartedEvent {
  table: string;
  operation: string;
  sql: string;
  /** Aggregated field, for aggregate operations */
  field?: string;
}

export interface QueryCompletedEvent extends QueryStartedEvent {
  durationMs: number;
  rowsReturned?: number;
  rowsAffected?: number;
  resultValue?: number;
}

export interface QueryFailedEvent extends QueryStartedEvent {
  durationMs: number;
  error: string;
}

export interface QueryEventMap {
  'query:started': [QueryStartedEvent];
  'query:completed': [QueryCompletedEvent];
  'query:failed': [QueryFailedEvent];
}

export class QueryEvents extends EventEmitter<QueryEventMap> {
  constructor(private readonly logger: Logger = consoleLogger) {
    super();
  }

  started(event: QueryStartedEvent): void {
    this.safely('query:started', () => this.emit('query:started', event));
  }

  completed(event: QueryCompletedEvent): void {
    this.safely('query:completed', () => this.emit('query:completed', event));
  }

  failed(event: QueryFailedEvent): void {
    this.safely('query:failed', () => this.emit('query:failed', event));
  }

  private safely(name: keyof QueryEventMap, emit: () => boolean): void {
    try {
      emit();
    } catch (error) {
      this.logger.warn(`${name} listener failed: ${toError(error).message}`, { error });
    }
  }
}
