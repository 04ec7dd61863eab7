export class KeyqlError extends Error {
  constructor(message: string, public code?: string, public override cause?: Error) {
    super(message);
    this.name = 'KeyqlError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * What a schema lookup failed to resolve.
 */
export type ValidationKind =
  | 'table'
  | 'field'
  | 'param'
  | 'low param'
  | 'high param'
  | 'alias'
  | 'operator'
  | 'direction'
  | 'nulls'
  | 'aggregate'
  | 'cast'
  | 'frame'
  | 'lock'
  | 'set operation'
  | 'limit'
  | 'offset'
  | 'arguments'
  | 'spec'
  | 'schema'
  | 'config';

export class ValidationError extends KeyqlError {
  constructor(
    public kind: ValidationKind,
    public identifier: string,
    message?: string,
  ) {
    super(message ?? formatValidationMessage(kind, identifier), 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

function formatValidationMessage(kind: ValidationKind, identifier: string): string {
  if (kind === 'low param' || kind === 'high param') {
    return `invalid ${kind}`;
  }
  return `invalid ${kind} "${identifier}"`;
}

export class ConditionError extends KeyqlError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONDITION_ERROR', cause);
    this.name = 'ConditionError';
  }
}

export class MutationSafetyError extends KeyqlError {
  constructor(public operation: 'UPDATE' | 'DELETE') {
    super(
      `${operation} requires at least one WHERE condition to prevent accidental full-table ${operation === 'UPDATE' ? 'update' : 'delete'}`,
      'MISSING_WHERE',
    );
    this.name = 'MutationSafetyError';
  }
}

export class RenderError extends KeyqlError {
  constructor(message: string, public dialect?: string) {
    super(message, 'RENDER_ERROR');
    this.name = 'RenderError';
  }
}

export class MissingParameterError extends KeyqlError {
  constructor(public parameter: string) {
    super(`missing required parameter "${parameter}"`, 'MISSING_PARAMETER');
    this.name = 'MissingParameterError';
  }
}

export class QueryError extends KeyqlError {
  constructor(
    message: string,
    public operation?: string,
    public sql?: string,
    cause?: Error,
  ) {
    super(message, 'QUERY_ERROR', cause);
    this.name = 'QueryError';
  }
}

export type Cardinality = 'none' | 'multiple';

export class CardinalityError extends KeyqlError {
  constructor(
    message: string,
    public operation: string,
    public cardinality: Cardinality,
  ) {
    super(message, cardinality === 'none' ? 'NO_ROWS' : 'MULTIPLE_ROWS');
    this.name = 'CardinalityError';
  }
}

export class BatchError extends KeyqlError {
  constructor(
    public operation: string,
    public index: number,
    public rowsAffected: number,
    cause: Error,
  ) {
    super(
      `batch ${operation} failed at index ${index} after ${rowsAffected} rows: ${cause.message}`,
      'BATCH_ERROR',
      cause,
    );
    this.name = 'BatchError';
  }
}

export class TimeoutError extends KeyqlError {
  constructor(message: string, public timeout?: number, cause?: Error) {
    super(message, 'TIMEOUT_ERROR', cause);
    this.name = 'TimeoutError';
  }
}

export class CancellationError extends KeyqlError {
  constructor(message = 'query was cancelled', cause?: Error) {
    super(message, 'CANCELLED', cause);
    this.name = 'CancellationError';
  }
}

export class ConnectionError extends KeyqlError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONNECTION_ERROR', cause);
    this.name = 'ConnectionError';
  }
}

export class TransactionError extends KeyqlError {
  constructor(message: string, public transactionId?: string, cause?: Error) {
    super(message, 'TRANSACTION_ERROR', cause);
    this.name = 'TransactionError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
