import { IDENTIFIER_PATTERN, MAX_IDENTIFIER_LENGTH, CONNECTION_DEFAULTS } from '../constants';
import { ValidationError } from '../errors';

import type { ConnectionConfig } from '../types';

export function validateConnectionConfig(config: ConnectionConfig): void {
  if (!config.connectionString) {
    if (!config.host) {
      throw new ValidationError(
        'config',
        'host',
        'Host is required when connectionString is not provided',
      );
    }

    if (!config.database) {
      throw new ValidationError(
        'config',
        'database',
        'Database name is required when connectionString is not provided',
      );
    }
  }

  if (
    config.port !== undefined &&
    (!Number.isInteger(config.port) ||
      config.port < CONNECTION_DEFAULTS.MIN_PORT ||
      config.port > CONNECTION_DEFAULTS.MAX_PORT)
  ) {
    throw new ValidationError('config', 'port', 'Port must be a number between 1 and 65535');
  }

  if (config.pool?.max !== undefined && config.pool.max < 1) {
    throw new ValidationError('config', 'pool.max', 'Pool size must be a positive number');
  }

  if (config.connectionTimeout !== undefined && config.connectionTimeout < 0) {
    throw new ValidationError(
      'config',
      'connectionTimeout',
      'Connection timeout must be a non-negative number',
    );
  }

  if (config.idleTimeout !== undefined && config.idleTimeout < 0) {
    throw new ValidationError('config', 'idleTimeout', 'Idle timeout must be a non-negative number');
  }
}

export function isValidIdentifier(name: string): boolean {
  return name.length <= MAX_IDENTIFIER_LENGTH && IDENTIFIER_PATTERN.test(name);
}
