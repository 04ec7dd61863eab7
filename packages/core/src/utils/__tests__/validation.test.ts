import { describe, it, expect } from 'vitest';

import { ValidationError } from '../../errors';
import { isValidIdentifier, validateConnectionConfig } from '../validation';

describe('isValidIdentifier', () => {
  it('should accept plain identifiers', () => {
    expect(isValidIdentifier('user_id')).toBe(true);
    expect(isValidIdentifier('_private')).toBe(true);
    expect(isValidIdentifier('q0_status')).toBe(true);
  });

  it('should reject anything that needs quoting', () => {
    expect(isValidIdentifier('')).toBe(false);
    expect(isValidIdentifier('1st')).toBe(false);
    expect(isValidIdentifier('bad alias')).toBe(false);
    expect(isValidIdentifier('users.id')).toBe(false);
    expect(isValidIdentifier('id; DROP TABLE users')).toBe(false);
  });

  it('should enforce the length limit', () => {
    expect(isValidIdentifier('a'.repeat(63))).toBe(true);
    expect(isValidIdentifier('a'.repeat(64))).toBe(false);
  });
});

describe('validateConnectionConfig', () => {
  it('should accept a connection string alone', () => {
    expect(() => validateConnectionConfig({ connectionString: 'postgres://localhost/shop' })).not.toThrow();
  });

  it('should require host and database otherwise', () => {
    expect(() => validateConnectionConfig({ database: 'shop' })).toThrow(
      'Host is required when connectionString is not provided',
    );
    expect(() => validateConnectionConfig({ host: 'localhost' })).toThrow(
      'Database name is required when connectionString is not provided',
    );
  });

  it('should reject out-of-range values', () => {
    const base = { host: 'localhost', database: 'shop' };

    expect(() => validateConnectionConfig({ ...base, port: 70000 })).toThrow(ValidationError);
    expect(() => validateConnectionConfig({ ...base, pool: { max: 0 } })).toThrow('Pool size must be a positive number');
    expect(() => validateConnectionConfig({ ...base, connectionTimeout: -1 })).toThrow(
      'Connection timeout must be a non-negative number',
    );
    expect(() => validateConnectionConfig({ ...base, idleTimeout: -5 })).toThrow(
      'Idle timeout must be a non-negative number',
    );
  });
});
