import { describe, it, expect } from '@jest/globals';
import {
  ApplicationError,
  ConfigurationError,
  DatabaseError,
  DuplicateKeyError,
  ErrorCode,
  MigrationError,
  SchemaValidationError,
  TransferVerificationError,
  ValidationError,
} from '../../src/errors/index.js';
import { getErrorMessage, getStringProperty, hasCode, toError } from '../../src/utils/errorHandling.js';

describe('ApplicationError hierarchy', () => {
  it('should keep instanceof checks along the chain', () => {
    const error = new DuplicateKeyError('genre', 'name');

    expect(error).toBeInstanceOf(DuplicateKeyError);
    expect(error).toBeInstanceOf(DatabaseError);
    expect(error).toBeInstanceOf(ApplicationError);
    expect(error.name).toBe('DuplicateKeyError');
    expect(error.message).toBe("Duplicate key in table 'genre': name");
    expect(error.code).toBe(ErrorCode.DATABASE_DUPLICATE_KEY);
    expect(error.retryable).toBe(false);
  });

  it('should record migration details', () => {
    const cause = new Error('relation already exists');
    const error = new MigrationError('20240601_001', 'up', undefined, { service: 'MigrationRunner' }, cause);

    expect(error.message).toBe('Migration up failed: 20240601_001');
    expect(error.code).toBe(ErrorCode.DATABASE_MIGRATION_FAILED);
    expect(error.cause).toBe(cause);
    expect(error.context.metadata).toEqual({ version: '20240601_001', direction: 'up' });
  });

  it('should carry schema errors in metadata', () => {
    const errors = [{ path: 'rating', message: 'Rating must be at most 100' }];
    const error = new SchemaValidationError(errors);

    expect(error).toBeInstanceOf(ValidationError);
    expect(error.message).toBe('Schema validation failed: 1 error(s)');
    expect(error.context.metadata).toEqual({ errors });
  });

  it('should treat verification and configuration failures as permanent', () => {
    const verification = new TransferVerificationError('genre', ['g1'], []);
    const configuration = new ConfigurationError('DB_USER');

    expect(verification.isOperational).toBe(false);
    expect(verification.code).toBe(ErrorCode.TRANSFER_VERIFICATION_FAILED);
    expect(configuration.message).toBe('Configuration error: DB_USER');
    expect(configuration.code).toBe(ErrorCode.CONFIG_INVALID);
  });

  it('should serialize for logging', () => {
    const json = new ValidationError('bad input', { service: 'test' }).toJSON();

    expect(json).toMatchObject({
      name: 'ValidationError',
      message: 'bad input',
      code: ErrorCode.VALIDATION_INPUT_INVALID,
      isOperational: true,
      retryable: false,
      context: { service: 'test' },
      cause: undefined,
    });
  });
});

describe('error handling helpers', () => {
  it('should read messages from any thrown value', () => {
    expect(getErrorMessage(new Error('boom'))).toBe('boom');
    expect(getErrorMessage({ message: 'plain object' })).toBe('plain object');
    expect(getErrorMessage('text')).toBe('text');
    expect(getErrorMessage(42)).toBe('An unknown error occurred');
  });

  it('should wrap non-errors', () => {
    const original = new Error('kept');

    expect(toError(original)).toBe(original);
    expect(toError('text').message).toBe('text');
  });

  it('should read driver error properties', () => {
    const driverError = Object.assign(new Error('duplicate'), { code: '23505', table: 'genre', port: 5432 });

    expect(hasCode(driverError)).toBe(true);
    expect(hasCode(new Error('no code'))).toBe(false);
    expect(getStringProperty(driverError, 'table')).toBe('genre');
    expect(getStringProperty(driverError, 'port')).toBeUndefined();
    expect(getStringProperty(null, 'table')).toBeUndefined();
  });
});
