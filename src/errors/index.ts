/**
 * Unified Error System Export
 *
 * All application errors should be imported from this file.
 */

// Core error system
export {
  ApplicationError,
  ErrorCode,
  type ErrorContext,
} from './ApplicationError.js';

// Validation errors
export {
  ValidationError,
  SchemaValidationError,
} from './ApplicationError.js';

// Operational errors
export {
  OperationalError,
  DatabaseError,
  DuplicateKeyError,
  ForeignKeyViolationError,
  NotNullViolationError,
  MigrationError,
  FileSystemError,
} from './ApplicationError.js';

// Permanent errors (not retryable)
export {
  PermanentError,
  ConfigurationError,
  TransferVerificationError,
} from './ApplicationError.js';
