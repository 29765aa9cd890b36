import type { ZodError } from 'zod';
import { ErrorCodes, type ErrorCode } from './error-codes';

export interface FieldIssue {
  field: string;
  message: string;
}

/**
 * Custom application error
 */
export class AppError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public details?: unknown,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * A value was rejected by a field rule (phone, birthday, page size)
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: FieldIssue[]) {
    super(ErrorCodes.VALIDATION_ERROR, message, details);
    this.name = 'ValidationError';
  }

  /**
   * Uses the first issue as the message and keeps all issues as details
   */
  static fromZodError(error: ZodError): ValidationError {
    const issues = error.errors.map((err) => ({
      field: err.path.join('.'),
      message: err.message,
    }));
    const [first] = issues;
    return new ValidationError(first ? first.message : 'Validation failed', issues);
  }
}

/**
 * Reading or writing the address book file failed
 */
export class StorageError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCodes.STORAGE_ERROR, message, undefined, options);
    this.name = 'StorageError';
  }
}

/**
 * The address book file exists but its content cannot be trusted
 */
export class CorruptDataError extends AppError {
  constructor(message: string, details?: unknown, options?: { cause?: unknown }) {
    super(ErrorCodes.CORRUPT_DATA, message, details, options);
    this.name = 'CorruptDataError';
  }
}

/**
 * Standard input ended while the command loop was waiting for a line
 */
export class InputClosedError extends Error {
  constructor() {
    super('Input stream closed');
    this.name = 'InputClosedError';
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
