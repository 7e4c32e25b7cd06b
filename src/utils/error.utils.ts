/**
 * @fileoverview Structured error handling for the filament ledger with typed error codes,
 * contextual metadata, and user-facing message generation.
 *
 * Key Features:
 * - ErrorCode enumeration covering the ledger taxonomy and process-level failures
 * - AppError class with context, timestamp, and original error tracking
 * - User-facing messages derived from error codes
 * - JSON serialization for HTTP responses and logging
 * - Factory functions for the ledger failure kinds
 * - Zod validation error conversion
 *
 * Error Categories:
 * - General: UNKNOWN, VALIDATION, NETWORK, TIMEOUT
 * - Ledger: INVALID_INPUT, INVALID_AMOUNT, UNKNOWN_SPOOL
 * - Reconciliation: SCHEMA_INVALID, WRITE_FAILED, IMPORT_IN_PROGRESS
 * - Configuration: CONFIG_INVALID, CONFIG_SAVE_FAILED, CONFIG_LOAD_FAILED
 *
 * A clamped usage entry is not an error: it is reported as a LedgerNotice next to the
 * recorded usage (see types/inventory).
 */

import { ZodError } from 'zod';

// ============================================================================
// ERROR TYPES
// ============================================================================

export enum ErrorCode {
  // General errors
  UNKNOWN = 'UNKNOWN',
  VALIDATION = 'VALIDATION',
  NETWORK = 'NETWORK',
  TIMEOUT = 'TIMEOUT',

  // Ledger errors
  INVALID_INPUT = 'INVALID_INPUT',
  INVALID_AMOUNT = 'INVALID_AMOUNT',
  UNKNOWN_SPOOL = 'UNKNOWN_SPOOL',

  // Reconciliation errors
  SCHEMA_INVALID = 'SCHEMA_INVALID',
  WRITE_FAILED = 'WRITE_FAILED',
  IMPORT_IN_PROGRESS = 'IMPORT_IN_PROGRESS',

  // Configuration errors
  CONFIG_INVALID = 'CONFIG_INVALID',
  CONFIG_SAVE_FAILED = 'CONFIG_SAVE_FAILED',
  CONFIG_LOAD_FAILED = 'CONFIG_LOAD_FAILED'
}

// ============================================================================
// CUSTOM ERROR CLASS
// ============================================================================

/**
 * Enhanced error class with structured context
 */
export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: Record<string, unknown>;
  public readonly timestamp: Date;
  public readonly originalError?: Error;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context?: Record<string, unknown>,
    originalError?: Error
  ) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.context = context;
    this.timestamp = new Date();
    this.originalError = originalError;

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AppError);
    }
  }

  /**
   * Convert to plain object for serialization
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      timestamp: this.timestamp,
      stack: this.stack,
      originalError: this.originalError ? {
        name: this.originalError.name,
        message: this.originalError.message,
        stack: this.originalError.stack
      } : undefined
    };
  }

  /**
   * Get user-friendly error message
   * Ledger errors already carry a specific reason, so their message is returned as-is
   */
  public getUserMessage(): string {
    switch (this.code) {
      case ErrorCode.UNKNOWN_SPOOL:
        return this.message || 'Spool not found';
      case ErrorCode.SCHEMA_INVALID:
        return `Import file is not a valid inventory export: ${this.message}`;
      case ErrorCode.WRITE_FAILED: {
        const committed = this.context?.committed;
        const total = this.context?.total;
        if (typeof committed === 'number' && typeof total === 'number') {
          return `Partial write: ${committed} of ${total} entities were saved. ${this.message}`;
        }
        return `Failed to save inventory data. ${this.message}`;
      }
      case ErrorCode.IMPORT_IN_PROGRESS:
        return 'An import is already running. Please wait for it to finish';
      case ErrorCode.CONFIG_INVALID:
        return 'Configuration is invalid. Please check your settings';
      case ErrorCode.NETWORK:
        return 'Network error. Please check your connection';
      case ErrorCode.TIMEOUT:
        return 'Operation timed out. Please try again';
      default:
        return this.message || 'An unexpected error occurred';
    }
  }
}

// ============================================================================
// ERROR FACTORIES
// ============================================================================

/**
 * Create error from Zod validation error
 */
export function fromZodError(error: ZodError, code: ErrorCode = ErrorCode.VALIDATION): AppError {
  const issues = error.issues.map(issue => ({
    path: issue.path.join('.'),
    message: issue.message,
    code: issue.code
  }));

  const first = issues[0];
  const message = first
    ? `${first.path ? `${first.path}: ` : ''}${first.message}`
    : 'Validation failed';

  return new AppError(message, code, { issues }, error);
}

/**
 * Non-positive or out-of-range numeric argument
 */
export function invalidInputError(message: string, context?: Record<string, unknown>): AppError {
  return new AppError(message, ErrorCode.INVALID_INPUT, context);
}

/**
 * Usage or stock revision that would break the mass invariant
 */
export function invalidAmountError(message: string, context?: Record<string, unknown>): AppError {
  return new AppError(message, ErrorCode.INVALID_AMOUNT, context);
}

/**
 * Reference to a spool identity that does not exist
 */
export function unknownSpoolError(spoolId: string): AppError {
  return new AppError(`Spool ${spoolId} does not exist`, ErrorCode.UNKNOWN_SPOOL, { spoolId });
}

/**
 * Import document failed structural validation
 */
export function schemaInvalidError(message: string, context?: Record<string, unknown>): AppError {
  return new AppError(message, ErrorCode.SCHEMA_INVALID, context);
}

/**
 * Persistence collaborator reported a failure
 */
export function writeFailedError(
  message: string,
  context?: Record<string, unknown>,
  originalError?: unknown
): AppError {
  return new AppError(
    message,
    ErrorCode.WRITE_FAILED,
    context,
    originalError instanceof Error ? originalError : undefined
  );
}

/**
 * Create timeout error
 */
export function timeoutError(operation: string, timeoutMs: number): AppError {
  return new AppError(
    `Operation timed out after ${timeoutMs}ms`,
    ErrorCode.TIMEOUT,
    { operation, timeoutMs }
  );
}

// ============================================================================
// ERROR HANDLING UTILITIES
// ============================================================================

/**
 * Check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Error raised by a Node system call. Checked structurally: errors thrown by `fs` are
 * not always instances of this realm's Error.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string';
}

/**
 * True when a system call failed because the path does not exist
 */
export function isMissingFileError(error: unknown): boolean {
  return isErrnoException(error) && error.code === 'ENOENT';
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

/**
 * Convert unknown error to AppError
 */
export function toAppError(error: unknown, defaultCode: ErrorCode = ErrorCode.UNKNOWN): AppError {
  if (isAppError(error)) {
    return error;
  }

  if (error instanceof ZodError) {
    return fromZodError(error);
  }

  if (error instanceof Error) {
    return new AppError(
      error.message,
      defaultCode,
      undefined,
      error
    );
  }

  if (typeof error === 'string') {
    return new AppError(error, defaultCode);
  }

  return new AppError(
    'An unknown error occurred',
    defaultCode,
    { error }
  );
}

/**
 * Run a persistence call, converting any failure that is not already an AppError
 * into WRITE_FAILED with the supplied context
 */
export async function guardWrite<T>(
  operation: string,
  fn: () => Promise<T>,
  context?: Record<string, unknown>
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (isAppError(error)) {
      throw error;
    }
    throw writeFailedError(`${operation} failed: ${errorMessage(error)}`, { operation, ...context }, error);
  }
}

/**
 * Error payload for HTTP responses
 */
export function createErrorResult(error: unknown): {
  success: false;
  error: string;
  code: ErrorCode;
  context?: Record<string, unknown>;
} {
  const appError = toAppError(error);
  return {
    success: false,
    error: appError.getUserMessage(),
    code: appError.code,
    context: appError.context
  };
}
