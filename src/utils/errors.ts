/**
 * Error Handling Utilities
 *
 * Typed application errors for the account store, the linking flow and the
 * credit reconciler, plus helpers that turn them into log lines and safe
 * user-facing text.
 */

import { logger } from './logger.js';

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Database error (store unavailable, constraint failure, lock timeout)
 */
export class DatabaseError extends AppError {
  constructor(message: string, public readonly sqliteCode?: string) {
    super(message, 'DATABASE_ERROR', 503);
  }
}

/**
 * Validation error
 */
export class ValidationError extends AppError {
  public readonly field: string | undefined;

  constructor(message: string, field?: string) {
    super(message, 'VALIDATION_ERROR', 400);
    this.field = field;
  }
}

/**
 * Not found error
 */
export class NotFoundError extends AppError {
  public readonly resource: string;

  constructor(resource: string, identifier?: string, code: string = 'NOT_FOUND') {
    const message = identifier
      ? `${resource} not found: ${identifier}`
      : `${resource} not found`;
    super(message, code, 404);
    this.resource = resource;
  }
}

/**
 * No account exists for the given chat identity or email
 */
export class AccountNotFoundError extends NotFoundError {
  constructor(identifier?: string) {
    super('Account', identifier, 'ACCOUNT_NOT_FOUND');
  }
}

/**
 * The resource is owned by someone else (e.g. email bound to another chat identity)
 */
export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 'CONFLICT', 409);
  }
}

/**
 * Passcode delivery failed
 */
export class NotifierError extends AppError {
  constructor(message: string, public readonly providerStatus?: number) {
    super(message, 'NOTIFIER_ERROR', 502);
  }
}

/**
 * Question generation failed
 */
export class GenerationError extends AppError {
  constructor(message: string, public readonly providerStatus?: number) {
    super(message, 'GENERATION_ERROR', 502);
  }
}

/**
 * The store is in a state the link flow never produces: the merge target is
 * bound to another chat identity, or the chat identity already belongs to a
 * different verified account. Never resolved by overwriting credits.
 */
export class LinkIntegrityError extends AppError {
  constructor(message: string, public readonly accountIds: string[] = []) {
    super(message, 'LINK_INTEGRITY', 409, false);
  }
}

/**
 * A merge would create or destroy credits. Raised inside the transaction so
 * that it rolls back.
 */
export class ConservationViolationError extends AppError {
  constructor(public readonly expected: number, public readonly actual: number) {
    super(
      `Credit conservation violated: expected total ${expected}, got ${actual}`,
      'CONSERVATION_VIOLATION',
      500,
      false
    );
  }
}

/**
 * Wrap a synchronous store call so driver exceptions surface as DatabaseError.
 * Typed application errors pass through untouched.
 */
export function wrapDatabaseError<T>(fn: () => T, context: string): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof AppError) {
      throw error;
    }
    const sqliteCode =
      error instanceof Error && 'code' in error && typeof error.code === 'string'
        ? error.code
        : undefined;
    const message = error instanceof Error ? error.message : String(error);
    throw new DatabaseError(`${context}: ${message}`, sqliteCode);
  }
}

/**
 * Format error for user-facing response (no internal details)
 */
export function formatUserError(error: unknown): { error: string; code?: string } {
  if (error instanceof AppError && error.isOperational) {
    return {
      error: error.message,
      code: error.code,
    };
  }

  // Don't expose internal error details
  return {
    error: 'An unexpected error occurred',
    code: error instanceof AppError ? error.code : 'INTERNAL_ERROR',
  };
}

/**
 * Log error without exposing sensitive data
 */
export function logError(
  error: unknown,
  context: Record<string, unknown> = {}
): void {
  // Remove any sensitive fields from context
  const safeContext = { ...context };
  const sensitiveFields = ['email', 'code', 'otp', 'token', 'secret'];

  for (const field of sensitiveFields) {
    if (field in safeContext) {
      safeContext[field] = '[REDACTED]';
    }
  }

  if (error instanceof AppError) {
    logger.error(
      {
        ...safeContext,
        errorCode: error.code,
        statusCode: error.statusCode,
        isOperational: error.isOperational,
        message: error.message,
      },
      'Application error'
    );
  } else if (error instanceof Error) {
    logger.error(
      {
        ...safeContext,
        message: error.message,
        name: error.name,
      },
      'Unexpected error'
    );
  } else {
    logger.error(
      {
        ...safeContext,
        error: String(error),
      },
      'Unknown error'
    );
  }
}
