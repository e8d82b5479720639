/**
 * Custom error classes for standardized error handling across the API
 */

export type ErrorCode =
  | 'AUTH_REQUIRED'
  | 'AUTH_EXPIRED'
  | 'NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'INTERNAL_ERROR';

/**
 * Base application error class
 * All custom errors should extend this class
 */
export class AppError extends Error {
  public readonly statusCode: 401 | 404 | 422 | 500;
  public readonly code: ErrorCode;
  public readonly details?: Record<string, unknown>;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    statusCode: 401 | 404 | 422 | 500,
    code: ErrorCode,
    details?: Record<string, unknown>,
    isOperational = true
  ) {
    super(message);
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
    this.isOperational = isOperational;

    // Maintains proper stack trace for where error was thrown (V8 engines)
    Error.captureStackTrace(this, this.constructor);

    // Set the prototype explicitly (TypeScript requirement)
    Object.setPrototypeOf(this, AppError.prototype);
  }
}

/**
 * 401 Unauthorized - Authentication required
 */
export class AuthRequiredError extends AppError {
  constructor(message = 'Authentication required', details?: Record<string, unknown>) {
    super(message, 401, 'AUTH_REQUIRED', details);
    Object.setPrototypeOf(this, AuthRequiredError.prototype);
  }
}

/**
 * 401 Unauthorized - Token expired
 */
export class AuthExpiredError extends AppError {
  constructor(message = 'Token has expired', details?: Record<string, unknown>) {
    super(message, 401, 'AUTH_EXPIRED', details);
    Object.setPrototypeOf(this, AuthExpiredError.prototype);
  }
}

/**
 * 422 Unprocessable Entity - Validation failed
 */
export class ValidationError extends AppError {
  constructor(message = 'Validation failed', details?: Record<string, unknown>) {
    super(message, 422, 'VALIDATION_ERROR', details);
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * 500 Internal Server Error - Unexpected error
 */
export class InternalError extends AppError {
  constructor(message = 'Internal server error', details?: Record<string, unknown>) {
    super(message, 500, 'INTERNAL_ERROR', details, false);
    Object.setPrototypeOf(this, InternalError.prototype);
  }
}
