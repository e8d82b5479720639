/**
 * Global error handler middleware for Hono
 * Catches all errors and returns standardized error responses
 */

import type { Context } from 'hono';
import { ZodError } from 'zod';
import { env } from '../config/env.js';
import { AppError } from '../utils/errors.js';
import { error } from '../utils/response.js';

/**
 * Global error handler middleware
 * Transforms all errors into standardized API error responses
 */
export function errorHandler(err: Error, c: Context) {
  const requestId: string | undefined = c.get('requestId');

  // Log error for debugging
  console.error(JSON.stringify({
    timestamp: new Date().toISOString(),
    event: 'request_error',
    request_id: requestId,
    name: err.name,
    message: err.message,
    stack: err.stack,
  }));

  // Handle custom AppError instances
  if (err instanceof AppError) {
    return c.json(
      error(err.code, err.message, err.details, requestId),
      err.statusCode
    );
  }

  // Handle Zod validation errors (if thrown directly)
  if (err instanceof ZodError) {
    return c.json(
      error('VALIDATION_ERROR', 'Request validation failed', {
        issues: err.issues,
      }, requestId),
      422
    );
  }

  // Handle all other unexpected errors, database failures included
  // Don't leak sensitive error details outside development
  const errorDetails = env.NODE_ENV === 'development'
    ? {
        name: err.name,
        message: err.message,
        stack: err.stack,
      }
    : undefined;

  return c.json(
    error('INTERNAL_ERROR', 'An unexpected error occurred', errorDetails, requestId),
    500
  );
}
