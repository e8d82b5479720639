/**
 * Standardized API response builders
 * All API responses should use these helpers for consistency
 */

import { randomUUID } from 'crypto';
import type {
  ApiSuccessResponse,
  ApiErrorResponse,
  ResponseMeta,
} from '../types/api.js';

/**
 * Generate response metadata with timestamp and request ID.
 * Reuses the request ID assigned by the request-id middleware when one is given.
 */
function generateMeta(requestId?: string): ResponseMeta {
  return {
    timestamp: new Date().toISOString(),
    request_id: requestId ?? randomUUID(),
  };
}

/**
 * Build a successful API response
 * @param data - The response data
 * @param requestId - Request ID to echo back in `meta`
 */
export function success<T>(data: T, requestId?: string): ApiSuccessResponse<T> {
  return {
    success: true,
    data,
    meta: generateMeta(requestId),
  };
}

/**
 * Build an error API response
 * @param code - Error code (e.g., "AUTH_REQUIRED", "VALIDATION_ERROR")
 * @param message - Human-readable error message
 * @param details - Optional additional error details
 * @param requestId - Request ID to echo back in `meta`
 */
export function error(
  code: string,
  message: string,
  details?: Record<string, unknown>,
  requestId?: string
): ApiErrorResponse {
  return {
    success: false,
    error: {
      code,
      message,
      details,
    },
    meta: generateMeta(requestId),
  };
}
