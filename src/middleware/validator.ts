/**
 * Zod-based request validation middleware for Hono
 * Validates query parameters before the route handler runs
 */

import type { MiddlewareHandler } from 'hono';
import type { z, ZodTypeAny } from 'zod';
import { ValidationError } from '../utils/errors.js';

/**
 * Context variables added by the validator: the parsed, typed query
 */
export type ValidatedQuery<T extends ZodTypeAny> = {
  Variables: {
    query: z.output<T>;
  };
};

/**
 * Creates a middleware that validates the query string against `schema`.
 *
 * On success the parsed value (defaults and transforms applied) is stored
 * as the `query` context variable. On failure a ValidationError (422) is
 * thrown and the handler never runs.
 *
 * @example
 * app.get('/sectors/performance', validateQuery(z.object({ period: periodSchema })), async (c) => {
 *   const { period } = c.get('query');
 * });
 */
export function validateQuery<T extends ZodTypeAny>(
  schema: T
): MiddlewareHandler<ValidatedQuery<T>> {
  return async (c, next) => {
    const result = schema.safeParse(c.req.query());

    if (!result.success) {
      // Extract validation errors in a readable format
      const issues = result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
        code: issue.code,
      }));

      throw new ValidationError('Request validation failed', {
        target: 'query',
        issues,
      });
    }

    c.set('query', result.data);

    await next();
  };
}
