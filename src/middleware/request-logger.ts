import type { MiddlewareHandler } from 'hono';

// Define context variables type
type Variables = {
  requestId: string;
};

const SLOW_REQUEST_MS = 500;

/**
 * Request timing and structured JSON logging middleware
 * Logs every request with timing information in JSON format
 * Warns on slow requests (>500ms)
 */
export const requestLogger: MiddlewareHandler<{ Variables: Variables }> = async (c, next) => {
  const start = Date.now();
  const requestId = c.get('requestId');

  await next();

  const duration = Date.now() - start;
  const { method } = c.req;
  const status = c.res.status;

  // Structured log entry; path excludes the query string
  const logEntry = {
    timestamp: new Date().toISOString(),
    request_id: requestId,
    method,
    path: c.req.path,
    status,
    duration_ms: duration,
  };

  if (status >= 500) {
    console.error(JSON.stringify(logEntry));
  } else if (status >= 400) {
    console.warn(JSON.stringify(logEntry));
  } else if (duration > SLOW_REQUEST_MS) {
    console.warn(JSON.stringify({ ...logEntry, warning: 'slow_request' }));
  } else {
    console.log(JSON.stringify(logEntry));
  }
};
