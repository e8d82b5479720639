import { OpenAPIHono } from '@hono/zod-openapi';
import { swaggerUI } from '@hono/swagger-ui';
import { cors } from 'hono/cors';
import { secureHeaders } from 'hono/secure-headers';
import { bodyLimit } from 'hono/body-limit';
import { errorHandler } from './middleware/error-handler.js';
import { requestLogger } from './middleware/request-logger.js';
import { env } from './config/env.js';
import { healthRoutes, sectorRoutes } from './routes/index.js';
import { error } from './utils/response.js';
import type { AppEnv } from './types/index.js';

const app = new OpenAPIHono<AppEnv>().basePath('/v1');

// Configure OpenAPI documentation
app.doc('/openapi.json', {
  openapi: '3.0.0',
  info: {
    title: 'Sector Analytics API',
    version: '1.0.0',
    description:
      'Sector-level stock performance statistics computed from daily price history.\n\n' +
      '## Authentication\n\n' +
      'Sector endpoints require JWT authentication via Bearer token in Authorization header:\n' +
      '```\nAuthorization: Bearer <access_token>\n```\n\n' +
      '## Endpoints\n\n' +
      '- `GET /sectors` - sectors with company counts\n' +
      '- `GET /sectors/performance?period=1D|1W|1M|3M|6M|1Y|YTD` - performance per sector\n' +
      '- `GET /sectors/compare?sectors=A,B&period=1D|1W|1M|3M|6M|1Y` - companies of the named sectors side by side\n\n' +
      '## Error Response Format\n\n' +
      '```json\n' +
      '{\n' +
      '  "success": false,\n' +
      '  "error": {\n' +
      '    "code": "ERROR_CODE",\n' +
      '    "message": "Human-readable error message",\n' +
      '    "details": {}\n' +
      '  },\n' +
      '  "meta": {\n' +
      '    "timestamp": "2024-01-01T00:00:00.000Z",\n' +
      '    "request_id": "uuid"\n' +
      '  }\n' +
      '}\n```\n\n' +
      '**Error Codes:**\n\n' +
      '- `AUTH_REQUIRED` (401): Authorization header missing or invalid\n' +
      '- `AUTH_EXPIRED` (401): Access token has expired\n' +
      '- `NOT_FOUND` (404): No such route\n' +
      '- `VALIDATION_ERROR` (422): Request validation failed, see `details` for field errors\n' +
      '- `INTERNAL_ERROR` (500): Unexpected server error, database failures included',
  },
  servers: [
    {
      url: '/v1',
      description: 'API v1',
    },
  ],
  tags: [
    { name: 'health', description: 'Health check endpoints' },
    { name: 'sectors', description: 'Sector performance and comparison' },
  ],
});

// Swagger UI documentation endpoint
app.get('/docs', swaggerUI({ url: '/v1/openapi.json' }));

// Request ID middleware - adds unique request_id to context
app.use('*', async (c, next) => {
  c.set('requestId', crypto.randomUUID());
  await next();
});

// Structured request timing logger
app.use('*', requestLogger);

// Security headers middleware
app.use('*', secureHeaders());

// Request body size limit (1MB)
app.use('*', bodyLimit({ maxSize: 1024 * 1024 }));

// CORS middleware - configurable via environment variable
// Supports comma-separated origins or wildcard '*' for all origins
const corsOrigin = (() => {
  if (env.CORS_ORIGIN === '*') {
    return '*';
  }

  const allowedOrigins = env.CORS_ORIGIN.split(',').map(origin => origin.trim());

  return (origin: string) => {
    if (allowedOrigins.includes(origin)) {
      return origin;
    }
    return allowedOrigins[0]; // Fallback to first origin
  };
})();

app.use(
  '*',
  cors({
    origin: corsOrigin,
    credentials: true,
  })
);

// Global error handler
app.onError(errorHandler);

app.notFound((c) =>
  c.json(error('NOT_FOUND', `Route ${c.req.method} ${c.req.path} not found`, undefined, c.get('requestId')), 404)
);

// Register routes
app.route('/health', healthRoutes);
app.route('/sectors', sectorRoutes);

export { app };
export default app;
