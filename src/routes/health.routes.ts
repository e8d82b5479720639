import { Hono } from 'hono';
import { sql } from 'drizzle-orm';
import { getConnectionConfig, withConnection } from '../config/database.js';
import type { AppEnv } from '../types/index.js';

const healthRoutes = new Hono<AppEnv>();

// Store server start time for uptime calculation
const startTime = Date.now();

healthRoutes.get('/', async (c) => {
  const uptimeSeconds = Math.floor((Date.now() - startTime) / 1000);

  // Check database connectivity with a throwaway connection
  let dbStatus: 'unavailable' | 'connected' | 'error' = 'unavailable';
  let dbError: string | undefined;

  if (getConnectionConfig()) {
    try {
      await withConnection(async (db) => db.execute(sql`SELECT 1`));
      dbStatus = 'connected';
    } catch (error) {
      dbStatus = 'error';
      dbError = error instanceof Error ? error.message : 'Unknown database error';
    }
  }

  const status = dbStatus === 'connected' ? 'healthy' : 'degraded';

  return c.json({
    success: true,
    data: {
      status,
      version: '1.0.0',
      uptime: uptimeSeconds,
      timestamp: new Date().toISOString(),
      database: {
        status: dbStatus,
        error: dbError,
      },
    },
  });
});

export { healthRoutes };
