import { drizzle } from 'drizzle-orm/node-postgres';
import type { NodePgDatabase } from 'drizzle-orm/node-postgres';
import pg from 'pg';
import type { ClientConfig } from 'pg';
import { env } from './env.js';
import * as schema from '../db/schema/index.js';
import { InternalError } from '../utils/errors.js';

const { Client } = pg;

export type Database = NodePgDatabase<typeof schema>;

/**
 * Resolve connection parameters for PostgreSQL.
 *
 * DATABASE_URL wins when set; otherwise the discrete DB_* variables are used.
 * Returns null when neither is configured.
 */
export function getConnectionConfig(): ClientConfig | null {
  if (env.DATABASE_URL) {
    return { connectionString: env.DATABASE_URL };
  }

  if (env.DB_HOST) {
    return {
      host: env.DB_HOST,
      port: env.DB_PORT,
      database: env.DB_NAME,
      user: env.DB_USER,
      password: env.DB_PASSWORD,
    };
  }

  return null;
}

/**
 * Run `work` against a dedicated database connection.
 *
 * Every call opens its own `pg.Client` and closes it once `work` settles,
 * whether it resolved or threw. There is no pooling and no retry: driver
 * errors reach the caller unchanged. A failure while closing is logged
 * and never overrides the result of `work`.
 */
export async function withConnection<T>(work: (db: Database) => Promise<T>): Promise<T> {
  const config = getConnectionConfig();

  if (!config) {
    throw new InternalError('Database not available');
  }

  const client = new Client(config);

  try {
    await client.connect();
    return await work(drizzle(client, { schema }));
  } finally {
    // A failed disconnect must not replace the outcome of `work`
    try {
      await client.end();
    } catch (error) {
      console.error(JSON.stringify({
        timestamp: new Date().toISOString(),
        event: 'db_disconnect_error',
        message: error instanceof Error ? error.message : String(error),
      }));
    }
  }
}
