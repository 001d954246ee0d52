import { Pool } from 'pg';
import { dbLogger } from '../utils/logger';

const isLocalUrl = (url: string): boolean => url.includes('localhost') || url.includes('127.0.0.1');

/**
 * PostgreSQL connection pool. SSL is enabled for every non-local host.
 */
export const createPool = (databaseUrl: string): Pool => {
  dbLogger.info({ databaseUrl: databaseUrl.replace(/:[^:@]+@/, ':****@') }, 'Creating PostgreSQL pool');

  const pool = new Pool({
    connectionString: databaseUrl,
    ssl: isLocalUrl(databaseUrl) ? false : { rejectUnauthorized: false },
    max: 10,
    connectionTimeoutMillis: 5000,
    idleTimeoutMillis: 30000,
    // Keep connections alive so idle clients are not dropped by the host
    keepAlive: true,
    keepAliveInitialDelayMillis: 10000,
  });

  pool.on('error', (err: Error & { code?: string }) => {
    dbLogger.error({ code: err.code, message: err.message, name: err.name }, 'PostgreSQL pool error');
  });

  return pool;
};

/**
 * Open one connection up front so the first request does not pay for it.
 * Failure is logged; connections are otherwise established on demand.
 */
export async function warmUpPool(pool: Pool): Promise<void> {
  try {
    await pool.query('SELECT 1');
    dbLogger.info('Database pool warmed up');
  } catch (error) {
    dbLogger.warn({ err: error }, 'Failed to warm up database pool');
  }
}
