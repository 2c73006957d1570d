import { Pool } from 'pg';
import type { Config } from '../config/index.js';
import logger from '../utils/logger.js';

/**
 * PostgreSQL pool for the prototype store.
 * statement_timeout bounds every query server-side as well as from the caller.
 */
export function createPool(config: Config): Pool {
  const pool = new Pool({
    host: config.postgres.host,
    port: config.postgres.port,
    user: config.postgres.user,
    password: config.postgres.password,
    database: config.postgres.database,
    max: config.postgres.maxConnections,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: config.router.timeouts.vectorSearchMs,
    statement_timeout: config.router.timeouts.vectorSearchMs,
  });

  pool.on('error', (err) => {
    logger.error('Unexpected PostgreSQL error', { error: err.message });
  });

  pool.on('connect', () => {
    logger.debug('New PostgreSQL connection established');
  });

  return pool;
}

export async function healthCheck(pool: Pool): Promise<boolean> {
  try {
    await pool.query('SELECT 1');
    return true;
  } catch {
    return false;
  }
}

export async function closePool(pool: Pool): Promise<void> {
  await pool.end();
  logger.info('PostgreSQL pool closed');
}
