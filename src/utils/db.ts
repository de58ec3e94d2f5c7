/**
 * postgres.js connection pool
 *
 * One pool per process, created on first use and reused across the
 * application. Only the PostgreSQL observation store touches it.
 */

import postgres from 'postgres';
import { moduleLogger } from './logger';

const logger = moduleLogger('db');

export type Sql = postgres.Sql;
export type Fragment = postgres.PendingQuery<postgres.Row[]>;

let pool: Sql | undefined;

export const getDb = (databaseUrl: string, maxConnections = 10): Sql => {
  if (!pool) {
    pool = postgres(databaseUrl, {
      max: maxConnections,
      idle_timeout: 30,
      connect_timeout: 10,
      onnotice: (notice) => {
        logger.debug('PostgreSQL notice', { message: notice.message });
      }
    });
  }
  return pool;
};

// Graceful disconnect helper
export const disconnectDb = async (): Promise<void> => {
  if (!pool) return;
  await pool.end({ timeout: 5 });
  pool = undefined;
};

// Health check helper
export const checkDatabaseConnection = async (): Promise<boolean> => {
  if (!pool) return false;
  try {
    await pool`SELECT 1`;
    return true;
  } catch (error) {
    logger.warn('Database health check failed', { error });
    return false;
  }
};
