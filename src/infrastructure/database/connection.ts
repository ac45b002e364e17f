/**
 * Database Connection Pool — Singleton
 * Layer: Infrastructure
 * Pattern: Singleton
 *
 * Run history is the only thing the collector stores, so the pool is small
 * (DB_POOL_MIN/DB_POOL_MAX, 0–5 by default) and `min: 0` lets a CLI run exit
 * without holding idle sockets.
 *
 * Knex opens connections lazily: creating the pool does not touch the
 * database, so the HTTP server and the CLI start even when PostgreSQL is
 * down. Saving a run then fails, and that failure is only logged.
 *
 * `destroyDbConnection()` is called during graceful shutdown (SIGTERM) and at
 * the end of a CLI run.
 */
import knex, { Knex } from 'knex';
import { config } from '@core/config';
import { logger } from '@core/logger';

let instance: Knex | null = null;

export function pgConnection(): Knex.PgConnectionConfig {
  return {
    connectionString: config.database.url,
    ssl: config.database.ssl ? { rejectUnauthorized: false } : false,
  };
}

export function getDbConnection(): Knex {
  if (!instance) {
    instance = knex({
      client: 'pg',
      connection: pgConnection(),
      pool: {
        min: config.database.pool.min,
        max: config.database.pool.max,
        afterCreate: (conn: unknown, done: (err: Error | null, conn: unknown) => void) => {
          logger.debug('New database connection established');
          done(null, conn);
        },
      },
      acquireConnectionTimeout: 10000,
    });

    logger.info({ ssl: config.database.ssl }, 'Database connection pool initialized');
  }

  return instance;
}

/** Gracefully tears down the pool (used on SIGTERM / CLI exit). */
export async function destroyDbConnection(): Promise<void> {
  if (instance) {
    await instance.destroy();
    instance = null;
    logger.info('Database connection pool destroyed');
  }
}
