/**
 * Knex Configuration (knexfile.ts)
 *
 * Tells the Knex CLI how to reach PostgreSQL and where the migrations live.
 * Connection settings come from the same source of truth as the app:
 * src/core/config.ts (DATABASE_URL, DB_SSL, DB_POOL_*), keyed by NODE_ENV.
 *
 * Migrations are TypeScript source in src/infrastructure/database/migrations/;
 * the CLI runs under `tsx` so they need no build step.
 *
 * Consumed by: Knex CLI (`npm run migrate`, `npm run migrate:rollback`) and the
 * collect script when `--migrate` is passed.
 */

import type { Knex } from 'knex';

import { config } from './src/core/config';
import path from 'node:path';

function getConnection(): Knex.PgConnectionConfig {
  return {
    connectionString: config.database.url,
    ssl: config.database.ssl ? { rejectUnauthorized: false } : false,
  };
}

const migrations: Knex.MigratorConfig = {
  directory: path.join(__dirname, 'src/infrastructure/database/migrations'),
  extension: 'ts',
};

const knexConfig: Record<string, Knex.Config> = {
  development: {
    client: 'pg',
    connection: getConnection(),
    pool: {
      min: config.database.pool.min,
      max: config.database.pool.max,
    },
    migrations,
  },

  production: {
    client: 'pg',
    connection: getConnection(),
    pool: {
      min: config.database.pool.min,
      max: config.database.pool.max,
    },
    migrations,
  },
};

export default knexConfig;
