/**
 * Application Configuration — Single Source of Truth
 * Layer: Core
 *
 * Every setting the collector needs (source API, ingestion target, batch
 * limits, retry policy, default entity scopes) is funnelled through this file.
 * Other modules import `config` instead of reading process.env directly.
 *
 * Flow: dotenv loads .env into process.env; a Zod schema validates and coerces
 * ("500" → 500, "a,b" → ['a', 'b']) at startup. If anything is missing or
 * invalid the process exits immediately with the offending keys listed.
 *
 * Entity scopes use an explicit sentinel: "*" (or "all") means "everything the
 * principal can see", anything else is a comma-separated id list. Child kinds
 * (pipelines, dataflows, datasets) take `<workspaceId>/<itemId>` ids.
 */
import 'dotenv/config';

import { z } from 'zod/v4';

import { COLLECTION_MODES, DETAIL_LEVELS, STREAM_NAMES } from '@shared/constants';

const scopeString = z
  .string()
  .default('*')
  .transform((value) => {
    const trimmed = value.trim();
    if (trimmed === '' || trimmed === '*' || trimmed.toLowerCase() === 'all') {
      return { type: 'all' as const };
    }
    const ids = trimmed
      .split(',')
      .map((id) => id.trim())
      .filter((id) => id.length > 0);
    return { type: 'explicit' as const, ids };
  });

const optionalPositiveInt = z.preprocess(
  (value) => (value === '' || value === undefined ? undefined : value),
  z.coerce.number().int().positive().optional(),
);

const envSchema = z.object({
  PORT: z.coerce.number().default(3000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  /** Run history store (PostgreSQL connection URL). */
  DATABASE_URL: z.string().min(1).default('postgres://postgres:@localhost:5432/fabric_telemetry'),
  DB_SSL: z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true'),
  DB_POOL_MIN: z.coerce.number().default(0),
  DB_POOL_MAX: z.coerce.number().default(5),

  FABRIC_API_BASE_URL: z.url().default('https://api.fabric.microsoft.com/v1'),
  FABRIC_API_SCOPE: z.string().min(1).default('https://api.fabric.microsoft.com/.default'),

  /** Static bearer token. Used when no service principal is configured. */
  FABRIC_ACCESS_TOKEN: z.string().default(''),
  AZURE_TENANT_ID: z.string().default(''),
  AZURE_CLIENT_ID: z.string().default(''),
  AZURE_CLIENT_SECRET: z.string().default(''),
  AZURE_AUTHORITY_HOST: z.url().default('https://login.microsoftonline.com'),

  /** Data Collection Endpoint base URL; checked when a run starts, not at boot. */
  INGESTION_ENDPOINT: z.string().default(''),
  /** Immutable id of the Data Collection Rule bound to the streams. */
  INGESTION_RULE_ID: z.string().default(''),
  INGESTION_API_VERSION: z.string().default('2023-01-01'),
  INGESTION_SCOPE: z.string().min(1).default('https://monitor.azure.com/.default'),

  COLLECT_STREAMS: z
    .string()
    .default(STREAM_NAMES.join(','))
    .transform((value) =>
      value
        .split(',')
        .map((name) => name.trim())
        .filter((name) => name.length > 0),
    )
    .pipe(z.array(z.enum(STREAM_NAMES)).min(1)),
  COLLECT_WORKSPACES: scopeString,
  COLLECT_PIPELINES: scopeString,
  COLLECT_DATAFLOWS: scopeString,
  COLLECT_DATASETS: scopeString,
  COLLECT_CAPACITIES: scopeString,

  COLLECT_MODE: z.enum(COLLECTION_MODES).default('Incremental'),
  COLLECT_LOOKBACK_MINUTES: optionalPositiveInt,
  COLLECT_DETAIL_LEVEL: z.preprocess(
    (value) => (value === '' ? undefined : value),
    z.enum(DETAIL_LEVELS).optional(),
  ),
  COLLECT_WORKER_COUNT: z.coerce.number().int().min(1).max(64).default(4),
  /** Safety valve: pages read per entity before the reader gives up. */
  COLLECT_MAX_PAGES: z.coerce.number().int().positive().default(500),
  COLLECT_DEADLINE_MS: optionalPositiveInt,
  /** 0 disables the in-process incremental scheduler. */
  COLLECT_INTERVAL_MINUTES: z.coerce.number().int().min(0).default(0),

  BATCH_MAX_RECORDS: z.coerce.number().int().positive().default(500),
  BATCH_MAX_BYTES: z.coerce.number().int().positive().max(1_000_000).default(1_000_000),

  RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  RETRY_MULTIPLIER: z.coerce.number().min(1).default(2),
  RETRY_MAX_ATTEMPTS: z.coerce.number().int().positive().default(5),
  RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(60_000),
  RETRY_JITTER: z.coerce.number().min(0).max(1).default(0.2),

  THROTTLE_MAX_RETRIES: z.coerce.number().int().min(0).default(5),
  THROTTLE_DEFAULT_DELAY_MS: z.coerce.number().int().min(0).default(30_000),

  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  // eslint-disable-next-line no-console
  console.error('Invalid environment configuration:', z.treeifyError(parsed.error));
  process.exit(1);
}

const env = parsed.data;

export const config = {
  port: env.PORT,
  nodeEnv: env.NODE_ENV,
  isDev: env.NODE_ENV === 'development',
  isProd: env.NODE_ENV === 'production',

  database: {
    url: env.DATABASE_URL,
    ssl: env.DB_SSL,
    pool: {
      min: env.DB_POOL_MIN,
      max: env.DB_POOL_MAX,
    },
  },

  log: {
    level: env.LOG_LEVEL,
  },

  source: {
    baseUrl: env.FABRIC_API_BASE_URL,
    scope: env.FABRIC_API_SCOPE,
  },

  credentials: {
    staticToken: env.FABRIC_ACCESS_TOKEN,
    tenantId: env.AZURE_TENANT_ID,
    clientId: env.AZURE_CLIENT_ID,
    clientSecret: env.AZURE_CLIENT_SECRET,
    authorityHost: env.AZURE_AUTHORITY_HOST,
  },

  ingestion: {
    endpoint: env.INGESTION_ENDPOINT,
    ruleId: env.INGESTION_RULE_ID,
    apiVersion: env.INGESTION_API_VERSION,
    scope: env.INGESTION_SCOPE,
  },

  http: {
    timeoutMs: env.HTTP_TIMEOUT_MS,
  },

  collect: {
    streams: env.COLLECT_STREAMS,
    entities: {
      Workspace: env.COLLECT_WORKSPACES,
      Pipeline: env.COLLECT_PIPELINES,
      Dataflow: env.COLLECT_DATAFLOWS,
      Dataset: env.COLLECT_DATASETS,
      Capacity: env.COLLECT_CAPACITIES,
    },
    mode: env.COLLECT_MODE,
    lookbackMinutes: env.COLLECT_LOOKBACK_MINUTES,
    detailLevel: env.COLLECT_DETAIL_LEVEL,
    workerCount: env.COLLECT_WORKER_COUNT,
    maxPages: env.COLLECT_MAX_PAGES,
    deadlineMs: env.COLLECT_DEADLINE_MS,
    intervalMinutes: env.COLLECT_INTERVAL_MINUTES,
    batchLimits: {
      maxRecords: env.BATCH_MAX_RECORDS,
      maxBytes: env.BATCH_MAX_BYTES,
    },
    retryPolicy: {
      baseDelayMs: env.RETRY_BASE_DELAY_MS,
      multiplier: env.RETRY_MULTIPLIER,
      maxAttempts: env.RETRY_MAX_ATTEMPTS,
      maxDelayMs: env.RETRY_MAX_DELAY_MS,
      jitter: env.RETRY_JITTER,
    },
    throttle: {
      maxRetries: env.THROTTLE_MAX_RETRIES,
      defaultDelayMs: env.THROTTLE_DEFAULT_DELAY_MS,
    },
  },
} as const;

export type AppConfig = typeof config;
export type CollectDefaults = AppConfig['collect'];
