/**
 * Structured Logger (Pino)
 * Layer: Core
 *
 * One JSON object per line in production, piped through `pino-pretty` in
 * development. Collector components never log through this instance
 * directly: they take a `Logger` in their constructor and derive a child
 * (`log.child({ component: 'BatchIngestionClient' })`), so every line carries
 * the component and, during a run, the run id.
 *
 * Tests pass `pino({ level: 'silent' })` or rely on LOG_LEVEL=silent from
 * jest.setup.ts.
 */
import pino from 'pino';
import { config } from './config';

export const logger = pino({
  level: config.log.level,
  transport: config.isDev
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
});

export type Logger = pino.Logger;
