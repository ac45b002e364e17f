/**
 * Server Entry Point — HTTP API, Scheduler & Graceful Shutdown
 * Layer: Entry Point (top of the dependency tree)
 *
 * Starts when you run `npm start` or `npm run dev`. One process: the
 * collector keeps its one-run-at-a-time guard and its token cache in memory,
 * so it is not forked per CPU core.
 *
 * When COLLECT_INTERVAL_MINUTES > 0 an in-process scheduler triggers
 * incremental runs on that interval alongside the HTTP API.
 *
 * Graceful shutdown on SIGTERM/SIGINT:
 *   1. Stop the scheduler and wait for its run in flight.
 *   2. Stop accepting connections and let in-flight requests finish.
 *   3. Destroy the DB pool.
 *   4. Exit with code 0.
 */
import { CollectionScheduler } from '@application/services/CollectionScheduler';
import type { CollectionService } from '@application/services/CollectionService';
import { config } from '@core/config';
import { container } from '@core/container';
import { logger } from '@core/logger';
import { TOKENS } from '@core/types';
import { destroyDbConnection } from '@infrastructure/database/connection';
import { createApp } from '@interfaces/http/app';

const app = createApp();

const server = app.listen(config.port, () => {
  logger.info({ pid: process.pid, port: config.port }, `Collector API listening on :${config.port}`);
});

let scheduler: CollectionScheduler | null = null;

if (config.collect.intervalMinutes > 0) {
  scheduler = new CollectionScheduler(
    container.resolve<CollectionService>(TOKENS.CollectionService),
    config.collect.intervalMinutes * 60_000,
    // The configured window applies when the configured mode is already Incremental.
    config.collect.mode === 'Incremental' ? {} : { mode: 'Incremental' },
    logger,
  );
  scheduler.start();
}

const shutdown = async (signal: string): Promise<void> => {
  logger.info({ pid: process.pid, signal }, 'Graceful shutdown initiated');
  await scheduler?.stop();
  await new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
  await destroyDbConnection();
  process.exit(0);
};

const onSignal = (signal: string) => () => {
  shutdown(signal).catch((err: unknown) => {
    logger.error({ err }, 'Shutdown failed');
    process.exit(1);
  });
};

process.once('SIGTERM', onSignal('SIGTERM'));
process.once('SIGINT', onSignal('SIGINT'));
