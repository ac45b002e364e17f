/**
 * Collection Scheduler — in-process incremental polling
 * Layer: Application
 *
 * Started by server.ts when COLLECT_INTERVAL_MINUTES > 0. Every interval it
 * asks the CollectionService for a run; a tick that finds a run in progress
 * is skipped rather than queued. Ticks never throw: a failed run is logged
 * and the next tick tries again.
 *
 * stop() clears the interval and waits for the run in flight, so graceful
 * shutdown does not cut an upload in half.
 */
import type { CollectionService } from '@application/services/CollectionService';
import type { Logger } from '@core/logger';
import type { RunOverrides } from '@domain/entities/RunConfig';
import { totals } from '@domain/entities/RunResult';
import { ConflictError } from '@shared/errors/AppError';
import { describeError } from '@shared/errors/CollectorError';

export class CollectionScheduler {
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> = Promise.resolve();
  private readonly log: Logger;

  constructor(
    private readonly service: Pick<CollectionService, 'startRun' | 'isRunning'>,
    private readonly intervalMs: number,
    private readonly overrides: RunOverrides,
    logger: Logger,
  ) {
    this.log = logger.child({ component: 'CollectionScheduler' });
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.inFlight = this.tick();
    }, this.intervalMs);
    this.log.info({ intervalMs: this.intervalMs }, 'Collection scheduler started');
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      this.log.info('Collection scheduler stopped');
    }
    await this.inFlight;
  }

  async tick(): Promise<void> {
    if (this.service.isRunning) {
      this.log.info('Previous run still in progress, skipping tick');
      return;
    }
    try {
      const result = await this.service.startRun(this.overrides);
      const { sent, failed } = totals(result);
      this.log.info(
        { runId: result.runId, status: result.status, sent, failed },
        'Scheduled run finished',
      );
    } catch (err) {
      if (err instanceof ConflictError) {
        this.log.info('Previous run still in progress, skipping tick');
        return;
      }
      this.log.error({ error: describeError(err) }, 'Scheduled run failed');
    }
  }
}
