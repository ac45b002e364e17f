/**
 * Collection Service — Facade over the Collector
 * Layer: Application
 * Pattern: Facade Pattern
 *
 * The HTTP API, the CLI and the scheduler all start runs through here, so
 * the rules live in one place:
 *
 *   - one run at a time per process (a second caller gets a 409);
 *   - the finished RunResult is written to run history, and a failed write
 *     is logged without changing the result the caller gets back;
 *   - history reads go through the repository.
 *
 * The service is @injectable so the DI container wires it up automatically;
 * controllers resolve it via TOKENS.CollectionService.
 */
import type { RunConfigFactory } from '@application/factories/RunConfigFactory';
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { RunOverrides } from '@domain/entities/RunConfig';
import type { RunResult, RunSummary } from '@domain/entities/RunResult';
import type { IRunRepository } from '@domain/interfaces/IRunRepository';
import { ConflictError, NotFoundError } from '@shared/errors/AppError';
import { DEFAULT_RUN_HISTORY_LIMIT, MAX_RUN_HISTORY_LIMIT } from '@shared/constants';
import type { CollectionOrchestrator, RunOptions } from '@workers/collector/CollectionOrchestrator';
import { inject, injectable } from 'tsyringe';

@injectable()
export class CollectionService {
  private running = false;

  constructor(
    @inject(TOKENS.CollectionOrchestrator)
    private orchestrator: Pick<CollectionOrchestrator, 'run'>,
    @inject(TOKENS.RunRepository) private repo: IRunRepository,
    @inject(TOKENS.RunConfigFactory) private configFactory: RunConfigFactory,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  get isRunning(): boolean {
    return this.running;
  }

  async startRun(overrides: RunOverrides = {}, options: RunOptions = {}): Promise<RunResult> {
    if (this.running) {
      throw new ConflictError('A collection run is already in progress');
    }
    this.running = true;
    try {
      const config = this.configFactory.build(overrides);
      const result = await this.orchestrator.run(config, options);
      await this.persist(result);
      return result;
    } finally {
      this.running = false;
    }
  }

  async listRuns(limit = DEFAULT_RUN_HISTORY_LIMIT): Promise<RunSummary[]> {
    const capped = Math.min(MAX_RUN_HISTORY_LIMIT, Math.max(1, limit));
    return this.repo.listRecent(capped);
  }

  async getRun(runId: string): Promise<RunResult> {
    const result = await this.repo.findById(runId);
    if (!result) throw new NotFoundError('Run', runId);
    return result;
  }

  private async persist(result: RunResult): Promise<void> {
    try {
      await this.repo.save(result);
    } catch (err) {
      this.log.error({ err, runId: result.runId }, 'Failed to save run history');
    }
  }
}
