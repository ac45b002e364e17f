/**
 * Run Repository Interface — Run History Contract
 * Layer: Domain
 * Pattern: Repository Pattern
 *
 * Where finished RunResults go. The collector itself never reads history;
 * the API and CLI do.
 */
import type { RunResult, RunSummary } from '@domain/entities/RunResult';

export interface IRunRepository {
  /** Persist a finished run. Saving the same runId twice is a no-op. */
  save(result: RunResult): Promise<void>;

  findById(runId: string): Promise<RunResult | null>;

  /** Most recent runs first. */
  listRecent(limit: number): Promise<RunSummary[]>;
}
