/**
 * PostgreSQL Run Repository — Run History
 * Layer: Infrastructure
 * Pattern: Repository Pattern (implements IRunRepository)
 *
 * I store finished RunResults in `collection_runs`: the listing columns as
 * real columns, the whole result as JSONB. `run_id` is unique and inserts
 * ignore conflicts, so saving the same run twice keeps the first copy.
 * @injectable so tsyringe injects Knex and Logger.
 */
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import {
  totals,
  type CollectionRunRow,
  type RunResult,
  type RunSummary,
} from '@domain/entities/RunResult';
import type { IRunRepository } from '@domain/interfaces/IRunRepository';
import type { Knex } from 'knex';
import { inject, injectable } from 'tsyringe';

const TABLE = 'collection_runs';

type SummaryRow = Pick<
  CollectionRunRow,
  'run_id' | 'status' | 'mode' | 'started_at' | 'finished_at' | 'total_sent' | 'total_failed'
>;

@injectable()
export class PostgresRunRepository implements IRunRepository {
  constructor(
    @inject(TOKENS.Knex) private db: Knex,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  async save(result: RunResult): Promise<void> {
    await this.db(TABLE).insert(toRow(result)).onConflict('run_id').ignore();
    this.log.debug({ runId: result.runId }, 'Run saved');
  }

  async findById(runId: string): Promise<RunResult | null> {
    const row: CollectionRunRow | undefined = await this.db(TABLE).where('run_id', runId).first();
    return row ? row.result : null;
  }

  async listRecent(limit: number): Promise<RunSummary[]> {
    const rows: SummaryRow[] = await this.db(TABLE)
      .select(
        'run_id',
        'status',
        'mode',
        'started_at',
        'finished_at',
        'total_sent',
        'total_failed',
      )
      .orderBy('started_at', 'desc')
      .limit(limit);

    return rows.map((row) => ({
      runId: row.run_id,
      status: row.status,
      mode: row.mode,
      startedAt: new Date(row.started_at).toISOString(),
      finishedAt: new Date(row.finished_at).toISOString(),
      totalSent: row.total_sent,
      totalFailed: row.total_failed,
    }));
  }
}

/** Map a camelCase RunResult to its snake_case row (single place for this conversion). */
export function toRow(result: RunResult): CollectionRunRow {
  const { sent, failed } = totals(result);
  return {
    run_id: result.runId,
    status: result.status,
    mode: result.window.mode,
    detail_level: result.detailLevel,
    window_start: new Date(result.window.start),
    window_end: new Date(result.window.end),
    started_at: new Date(result.startedAt),
    finished_at: new Date(result.finishedAt),
    total_sent: sent,
    total_failed: failed,
    result,
  };
}
