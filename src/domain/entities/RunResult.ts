/**
 * Run Result — Externally Visible End State of One Run
 * Layer: Domain
 *
 * Two shapes, same as the rest of the domain:
 *
 *   RunResult         — camelCase, returned by the orchestrator, the API and
 *                       the CLI.
 *   CollectionRunRow  — snake_case, mirrors the `collection_runs` table.
 *
 * Conservation: for every stream, `sent + failed === emitted`. A record the
 * normalizer produced always ends up in exactly one of the two counters.
 */
import type { CollectionMode, DetailLevel } from './CollectionWindow';
import type { EntityKind } from './EntityReference';
import type { StreamName } from './StreamSchema';

export type RunState =
  | 'Init'
  | 'Discovering'
  | 'Collecting'
  | 'Flushing'
  | 'Completed'
  | 'PartiallyFailed';

export type RunStatus = Extract<RunState, 'Completed' | 'PartiallyFailed'>;

export interface StreamResult {
  /** Records the normalizer produced for this stream. */
  emitted: number;
  sent: number;
  failed: number;
  /** Entities whose collection stopped early, as "Pipeline ws/id" labels. */
  skippedEntities: string[];
  errors: string[];
}

/** A (kind, parent) pair discovery could not list. */
export interface SkippedScope {
  kind: EntityKind;
  parentId?: string;
  reason: string;
}

export interface EntityFailure {
  entity: string;
  error: string;
  message: string;
}

export interface RunResult {
  runId: string;
  status: RunStatus;
  window: { start: string; end: string; mode: CollectionMode };
  detailLevel: DetailLevel;
  startedAt: string;
  finishedAt: string;
  entitiesProcessed: number;
  deadlineExceeded: boolean;
  streams: Partial<Record<StreamName, StreamResult>>;
  skipped: SkippedScope[];
  entityFailures: EntityFailure[];
}

/** Row shape of `collection_runs`. */
export interface CollectionRunRow {
  id?: number;
  run_id: string;
  status: RunStatus;
  mode: CollectionMode;
  detail_level: DetailLevel;
  window_start: Date;
  window_end: Date;
  started_at: Date;
  finished_at: Date;
  total_sent: number;
  total_failed: number;
  result: RunResult;
}

/** Listing view used by GET /runs. */
export interface RunSummary {
  runId: string;
  status: RunStatus;
  mode: CollectionMode;
  startedAt: string;
  finishedAt: string;
  totalSent: number;
  totalFailed: number;
}

export function totals(result: RunResult): { sent: number; failed: number } {
  let sent = 0;
  let failed = 0;
  for (const stream of Object.values(result.streams)) {
    if (!stream) continue;
    sent += stream.sent;
    failed += stream.failed;
  }
  return { sent, failed };
}
