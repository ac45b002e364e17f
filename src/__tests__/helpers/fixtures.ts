/**
 * Test Fixtures — Reusable Sample Data
 * Layer: Test Helpers
 *
 * Shared run configs, runtimes and raw records so tests don't repeat the
 * same objects. The clock is fixed at FIXED_NOW; a 1200-minute Incremental
 * window therefore covers 2026-02-28T16:00:00Z → 2026-03-01T12:00:00Z.
 */
import type { RunConfig } from '@domain/entities/RunConfig';
import type { RunResult } from '@domain/entities/RunResult';
import type { CollectorRuntime } from '@workers/collector/runtime';
import pino from 'pino';

export const FIXED_NOW = new Date('2026-03-01T12:00:00.000Z');

export const silentLogger = pino({ level: 'silent' });

export function buildRunConfig(overrides: Partial<RunConfig> = {}): RunConfig {
  return {
    streams: ['Custom-FabricPipelineRun_CL'],
    entities: {
      Workspace: { type: 'all' },
      Pipeline: { type: 'all' },
      Dataflow: { type: 'all' },
      Dataset: { type: 'all' },
      Capacity: { type: 'all' },
    },
    window: { mode: 'Incremental', lookbackMinutes: 1200 },
    detailLevel: 'Summary',
    workerCount: 2,
    batchLimits: { maxRecords: 500, maxBytes: 1_000_000 },
    retryPolicy: { baseDelayMs: 100, multiplier: 2, maxAttempts: 3, maxDelayMs: 1000, jitter: 0 },
    throttle: { maxRetries: 3, defaultDelayMs: 50 },
    maxPages: 10,
    ...overrides,
  };
}

export interface TestRuntime extends CollectorRuntime {
  sleep: jest.Mock<Promise<void>, [number, AbortSignal?]>;
}

/** Fixed clock, no-op sleeper (records requested delays), mid-point jitter. */
export function createTestRuntime(now: Date = FIXED_NOW): TestRuntime {
  return {
    now: () => now,
    sleep: jest.fn<Promise<void>, [number, AbortSignal?]>().mockResolvedValue(undefined),
    random: () => 0.5,
  };
}

/** A pipeline job instance that started `minutesAgo` before FIXED_NOW and ran for 90 s. */
export function jobInstance(id: string, minutesAgo = 60): Record<string, unknown> {
  const start = new Date(FIXED_NOW.getTime() - minutesAgo * 60_000);
  return {
    id,
    itemId: 'pl-1',
    jobType: 'Pipeline',
    invokeType: 'Scheduled',
    status: 'Completed',
    startTimeUtc: start.toISOString(),
    endTimeUtc: new Date(start.getTime() + 90_000).toISOString(),
    failureReason: null,
  };
}

export function jobInstances(prefix: string, count: number): Record<string, unknown>[] {
  return Array.from({ length: count }, (_, i) => jobInstance(`${prefix}-${i + 1}`));
}

export const sampleRunResult: RunResult = {
  runId: 'run-0001',
  status: 'Completed',
  window: {
    start: '2026-02-28T16:00:00.000Z',
    end: '2026-03-01T12:00:00.000Z',
    mode: 'Incremental',
  },
  detailLevel: 'Full',
  startedAt: '2026-03-01T12:00:00.000Z',
  finishedAt: '2026-03-01T12:01:30.000Z',
  entitiesProcessed: 3,
  deadlineExceeded: false,
  streams: {
    'Custom-FabricPipelineRun_CL': {
      emitted: 12,
      sent: 12,
      failed: 0,
      skippedEntities: [],
      errors: [],
    },
    'Custom-FabricPipelineActivityRun_CL': {
      emitted: 30,
      sent: 28,
      failed: 2,
      skippedEntities: [],
      errors: ['SchemaMismatchError: bad record'],
    },
  },
  skipped: [],
  entityFailures: [],
};
