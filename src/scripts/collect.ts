/**
 * Collect CLI Script — One Collection Run from the Shell
 * Layer: Entry Point (CLI, not HTTP)
 *
 * npm run collect -- [--mode Incremental|Bulk|ActivityBackfill] [--lookback <minutes>]
 *                    [--detail Summary|Full] [--streams a,b] [--deadline <ms>] [--migrate]
 *
 * Runs the same CollectionService the HTTP API uses, prints the window and a
 * per-stream summary, and exits with:
 *
 *   0  Completed
 *   2  PartiallyFailed (some records, entities or scopes did not make it)
 *   1  fatal error (bad configuration, no token, nothing discoverable)
 *
 * Ctrl+C aborts the run like an expired deadline: in-flight entities stop,
 * buffered records are still flushed and the result is printed.
 */
import 'reflect-metadata';

import type { CollectionService } from '@application/services/CollectionService';
import { config } from '@core/config';
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import { runOverridesSchema, type RunOverrides } from '@domain/entities/RunConfig';
import { totals, type RunResult } from '@domain/entities/RunResult';
import { destroyDbConnection, getDbConnection } from '@infrastructure/database/connection';
import { AppError } from '@shared/errors/AppError';
import { DeadlineExceededError, describeError } from '@shared/errors/CollectorError';
import path from 'node:path';

// CLI argument parsing

const args = process.argv.slice(2);

function getArg(flag: string): string | undefined {
  const idx = args.indexOf(flag);
  return idx !== -1 && args[idx + 1] ? args[idx + 1] : undefined;
}

const hasFlag = (flag: string): boolean => args.includes(flag);

function toNumber(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

function parseOverrides(): RunOverrides {
  const parsed = runOverridesSchema.safeParse({
    mode: getArg('--mode'),
    lookbackMinutes: toNumber(getArg('--lookback')),
    detailLevel: getArg('--detail'),
    streams: getArg('--streams')
      ?.split(',')
      .map((name) => name.trim())
      .filter((name) => name.length > 0),
    deadlineMs: toNumber(getArg('--deadline')),
  });
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `--${issue.path.join('.')}: ${issue.message}`)
      .join('\n  ');
    throw new AppError(`Invalid arguments:\n  ${issues}`, 400);
  }
  return parsed.data;
}

// Helpers

function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const seconds = (ms / 1000).toFixed(1);
  if (ms < 60_000) return `${seconds}s`;
  const minutes = Math.floor(ms / 60_000);
  const remainingSec = ((ms % 60_000) / 1000).toFixed(0);
  return `${minutes}m ${remainingSec}s`;
}

function printResult(log: (line: string) => void, result: RunResult): void {
  const { sent, failed } = totals(result);
  const durationMs = Date.parse(result.finishedAt) - Date.parse(result.startedAt);

  log(`  Run:        ${result.runId}`);
  log(`  Window:     ${result.window.start} → ${result.window.end} (${result.window.mode})`);
  log(`  Detail:     ${result.detailLevel}`);
  log(`  Entities:   ${result.entitiesProcessed}`);
  log('');
  for (const [stream, counts] of Object.entries(result.streams)) {
    if (!counts) continue;
    log(`    ${stream.padEnd(38)} sent ${String(counts.sent).padStart(7)}  failed ${counts.failed}`);
  }
  log('');
  for (const scope of result.skipped) {
    const where = scope.parentId ? ` in ${scope.parentId}` : '';
    log(`  ! skipped ${scope.kind}${where}: ${scope.reason}`);
  }
  for (const failure of result.entityFailures) {
    log(`  ! ${failure.entity}: ${failure.error}: ${failure.message}`);
  }
  if (result.deadlineExceeded) log('  ! Deadline exceeded before all entities finished');
  log('');
  log(`  ${result.status === 'Completed' ? '✓' : '✗'} ${result.status}`);
  log(`    Sent: ${sent}  Failed: ${failed}  Duration: ${formatDuration(durationMs)}`);
  log('');
}

// Main

async function main(): Promise<number> {
  // eslint-disable-next-line no-console
  const log = console.log;

  log('');
  log('╔══════════════════════════════════════════════════╗');
  log('║       Fabric Telemetry Collector — Collect       ║');
  log('╚══════════════════════════════════════════════════╝');
  log('');

  const overrides = parseOverrides();
  log(`  Mode:       ${overrides.mode ?? config.collect.mode}`);
  log(`  Streams:    ${(overrides.streams ?? config.collect.streams).join(', ')}`);
  log(`  Source:     ${config.source.baseUrl}`);
  log('');

  if (hasFlag('--migrate')) {
    log('  Running migrations...');
    await getDbConnection().migrate.latest({
      directory: path.resolve(__dirname, '../infrastructure/database/migrations'),
    });
    log('  Migrations complete.');
    log('');
  }

  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort(new DeadlineExceededError('Interrupted')));

  const service = container.resolve<CollectionService>(TOKENS.CollectionService);
  const result = await service.startRun(overrides, { signal: controller.signal });
  printResult(log, result);

  return result.status === 'Completed' ? 0 : 2;
}

main()
  .catch((err: unknown) => {
    // eslint-disable-next-line no-console
    console.error(`Collect failed: ${err instanceof AppError ? err.message : describeError(err)}`);
    return 1;
  })
  .then(async (code) => {
    await destroyDbConnection();
    process.exit(code);
  })
  .catch(() => process.exit(1));
