/**
 * Collection Window
 * Layer: Domain
 *
 * The half-open interval [start, end) a run collects, plus the mode that
 * produced it. Incremental polls cover the last 20 hours by default, Bulk
 * backfills 30 days at summary depth, ActivityBackfill 7 days at full depth
 * (see MODE_DEFAULTS).
 */
import type { COLLECTION_MODES, DETAIL_LEVELS } from '@shared/constants';
import { MODE_DEFAULTS } from '@shared/constants';
import { ConfigError } from '@shared/errors/CollectorError';

export type CollectionMode = (typeof COLLECTION_MODES)[number];
export type DetailLevel = (typeof DETAIL_LEVELS)[number];

export interface CollectionWindow {
  readonly start: Date;
  readonly end: Date;
  readonly mode: CollectionMode;
}

export function createWindow(
  mode: CollectionMode,
  lookbackMinutes: number | undefined,
  now: Date,
): CollectionWindow {
  const minutes = lookbackMinutes ?? MODE_DEFAULTS[mode].lookbackMinutes;
  if (!Number.isFinite(minutes) || minutes <= 0) {
    throw new ConfigError(`Lookback must be a positive number of minutes, got ${minutes}`);
  }
  const end = new Date(now.getTime());
  const start = new Date(end.getTime() - minutes * 60_000);
  if (!(start.getTime() < end.getTime())) {
    throw new ConfigError('Collection window start must be before its end');
  }
  return { start, end, mode };
}

export function defaultDetailLevel(mode: CollectionMode): DetailLevel {
  return MODE_DEFAULTS[mode].detailLevel;
}

/** Records without a parseable timestamp are kept: the window cannot rule them out. */
export function isWithinWindow(timestamp: unknown, window: CollectionWindow): boolean {
  if (typeof timestamp !== 'string' && !(timestamp instanceof Date)) return true;
  const ms = timestamp instanceof Date ? timestamp.getTime() : Date.parse(timestamp);
  if (Number.isNaN(ms)) return true;
  return ms >= window.start.getTime() && ms < window.end.getTime();
}
