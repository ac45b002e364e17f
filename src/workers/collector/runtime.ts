/**
 * Collector Runtime — clock, sleeper and randomness behind one seam
 * Layer: Workers (Collector)
 *
 * The container registers `systemRuntime`; tests register a runtime whose
 * sleeper resolves immediately and whose clock is fixed.
 */
import { sleep, type Sleeper } from './BackoffPolicy';

export interface CollectorRuntime {
  now(): Date;
  sleep: Sleeper;
  random(): number;
}

export const systemRuntime: CollectorRuntime = {
  now: () => new Date(),
  sleep,
  random: Math.random,
};
