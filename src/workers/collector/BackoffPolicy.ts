/**
 * Backoff Policy — one retry rule for discovery, source pages and ingestion
 * Layer: Workers (Collector)
 *
 * Delay before retry n (1-based) is
 *
 *   min(maxDelayMs, baseDelayMs * multiplier^(n-1)) ± jitter
 *
 * where jitter is a fraction of the capped delay spread evenly around it, so
 * concurrent workers that fail together do not retry together. All four
 * numbers come from configuration.
 *
 * Waiting goes through an injected Sleeper that honours an AbortSignal, so a
 * run deadline interrupts a backoff and tests never actually sleep.
 */
import type { RetryPolicyOptions } from '@domain/entities/RunConfig';
import { abortError } from '@infrastructure/http/HttpClient';

export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleeper = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortError(signal));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      if (signal) reject(abortError(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

export class BackoffPolicy {
  constructor(
    private readonly options: RetryPolicyOptions,
    private readonly sleeper: Sleeper = sleep,
    private readonly random: () => number = Math.random,
  ) {}

  get maxAttempts(): number {
    return this.options.maxAttempts;
  }

  /** True while another attempt is allowed after `attempt` attempts have been made. */
  canRetry(attempt: number): boolean {
    return attempt < this.options.maxAttempts;
  }

  delayFor(attempt: number): number {
    const { baseDelayMs, multiplier, maxDelayMs, jitter } = this.options;
    const exponential = baseDelayMs * Math.pow(multiplier, Math.max(0, attempt - 1));
    const capped = Math.min(exponential, maxDelayMs);
    const spread = capped * jitter;
    return Math.max(0, Math.round(capped - spread + this.random() * 2 * spread));
  }

  wait(ms: number, signal?: AbortSignal): Promise<void> {
    return this.sleeper(ms, signal);
  }
}
