/**
 * Batch Ingestion Client — Buffered Stream Uploads
 * Layer: Workers (Collector)
 *
 * I buffer normalized records per stream and POST them to the Logs Ingestion
 * API in batches, so we don't make one request per record.
 *
 * Flush triggers:
 *   - the buffer reaches maxRecords;
 *   - the next record would push the serialized JSON array past maxBytes
 *     (the current buffer goes out first, the record starts the next batch);
 *   - end of run (flushAll).
 *
 * Records are validated against their stream schema before they are
 * buffered. An invalid record, or one that alone is larger than maxBytes,
 * is counted as failed and never sent.
 *
 * Concurrency: workers call submit() concurrently. The buffer is detached
 * synchronously (`splice(0)`) before any await, and flushes for one stream
 * are serialized through a per-stream mutex, so a record is in exactly one
 * batch and one stream never has two uploads in flight.
 *
 * Retries: 429, 5xx and connection errors follow the backoff policy (429
 * honours Retry-After). A 401 gets one token refresh per batch that does not
 * count as an attempt. Batches are never split.
 *
 * deliver() never rejects; every outcome lands in the stream's tally.
 */
import { randomUUID } from 'node:crypto';

import type { Logger } from '@core/logger';
import type { BatchLimits } from '@domain/entities/RunConfig';
import {
  getStreamSchema,
  validateRecord,
  type NormalizedRecord,
  type StreamName,
} from '@domain/entities/StreamSchema';
import {
  bodySnippet,
  headerValue,
  isRetryableStatus,
  isSuccess,
  parseRetryAfter,
  type HttpClient,
  type HttpResponse,
} from '@infrastructure/http/HttpClient';
import {
  AuthError,
  IngestionRejectedError,
  SchemaMismatchError,
  ThrottledError,
  TransientError,
  TransportError,
  describeError,
} from '@shared/errors/CollectorError';

import type { BackoffPolicy } from './BackoffPolicy';
import type { TokenManager } from './TokenManager';

/** Errors kept per stream in the run result; counts are never capped. */
const MAX_ERRORS_PER_STREAM = 20;

export interface IngestionTarget {
  endpoint: string;
  ruleId: string;
  apiVersion: string;
  /** Token scope for the ingestion endpoint. */
  scope: string;
}

export interface BatchIngestionClientOptions {
  target: IngestionTarget;
  limits: BatchLimits;
  backoff: BackoffPolicy;
  now: () => number;
  requestId?: () => string;
}

export interface StreamTally {
  sent: number;
  failed: number;
  errors: string[];
}

interface StreamBuffer {
  serialized: string[];
  bytes: number;
}

export class BatchIngestionClient {
  private readonly buffers = new Map<StreamName, StreamBuffer>();
  private readonly flushMutex = new Map<StreamName, Promise<void>>();
  private readonly tallies = new Map<StreamName, StreamTally>();
  private readonly log: Logger;
  private readonly requestId: () => string;

  constructor(
    private readonly http: HttpClient,
    private readonly tokens: TokenManager,
    private readonly options: BatchIngestionClientOptions,
    logger: Logger,
  ) {
    this.log = logger.child({ component: 'BatchIngestionClient' });
    this.requestId = options.requestId ?? randomUUID;
  }

  async submit(stream: StreamName, record: NormalizedRecord): Promise<void> {
    const { maxRecords, maxBytes } = this.options.limits;

    const issues = validateRecord(getStreamSchema(stream), record);
    if (issues.length > 0) {
      const field = /^(?:missing column|column|unexpected field) (\w+)/.exec(issues[0])?.[1];
      this.fail(
        stream,
        1,
        new SchemaMismatchError(
          stream,
          `Record does not match ${stream}: ${issues.join('; ')}`,
          field,
        ),
      );
      return;
    }

    const json = JSON.stringify(record);
    const size = Buffer.byteLength(json, 'utf8');
    if (2 + size > maxBytes) {
      this.fail(
        stream,
        1,
        new IngestionRejectedError(
          stream,
          `Record of ${size} bytes exceeds the ${maxBytes}-byte batch limit`,
          null,
        ),
      );
      return;
    }

    const buffer = this.bufferFor(stream);
    // Serialized array: brackets, records, and one comma between each pair.
    while (
      buffer.serialized.length > 0 &&
      2 + buffer.bytes + size + buffer.serialized.length > maxBytes
    ) {
      await this.flush(stream);
    }

    buffer.serialized.push(json);
    buffer.bytes += size;
    this.tallyFor(stream);

    if (buffer.serialized.length >= maxRecords) {
      await this.flush(stream);
    }
  }

  async flush(stream: StreamName): Promise<void> {
    const buffer = this.buffers.get(stream);
    if (!buffer || buffer.serialized.length === 0) return;
    const batch = buffer.serialized.splice(0);
    buffer.bytes = 0;

    const previous = this.flushMutex.get(stream) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.flushMutex.set(stream, gate);
    await previous.then(() => this.deliver(stream, batch)).finally(() => release());
  }

  async flushAll(): Promise<void> {
    await Promise.all([...this.buffers.keys()].map((stream) => this.flush(stream)));
    // Wait for uploads started by other callers as well.
    await Promise.all([...this.flushMutex.values()]);
  }

  pending(stream: StreamName): number {
    return this.buffers.get(stream)?.serialized.length ?? 0;
  }

  results(): Map<StreamName, StreamTally> {
    return this.tallies;
  }

  private async deliver(stream: StreamName, batch: string[]): Promise<void> {
    const count = batch.length;
    try {
      await this.post(stream, `[${batch.join(',')}]`, count);
      this.tallyFor(stream).sent += count;
      this.log.info({ stream, records: count }, 'Batch ingested');
    } catch (err) {
      this.fail(stream, count, err);
    }
  }

  /** Resolves once the endpoint accepted the batch; rejects with the final error. */
  private async post(stream: StreamName, body: string, count: number): Promise<void> {
    const { backoff, target } = this.options;
    const url = ingestionUrl(target, stream);
    const requestId = this.requestId();
    let token = await this.token();
    let refreshed = false;
    let attempt = 0;

    for (;;) {
      attempt++;
      let res: HttpResponse;
      try {
        res = await this.http.send({
          method: 'POST',
          url,
          headers: {
            authorization: `Bearer ${token}`,
            'content-type': 'application/json',
            'x-ms-client-request-id': requestId,
          },
          body,
        });
      } catch (err) {
        if (!(err instanceof TransportError)) throw err;
        if (attempt >= backoff.maxAttempts) {
          throw new TransientError(
            `${stream} upload failed after ${attempt} attempts: ${err.message}`,
            attempt,
            'batch',
            { cause: err },
          );
        }
        await this.retryWait(stream, attempt, undefined, err.message);
        continue;
      }

      if (isSuccess(res.status)) return;

      if (res.status === 401 && !refreshed) {
        refreshed = true;
        attempt--;
        token = await this.token(token);
        continue;
      }
      if (res.status === 401 || res.status === 403) {
        throw new AuthError(`${stream} upload rejected the token (HTTP ${res.status})`, 'batch');
      }
      if (res.status === 400) {
        throw new SchemaMismatchError(
          stream,
          `${stream} rejected a batch of ${count}: ${bodySnippet(res.body)}`,
          offendingField(res.body),
        );
      }
      if (isRetryableStatus(res.status)) {
        if (attempt >= backoff.maxAttempts) {
          const message = `${stream} upload returned HTTP ${res.status} after ${attempt} attempts`;
          throw res.status === 429
            ? new ThrottledError(message, attempt, 'batch')
            : new TransientError(message, attempt, 'batch');
        }
        const retryAfter =
          res.status === 429
            ? parseRetryAfter(headerValue(res.headers, 'retry-after'), this.options.now())
            : undefined;
        await this.retryWait(stream, attempt, retryAfter, `HTTP ${res.status}`);
        continue;
      }

      throw new IngestionRejectedError(
        stream,
        `${stream} upload returned HTTP ${res.status}: ${bodySnippet(res.body)}`,
        res.status,
      );
    }
  }

  private async retryWait(
    stream: StreamName,
    attempt: number,
    retryAfterMs: number | undefined,
    reason: string,
  ): Promise<void> {
    const { backoff } = this.options;
    const delayMs = retryAfterMs ?? backoff.delayFor(attempt);
    this.log.warn({ stream, attempt, delayMs, reason }, 'Ingestion attempt failed, retrying');
    await backoff.wait(delayMs);
  }

  private async token(stale?: string): Promise<string> {
    const { scope } = this.options.target;
    try {
      return stale === undefined
        ? await this.tokens.getToken(scope)
        : await this.tokens.refresh(scope, stale);
    } catch (err) {
      throw new AuthError(`Ingestion token unavailable: ${describeError(err)}`, 'batch', {
        cause: err,
      });
    }
  }

  private fail(stream: StreamName, count: number, err: unknown): void {
    const tally = this.tallyFor(stream);
    tally.failed += count;
    if (tally.errors.length < MAX_ERRORS_PER_STREAM) tally.errors.push(describeError(err));
    this.log.error({ stream, records: count, error: describeError(err) }, 'Records failed ingestion');
  }

  private bufferFor(stream: StreamName): StreamBuffer {
    let buffer = this.buffers.get(stream);
    if (!buffer) {
      buffer = { serialized: [], bytes: 0 };
      this.buffers.set(stream, buffer);
    }
    return buffer;
  }

  private tallyFor(stream: StreamName): StreamTally {
    let tally = this.tallies.get(stream);
    if (!tally) {
      tally = { sent: 0, failed: 0, errors: [] };
      this.tallies.set(stream, tally);
    }
    return tally;
  }
}

export function ingestionUrl(target: IngestionTarget, stream: StreamName): string {
  const base = target.endpoint.replace(/\/+$/, '');
  const rule = encodeURIComponent(target.ruleId);
  const version = encodeURIComponent(target.apiVersion);
  const name = encodeURIComponent(stream);
  return `${base}/dataCollectionRules/${rule}/streams/${name}?api-version=${version}`;
}

/** Pulls the column name out of a 400 answer such as "Column 'DurationMs' has type mismatch". */
export function offendingField(body: string): string | undefined {
  return /\b(?:field|column|property)\b\s*['"`]?([A-Za-z_]\w*)['"`]?/i.exec(body)?.[1];
}
