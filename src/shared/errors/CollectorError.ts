/**
 * Collector Error Taxonomy
 * Layer: Shared
 *
 * Each error knows the scope it belongs to and whether it is fatal:
 *
 *   run    — aborts the run and propagates to the caller (ConfigError,
 *            AuthError before the first token, DiscoveryError when nothing
 *            at all could be resolved).
 *   kind   — one entity kind (under one parent workspace) is skipped.
 *   entity — one entity's records stop; other entities continue.
 *   batch  — one batch is counted as failed for its stream.
 *
 * Only fatal errors escape CollectionOrchestrator.run(); everything else is
 * recorded in the RunResult.
 */
import { AppError } from './AppError';

export type ErrorScope = 'run' | 'kind' | 'entity' | 'batch';

export class CollectorError extends AppError {
  constructor(
    message: string,
    statusCode: number,
    public readonly scope: ErrorScope,
    public readonly fatal = false,
    options?: { cause?: unknown },
  ) {
    super(message, statusCode);
    if (options?.cause !== undefined) {
      Object.defineProperty(this, 'cause', { value: options.cause, enumerable: false });
    }
  }
}

/** Invalid run configuration. Raised before any I/O. */
export class ConfigError extends CollectorError {
  constructor(message: string) {
    super(message, 400, 'run', true);
  }
}

/** Token acquisition failed, or the target still rejects the refreshed token. */
export class AuthError extends CollectorError {
  constructor(message: string, scope: ErrorScope = 'run', options?: { cause?: unknown }) {
    super(message, 502, scope, scope === 'run', options);
  }
}

export class DiscoveryError extends CollectorError {
  constructor(message: string, fatal = false, options?: { cause?: unknown }) {
    super(message, 502, fatal ? 'run' : 'kind', fatal, options);
  }
}

/** The source (or ingestion endpoint) kept answering 429 past the retry bound. */
export class ThrottledError extends CollectorError {
  constructor(
    message: string,
    public readonly attempts: number,
    scope: ErrorScope = 'entity',
  ) {
    super(message, 429, scope);
  }
}

/** More continuation pages than the per-entity cap allows. */
export class PaginationExhaustedError extends CollectorError {
  constructor(
    public readonly url: string,
    public readonly maxPages: number,
  ) {
    super(`Pagination did not finish within ${maxPages} pages: ${url}`, 502, 'entity');
  }
}

/** Non-retryable source response (4xx other than 401/429, or a malformed page). */
export class SourceRequestError extends CollectorError {
  constructor(
    message: string,
    public readonly status: number | null,
  ) {
    super(message, 502, 'entity');
  }
}

/** A raw record did not match the shape its API family promises. */
export class NormalizationError extends CollectorError {
  constructor(message: string) {
    super(message, 422, 'entity');
  }
}

/** A record (or the ingestion endpoint's 400 answer) does not fit the stream schema. */
export class SchemaMismatchError extends CollectorError {
  constructor(
    public readonly stream: string,
    message: string,
    public readonly field?: string,
  ) {
    super(message, 422, 'batch');
  }
}

/** The ingestion endpoint refused a batch with a non-retryable status. */
export class IngestionRejectedError extends CollectorError {
  constructor(
    public readonly stream: string,
    message: string,
    public readonly status: number | null,
  ) {
    super(message, 502, 'batch');
  }
}

/** Retryable failures (5xx, connection errors) that outlasted the backoff policy. */
export class TransientError extends CollectorError {
  constructor(
    message: string,
    public readonly attempts: number,
    scope: ErrorScope = 'entity',
    options?: { cause?: unknown },
  ) {
    super(message, 503, scope, false, options);
  }
}

/** Connection-level failure of a single HTTP call (reset, refused, timeout). */
export class TransportError extends CollectorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 503, 'entity', false, options);
  }
}

/** The run's deadline expired (or the caller aborted) while work was in flight. */
export class DeadlineExceededError extends CollectorError {
  constructor(message = 'Run deadline exceeded') {
    super(message, 504, 'entity');
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return String(err);
}
