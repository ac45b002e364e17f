/**
 * Source Page Fetcher — one authenticated, retried GET per page
 * Layer: Workers (Collector)
 *
 * Shared by the Discovery Resolver and the Paginated Source Reader so both
 * follow the same rules for the Fabric REST API:
 *
 *   401        → refresh the token once for this request, then AuthError
 *   403        → AuthError
 *   429        → wait Retry-After (or the configured default) and retry the
 *                same page, up to throttle.maxRetries → ThrottledError
 *   5xx, reset → backoff policy → TransientError
 *   other 4xx  → SourceRequestError
 *
 * `pages()` walks continuation links lazily: the next request is only made
 * when the consumer asks for the next page.
 */
import type { Logger } from '@core/logger';
import type { ThrottleOptions } from '@domain/entities/RunConfig';
import {
  bodySnippet,
  headerValue,
  isSuccess,
  parseRetryAfter,
  throwIfAborted,
  type HttpClient,
  type HttpResponse,
} from '@infrastructure/http/HttpClient';
import {
  AuthError,
  PaginationExhaustedError,
  SourceRequestError,
  ThrottledError,
  TransientError,
  TransportError,
  describeError,
} from '@shared/errors/CollectorError';
import { z } from 'zod/v4';

import type { BackoffPolicy } from './BackoffPolicy';
import type { TokenManager } from './TokenManager';

const pageSchema = z.object({
  value: z.array(z.record(z.string(), z.unknown())),
  continuationToken: z.string().nullish(),
  continuationUri: z.string().nullish(),
});

export type SourcePage = z.infer<typeof pageSchema>;

export interface SourcePageFetcherOptions {
  /** Token scope for the source API. */
  scope: string;
  maxPages: number;
  throttle: ThrottleOptions;
  backoff: BackoffPolicy;
  now: () => number;
}

export class SourcePageFetcher {
  private readonly log: Logger;

  constructor(
    private readonly http: HttpClient,
    private readonly tokens: TokenManager,
    private readonly options: SourcePageFetcherOptions,
    logger: Logger,
  ) {
    this.log = logger.child({ component: 'SourcePageFetcher' });
  }

  /** Yields every page reachable from `url`, following continuation links. */
  async *pages(url: string, signal?: AbortSignal): AsyncGenerator<SourcePage, void, undefined> {
    const { maxPages } = this.options;
    let next: string | undefined = url;
    let count = 0;

    while (next) {
      if (count >= maxPages) throw new PaginationExhaustedError(pathOf(url), maxPages);
      const page = await this.fetchPage(next, signal);
      count++;
      this.log.debug({ url: pathOf(next), page: count, records: page.value.length }, 'Page fetched');
      yield page;
      next = nextPageUrl(next, page);
    }
  }

  async fetchPage(url: string, signal?: AbortSignal): Promise<SourcePage> {
    const { backoff, throttle } = this.options;
    const label = `GET ${pathOf(url)}`;
    let token = await this.token();
    let refreshed = false;
    let throttles = 0;
    let attempts = 0;

    for (;;) {
      throwIfAborted(signal);
      let res: HttpResponse;
      try {
        res = await this.http.send({
          method: 'GET',
          url,
          headers: { authorization: `Bearer ${token}`, accept: 'application/json' },
          signal,
        });
      } catch (err) {
        if (!(err instanceof TransportError)) throw err;
        attempts++;
        if (!backoff.canRetry(attempts)) {
          throw new TransientError(
            `${label} failed after ${attempts} attempts: ${err.message}`,
            attempts,
            'entity',
            { cause: err },
          );
        }
        await backoff.wait(backoff.delayFor(attempts), signal);
        continue;
      }

      if (isSuccess(res.status)) return parsePage(res.body, label);

      if (res.status === 401 && !refreshed) {
        refreshed = true;
        token = await this.token(token);
        continue;
      }
      if (res.status === 401 || res.status === 403) {
        throw new AuthError(`${label} rejected the token (HTTP ${res.status})`, 'entity');
      }

      if (res.status === 429) {
        throttles++;
        if (throttles > throttle.maxRetries) {
          throw new ThrottledError(
            `${label} still throttled after ${throttle.maxRetries} retries`,
            throttles,
          );
        }
        const retryAfter = parseRetryAfter(
          headerValue(res.headers, 'retry-after'),
          this.options.now(),
        );
        const delayMs = retryAfter ?? throttle.defaultDelayMs;
        this.log.warn({ url: pathOf(url), delayMs, throttles }, 'Source API throttled, waiting');
        await backoff.wait(delayMs, signal);
        continue;
      }

      if (res.status >= 500) {
        attempts++;
        if (!backoff.canRetry(attempts)) {
          throw new TransientError(
            `${label} returned HTTP ${res.status} after ${attempts} attempts`,
            attempts,
          );
        }
        await backoff.wait(backoff.delayFor(attempts), signal);
        continue;
      }

      throw new SourceRequestError(
        `${label} returned HTTP ${res.status}: ${bodySnippet(res.body)}`,
        res.status,
      );
    }
  }

  /** Current token, or a replacement for `stale` after a 401. Failures here are entity scoped. */
  private async token(stale?: string): Promise<string> {
    try {
      return stale === undefined
        ? await this.tokens.getToken(this.options.scope)
        : await this.tokens.refresh(this.options.scope, stale);
    } catch (err) {
      throw new AuthError(`Source token unavailable: ${describeError(err)}`, 'entity', {
        cause: err,
      });
    }
  }
}

function parsePage(body: string, label: string): SourcePage {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (err) {
    throw new SourceRequestError(`${label} returned malformed JSON: ${describeError(err)}`, null);
  }
  const parsed = pageSchema.safeParse(json);
  if (!parsed.success) {
    throw new SourceRequestError(`${label} returned an unexpected page shape`, null);
  }
  return parsed.data;
}

/** continuationUri wins; a bare continuationToken is sent back as a query parameter. */
export function nextPageUrl(current: string, page: SourcePage): string | undefined {
  if (page.continuationUri) return page.continuationUri;
  if (page.continuationToken) {
    const url = new URL(current);
    url.searchParams.set('continuationToken', page.continuationToken);
    return url.toString();
  }
  return undefined;
}

function pathOf(url: string): string {
  try {
    return new URL(url).pathname;
  } catch {
    return url;
  }
}
