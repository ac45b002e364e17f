/**
 * Unit Tests — SourcePageFetcher
 *
 * Runs against the fake Fabric API (undici MockAgent). The test runtime's
 * sleeper resolves at once and records each requested delay, so backoff
 * and Retry-After handling are asserted through `runtime.sleep`.
 */
import type { AccessToken } from '@domain/interfaces/ICredentialProvider';
import {
  AuthError,
  DeadlineExceededError,
  PaginationExhaustedError,
  SourceRequestError,
  ThrottledError,
  TransientError,
} from '@shared/errors/CollectorError';
import { BackoffPolicy } from '@workers/collector/BackoffPolicy';
import {
  nextPageUrl,
  SourcePageFetcher,
  type SourcePage,
} from '@workers/collector/SourcePageFetcher';
import { TokenManager } from '@workers/collector/TokenManager';

import {
  createFakeApi,
  firstPageOf,
  headersOf,
  pathIs,
  pathWithParam,
  SOURCE_BASE_URL,
  SOURCE_SCOPE,
  type FakeApi,
} from '../helpers/fakeApi';
import {
  buildRunConfig,
  createTestRuntime,
  FIXED_NOW,
  silentLogger,
  type TestRuntime,
} from '../helpers/fixtures';

const WORKSPACES_URL = `${SOURCE_BASE_URL}/workspaces`;

describe('SourcePageFetcher', () => {
  let api: FakeApi;
  let runtime: TestRuntime;
  let getToken: jest.Mock<Promise<AccessToken>, [string]>;
  let fetcher: SourcePageFetcher;

  beforeEach(() => {
    api = createFakeApi();
    runtime = createTestRuntime();
    getToken = jest
      .fn<Promise<AccessToken>, [string]>()
      .mockResolvedValueOnce({ token: 'token-1' })
      .mockResolvedValueOnce({ token: 'token-2' });
    const tokens = new TokenManager({ getToken }, runtime, silentLogger);
    const { retryPolicy } = buildRunConfig();
    fetcher = new SourcePageFetcher(
      api.http,
      tokens,
      {
        scope: SOURCE_SCOPE,
        maxPages: 3,
        throttle: { maxRetries: 2, defaultDelayMs: 50 },
        backoff: new BackoffPolicy(retryPolicy, runtime.sleep, runtime.random),
        now: () => FIXED_NOW.getTime(),
      },
      silentLogger,
    );
  });

  afterEach(async () => {
    await api.close();
  });

  async function collect(url: string): Promise<SourcePage[]> {
    const pages: SourcePage[] = [];
    for await (const page of fetcher.pages(url)) pages.push(page);
    return pages;
  }

  describe('pages', () => {
    it('should follow continuation tokens until the last page', async () => {
      api.source
        .intercept({ path: firstPageOf('/v1/workspaces'), method: 'GET' })
        .reply(200, { value: [{ id: 'ws-a' }], continuationToken: 'page-2' });
      api.source
        .intercept({
          path: pathWithParam('/v1/workspaces', 'continuationToken', 'page-2'),
          method: 'GET',
        })
        .reply(200, { value: [{ id: 'ws-b' }], continuationToken: null });

      const pages = await collect(WORKSPACES_URL);

      expect(pages.map((page) => page.value)).toEqual([[{ id: 'ws-a' }], [{ id: 'ws-b' }]]);
    });

    it('should prefer a continuation URI over a token', async () => {
      api.source
        .intercept({ path: pathIs('/v1/workspaces'), method: 'GET' })
        .reply(200, {
          value: [{ id: 'ws-a' }],
          continuationToken: 'ignored',
          continuationUri: `${SOURCE_BASE_URL}/workspaces/next`,
        });
      api.source
        .intercept({ path: pathIs('/v1/workspaces/next'), method: 'GET' })
        .reply(200, { value: [{ id: 'ws-b' }] });

      const pages = await collect(WORKSPACES_URL);

      expect(pages).toHaveLength(2);
      expect(pages[1].value).toEqual([{ id: 'ws-b' }]);
    });

    it('should stop with PaginationExhaustedError after maxPages pages', async () => {
      api.source
        .intercept({ path: pathIs('/v1/workspaces'), method: 'GET' })
        .reply(200, { value: [{ id: 'ws' }], continuationToken: 'more' })
        .persist();

      let seen = 0;
      const error = await (async () => {
        for await (const page of fetcher.pages(WORKSPACES_URL)) seen += page.value.length;
      })().catch((err: unknown) => err);

      expect(seen).toBe(3);
      expect(error).toBeInstanceOf(PaginationExhaustedError);
      expect(error).toHaveProperty(
        'message',
        'Pagination did not finish within 3 pages: /v1/workspaces',
      );
    });
  });

  describe('fetchPage', () => {
    it('should send the bearer token', async () => {
      let authorization: unknown;
      api.source.intercept({ path: pathIs('/v1/workspaces'), method: 'GET' }).reply(200, (opts) => {
        authorization = headersOf(opts.headers).authorization;
        return { value: [] };
      });

      await fetcher.fetchPage(WORKSPACES_URL);

      expect(authorization).toBe('Bearer token-1');
      expect(getToken).toHaveBeenCalledWith(SOURCE_SCOPE);
    });

    it('should refresh the token once after a 401 and retry', async () => {
      let authorization: unknown;
      api.source.intercept({ path: pathIs('/v1/workspaces'), method: 'GET' }).reply(401, '');
      api.source.intercept({ path: pathIs('/v1/workspaces'), method: 'GET' }).reply(200, (opts) => {
        authorization = headersOf(opts.headers).authorization;
        return { value: [{ id: 'ws-a' }] };
      });

      const page = await fetcher.fetchPage(WORKSPACES_URL);

      expect(page.value).toEqual([{ id: 'ws-a' }]);
      expect(authorization).toBe('Bearer token-2');
      expect(getToken).toHaveBeenCalledTimes(2);
    });

    it('should raise an entity-scoped AuthError when the refreshed token is rejected too', async () => {
      api.source
        .intercept({ path: pathIs('/v1/workspaces'), method: 'GET' })
        .reply(401, '')
        .times(2);

      const error = await fetcher.fetchPage(WORKSPACES_URL).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(AuthError);
      expect(error).toMatchObject({
        message: 'GET /v1/workspaces rejected the token (HTTP 401)',
        scope: 'entity',
        fatal: false,
      });
    });

    it('should not refresh on 403', async () => {
      api.source.intercept({ path: pathIs('/v1/workspaces'), method: 'GET' }).reply(403, '');

      await expect(fetcher.fetchPage(WORKSPACES_URL)).rejects.toThrow(
        'GET /v1/workspaces rejected the token (HTTP 403)',
      );
      expect(getToken).toHaveBeenCalledTimes(1);
    });

    it('should raise SourceRequestError for other client errors without retrying', async () => {
      api.source.intercept({ path: pathIs('/v1/workspaces'), method: 'GET' }).reply(404, 'not here');

      const error = await fetcher.fetchPage(WORKSPACES_URL).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(SourceRequestError);
      expect(error).toMatchObject({
        message: 'GET /v1/workspaces returned HTTP 404: not here',
        status: 404,
      });
      expect(runtime.sleep).not.toHaveBeenCalled();
    });

    it('should retry server errors with exponential backoff', async () => {
      api.source.intercept({ path: pathIs('/v1/workspaces'), method: 'GET' }).reply(500, '');
      api.source.intercept({ path: pathIs('/v1/workspaces'), method: 'GET' }).reply(502, '');
      api.source
        .intercept({ path: pathIs('/v1/workspaces'), method: 'GET' })
        .reply(200, { value: [{ id: 'ws-a' }] });

      const page = await fetcher.fetchPage(WORKSPACES_URL);

      expect(page.value).toHaveLength(1);
      expect(runtime.sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
    });

    it('should give up with TransientError after maxAttempts server errors', async () => {
      api.source
        .intercept({ path: pathIs('/v1/workspaces'), method: 'GET' })
        .reply(503, '')
        .times(3);

      const error = await fetcher.fetchPage(WORKSPACES_URL).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(TransientError);
      expect(error).toMatchObject({
        message: 'GET /v1/workspaces returned HTTP 503 after 3 attempts',
        attempts: 3,
      });
      expect(runtime.sleep).toHaveBeenCalledTimes(2);
    });

    it('should retry connection failures', async () => {
      api.source
        .intercept({ path: pathIs('/v1/workspaces'), method: 'GET' })
        .replyWithError(new Error('socket hang up'));
      api.source
        .intercept({ path: pathIs('/v1/workspaces'), method: 'GET' })
        .reply(200, { value: [] });

      await expect(fetcher.fetchPage(WORKSPACES_URL)).resolves.toEqual({ value: [] });
      expect(runtime.sleep.mock.calls.map(([ms]) => ms)).toEqual([100]);
    });

    it('should wait for Retry-After on 429 and retry the same page', async () => {
      api.source
        .intercept({ path: pathIs('/v1/workspaces'), method: 'GET' })
        .reply(429, '', { headers: { 'retry-after': '2' } });
      api.source.intercept({ path: pathIs('/v1/workspaces'), method: 'GET' }).reply(429, '');
      api.source
        .intercept({ path: pathIs('/v1/workspaces'), method: 'GET' })
        .reply(200, { value: [{ id: 'ws-a' }] });

      const page = await fetcher.fetchPage(WORKSPACES_URL);

      expect(page.value).toEqual([{ id: 'ws-a' }]);
      expect(runtime.sleep.mock.calls.map(([ms]) => ms)).toEqual([2000, 50]);
    });

    it('should raise ThrottledError once throttle retries run out', async () => {
      api.source
        .intercept({ path: pathIs('/v1/workspaces'), method: 'GET' })
        .reply(429, '')
        .times(3);

      const error = await fetcher.fetchPage(WORKSPACES_URL).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ThrottledError);
      expect(error).toMatchObject({
        message: 'GET /v1/workspaces still throttled after 2 retries',
        attempts: 3,
      });
    });

    it('should reject a body that is not JSON', async () => {
      api.source.intercept({ path: pathIs('/v1/workspaces'), method: 'GET' }).reply(200, '<html>');

      await expect(fetcher.fetchPage(WORKSPACES_URL)).rejects.toThrow(
        /^GET \/v1\/workspaces returned malformed JSON: /,
      );
    });

    it('should reject a page without a value array', async () => {
      api.source
        .intercept({ path: pathIs('/v1/workspaces'), method: 'GET' })
        .reply(200, { items: [] });

      const error = await fetcher.fetchPage(WORKSPACES_URL).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(SourceRequestError);
      expect(error).toMatchObject({
        message: 'GET /v1/workspaces returned an unexpected page shape',
        status: null,
      });
    });

    it('should turn a token failure into an entity-scoped AuthError', async () => {
      getToken.mockReset().mockRejectedValue(new Error('boom'));

      const error = await fetcher.fetchPage(WORKSPACES_URL).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(AuthError);
      expect(error).toMatchObject({
        message:
          'Source token unavailable: AuthError: Token acquisition failed for ' +
          `${SOURCE_SCOPE}: Error: boom`,
        scope: 'entity',
      });
    });

    it('should stop when the signal is aborted', async () => {
      const controller = new AbortController();
      controller.abort(new DeadlineExceededError());

      await expect(fetcher.fetchPage(WORKSPACES_URL, controller.signal)).rejects.toBeInstanceOf(
        DeadlineExceededError,
      );
    });
  });
});

describe('nextPageUrl', () => {
  it('should return undefined on the last page', () => {
    expect(nextPageUrl(WORKSPACES_URL, { value: [] })).toBeUndefined();
    expect(nextPageUrl(WORKSPACES_URL, { value: [], continuationToken: '' })).toBeUndefined();
  });

  it('should set the continuation token on the current URL', () => {
    expect(
      nextPageUrl(`${WORKSPACES_URL}?startDateTime=x&continuationToken=old`, {
        value: [],
        continuationToken: 'a b',
      }),
    ).toBe(`${WORKSPACES_URL}?startDateTime=x&continuationToken=a+b`);
  });
});
