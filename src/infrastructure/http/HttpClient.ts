/**
 * HTTP Client — undici wrapper shared by every outbound call
 * Layer: Infrastructure
 *
 * The collector talks to three services (Fabric REST, the token endpoint and
 * the Logs Ingestion endpoint) through this one class so that every call has
 * the same timeout behaviour and the same failure taxonomy:
 *
 *   - any HTTP status comes back as an HttpResponse (the caller decides what
 *     4xx/5xx mean for it),
 *   - connection-level failures and timeouts become TransportError,
 *   - an aborted signal surfaces the abort reason (DeadlineExceededError).
 *
 * The body is always read to the end so the socket goes back to the pool.
 * Tests hand in an undici MockAgent as the dispatcher.
 */
import type { IncomingHttpHeaders } from 'node:http';

import { USER_AGENT } from '@shared/constants';
import { DeadlineExceededError, TransportError } from '@shared/errors/CollectorError';
import { request, type Dispatcher } from 'undici';

export interface HttpRequest {
  method: 'GET' | 'POST';
  url: string;
  headers?: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

export interface HttpResponse {
  status: number;
  headers: IncomingHttpHeaders;
  body: string;
}

export interface HttpClientOptions {
  timeoutMs: number;
  dispatcher?: Dispatcher;
}

export class HttpClient {
  constructor(private readonly options: HttpClientOptions) {}

  async send(req: HttpRequest): Promise<HttpResponse> {
    throwIfAborted(req.signal);
    try {
      const res = await request(req.url, {
        method: req.method,
        headers: { 'user-agent': USER_AGENT, ...req.headers },
        body: req.body,
        signal: req.signal,
        dispatcher: this.options.dispatcher,
        headersTimeout: this.options.timeoutMs,
        bodyTimeout: this.options.timeoutMs,
      });
      const body = await res.body.text();
      return { status: res.statusCode, headers: res.headers, body };
    } catch (err) {
      throwIfAborted(req.signal);
      const message = err instanceof Error ? err.message : String(err);
      throw new TransportError(`${req.method} ${redact(req.url)} failed: ${message}`, {
        cause: err,
      });
    }
  }
}

export function headerValue(headers: IncomingHttpHeaders, name: string): string | undefined {
  const value = headers[name.toLowerCase()];
  return Array.isArray(value) ? value[0] : value;
}

export function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

/** 429 and every 5xx are worth another attempt; other statuses are final. */
export function isRetryableStatus(status: number): boolean {
  return status === 429 || (status >= 500 && status < 600);
}

/**
 * Retry-After is either delta-seconds or an HTTP date. Returns milliseconds,
 * or undefined when the header is absent or unreadable.
 */
export function parseRetryAfter(value: string | undefined, now = Date.now()): number | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(Number(trimmed) * 1000);
  }
  const at = Date.parse(trimmed);
  if (Number.isNaN(at)) return undefined;
  return Math.max(0, at - now);
}

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) throw abortError(signal);
}

export function abortError(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  return reason instanceof Error ? reason : new DeadlineExceededError('Operation aborted');
}

/** Short, log-safe description of a response body. */
export function bodySnippet(body: string, max = 300): string {
  const flat = body.replace(/\s+/g, ' ').trim();
  return flat.length > max ? `${flat.slice(0, max)}…` : flat;
}

function redact(url: string): string {
  try {
    const parsed = new URL(url);
    return `${parsed.origin}${parsed.pathname}`;
  } catch {
    return url;
  }
}
