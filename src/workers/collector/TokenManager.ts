/**
 * Token Manager — cached, single-flight bearer tokens per scope
 * Layer: Workers (Collector)
 *
 * The run acquires one token for the source API and one for the ingestion
 * endpoint at Init; workers only ever read them. When a call comes back 401,
 * the caller hands the token it used to `refresh()`:
 *
 *   - if another worker already replaced that token, the newer one is
 *     returned without touching the provider;
 *   - otherwise one provider call is made, and every concurrent refresh for
 *     the same scope awaits that same promise.
 *
 * Tokens within REFRESH_SKEW_MS of expiry are treated as expired.
 */
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { AccessToken, ICredentialProvider } from '@domain/interfaces/ICredentialProvider';
import { AuthError, describeError } from '@shared/errors/CollectorError';
import { inject, injectable } from 'tsyringe';

import type { CollectorRuntime } from './runtime';

const REFRESH_SKEW_MS = 120_000;

@injectable()
export class TokenManager {
  private readonly cache = new Map<string, AccessToken>();
  private readonly inflight = new Map<string, Promise<AccessToken>>();
  private readonly log: Logger;

  constructor(
    @inject(TOKENS.CredentialProvider) private readonly provider: ICredentialProvider,
    @inject(TOKENS.CollectorRuntime) private readonly runtime: CollectorRuntime,
    @inject(TOKENS.Logger) logger: Logger,
  ) {
    this.log = logger.child({ component: 'TokenManager' });
  }

  async getToken(scope: string): Promise<string> {
    const cached = this.cache.get(scope);
    if (cached && this.isFresh(cached)) return cached.token;
    const acquired = await this.acquire(scope);
    return acquired.token;
  }

  /** Replace `staleToken`; returns the cached token instead if it has already been replaced. */
  async refresh(scope: string, staleToken: string): Promise<string> {
    const cached = this.cache.get(scope);
    if (cached && cached.token !== staleToken && this.isFresh(cached)) {
      return cached.token;
    }
    const acquired = await this.acquire(scope);
    return acquired.token;
  }

  private isFresh(token: AccessToken): boolean {
    if (token.expiresOnTimestamp === undefined) return true;
    return token.expiresOnTimestamp - REFRESH_SKEW_MS > this.runtime.now().getTime();
  }

  private acquire(scope: string): Promise<AccessToken> {
    const pending = this.inflight.get(scope);
    if (pending) return pending;

    const promise = this.provider
      .getToken(scope)
      .then((token) => {
        if (!token.token) {
          throw new AuthError(`Credential provider returned an empty token for ${scope}`);
        }
        this.cache.set(scope, token);
        this.log.debug({ scope }, 'Token acquired');
        return token;
      })
      .catch((err: unknown) => {
        this.cache.delete(scope);
        if (err instanceof AuthError) throw err;
        throw new AuthError(`Token acquisition failed for ${scope}: ${describeError(err)}`, 'run', {
          cause: err,
        });
      })
      .finally(() => {
        this.inflight.delete(scope);
      });

    this.inflight.set(scope, promise);
    return promise;
  }
}
