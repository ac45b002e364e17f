import type { AccessToken, ICredentialProvider } from '@domain/interfaces/ICredentialProvider';
import { AuthError } from '@shared/errors/CollectorError';

/**
 * Hands out one pre-issued bearer token (FABRIC_ACCESS_TOKEN) for every
 * scope. Its lifetime is unknown, so the TokenManager only replaces it after
 * a 401, and then gets the same token back.
 */
export class StaticTokenProvider implements ICredentialProvider {
  constructor(private readonly token: string) {}

  async getToken(scope: string): Promise<AccessToken> {
    if (!this.token) throw new AuthError(`No access token configured for ${scope}`);
    return { token: this.token };
  }
}
