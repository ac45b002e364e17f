/**
 * Client Secret Credential Provider — OAuth2 client-credentials grant
 * Layer: Infrastructure
 *
 * Exchanges a service principal's id and secret for an access token at
 * `{authorityHost}/{tenantId}/oauth2/v2.0/token`, one request per scope.
 * Caching is left to the TokenManager; this class always asks the authority.
 */
import type { AccessToken, ICredentialProvider } from '@domain/interfaces/ICredentialProvider';
import { bodySnippet, isSuccess, type HttpClient } from '@infrastructure/http/HttpClient';
import { AuthError, describeError } from '@shared/errors/CollectorError';
import { z } from 'zod/v4';

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.coerce.number().positive(),
  token_type: z.string().optional(),
});

export interface ClientSecretCredentials {
  authorityHost: string;
  tenantId: string;
  clientId: string;
  clientSecret: string;
}

export class ClientSecretCredentialProvider implements ICredentialProvider {
  constructor(
    private readonly http: HttpClient,
    private readonly credentials: ClientSecretCredentials,
    private readonly now: () => number = Date.now,
  ) {}

  async getToken(scope: string): Promise<AccessToken> {
    const { authorityHost, tenantId, clientId, clientSecret } = this.credentials;
    const host = authorityHost.replace(/\/+$/, '');
    const url = `${host}/${encodeURIComponent(tenantId)}/oauth2/v2.0/token`;
    const form = new URLSearchParams({
      grant_type: 'client_credentials',
      client_id: clientId,
      client_secret: clientSecret,
      scope,
    });

    let status: number;
    let body: string;
    try {
      ({ status, body } = await this.http.send({
        method: 'POST',
        url,
        headers: { 'content-type': 'application/x-www-form-urlencoded' },
        body: form.toString(),
      }));
    } catch (err) {
      throw new AuthError(`Token request for ${scope} failed: ${describeError(err)}`, 'run', {
        cause: err,
      });
    }

    if (!isSuccess(status)) {
      throw new AuthError(
        `Token request for ${scope} returned HTTP ${status}: ${bodySnippet(body)}`,
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch {
      throw new AuthError(`Token response for ${scope} is not JSON`);
    }
    const parsed = tokenResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new AuthError(`Token response for ${scope} has no access_token/expires_in`);
    }

    return {
      token: parsed.data.access_token,
      expiresOnTimestamp: this.now() + parsed.data.expires_in * 1000,
    };
  }
}
