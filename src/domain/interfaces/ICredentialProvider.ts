/**
 * Credential Provider Interface
 * Layer: Domain
 *
 * The collector consumes bearer tokens; it does not care how they are
 * obtained. A provider resolves one token per scope and fails with
 * AuthError. Caching, expiry and single-flight refresh are the TokenManager's
 * job, not the provider's.
 */
export interface AccessToken {
  token: string;
  /** Epoch milliseconds; absent for tokens with unknown lifetime. */
  expiresOnTimestamp?: number;
}

export interface ICredentialProvider {
  getToken(scope: string): Promise<AccessToken>;
}
