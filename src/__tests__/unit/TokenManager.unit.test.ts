/**
 * Unit Tests — TokenManager
 *
 * The provider is a jest mock and the clock is fixed, so the tests can count
 * exactly how many times a token is acquired.
 */
import type { AccessToken, ICredentialProvider } from '@domain/interfaces/ICredentialProvider';
import { AuthError } from '@shared/errors/CollectorError';
import { TokenManager } from '@workers/collector/TokenManager';

import { createTestRuntime, FIXED_NOW, silentLogger } from '../helpers/fixtures';

const SCOPE = 'https://fabric.test/.default';

function createProvider(...tokens: AccessToken[]): {
  provider: ICredentialProvider;
  getToken: jest.Mock<Promise<AccessToken>, [string]>;
} {
  const getToken = jest.fn<Promise<AccessToken>, [string]>();
  for (const token of tokens) getToken.mockResolvedValueOnce(token);
  return { provider: { getToken }, getToken };
}

describe('TokenManager', () => {
  const runtime = createTestRuntime();

  it('should cache a token per scope', async () => {
    const { provider, getToken } = createProvider({ token: 'token-a' });
    const tokens = new TokenManager(provider, runtime, silentLogger);

    expect(await tokens.getToken(SCOPE)).toBe('token-a');
    expect(await tokens.getToken(SCOPE)).toBe('token-a');
    expect(getToken).toHaveBeenCalledTimes(1);
    expect(getToken).toHaveBeenCalledWith(SCOPE);
  });

  it('should keep separate tokens for separate scopes', async () => {
    const { provider, getToken } = createProvider({ token: 'source' }, { token: 'ingestion' });
    const tokens = new TokenManager(provider, runtime, silentLogger);

    expect(await tokens.getToken('scope-a')).toBe('source');
    expect(await tokens.getToken('scope-b')).toBe('ingestion');
    expect(getToken).toHaveBeenCalledTimes(2);
  });

  it('should share one acquisition between concurrent callers', async () => {
    const { provider, getToken } = createProvider({ token: 'token-a' });
    const tokens = new TokenManager(provider, runtime, silentLogger);

    const results = await Promise.all([
      tokens.getToken(SCOPE),
      tokens.getToken(SCOPE),
      tokens.getToken(SCOPE),
    ]);

    expect(results).toEqual(['token-a', 'token-a', 'token-a']);
    expect(getToken).toHaveBeenCalledTimes(1);
  });

  it('should re-acquire a token that expires within two minutes', async () => {
    const { provider, getToken } = createProvider(
      { token: 'old', expiresOnTimestamp: FIXED_NOW.getTime() + 60_000 },
      { token: 'new', expiresOnTimestamp: FIXED_NOW.getTime() + 3_600_000 },
    );
    const tokens = new TokenManager(provider, runtime, silentLogger);

    expect(await tokens.getToken(SCOPE)).toBe('old');
    expect(await tokens.getToken(SCOPE)).toBe('new');
    expect(await tokens.getToken(SCOPE)).toBe('new');
    expect(getToken).toHaveBeenCalledTimes(2);
  });

  describe('refresh', () => {
    it('should acquire a new token when the stale one is still cached', async () => {
      const { provider, getToken } = createProvider({ token: 'first' }, { token: 'second' });
      const tokens = new TokenManager(provider, runtime, silentLogger);

      const stale = await tokens.getToken(SCOPE);
      const refreshed = await tokens.refresh(SCOPE, stale);

      expect(refreshed).toBe('second');
      expect(await tokens.getToken(SCOPE)).toBe('second');
      expect(getToken).toHaveBeenCalledTimes(2);
    });

    it('should return the replacement when another caller already refreshed', async () => {
      const { provider, getToken } = createProvider({ token: 'first' }, { token: 'second' });
      const tokens = new TokenManager(provider, runtime, silentLogger);

      const stale = await tokens.getToken(SCOPE);
      await tokens.refresh(SCOPE, stale);
      const again = await tokens.refresh(SCOPE, stale);

      expect(again).toBe('second');
      expect(getToken).toHaveBeenCalledTimes(2);
    });

    it('should make a single provider call for concurrent refreshes', async () => {
      const { provider, getToken } = createProvider({ token: 'first' }, { token: 'second' });
      const tokens = new TokenManager(provider, runtime, silentLogger);

      const stale = await tokens.getToken(SCOPE);
      const results = await Promise.all([
        tokens.refresh(SCOPE, stale),
        tokens.refresh(SCOPE, stale),
      ]);

      expect(results).toEqual(['second', 'second']);
      expect(getToken).toHaveBeenCalledTimes(2);
    });
  });

  describe('failures', () => {
    it('should wrap provider errors in a fatal AuthError', async () => {
      const getToken = jest
        .fn<Promise<AccessToken>, [string]>()
        .mockRejectedValue(new Error('network down'));
      const tokens = new TokenManager({ getToken }, runtime, silentLogger);

      const error = await tokens.getToken(SCOPE).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(AuthError);
      expect(error).toMatchObject({
        message: `Token acquisition failed for ${SCOPE}: Error: network down`,
        fatal: true,
        scope: 'run',
      });
    });

    it('should pass an AuthError from the provider through unchanged', async () => {
      const original = new AuthError('bad secret');
      const getToken = jest.fn<Promise<AccessToken>, [string]>().mockRejectedValue(original);
      const tokens = new TokenManager({ getToken }, runtime, silentLogger);

      await expect(tokens.getToken(SCOPE)).rejects.toBe(original);
    });

    it('should reject an empty token', async () => {
      const { provider } = createProvider({ token: '' });
      const tokens = new TokenManager(provider, runtime, silentLogger);

      await expect(tokens.getToken(SCOPE)).rejects.toThrow(
        `Credential provider returned an empty token for ${SCOPE}`,
      );
    });

    it('should try the provider again after a failed acquisition', async () => {
      const getToken = jest
        .fn<Promise<AccessToken>, [string]>()
        .mockRejectedValueOnce(new Error('blip'))
        .mockResolvedValueOnce({ token: 'recovered' });
      const tokens = new TokenManager({ getToken }, runtime, silentLogger);

      await expect(tokens.getToken(SCOPE)).rejects.toBeInstanceOf(AuthError);
      expect(await tokens.getToken(SCOPE)).toBe('recovered');
    });
  });
});
