/**
 * Unit Tests — DiscoveryResolver
 */
import type { EntityReference } from '@domain/entities/EntityReference';
import {
  ConfigError,
  DeadlineExceededError,
  DiscoveryError,
} from '@shared/errors/CollectorError';
import { DiscoveryResolver } from '@workers/collector/DiscoveryResolver';

import {
  createFakeApi,
  createTestFetcher,
  firstPageOf,
  pathIs,
  pathWithParam,
  SOURCE_BASE_URL,
  type FakeApi,
} from '../helpers/fakeApi';
import { createTestRuntime, silentLogger } from '../helpers/fixtures';

const workspace: EntityReference = { id: 'ws-1', kind: 'Workspace' };

describe('DiscoveryResolver', () => {
  let api: FakeApi;
  let resolver: DiscoveryResolver;

  beforeEach(() => {
    api = createFakeApi();
    resolver = new DiscoveryResolver(
      createTestFetcher(api, createTestRuntime()),
      SOURCE_BASE_URL,
      silentLogger,
    );
  });

  afterEach(async () => {
    await api.close();
  });

  describe('explicit scopes', () => {
    it('should return top-level ids as written without calling the API', async () => {
      const refs = await resolver.resolve('Capacity', { type: 'explicit', ids: ['cap-1', ' cap-2 '] });

      expect(refs).toEqual([
        { id: 'cap-1', kind: 'Capacity' },
        { id: 'cap-2', kind: 'Capacity' },
      ]);
    });

    it('should split child ids into workspace and item', async () => {
      const refs = await resolver.resolve('Pipeline', { type: 'explicit', ids: ['ws-1/pl-9'] });

      expect(refs).toEqual([{ id: 'pl-9', kind: 'Pipeline', workspaceId: 'ws-1' }]);
    });

    it('should reject a child id without a workspace', async () => {
      const error = await resolver
        .resolve('Dataset', { type: 'explicit', ids: ['ds-1'] })
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toHaveProperty(
        'message',
        'Dataset id "ds-1" must be written <workspaceId>/<itemId>',
      );
    });

    it('should return an empty list for an empty explicit scope', async () => {
      await expect(resolver.resolve('Workspace', { type: 'explicit', ids: [] })).resolves.toEqual([]);
    });
  });

  describe('all scopes', () => {
    it('should list every page of a top-level kind', async () => {
      api.source
        .intercept({ path: firstPageOf('/v1/workspaces'), method: 'GET' })
        .reply(200, { value: [{ id: 'A', displayName: 'Alpha' }], continuationToken: 'next' });
      api.source
        .intercept({ path: pathWithParam('/v1/workspaces', 'continuationToken', 'next'), method: 'GET' })
        .reply(200, { value: [{ id: 'B' }] });

      const refs = await resolver.resolve('Workspace', { type: 'all' });

      expect(refs).toEqual([
        { id: 'A', kind: 'Workspace', workspaceId: undefined, displayName: 'Alpha' },
        { id: 'B', kind: 'Workspace', workspaceId: undefined, displayName: undefined },
      ]);
    });

    it('should list children of the parent workspace filtered by item type', async () => {
      api.source
        .intercept({ path: pathWithParam('/v1/workspaces/ws-1/items', 'type', 'DataPipeline'), method: 'GET' })
        .reply(200, {
          value: [
            { id: 'pl-1', displayName: 'Load', type: 'DataPipeline' },
            { id: 'nb-1', displayName: 'Notebook', type: 'Notebook' },
            { id: 'pl-2' },
          ],
        });

      const refs = await resolver.resolve('Pipeline', { type: 'all' }, workspace);

      expect(refs.map((ref) => [ref.workspaceId, ref.id])).toEqual([
        ['ws-1', 'pl-1'],
        ['ws-1', 'pl-2'],
      ]);
    });

    it('should skip listing entries without an id', async () => {
      api.source
        .intercept({ path: pathIs('/v1/capacities'), method: 'GET' })
        .reply(200, { value: [{ displayName: 'orphan' }, { id: '' }, { id: 'cap-1' }] });

      const refs = await resolver.resolve('Capacity', { type: 'all' });

      expect(refs.map((ref) => ref.id)).toEqual(['cap-1']);
    });

    it('should require a parent workspace for child kinds', async () => {
      await expect(resolver.resolve('Dataflow', { type: 'all' })).rejects.toThrow(
        'Listing Dataflow requires a parent workspace',
      );
    });

    it('should wrap a failed listing in a non-fatal DiscoveryError', async () => {
      api.source
        .intercept({ path: pathWithParam('/v1/workspaces/ws-1/items', 'type', 'SemanticModel'), method: 'GET' })
        .reply(404, 'gone');

      const error = await resolver
        .resolve('Dataset', { type: 'all' }, workspace)
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(DiscoveryError);
      expect(error).toMatchObject({
        message:
          'Listing Dataset in workspace ws-1 failed: SourceRequestError: ' +
          'GET /v1/workspaces/ws-1/items returned HTTP 404: gone',
        fatal: false,
        scope: 'kind',
      });
    });

    it('should let a deadline through unwrapped', async () => {
      const controller = new AbortController();
      controller.abort(new DeadlineExceededError());

      await expect(
        resolver.resolve('Workspace', { type: 'all' }, undefined, controller.signal),
      ).rejects.toBeInstanceOf(DeadlineExceededError);
    });
  });
});
