/**
 * Discovery Resolver — turns a Scope into concrete entity references
 * Layer: Workers (Collector)
 *
 * `explicit` scopes are returned as written, without an existence check.
 * `all` scopes are expanded through the kind's listing endpoint, following
 * continuation links until the listing is exhausted. Child kinds are listed
 * one parent workspace at a time.
 *
 * A listing that fails after the shared retry rules becomes a non-fatal
 * DiscoveryError; the orchestrator decides whether the run can go on.
 */
import type { Logger } from '@core/logger';
import {
  isChildKind,
  type EntityKind,
  type EntityReference,
  type Scope,
} from '@domain/entities/EntityReference';
import { ITEM_TYPES } from '@shared/constants';
import {
  ConfigError,
  DeadlineExceededError,
  DiscoveryError,
  describeError,
} from '@shared/errors/CollectorError';
import { z } from 'zod/v4';

import type { SourcePageFetcher } from './SourcePageFetcher';
import { buildUrl, listingPath } from './sourceCatalog';

const listedItemSchema = z.object({
  id: z.string().min(1),
  displayName: z.string().optional(),
  type: z.string().optional(),
});

export class DiscoveryResolver {
  private readonly log: Logger;

  constructor(
    private readonly fetcher: SourcePageFetcher,
    private readonly baseUrl: string,
    logger: Logger,
  ) {
    this.log = logger.child({ component: 'DiscoveryResolver' });
  }

  async resolve(
    kind: EntityKind,
    scope: Scope,
    parentScope?: EntityReference,
    signal?: AbortSignal,
  ): Promise<EntityReference[]> {
    if (scope.type === 'explicit') return explicitReferences(kind, scope.ids);

    if (isChildKind(kind) && parentScope?.kind !== 'Workspace') {
      throw new DiscoveryError(`Listing ${kind} requires a parent workspace`);
    }
    const workspaceId = isChildKind(kind) ? parentScope?.id : undefined;
    const url = buildUrl(this.baseUrl, listingPath(kind, workspaceId));

    const found: EntityReference[] = [];
    try {
      for await (const page of this.fetcher.pages(url, signal)) {
        for (const item of page.value) {
          const parsed = listedItemSchema.safeParse(item);
          if (!parsed.success) {
            this.log.debug({ kind, workspaceId }, 'Skipping listing entry without an id');
            continue;
          }
          if (isChildKind(kind) && parsed.data.type && parsed.data.type !== ITEM_TYPES[kind]) {
            continue;
          }
          found.push({
            id: parsed.data.id,
            kind,
            workspaceId,
            displayName: parsed.data.displayName,
          });
        }
      }
    } catch (err) {
      if (err instanceof DeadlineExceededError) throw err;
      const where = workspaceId ? ` in workspace ${workspaceId}` : '';
      throw new DiscoveryError(`Listing ${kind}${where} failed: ${describeError(err)}`, false, {
        cause: err,
      });
    }

    this.log.info({ kind, workspaceId, count: found.length }, 'Discovered entities');
    return found;
  }
}

/** Child ids are written `<workspaceId>/<itemId>`; top-level ids are taken as-is. */
function explicitReferences(kind: EntityKind, ids: string[]): EntityReference[] {
  return ids.map((raw) => {
    const id = raw.trim();
    if (!isChildKind(kind)) return { id, kind };
    const parts = id.split('/');
    if (parts.length !== 2 || !parts[0] || !parts[1]) {
      throw new ConfigError(`${kind} id "${id}" must be written <workspaceId>/<itemId>`);
    }
    return { id: parts[1], kind, workspaceId: parts[0] };
  });
}
