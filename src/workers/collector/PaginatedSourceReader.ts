/**
 * Paginated Source Reader — lazy record stream for one entity
 * Layer: Workers (Collector)
 *
 * `read()` is an async generator: nothing is fetched until the orchestrator
 * pulls, and each page boundary costs exactly one API call. Records come out
 * in the order the source returned them.
 *
 * The window is sent to the server as startDateTime/endDateTime and applied
 * again client-side on the family's time field, because not every endpoint
 * honours the filter. Records without a readable timestamp are kept.
 *
 * At Full detail a pipeline run is followed immediately by its activity runs
 * (one paginated sub-call per run). Activity runs are not window-filtered;
 * their parent run already was.
 */
import type { Logger } from '@core/logger';
import {
  isWithinWindow,
  type CollectionWindow,
  type DetailLevel,
} from '@domain/entities/CollectionWindow';
import { entityLabel, type EntityReference } from '@domain/entities/EntityReference';
import type { RawRecord } from '@domain/entities/RawRecord';

import type { SourcePageFetcher } from './SourcePageFetcher';
import { SOURCE_FAMILIES, activityRunsPath, buildUrl } from './sourceCatalog';

export class PaginatedSourceReader {
  private readonly log: Logger;

  constructor(
    private readonly fetcher: SourcePageFetcher,
    private readonly baseUrl: string,
    logger: Logger,
  ) {
    this.log = logger.child({ component: 'PaginatedSourceReader' });
  }

  async *read(
    entity: EntityReference,
    window: CollectionWindow,
    detailLevel: DetailLevel,
    signal?: AbortSignal,
  ): AsyncGenerator<RawRecord, void, undefined> {
    const family = SOURCE_FAMILIES[entity.kind];
    const url = buildUrl(this.baseUrl, family.path(entity), {
      startDateTime: window.start.toISOString(),
      endDateTime: window.end.toISOString(),
    });
    const withActivities = entity.kind === 'Pipeline' && detailLevel === 'Full';
    let outside = 0;

    for await (const page of this.fetcher.pages(url, signal)) {
      for (const fields of page.value) {
        if (!isWithinWindow(fields[family.timeField], window)) {
          outside++;
          continue;
        }
        yield { source: family.source, entity, fields };

        const runId = fields.id;
        if (withActivities && typeof runId === 'string' && runId.length > 0) {
          yield* this.readActivityRuns(entity, runId, signal);
        }
      }
    }

    if (outside > 0) {
      this.log.debug({ entity: entityLabel(entity), outside }, 'Dropped records outside the window');
    }
  }

  private async *readActivityRuns(
    pipeline: EntityReference,
    runId: string,
    signal?: AbortSignal,
  ): AsyncGenerator<RawRecord, void, undefined> {
    const url = buildUrl(this.baseUrl, activityRunsPath(pipeline, runId));
    for await (const page of this.fetcher.pages(url, signal)) {
      for (const fields of page.value) {
        yield { source: 'pipelineActivityRun', entity: pipeline, fields, parentRunId: runId };
      }
    }
  }
}
