/**
 * Source Catalog — where each record family lives and where it goes
 * Layer: Workers (Collector)
 *
 * One table ties together an entity kind, the Fabric REST path that lists
 * its records, the field that carries each record's timestamp, and the
 * destination stream. Reader, normalizer and orchestrator all read from
 * here, so adding a source family is one entry plus one mapping function.
 */
import type { EntityKind, EntityReference } from '@domain/entities/EntityReference';
import type { SourceKind } from '@domain/entities/RawRecord';
import type { StreamName } from '@domain/entities/StreamSchema';
import { ITEM_TYPES } from '@shared/constants';

/** Families read directly per entity; activity runs are only reached through a pipeline run. */
export type PrimarySourceKind = Exclude<SourceKind, 'pipelineActivityRun'>;

interface SourceFamily {
  source: PrimarySourceKind;
  /** Path relative to the API base URL, without window parameters. */
  path(entity: EntityReference): string;
  /** Raw field compared against the collection window. */
  timeField: string;
}

const seg = encodeURIComponent;

function workspaceOf(entity: EntityReference): string {
  return seg(entity.workspaceId ?? '');
}

const jobInstancesPath = (entity: EntityReference): string =>
  `/workspaces/${workspaceOf(entity)}/items/${seg(entity.id)}/jobs/instances`;

/** The primary record family read for each entity kind. */
export const SOURCE_FAMILIES: Record<EntityKind, SourceFamily> = {
  Workspace: {
    source: 'userActivity',
    path: (entity) => `/workspaces/${seg(entity.id)}/activityEvents`,
    timeField: 'CreationTime',
  },
  Pipeline: {
    source: 'pipelineRun',
    path: jobInstancesPath,
    timeField: 'startTimeUtc',
  },
  Dataflow: {
    source: 'dataflowRun',
    path: jobInstancesPath,
    timeField: 'startTimeUtc',
  },
  Dataset: {
    source: 'datasetRefresh',
    path: (entity) =>
      `/workspaces/${workspaceOf(entity)}/semanticModels/${seg(entity.id)}/refreshes`,
    timeField: 'startTime',
  },
  Capacity: {
    source: 'capacityMetric',
    path: (entity) => `/capacities/${seg(entity.id)}/metrics`,
    timeField: 'timestamp',
  },
};

/** Activity runs of one pipeline run (Full detail only). */
export function activityRunsPath(pipeline: EntityReference, runId: string): string {
  return `${jobInstancesPath(pipeline)}/${seg(runId)}/activityRuns`;
}

/** Listing endpoint used by discovery for `all` scopes. */
export function listingPath(kind: EntityKind, workspaceId?: string): string {
  switch (kind) {
    case 'Workspace':
      return '/workspaces';
    case 'Capacity':
      return '/capacities';
    case 'Pipeline':
    case 'Dataflow':
    case 'Dataset':
      return `/workspaces/${seg(workspaceId ?? '')}/items?type=${ITEM_TYPES[kind]}`;
  }
}

export const SOURCE_STREAM: Record<SourceKind, StreamName> = {
  pipelineRun: 'Custom-FabricPipelineRun_CL',
  pipelineActivityRun: 'Custom-FabricPipelineActivityRun_CL',
  dataflowRun: 'Custom-FabricDataflowRun_CL',
  datasetRefresh: 'Custom-FabricDatasetRefresh_CL',
  userActivity: 'Custom-FabricUserActivity_CL',
  capacityMetric: 'Custom-FabricCapacityMetrics_CL',
};

const ACTIVITY_STREAM: StreamName = SOURCE_STREAM.pipelineActivityRun;

/** Streams an entity of `kind` can feed, given the configured stream set. */
export function streamsForKind(kind: EntityKind, streams: readonly StreamName[]): StreamName[] {
  const fed: StreamName[] = [SOURCE_STREAM[SOURCE_FAMILIES[kind].source]];
  if (kind === 'Pipeline') fed.push(ACTIVITY_STREAM);
  return fed.filter((stream) => streams.includes(stream));
}

/** Entity kinds that must be processed for the configured stream set. */
export function kindsForStreams(streams: readonly StreamName[]): EntityKind[] {
  const kinds: EntityKind[] = ['Workspace', 'Pipeline', 'Dataflow', 'Dataset', 'Capacity'];
  return kinds.filter((kind) => streamsForKind(kind, streams).length > 0);
}

export function buildUrl(
  baseUrl: string,
  path: string,
  query: Record<string, string> = {},
): string {
  const url = new URL(`${baseUrl.replace(/\/+$/, '')}${path}`);
  for (const [key, value] of Object.entries(query)) {
    url.searchParams.set(key, value);
  }
  return url.toString();
}
