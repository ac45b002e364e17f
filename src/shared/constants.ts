/** Log Analytics custom streams the collector writes to (one per destination table). */
export const STREAM_NAMES = [
  'Custom-FabricPipelineRun_CL',
  'Custom-FabricPipelineActivityRun_CL',
  'Custom-FabricDataflowRun_CL',
  'Custom-FabricDatasetRefresh_CL',
  'Custom-FabricUserActivity_CL',
  'Custom-FabricCapacityMetrics_CL',
] as const;

/** Monitored object kinds. Pipeline, Dataflow and Dataset live inside a workspace. */
export const ENTITY_KINDS = ['Workspace', 'Pipeline', 'Dataflow', 'Dataset', 'Capacity'] as const;

export const CHILD_ENTITY_KINDS = ['Pipeline', 'Dataflow', 'Dataset'] as const;

/** Source API families, one per raw record shape. */
export const SOURCE_KINDS = [
  'pipelineRun',
  'pipelineActivityRun',
  'dataflowRun',
  'datasetRefresh',
  'userActivity',
  'capacityMetric',
] as const;

export const COLLECTION_MODES = ['Bulk', 'Incremental', 'ActivityBackfill'] as const;

export const DETAIL_LEVELS = ['Summary', 'Full'] as const;

/** Fabric item type filter used when listing a workspace's children. */
export const ITEM_TYPES = {
  Pipeline: 'DataPipeline',
  Dataflow: 'Dataflow',
  Dataset: 'SemanticModel',
} as const;

/**
 * Window length and sub-resource depth per collection mode.
 * Bulk backfills skip activity-level detail to stay inside API quotas.
 */
export const MODE_DEFAULTS = {
  Incremental: { lookbackMinutes: 1200, detailLevel: 'Full' },
  Bulk: { lookbackMinutes: 43_200, detailLevel: 'Summary' },
  ActivityBackfill: { lookbackMinutes: 10_080, detailLevel: 'Full' },
} as const;

/** Logs Ingestion API version used for stream uploads. */
export const INGESTION_API_VERSION = '2023-01-01';

/** Azure Monitor rejects request bodies above 1 MB. */
export const MAX_INGESTION_BYTES = 1_000_000;

export const USER_AGENT = 'fabric-telemetry-collector/1.0.0';

export const DEFAULT_RUN_HISTORY_LIMIT = 20;
export const MAX_RUN_HISTORY_LIMIT = 100;
