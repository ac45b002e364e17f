/**
 * Stream Schemas — Destination Table Contracts
 * Layer: Domain
 *
 * Each Log Analytics stream is bound (outside this repo) to a table with a
 * fixed column list. The collector never creates or alters those tables; it
 * only needs the column names and types to check every record before it is
 * sent, because the ingestion endpoint answers a mismatch with a 400 for the
 * whole batch.
 *
 * The column lists are declared `as const` so `StreamRecord<'...'>` is a
 * precise object type: a normalizer that forgets a column, or adds one, does
 * not compile.
 */
import type { STREAM_NAMES } from '@shared/constants';

export type StreamName = (typeof STREAM_NAMES)[number];

export type ColumnType = 'string' | 'datetime' | 'long' | 'real' | 'boolean';

export interface ColumnDefinition {
  readonly name: string;
  readonly type: ColumnType;
}

export type ColumnValue = string | number | boolean | null;

/** A record that has passed through the normalizer: column name → value. */
export type NormalizedRecord = Readonly<Record<string, ColumnValue>>;

type ValueOf<T extends ColumnType> = T extends 'string' | 'datetime'
  ? string | null
  : T extends 'long' | 'real'
    ? number | null
    : boolean | null;

type RecordOf<Columns extends readonly ColumnDefinition[]> = {
  [C in Columns[number] as C['name']]: ValueOf<C['type']>;
};

const PIPELINE_RUN_COLUMNS = [
  { name: 'TimeGenerated', type: 'datetime' },
  { name: 'WorkspaceId', type: 'string' },
  { name: 'PipelineId', type: 'string' },
  { name: 'PipelineName', type: 'string' },
  { name: 'RunId', type: 'string' },
  { name: 'JobType', type: 'string' },
  { name: 'InvokeType', type: 'string' },
  { name: 'Status', type: 'string' },
  { name: 'StartTime', type: 'datetime' },
  { name: 'EndTime', type: 'datetime' },
  { name: 'DurationMs', type: 'long' },
  { name: 'FailureReason', type: 'string' },
] as const;

const DATAFLOW_RUN_COLUMNS = [
  { name: 'TimeGenerated', type: 'datetime' },
  { name: 'WorkspaceId', type: 'string' },
  { name: 'DataflowId', type: 'string' },
  { name: 'DataflowName', type: 'string' },
  { name: 'RunId', type: 'string' },
  { name: 'JobType', type: 'string' },
  { name: 'InvokeType', type: 'string' },
  { name: 'Status', type: 'string' },
  { name: 'StartTime', type: 'datetime' },
  { name: 'EndTime', type: 'datetime' },
  { name: 'DurationMs', type: 'long' },
  { name: 'FailureReason', type: 'string' },
] as const;

const PIPELINE_ACTIVITY_RUN_COLUMNS = [
  { name: 'TimeGenerated', type: 'datetime' },
  { name: 'WorkspaceId', type: 'string' },
  { name: 'PipelineId', type: 'string' },
  { name: 'RunId', type: 'string' },
  { name: 'ActivityRunId', type: 'string' },
  { name: 'ActivityName', type: 'string' },
  { name: 'ActivityType', type: 'string' },
  { name: 'Status', type: 'string' },
  { name: 'StartTime', type: 'datetime' },
  { name: 'EndTime', type: 'datetime' },
  { name: 'DurationMs', type: 'long' },
  { name: 'ErrorCode', type: 'string' },
  { name: 'ErrorMessage', type: 'string' },
] as const;

const DATASET_REFRESH_COLUMNS = [
  { name: 'TimeGenerated', type: 'datetime' },
  { name: 'WorkspaceId', type: 'string' },
  { name: 'DatasetId', type: 'string' },
  { name: 'DatasetName', type: 'string' },
  { name: 'RequestId', type: 'string' },
  { name: 'RefreshType', type: 'string' },
  { name: 'Status', type: 'string' },
  { name: 'StartTime', type: 'datetime' },
  { name: 'EndTime', type: 'datetime' },
  { name: 'DurationMs', type: 'long' },
  { name: 'ServiceException', type: 'string' },
] as const;

const USER_ACTIVITY_COLUMNS = [
  { name: 'TimeGenerated', type: 'datetime' },
  { name: 'WorkspaceId', type: 'string' },
  { name: 'WorkspaceName', type: 'string' },
  { name: 'EventId', type: 'string' },
  { name: 'Operation', type: 'string' },
  { name: 'Activity', type: 'string' },
  { name: 'UserId', type: 'string' },
  { name: 'ItemName', type: 'string' },
  { name: 'ClientIP', type: 'string' },
  { name: 'UserAgent', type: 'string' },
  { name: 'IsSuccess', type: 'boolean' },
] as const;

const CAPACITY_METRIC_COLUMNS = [
  { name: 'TimeGenerated', type: 'datetime' },
  { name: 'CapacityId', type: 'string' },
  { name: 'CapacityName', type: 'string' },
  { name: 'UtilizationPercent', type: 'real' },
  { name: 'InteractiveCuSeconds', type: 'real' },
  { name: 'BackgroundCuSeconds', type: 'real' },
  { name: 'ThrottledPercent', type: 'real' },
  { name: 'IsThrottled', type: 'boolean' },
] as const;

export const STREAM_COLUMNS = {
  'Custom-FabricPipelineRun_CL': PIPELINE_RUN_COLUMNS,
  'Custom-FabricPipelineActivityRun_CL': PIPELINE_ACTIVITY_RUN_COLUMNS,
  'Custom-FabricDataflowRun_CL': DATAFLOW_RUN_COLUMNS,
  'Custom-FabricDatasetRefresh_CL': DATASET_REFRESH_COLUMNS,
  'Custom-FabricUserActivity_CL': USER_ACTIVITY_COLUMNS,
  'Custom-FabricCapacityMetrics_CL': CAPACITY_METRIC_COLUMNS,
} as const satisfies Record<StreamName, readonly ColumnDefinition[]>;

export type StreamRecord<N extends StreamName> = RecordOf<(typeof STREAM_COLUMNS)[N]>;

export interface StreamSchema {
  readonly name: StreamName;
  readonly columns: readonly ColumnDefinition[];
}

export function getStreamSchema(name: StreamName): StreamSchema {
  return { name, columns: STREAM_COLUMNS[name] };
}

function matchesType(value: ColumnValue, type: ColumnType): boolean {
  switch (type) {
    case 'string':
      return typeof value === 'string';
    case 'datetime':
      return typeof value === 'string' && !Number.isNaN(Date.parse(value));
    case 'long':
      return typeof value === 'number' && Number.isInteger(value);
    case 'real':
      return typeof value === 'number' && Number.isFinite(value);
    case 'boolean':
      return typeof value === 'boolean';
  }
}

/**
 * Checks a record against its stream's column list: every column present
 * (null is allowed), no extra fields, values of the declared type.
 * Returns one message per problem; an empty array means the record is valid.
 */
export function validateRecord(schema: StreamSchema, record: NormalizedRecord): string[] {
  const issues: string[] = [];
  const known = new Set<string>();

  for (const column of schema.columns) {
    known.add(column.name);
    if (!Object.prototype.hasOwnProperty.call(record, column.name)) {
      issues.push(`missing column ${column.name}`);
      continue;
    }
    const value = record[column.name];
    if (value !== null && !matchesType(value, column.type)) {
      issues.push(`column ${column.name} expects ${column.type}, got ${JSON.stringify(value)}`);
    }
  }

  for (const key of Object.keys(record)) {
    if (!known.has(key)) issues.push(`unexpected field ${key}`);
  }

  return issues;
}
