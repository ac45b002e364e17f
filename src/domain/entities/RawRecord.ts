/**
 * Raw Source Record
 * Layer: Domain
 *
 * What a Source API page hands back, tagged with the API family it came
 * from. `fields` stays an open mapping only until the Record Normalizer
 * parses it against that family's schema; nothing downstream of the
 * normalizer sees it. Activity runs carry their parent pipeline run.
 */
import type { SOURCE_KINDS } from '@shared/constants';

import type { EntityReference } from './EntityReference';

export type SourceKind = (typeof SOURCE_KINDS)[number];

export type RawFields = Readonly<Record<string, unknown>>;

interface RawRecordBase<K extends SourceKind> {
  readonly source: K;
  readonly entity: EntityReference;
  readonly fields: RawFields;
}

export type PipelineRunRaw = RawRecordBase<'pipelineRun'>;
export interface PipelineActivityRunRaw extends RawRecordBase<'pipelineActivityRun'> {
  readonly parentRunId: string;
}
export type DataflowRunRaw = RawRecordBase<'dataflowRun'>;
export type DatasetRefreshRaw = RawRecordBase<'datasetRefresh'>;
export type UserActivityRaw = RawRecordBase<'userActivity'>;
export type CapacityMetricRaw = RawRecordBase<'capacityMetric'>;

export type RawRecord =
  | PipelineRunRaw
  | PipelineActivityRunRaw
  | DataflowRunRaw
  | DatasetRefreshRaw
  | UserActivityRaw
  | CapacityMetricRaw;
