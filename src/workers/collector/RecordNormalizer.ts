/**
 * Record Normalizer — raw API records → fixed stream schemas
 * Layer: Workers (Collector)
 * Pattern: Adapter Pattern (implements IRecordNormalizer)
 *
 * One Zod schema per API family says which raw fields we rely on; one
 * mapping function per family builds the stream record. Each mapping returns
 * `StreamRecord<...>`, so a missing or extra column is a compile error
 * rather than a 400 from the ingestion endpoint.
 *
 * Unknown raw fields are ignored. Missing optional fields become null.
 * Timestamps are re-serialised as ISO-8601 UTC; unreadable ones become null.
 * TimeGenerated falls back to the time of normalization.
 *
 * Pure: no I/O, the clock is injected.
 */
import { entityLabel } from '@domain/entities/EntityReference';
import type {
  CapacityMetricRaw,
  DataflowRunRaw,
  DatasetRefreshRaw,
  PipelineActivityRunRaw,
  PipelineRunRaw,
  RawRecord,
  UserActivityRaw,
} from '@domain/entities/RawRecord';
import type { StreamRecord } from '@domain/entities/StreamSchema';
import type { IRecordNormalizer, NormalizedEnvelope } from '@domain/interfaces/IRecordNormalizer';
import { NormalizationError } from '@shared/errors/CollectorError';
import { z } from 'zod/v4';

const text = z.string().nullish();
const num = z.number().nullish();

const jobInstanceSchema = z.object({
  id: z.string().min(1),
  jobType: text,
  invokeType: text,
  status: text,
  startTimeUtc: text,
  endTimeUtc: text,
  failureReason: z.object({ message: text, errorCode: text }).nullish(),
});

const activityRunSchema = z.object({
  activityRunId: z.string().min(1),
  activityName: text,
  activityType: text,
  status: text,
  activityRunStart: text,
  activityRunEnd: text,
  durationInMs: num,
  error: z.object({ errorCode: text, message: text }).nullish(),
});

const refreshSchema = z.object({
  requestId: z.string().min(1),
  refreshType: text,
  status: text,
  startTime: text,
  endTime: text,
  serviceExceptionJson: text,
});

const activityEventSchema = z.object({
  Id: z.string().min(1),
  CreationTime: text,
  Operation: text,
  Activity: text,
  UserId: text,
  ItemName: text,
  WorkspaceName: text,
  ClientIP: text,
  UserAgent: text,
  IsSuccess: z.boolean().nullish(),
});

const capacityMetricSchema = z.object({
  timestamp: z.string().min(1),
  capacityName: text,
  utilizationPercent: num,
  interactiveCuSeconds: num,
  backgroundCuSeconds: num,
  throttledPercent: num,
});

export class RecordNormalizer implements IRecordNormalizer {
  constructor(private readonly now: () => Date = () => new Date()) {}

  normalize(raw: RawRecord): NormalizedEnvelope {
    switch (raw.source) {
      case 'pipelineRun':
        return { stream: 'Custom-FabricPipelineRun_CL', record: this.pipelineRun(raw) };
      case 'pipelineActivityRun':
        return { stream: 'Custom-FabricPipelineActivityRun_CL', record: this.activityRun(raw) };
      case 'dataflowRun':
        return { stream: 'Custom-FabricDataflowRun_CL', record: this.dataflowRun(raw) };
      case 'datasetRefresh':
        return { stream: 'Custom-FabricDatasetRefresh_CL', record: this.datasetRefresh(raw) };
      case 'userActivity':
        return { stream: 'Custom-FabricUserActivity_CL', record: this.userActivity(raw) };
      case 'capacityMetric':
        return { stream: 'Custom-FabricCapacityMetrics_CL', record: this.capacityMetric(raw) };
    }
  }

  private pipelineRun(raw: PipelineRunRaw): StreamRecord<'Custom-FabricPipelineRun_CL'> {
    const run = parse(jobInstanceSchema, raw);
    const start = toIso(run.startTimeUtc);
    const end = toIso(run.endTimeUtc);
    return {
      TimeGenerated: start ?? this.timestamp(),
      WorkspaceId: raw.entity.workspaceId ?? null,
      PipelineId: raw.entity.id,
      PipelineName: raw.entity.displayName ?? null,
      RunId: run.id,
      JobType: run.jobType ?? null,
      InvokeType: run.invokeType ?? null,
      Status: run.status ?? null,
      StartTime: start,
      EndTime: end,
      DurationMs: durationMs(start, end),
      FailureReason: run.failureReason?.message ?? null,
    };
  }

  private dataflowRun(raw: DataflowRunRaw): StreamRecord<'Custom-FabricDataflowRun_CL'> {
    const run = parse(jobInstanceSchema, raw);
    const start = toIso(run.startTimeUtc);
    const end = toIso(run.endTimeUtc);
    return {
      TimeGenerated: start ?? this.timestamp(),
      WorkspaceId: raw.entity.workspaceId ?? null,
      DataflowId: raw.entity.id,
      DataflowName: raw.entity.displayName ?? null,
      RunId: run.id,
      JobType: run.jobType ?? null,
      InvokeType: run.invokeType ?? null,
      Status: run.status ?? null,
      StartTime: start,
      EndTime: end,
      DurationMs: durationMs(start, end),
      FailureReason: run.failureReason?.message ?? null,
    };
  }

  private activityRun(
    raw: PipelineActivityRunRaw,
  ): StreamRecord<'Custom-FabricPipelineActivityRun_CL'> {
    const run = parse(activityRunSchema, raw);
    const start = toIso(run.activityRunStart);
    const end = toIso(run.activityRunEnd);
    const reported = run.durationInMs;
    return {
      TimeGenerated: start ?? this.timestamp(),
      WorkspaceId: raw.entity.workspaceId ?? null,
      PipelineId: raw.entity.id,
      RunId: raw.parentRunId,
      ActivityRunId: run.activityRunId,
      ActivityName: run.activityName ?? null,
      ActivityType: run.activityType ?? null,
      Status: run.status ?? null,
      StartTime: start,
      EndTime: end,
      DurationMs:
        typeof reported === 'number' && Number.isFinite(reported)
          ? Math.round(reported)
          : durationMs(start, end),
      ErrorCode: run.error?.errorCode || null,
      ErrorMessage: run.error?.message || null,
    };
  }

  private datasetRefresh(raw: DatasetRefreshRaw): StreamRecord<'Custom-FabricDatasetRefresh_CL'> {
    const refresh = parse(refreshSchema, raw);
    const start = toIso(refresh.startTime);
    const end = toIso(refresh.endTime);
    return {
      TimeGenerated: start ?? this.timestamp(),
      WorkspaceId: raw.entity.workspaceId ?? null,
      DatasetId: raw.entity.id,
      DatasetName: raw.entity.displayName ?? null,
      RequestId: refresh.requestId,
      RefreshType: refresh.refreshType ?? null,
      Status: refresh.status ?? null,
      StartTime: start,
      EndTime: end,
      DurationMs: durationMs(start, end),
      ServiceException: refresh.serviceExceptionJson || null,
    };
  }

  private userActivity(raw: UserActivityRaw): StreamRecord<'Custom-FabricUserActivity_CL'> {
    const event = parse(activityEventSchema, raw);
    return {
      TimeGenerated: toIso(event.CreationTime) ?? this.timestamp(),
      WorkspaceId: raw.entity.id,
      WorkspaceName: event.WorkspaceName ?? raw.entity.displayName ?? null,
      EventId: event.Id,
      Operation: event.Operation ?? null,
      Activity: event.Activity ?? null,
      UserId: event.UserId ?? null,
      ItemName: event.ItemName ?? null,
      ClientIP: event.ClientIP ?? null,
      UserAgent: event.UserAgent ?? null,
      IsSuccess: event.IsSuccess ?? null,
    };
  }

  private capacityMetric(raw: CapacityMetricRaw): StreamRecord<'Custom-FabricCapacityMetrics_CL'> {
    const metric = parse(capacityMetricSchema, raw);
    const throttled = metric.throttledPercent ?? null;
    return {
      TimeGenerated: toIso(metric.timestamp) ?? this.timestamp(),
      CapacityId: raw.entity.id,
      CapacityName: metric.capacityName ?? raw.entity.displayName ?? null,
      UtilizationPercent: metric.utilizationPercent ?? null,
      InteractiveCuSeconds: metric.interactiveCuSeconds ?? null,
      BackgroundCuSeconds: metric.backgroundCuSeconds ?? null,
      ThrottledPercent: throttled,
      IsThrottled: throttled === null ? null : throttled > 0,
    };
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}

function parse<T extends z.ZodType>(schema: T, raw: RawRecord): z.output<T> {
  const parsed = schema.safeParse(raw.fields);
  if (parsed.success) return parsed.data;
  const issues = parsed.error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
  throw new NormalizationError(
    `Malformed ${raw.source} record from ${entityLabel(raw.entity)}: ${issues}`,
  );
}

/** ISO-8601 UTC, or null when absent or unreadable. */
export function toIso(value: string | null | undefined): string | null {
  if (!value) return null;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? null : new Date(ms).toISOString();
}

export function durationMs(start: string | null, end: string | null): number | null {
  if (!start || !end) return null;
  const ms = Date.parse(end) - Date.parse(start);
  return Number.isFinite(ms) && ms >= 0 ? ms : null;
}
