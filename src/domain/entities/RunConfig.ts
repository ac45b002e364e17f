/**
 * Run Configuration
 * Layer: Domain
 *
 * Everything one orchestrator invocation needs, already resolved from
 * environment defaults and per-run overrides (see RunConfigFactory). The Zod
 * schema is the Init-state check: a config that does not parse never gets
 * as far as a network call.
 */
import { z } from 'zod/v4';

import { COLLECTION_MODES, DETAIL_LEVELS, STREAM_NAMES } from '@shared/constants';

export const scopeSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('all') }),
  z.object({ type: z.literal('explicit'), ids: z.array(z.string().min(1)).min(1) }),
]);

/** Explicit ids of workspace children are written `<workspaceId>/<itemId>`. */
export const childScopeSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('all') }),
  z.object({
    type: z.literal('explicit'),
    ids: z
      .array(
        z
          .string()
          .trim()
          .regex(/^[^/]+\/[^/]+$/, 'must be written <workspaceId>/<itemId>'),
      )
      .min(1),
  }),
]);

export const retryPolicySchema = z.object({
  baseDelayMs: z.number().int().min(0),
  multiplier: z.number().min(1),
  maxAttempts: z.number().int().positive(),
  maxDelayMs: z.number().int().min(0),
  jitter: z.number().min(0).max(1),
});

export const runConfigSchema = z.object({
  streams: z.array(z.enum(STREAM_NAMES)).min(1, 'at least one stream must be configured'),
  entities: z.object({
    Workspace: scopeSchema,
    Pipeline: childScopeSchema,
    Dataflow: childScopeSchema,
    Dataset: childScopeSchema,
    Capacity: scopeSchema,
  }),
  window: z.object({
    mode: z.enum(COLLECTION_MODES),
    lookbackMinutes: z.number().positive().optional(),
  }),
  detailLevel: z.enum(DETAIL_LEVELS).optional(),
  workerCount: z.number().int().min(1).max(64),
  batchLimits: z.object({
    maxRecords: z.number().int().positive(),
    maxBytes: z.number().int().positive(),
  }),
  retryPolicy: retryPolicySchema,
  throttle: z.object({
    maxRetries: z.number().int().min(0),
    defaultDelayMs: z.number().int().min(0),
  }),
  maxPages: z.number().int().positive(),
  deadlineMs: z.number().int().positive().optional(),
});

export type RunConfig = z.infer<typeof runConfigSchema>;
export type RetryPolicyOptions = z.infer<typeof retryPolicySchema>;
export type BatchLimits = RunConfig['batchLimits'];
export type ThrottleOptions = RunConfig['throttle'];

/** Per-run overrides accepted from the CLI, the HTTP trigger and the scheduler. */
export const runOverridesSchema = z.strictObject({
  mode: z.enum(COLLECTION_MODES).optional(),
  lookbackMinutes: z.number().int().positive().optional(),
  detailLevel: z.enum(DETAIL_LEVELS).optional(),
  streams: z.array(z.enum(STREAM_NAMES)).min(1).optional(),
  deadlineMs: z.number().int().positive().optional(),
});

export type RunOverrides = z.infer<typeof runOverridesSchema>;
