/**
 * Request schemas for the /runs endpoints.
 *
 * The POST body is the strict RunOverrides schema: an unknown key is a 400
 * rather than silently ignored, so a typo such as `lookback` does not start
 * a run with the default window.
 */
import { runOverridesSchema } from '@domain/entities/RunConfig';
import { DEFAULT_RUN_HISTORY_LIMIT, MAX_RUN_HISTORY_LIMIT } from '@shared/constants';
import { z } from 'zod/v4';

export const startRunBodySchema = runOverridesSchema;

export const listRunsQuerySchema = z.object({
  limit: z.coerce
    .number()
    .int()
    .min(1)
    .max(MAX_RUN_HISTORY_LIMIT)
    .default(DEFAULT_RUN_HISTORY_LIMIT),
});

export const runIdParamsSchema = z.object({
  runId: z.string().min(1).max(64),
});
