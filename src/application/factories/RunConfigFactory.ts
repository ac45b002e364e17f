/**
 * Run Config Factory
 * Layer: Application
 * Pattern: Factory Pattern
 *
 * I turn environment defaults plus per-run overrides (CLI flags, POST body,
 * scheduler) into the RunConfig the orchestrator validates.
 *
 * Choosing a mode means choosing its defaults: when an override names a
 * mode, the lookback and detail level come from that mode's MODE_DEFAULTS
 * unless the override sets them too. COLLECT_LOOKBACK_MINUTES and
 * COLLECT_DETAIL_LEVEL only apply to the configured COLLECT_MODE.
 */
import type { CollectDefaults } from '@core/config';
import type { RunConfig, RunOverrides } from '@domain/entities/RunConfig';

export class RunConfigFactory {
  constructor(private readonly defaults: CollectDefaults) {}

  build(overrides: RunOverrides = {}): RunConfig {
    const d = this.defaults;
    const modeOverridden = overrides.mode !== undefined;

    return {
      streams: [...(overrides.streams ?? d.streams)],
      entities: {
        Workspace: d.entities.Workspace,
        Pipeline: d.entities.Pipeline,
        Dataflow: d.entities.Dataflow,
        Dataset: d.entities.Dataset,
        Capacity: d.entities.Capacity,
      },
      window: {
        mode: overrides.mode ?? d.mode,
        lookbackMinutes:
          overrides.lookbackMinutes ?? (modeOverridden ? undefined : d.lookbackMinutes),
      },
      detailLevel: overrides.detailLevel ?? (modeOverridden ? undefined : d.detailLevel),
      workerCount: d.workerCount,
      batchLimits: { ...d.batchLimits },
      retryPolicy: { ...d.retryPolicy },
      throttle: { ...d.throttle },
      maxPages: d.maxPages,
      deadlineMs: overrides.deadlineMs ?? d.deadlineMs,
    };
  }
}
