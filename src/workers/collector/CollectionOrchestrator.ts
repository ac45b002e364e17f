/**
 * Collection Orchestrator — one run, end to end
 * Layer: Workers (Collector)
 *
 * Init → Discovering → Collecting → Flushing → Completed | PartiallyFailed
 *
 *   Init         validate the run config, build the window, acquire the
 *                source and ingestion tokens. Any failure here is fatal.
 *   Discovering  resolve every entity kind the configured streams need.
 *                A listing that fails is recorded as skipped; the run only
 *                fails if every listing call failed.
 *   Collecting   a bounded worker pool pulls entities; each entity streams
 *                reader → normalizer → ingestion client. An entity failure
 *                is recorded against the streams it feeds and the pool moves
 *                on.
 *   Flushing     every non-empty buffer goes out, also after the deadline.
 *
 * The run is Completed only if no record failed, no entity failed and the
 * deadline did not expire.
 *
 * Components are built per run: buffers, counters and the deadline belong to
 * one invocation. Tokens are shared through the injected TokenManager.
 */
import { randomUUID } from 'node:crypto';

import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import {
  createWindow,
  defaultDetailLevel,
  type CollectionWindow,
  type DetailLevel,
} from '@domain/entities/CollectionWindow';
import {
  entityKey,
  entityLabel,
  isChildKind,
  type EntityKind,
  type EntityReference,
  type Scope,
} from '@domain/entities/EntityReference';
import { runConfigSchema, type RunConfig } from '@domain/entities/RunConfig';
import type {
  EntityFailure,
  RunResult,
  RunState,
  SkippedScope,
  StreamResult,
} from '@domain/entities/RunResult';
import type { StreamName } from '@domain/entities/StreamSchema';
import type { HttpClient } from '@infrastructure/http/HttpClient';
import {
  ConfigError,
  DeadlineExceededError,
  DiscoveryError,
  describeError,
} from '@shared/errors/CollectorError';
import { inject, injectable } from 'tsyringe';

import { BackoffPolicy } from './BackoffPolicy';
import { BatchIngestionClient, type IngestionTarget } from './BatchIngestionClient';
import { DiscoveryResolver } from './DiscoveryResolver';
import { PaginatedSourceReader } from './PaginatedSourceReader';
import { RecordNormalizer } from './RecordNormalizer';
import type { CollectorRuntime } from './runtime';
import { SourcePageFetcher } from './SourcePageFetcher';
import { SOURCE_STREAM, kindsForStreams, streamsForKind } from './sourceCatalog';
import type { TokenManager } from './TokenManager';
import { runWithConcurrency } from './workerPool';

export interface CollectorSettings {
  apiBaseUrl: string;
  /** Token scope for the source API. */
  sourceScope: string;
  ingestion: IngestionTarget;
}

export interface RunOptions {
  /** External cancellation; treated like an expired deadline. */
  signal?: AbortSignal;
  runId?: string;
}

interface RunContext {
  config: RunConfig;
  window: CollectionWindow;
  detailLevel: DetailLevel;
  signal: AbortSignal;
  log: Logger;
}

@injectable()
export class CollectionOrchestrator {
  private currentState: RunState = 'Init';
  private readonly log: Logger;

  constructor(
    @inject(TOKENS.HttpClient) private readonly http: HttpClient,
    @inject(TOKENS.TokenManager) private readonly tokens: TokenManager,
    @inject(TOKENS.CollectorSettings) private readonly settings: CollectorSettings,
    @inject(TOKENS.CollectorRuntime) private readonly runtime: CollectorRuntime,
    @inject(TOKENS.Logger) logger: Logger,
  ) {
    this.log = logger.child({ component: 'CollectionOrchestrator' });
  }

  get state(): RunState {
    return this.currentState;
  }

  async run(input: RunConfig, options: RunOptions = {}): Promise<RunResult> {
    this.currentState = 'Init';
    const runId = options.runId ?? randomUUID();
    const log = this.log.child({ runId });

    const config = this.validate(input);
    const startedAt = this.runtime.now();
    const window = createWindow(config.window.mode, config.window.lookbackMinutes, startedAt);
    const detailLevel = config.detailLevel ?? defaultDetailLevel(window.mode);

    log.info(
      {
        mode: window.mode,
        start: window.start.toISOString(),
        end: window.end.toISOString(),
        detailLevel,
        streams: config.streams,
      },
      'Collection run starting',
    );

    await this.tokens.getToken(this.settings.sourceScope);
    await this.tokens.getToken(this.settings.ingestion.scope);

    const controller = new AbortController();
    const deadline = config.deadlineMs
      ? setTimeout(() => controller.abort(new DeadlineExceededError()), config.deadlineMs)
      : undefined;
    const onExternalAbort = (): void => {
      const reason: unknown = options.signal?.reason;
      controller.abort(reason instanceof Error ? reason : new DeadlineExceededError('Run aborted'));
    };
    if (options.signal?.aborted) onExternalAbort();
    options.signal?.addEventListener('abort', onExternalAbort, { once: true });

    try {
      return await this.execute(runId, startedAt, {
        config,
        window,
        detailLevel,
        signal: controller.signal,
        log,
      });
    } finally {
      if (deadline) clearTimeout(deadline);
      options.signal?.removeEventListener('abort', onExternalAbort);
    }
  }

  private async execute(runId: string, startedAt: Date, ctx: RunContext): Promise<RunResult> {
    const { config, window, detailLevel, signal, log } = ctx;
    const backoff = new BackoffPolicy(config.retryPolicy, this.runtime.sleep, this.runtime.random);
    const now = (): number => this.runtime.now().getTime();
    const fetcher = new SourcePageFetcher(
      this.http,
      this.tokens,
      {
        scope: this.settings.sourceScope,
        maxPages: config.maxPages,
        throttle: config.throttle,
        backoff,
        now,
      },
      log,
    );
    const discovery = new DiscoveryResolver(fetcher, this.settings.apiBaseUrl, log);
    const reader = new PaginatedSourceReader(fetcher, this.settings.apiBaseUrl, log);
    const normalizer = new RecordNormalizer(() => this.runtime.now());
    const ingestion = new BatchIngestionClient(
      this.http,
      this.tokens,
      { target: this.settings.ingestion, limits: config.batchLimits, backoff, now },
      log,
    );

    // ── Discovering ──
    this.currentState = 'Discovering';
    const { entities, skipped } = await this.discover(discovery, config, signal, log);

    // ── Collecting ──
    this.currentState = 'Collecting';
    const streams = new Map<StreamName, StreamResult>(
      config.streams.map((stream) => [
        stream,
        { emitted: 0, sent: 0, failed: 0, skippedEntities: [], errors: [] },
      ]),
    );
    const entityFailures: EntityFailure[] = [];
    let entitiesProcessed = 0;

    const recordFailure = (entity: EntityReference, err: unknown): void => {
      const label = entityLabel(entity);
      entityFailures.push({
        entity: label,
        error: err instanceof Error ? err.name : 'Error',
        message: err instanceof Error ? err.message : String(err),
      });
      for (const stream of streamsForKind(entity.kind, config.streams)) {
        const result = streams.get(stream);
        if (!result) continue;
        result.skippedEntities.push(label);
        result.errors.push(`${label}: ${describeError(err)}`);
      }
    };

    const collectEntity = async (entity: EntityReference): Promise<void> => {
      entitiesProcessed++;
      const fed = streamsForKind(entity.kind, config.streams);
      const detail: DetailLevel = fed.includes(SOURCE_STREAM.pipelineActivityRun)
        ? detailLevel
        : 'Summary';
      let emitted = 0;
      try {
        for await (const raw of reader.read(entity, window, detail, signal)) {
          const result = streams.get(SOURCE_STREAM[raw.source]);
          if (!result) continue;
          const { stream, record } = normalizer.normalize(raw);
          result.emitted++;
          emitted++;
          await ingestion.submit(stream, record);
        }
        log.debug({ entity: entityLabel(entity), emitted }, 'Entity collected');
      } catch (err) {
        log.warn(
          { entity: entityLabel(entity), emitted, error: describeError(err) },
          'Entity failed',
        );
        recordFailure(entity, err);
      }
    };

    const { notStarted } = await runWithConcurrency(
      entities,
      config.workerCount,
      collectEntity,
      signal,
    );
    for (const entity of notStarted) {
      recordFailure(entity, new DeadlineExceededError('Not started before the run deadline'));
    }

    // ── Flushing ──
    this.currentState = 'Flushing';
    await ingestion.flushAll();

    for (const [stream, tally] of ingestion.results()) {
      const result = streams.get(stream);
      if (!result) continue;
      result.sent = tally.sent;
      result.failed = tally.failed;
      result.errors.push(...tally.errors);
    }

    const deadlineExceeded = signal.aborted;
    const clean =
      !deadlineExceeded &&
      entityFailures.length === 0 &&
      [...streams.values()].every((result) => result.failed === 0);
    const status = clean ? 'Completed' : 'PartiallyFailed';
    this.currentState = status;

    const streamResults: RunResult['streams'] = {};
    for (const [stream, totals] of streams) streamResults[stream] = totals;

    const result: RunResult = {
      runId,
      status,
      window: {
        start: window.start.toISOString(),
        end: window.end.toISOString(),
        mode: window.mode,
      },
      detailLevel,
      startedAt: startedAt.toISOString(),
      finishedAt: this.runtime.now().toISOString(),
      entitiesProcessed,
      deadlineExceeded,
      streams: streamResults,
      skipped,
      entityFailures,
    };

    log.info(
      {
        status,
        entitiesProcessed,
        entityFailures: entityFailures.length,
        skipped: skipped.length,
        deadlineExceeded,
        streams: Object.fromEntries(
          [...streams].map(([stream, r]) => [stream, { sent: r.sent, failed: r.failed }]),
        ),
      },
      'Collection run finished',
    );
    return result;
  }

  private validate(input: RunConfig): RunConfig {
    const parsed = runConfigSchema.safeParse(input);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`Invalid run configuration: ${issues}`);
    }
    const { ingestion, apiBaseUrl } = this.settings;
    if (!ingestion.endpoint || !ingestion.ruleId) {
      throw new ConfigError('Ingestion endpoint and rule id must be configured');
    }
    if (!URL.canParse(ingestion.endpoint) || !URL.canParse(apiBaseUrl)) {
      throw new ConfigError('Ingestion endpoint and source base URL must be absolute URLs');
    }
    return parsed.data;
  }

  private async discover(
    discovery: DiscoveryResolver,
    config: RunConfig,
    signal: AbortSignal,
    log: Logger,
  ): Promise<{ entities: EntityReference[]; skipped: SkippedScope[] }> {
    const kinds = kindsForStreams(config.streams);
    const skipped: SkippedScope[] = [];
    let listings = 0;
    let listingFailures = 0;

    const resolve = async (
      kind: EntityKind,
      scope: Scope,
      parent?: EntityReference,
    ): Promise<EntityReference[]> => {
      if (scope.type === 'all') listings++;
      try {
        return await discovery.resolve(kind, scope, parent, signal);
      } catch (err) {
        if (err instanceof DiscoveryError) {
          listingFailures++;
        } else if (!(err instanceof DeadlineExceededError)) {
          throw err;
        }
        log.warn({ kind, parentId: parent?.id, error: describeError(err) }, 'Discovery skipped');
        skipped.push({ kind, parentId: parent?.id, reason: describeError(err) });
        return [];
      }
    };

    const needsWorkspaces = kinds.some(
      (kind) => kind === 'Workspace' || (isChildKind(kind) && config.entities[kind].type === 'all'),
    );
    const workspaces = needsWorkspaces ? await resolve('Workspace', config.entities.Workspace) : [];

    const found: EntityReference[] = [];
    for (const kind of kinds) {
      if (kind === 'Workspace') {
        found.push(...workspaces);
      } else if (kind === 'Capacity') {
        found.push(...(await resolve(kind, config.entities.Capacity)));
      } else {
        const scope = config.entities[kind];
        if (scope.type === 'explicit') {
          found.push(...(await resolve(kind, scope)));
          continue;
        }
        for (const workspace of workspaces) {
          found.push(...(await resolve(kind, scope, workspace)));
        }
      }
    }

    if (found.length === 0 && listings > 0 && listingFailures === listings) {
      throw new DiscoveryError('No entity could be resolved: every discovery call failed', true);
    }

    const seen = new Set<string>();
    const entities = found.filter((entity) => {
      const key = entityKey(entity);
      if (seen.has(key)) return false;
      seen.add(key);
      return true;
    });

    log.info({ entities: entities.length, skipped: skipped.length }, 'Discovery finished');
    return { entities, skipped };
  }
}
