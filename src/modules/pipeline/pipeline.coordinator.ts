import { randomUUID } from 'node:crypto';
import type { LRUCache } from 'lru-cache';
import { createCache, registerCache } from '../../lib/cache.js';
import {
  NoCandidatesError,
  PublishFailedError,
  QueryCancelledError,
  SelectionNotPendingError,
  errorMessage,
  toPipelineError,
} from '../../lib/errors.js';
import { createChildLogger } from '../../lib/logger.js';
import type { MetadataCache } from '../metadata/metadata.cache.js';
import type { CandidateRecord, MetadataRecord, MovieSource, StoredMetadata } from '../metadata/metadata.types.js';
import type { ChannelPublisher } from '../publish/telegram.publisher.js';
import { publicationKey, type PublicationDeduper } from '../publish/publication.deduper.js';
import { normalize } from '../query/query.normalizer.js';
import type { NormalizedQuery, Query, SeriesHint } from '../query/query.types.js';
import type { RenderCache } from '../render/render.cache.js';
import type { PosterAsset, PosterRenderer } from '../render/render.types.js';
import type { AmbiguityResolver, RankedCandidate, Selection } from '../resolver/ambiguity.resolver.js';
import { KeyedLease } from './keyed-lease.js';
import type { DoneResult, FailedResult, QuerySnapshot, QuerySubscription, RunResult } from './pipeline.types.js';
import { QueryRun } from './query-run.js';

const logger = createChildLogger('pipeline');

const FINISHED_RUNS_KEPT = 1000;

export interface PipelineDependencies {
  source: MovieSource;
  metadata: MetadataCache;
  resolver: AmbiguityResolver;
  renders: RenderCache;
  renderer: PosterRenderer;
  deduper: PublicationDeduper;
  publisher: ChannelPublisher;
}

export interface PipelineOptions {
  selectionTimeoutMs: number;
  publishMaxRetries: number;
  publishBackoffMs: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

/** What resolution settled on, before the per-ID lease is taken */
interface ResolutionTarget {
  externalId: string;
  /** Record already known from the cache, fresh or as a degraded fallback */
  known?: StoredMetadata;
  stale: boolean;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class PipelineCoordinator {
  private readonly active = new Map<string, QueryRun>();
  private readonly finished: LRUCache<string, QueryRun>;
  private readonly lease = new KeyedLease();
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly deps: PipelineDependencies,
    private readonly options: PipelineOptions,
  ) {
    this.finished = registerCache('queries', createCache<QueryRun>({ maxSize: FINISHED_RUNS_KEPT }));
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  // ==========================================================================
  // Public API
  // ==========================================================================

  submit(query: Query): QuerySubscription {
    const id = query.id ?? randomUUID();

    const existing = this.active.get(id);
    if (existing) {
      if (existing.query.raw === query.raw) {
        logger.debug({ queryId: id }, 'Query already running');
        return existing;
      }
      // Edited message: restart unless the old text already resolved
      if (!existing.signal.aborted && !this.cancel(id)) {
        logger.info({ queryId: id }, 'Edit arrived after resolution, keeping the running query');
        return existing;
      }
      logger.info({ queryId: id }, 'Query edited, restarting');
    }

    const run = new QueryRun(id, query);
    this.active.set(id, run);
    run.transition({ state: 'received', at: this.now(), query });
    logger.info({ queryId: id, source: query.source }, 'Query received');

    void this.execute(run).then((result) => {
      // A superseded run must not evict or shadow its replacement
      if (this.active.get(id) === run) {
        this.active.delete(id);
        this.finished.set(id, run);
      }
      run.finish(result);
    });

    return run;
  }

  /** Resume a run waiting on a human choice */
  provideSelection(queryId: string, candidateId: string): void {
    const run = this.active.get(queryId);
    const pending = run?.pendingSelection;
    if (!pending) {
      throw new SelectionNotPendingError(queryId);
    }
    const choice = this.deps.resolver.pick(queryId, pending.selection, candidateId);
    logger.info({ queryId, externalId: candidateId }, 'Selection provided');
    pending.settle(choice);
  }

  /** Best-effort abort; returns false when the run is unknown, finished or already resolved */
  cancel(queryId: string): boolean {
    const run = this.active.get(queryId);
    if (!run || run.pastResolution || run.signal.aborted) {
      return false;
    }
    logger.info({ queryId }, 'Cancelling query');
    run.controller.abort();
    return true;
  }

  getState(queryId: string): QuerySnapshot | undefined {
    return (this.active.get(queryId) ?? this.finished.get(queryId))?.snapshot();
  }

  // ==========================================================================
  // Run
  // ==========================================================================

  private async execute(run: QueryRun): Promise<RunResult> {
    try {
      run.transition({ state: 'normalizing', at: this.now() });
      const normalized = normalize(run.query, { now: new Date(this.now()) });
      this.throwIfCancelled(run);

      run.transition({ state: 'resolving', at: this.now() });
      const target = await this.resolveTarget(run, normalized);

      return await this.lease.withLease(target.externalId, () => this.complete(run, normalized, target));
    } catch (error) {
      const failure = toPipelineError(error);
      const result: FailedResult = {
        status: 'failed',
        queryId: run.id,
        query: run.query,
        code: failure.code,
        message: failure.message,
      };
      logger.warn({ queryId: run.id, code: failure.code, err: failure }, 'Query failed');
      run.transition({ state: 'failed', at: this.now(), result });
      return result;
    }
  }

  private async resolveTarget(run: QueryRun, normalized: NormalizedQuery): Promise<ResolutionTarget> {
    const { metadata, source, resolver } = this.deps;

    const fresh = metadata.get(normalized);
    if (fresh) {
      logger.debug({ queryId: run.id, externalId: fresh.record.externalId }, 'Resolved from cache');
      return { externalId: fresh.record.externalId, known: fresh, stale: false };
    }

    if (normalized.externalId !== undefined) {
      logger.debug({ queryId: run.id, externalId: normalized.externalId }, 'Catalog id given, skipping search');
      return { externalId: normalized.externalId, stale: false };
    }

    let candidates: CandidateRecord[];
    try {
      candidates = await source.fetchCandidates(normalized, run.signal);
    } catch (error) {
      this.throwIfCancelled(run);
      return this.staleFallback(run, normalized, error);
    }
    this.throwIfCancelled(run);

    if (candidates.length === 0) {
      return this.staleFallback(run, normalized, new NoCandidatesError(normalized.title, normalized.year));
    }

    const decision = resolver.resolve(normalized, candidates);
    const choice = decision.kind === 'auto'
      ? decision.choice
      : await this.awaitSelection(run, decision.selection);

    return { externalId: choice.candidate.externalId, stale: false };
  }

  private staleFallback(run: QueryRun, normalized: NormalizedQuery, reason: unknown): ResolutionTarget {
    const stale = this.deps.metadata.getStale(normalized);
    if (!stale) throw reason;

    logger.warn(
      { queryId: run.id, externalId: stale.record.externalId, reason: errorMessage(reason) },
      'Serving stale metadata',
    );
    return { externalId: stale.record.externalId, known: stale, stale: true };
  }

  private awaitSelection(run: QueryRun, selection: Selection): Promise<RankedCandidate> {
    const [top] = selection.options;
    if (!top) {
      return Promise.reject(new NoCandidatesError(selection.query.title, selection.query.year));
    }

    run.transition({
      state: 'awaiting_selection',
      at: this.now(),
      options: selection.options.map(({ candidate, score }) => ({
        externalId: candidate.externalId,
        title: candidate.title,
        score,
        ...(candidate.year !== undefined && { year: candidate.year }),
      })),
    });

    return new Promise<RankedCandidate>((resolve, reject) => {
      const settle = () => {
        clearTimeout(timer);
        run.signal.removeEventListener('abort', onAbort);
        run.pendingSelection = undefined;
      };

      const timer = setTimeout(() => {
        settle();
        logger.warn({ queryId: run.id, externalId: top.candidate.externalId }, 'SelectionTimeout, using top candidate');
        resolve(top);
      }, this.options.selectionTimeoutMs);

      const onAbort = () => {
        settle();
        reject(new QueryCancelledError(run.id));
      };
      run.signal.addEventListener('abort', onAbort, { once: true });

      run.pendingSelection = {
        selection,
        settle: (choice) => {
          settle();
          resolve(choice);
        },
      };
    });
  }

  /** Runs under the per-ID lease: fetch or reuse, render, publish */
  private async complete(run: QueryRun, normalized: NormalizedQuery, target: ResolutionTarget): Promise<DoneResult> {
    const { externalId } = target;
    this.throwIfCancelled(run);

    const { stored, stale } = await this.loadRecord(run, normalized, target);
    this.throwIfCancelled(run);

    run.transition({
      state: 'resolved',
      at: this.now(),
      externalId,
      version: stored.version,
      stale,
    });

    run.transition({ state: 'rendering', at: this.now() });
    const asset = await this.deps.renders.getOrRender(stored.record, this.deps.renderer);

    run.transition({ state: 'publishing', at: this.now() });
    const key = publicationKey(externalId, normalized.series);
    const decision = this.deps.deduper.shouldPublish(key, stored.version);

    let result: DoneResult;
    if (!decision.allowed) {
      logger.info({ queryId: run.id, externalId, channelRef: decision.record.channelRef }, 'Already published, skipping');
      result = {
        status: 'done',
        queryId: run.id,
        externalId,
        version: stored.version,
        published: false,
        channelRef: decision.record.channelRef,
      };
    } else {
      const channelRef = await this.publishWithRetry(asset, stored.record, normalized.series);
      this.deps.deduper.recordPublished(key, stored.version, channelRef);
      result = {
        status: 'done',
        queryId: run.id,
        externalId,
        version: stored.version,
        published: true,
        channelRef,
      };
    }

    run.transition({ state: 'done', at: this.now(), result });
    logger.info({ queryId: run.id, externalId, published: result.published }, 'Query done');
    return result;
  }

  /**
   * Fresh cache first, so runs queued behind the lease reuse the first holder's fetch.
   * A failed fetch degrades to the last known record.
   */
  private async loadRecord(
    run: QueryRun,
    normalized: NormalizedQuery,
    target: ResolutionTarget,
  ): Promise<{ stored: StoredMetadata; stale: boolean }> {
    const { metadata, source } = this.deps;
    const { externalId } = target;

    const fresh = metadata.get(externalId);
    if (fresh) {
      return { stored: target.known ? fresh : metadata.put(fresh.record, [normalized]), stale: false };
    }
    if (target.stale && target.known) {
      return { stored: target.known, stale: true };
    }

    let record: MetadataRecord;
    try {
      record = await source.fetchFullRecord(externalId, run.signal);
    } catch (error) {
      this.throwIfCancelled(run);
      const stale = metadata.getStale(externalId);
      if (!stale) throw error;
      logger.warn({ queryId: run.id, externalId, reason: errorMessage(error) }, 'Serving stale metadata');
      return { stored: metadata.put(stale.record, [normalized]), stale: true };
    }

    return { stored: metadata.put(record, [normalized]), stale: false };
  }

  private async publishWithRetry(asset: PosterAsset, record: MetadataRecord, series?: SeriesHint): Promise<string> {
    const { publishMaxRetries, publishBackoffMs } = this.options;

    for (let attempt = 0; ; attempt++) {
      try {
        return await this.deps.publisher.publish(asset, record, series);
      } catch (error) {
        if (attempt >= publishMaxRetries) {
          throw error instanceof PublishFailedError
            ? error
            : new PublishFailedError(asset.externalId, errorMessage(error), { cause: error });
        }
        const delay = publishBackoffMs * 2 ** attempt;
        logger.warn({ externalId: asset.externalId, attempt: attempt + 1, delay, err: error }, 'Publish failed, retrying');
        await this.sleep(delay);
      }
    }
  }

  private throwIfCancelled(run: QueryRun): void {
    if (run.signal.aborted) {
      throw new QueryCancelledError(run.id);
    }
  }
}
