import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { closeDb, initDb } from '../../db/index.js';
import { countMetadataRecords } from '../../db/repositories/metadata.repository.js';
import { findPublication } from '../../db/repositories/publication.repository.js';
import { InvalidSelectionError, SelectionNotPendingError } from '../../lib/errors.js';
import { FakeMovieSource, FakePublisher, FakeRenderer, deferred, makeRecord } from '../../test/fakes.js';
import { MetadataCache } from '../metadata/metadata.cache.js';
import type { CandidateRecord } from '../metadata/metadata.types.js';
import { PublicationDeduper } from '../publish/publication.deduper.js';
import { RenderCache } from '../render/render.cache.js';
import { AmbiguityResolver } from '../resolver/ambiguity.resolver.js';
import { PipelineCoordinator, type PipelineOptions } from './pipeline.coordinator.js';
import type { QueryState, QuerySubscription, StateEvent } from './pipeline.types.js';

const DAY = 24 * 60 * 60 * 1000;

const thing1982: CandidateRecord = { externalId: '1091', title: 'The Thing', year: 1982, popularity: 40 };
const thing2011: CandidateRecord = { externalId: '60935', title: 'The Thing', year: 2011, popularity: 35 };

const candidates: Record<string, CandidateRecord[]> = {
  inception: [
    { externalId: '27205', title: 'Inception', year: 2010, popularity: 80 },
    { externalId: '1', title: 'Inception: The Cobol Job', year: 2010, popularity: 10 },
  ],
  'the thing': [thing2011, thing1982],
};

const { fetchedAt: _inceptionFetchedAt, ...inception } = makeRecord();
const { fetchedAt: _thingFetchedAt, ...theThing } = makeRecord({
  externalId: '1091',
  title: 'The Thing',
  year: 1982,
  synopsis: 'Researchers in Antarctica meet a shape-shifting organism.',
  rating: 8.1,
  genres: ['Horror', 'Mystery'],
});

const HAPPY_PATH: QueryState[] = ['received', 'normalizing', 'resolving', 'resolved', 'rendering', 'publishing', 'done'];

function waitForState(run: QuerySubscription, state: QueryState): Promise<StateEvent> {
  return new Promise((resolve) => {
    run.subscribe((event) => {
      if (event.state === state) resolve(event);
    });
  });
}

describe('PipelineCoordinator', () => {
  let clock: number;
  let source: FakeMovieSource;
  let metadata: MetadataCache;
  let deduper: PublicationDeduper;
  let renderer: FakeRenderer;
  let publisher: FakePublisher;
  let sleep: Mock<(ms: number) => Promise<void>>;
  let coordinator: PipelineCoordinator;

  function createCoordinator(options: Partial<PipelineOptions> = {}): PipelineCoordinator {
    const now = () => clock;
    return new PipelineCoordinator(
      {
        source,
        metadata,
        resolver: new AmbiguityResolver({ autoSelectMargin: 0.25, maxOptions: 5 }),
        renders: new RenderCache({ memorySize: 10, now }),
        renderer,
        deduper,
        publisher,
      },
      { selectionTimeoutMs: 60_000, publishMaxRetries: 3, publishBackoffMs: 1000, now, sleep, ...options },
    );
  }

  function states(queryId: string): QueryState[] | undefined {
    return coordinator.getState(queryId)?.history.map((event) => event.state);
  }

  beforeEach(() => {
    initDb(':memory:');
    clock = Date.parse('2026-06-01T12:00:00Z');
    const now = () => clock;
    source = new FakeMovieSource(candidates, { '27205': inception, '1091': theThing, '60935': { ...theThing, externalId: '60935', year: 2011 } }, now);
    metadata = new MetadataCache({ ttlMs: DAY, ratingSignificance: 0.5, now });
    deduper = new PublicationDeduper({ retentionMs: 30 * DAY, republishOnChange: true, now });
    renderer = new FakeRenderer();
    publisher = new FakePublisher();
    sleep = vi.fn<(ms: number) => Promise<void>>(async () => undefined);
    coordinator = createCoordinator();
  });

  afterEach(() => {
    closeDb();
  });

  it('auto-resolves, renders and publishes a clear match once', async () => {
    const run = coordinator.submit({ raw: 'Inception 2010', source: 'text' });

    await expect(run.result).resolves.toEqual({
      status: 'done',
      queryId: run.id,
      externalId: '27205',
      version: 1,
      published: true,
      channelRef: '@test_channel:1',
    });

    expect(states(run.id)).toEqual(HAPPY_PATH);
    expect(source.fetchCalls).toEqual(['27205']);
    expect(renderer.calls).toHaveLength(1);
    expect(publisher.published).toHaveLength(1);
    expect(findPublication('27205')).toMatchObject({ version: 1, channel_ref: '@test_channel:1' });
  });

  it('suspends on close candidates and resumes with the chosen one', async () => {
    const run = coordinator.submit({ id: 'thing', raw: 'The Thing', source: 'text' });

    const waiting = await waitForState(run, 'awaiting_selection');
    expect(waiting).toMatchObject({
      options: [
        { externalId: '1091', title: 'The Thing', year: 1982, score: 3 },
        { externalId: '60935', title: 'The Thing', year: 2011, score: 2.875 },
      ],
    });
    expect(source.fetchCalls).toEqual([]);

    expect(() => coordinator.provideSelection('thing', '603')).toThrow(InvalidSelectionError);
    coordinator.provideSelection('thing', '1091');

    await expect(run.result).resolves.toMatchObject({ status: 'done', externalId: '1091', published: true });
    expect(states('thing')).toEqual([
      'received', 'normalizing', 'resolving', 'awaiting_selection', 'resolved', 'rendering', 'publishing', 'done',
    ]);
    expect(source.fetchCalls).toEqual(['1091']);
  });

  it('rejects selections for runs that are not waiting', async () => {
    expect(() => coordinator.provideSelection('missing', '1091')).toThrow(SelectionNotPendingError);

    const run = coordinator.submit({ id: 'inception', raw: 'Inception 2010', source: 'text' });
    await run.result;
    expect(() => coordinator.provideSelection('inception', '27205')).toThrow(SelectionNotPendingError);
  });

  it('falls back to the top option when no selection arrives in time', async () => {
    coordinator = createCoordinator({ selectionTimeoutMs: 10 });

    const run = coordinator.submit({ raw: 'The Thing', source: 'text' });

    await expect(run.result).resolves.toMatchObject({ status: 'done', externalId: '1091' });
  });

  it('reports NoCandidates without writing to the cache', async () => {
    const run = coordinator.submit({ raw: 'Xyzzy Nonexistent Film 1900', source: 'text' });

    await expect(run.result).resolves.toEqual({
      status: 'failed',
      queryId: run.id,
      query: { raw: 'Xyzzy Nonexistent Film 1900', source: 'text' },
      code: 'NO_CANDIDATES',
      message: 'No movie found for "xyzzy nonexistent film" (1900)',
    });
    expect(source.searchCalls).toEqual([{ title: 'xyzzy nonexistent film', year: 1900 }]);
    expect(countMetadataRecords()).toBe(0);
    expect(renderer.calls).toEqual([]);
    expect(states(run.id)).toEqual(['received', 'normalizing', 'resolving', 'failed']);
  });

  it('does not republish an unchanged movie', async () => {
    await coordinator.submit({ raw: 'Inception 2010', source: 'text' }).result;

    clock += 60 * 60 * 1000;
    expect(metadata.put({ ...inception, fetchedAt: clock }).version).toBe(1);

    const again = await coordinator.submit({ raw: 'Inception 2010', source: 'text' }).result;

    expect(again).toMatchObject({ status: 'done', published: false, version: 1, channelRef: '@test_channel:1' });
    expect(publisher.published).toHaveLength(1);
    expect(renderer.calls).toHaveLength(1);
    expect(deduper.shouldPublish('27205', 1).allowed).toBe(false);
  });

  it('republishes once the rating moves significantly', async () => {
    await coordinator.submit({ raw: 'Inception 2010', source: 'text' }).result;

    clock += 60 * 60 * 1000;
    expect(metadata.put({ ...inception, rating: 9.0, fetchedAt: clock }).version).toBe(2);

    const again = await coordinator.submit({ raw: 'Inception 2010', source: 'text' }).result;

    expect(again).toMatchObject({ status: 'done', published: true, version: 2, channelRef: '@test_channel:2' });
    expect(renderer.calls).toHaveLength(2);
  });

  it('does one fetch, render and publish for queries converging on one movie', async () => {
    const a = coordinator.submit({ raw: 'Inception 2010', source: 'text' });
    const b = coordinator.submit({ raw: 'Inception', source: 'caption' });

    const results = await Promise.all([a.result, b.result]);

    expect(results.map((r) => r.status === 'done' && r.externalId)).toEqual(['27205', '27205']);
    expect(results.filter((r) => r.status === 'done' && r.published)).toHaveLength(1);
    expect(source.fetchCalls).toEqual(['27205']);
    expect(renderer.calls).toHaveLength(1);
    expect(publisher.published).toHaveLength(1);
    expect(metadata.get({ title: 'inception' })?.record.externalId).toBe('27205');
  });

  it('serves stale metadata when the search fails', async () => {
    await coordinator.submit({ raw: 'Inception 2010', source: 'text' }).result;

    clock += 2 * DAY;
    source.failSearch = true;
    const run = coordinator.submit({ raw: 'Inception 2010', source: 'text' });

    await expect(run.result).resolves.toMatchObject({ status: 'done', externalId: '27205', published: false });
    expect(coordinator.getState(run.id)?.history.find((e) => e.state === 'resolved')).toMatchObject({
      externalId: '27205',
      stale: true,
    });
    expect(source.fetchCalls).toEqual(['27205']);
  });

  it('serves stale metadata when the full fetch fails', async () => {
    await coordinator.submit({ raw: 'Inception 2010', source: 'text' }).result;

    clock += 2 * DAY;
    source.failFetch = true;
    const run = coordinator.submit({ raw: 'Inception', source: 'text' });

    await expect(run.result).resolves.toMatchObject({ status: 'done', externalId: '27205' });
    expect(coordinator.getState(run.id)?.history.find((e) => e.state === 'resolved')).toMatchObject({ stale: true });
  });

  it('fails with SOURCE_UNAVAILABLE when nothing is cached', async () => {
    source.failSearch = true;

    await expect(coordinator.submit({ raw: 'Inception 2010', source: 'text' }).result).resolves.toMatchObject({
      status: 'failed',
      code: 'SOURCE_UNAVAILABLE',
    });
  });

  it('cancels a run before it resolves', async () => {
    source.searchGate = deferred<void>();
    const run = coordinator.submit({ id: 'c1', raw: 'Inception 2010', source: 'text' });

    expect(coordinator.cancel('c1')).toBe(true);
    expect(coordinator.cancel('c1')).toBe(false);
    source.searchGate.resolve();

    await expect(run.result).resolves.toMatchObject({ status: 'failed', code: 'CANCELLED' });
    expect(source.fetchCalls).toEqual([]);
    expect(publisher.published).toEqual([]);
  });

  it('cancels a run waiting on a selection', async () => {
    const run = coordinator.submit({ id: 'c2', raw: 'The Thing', source: 'text' });
    await waitForState(run, 'awaiting_selection');

    expect(coordinator.cancel('c2')).toBe(true);

    await expect(run.result).resolves.toMatchObject({ status: 'failed', code: 'CANCELLED' });
    expect(() => coordinator.provideSelection('c2', '1091')).toThrow(SelectionNotPendingError);
  });

  it('still caches a detail fetch that finishes after cancellation', async () => {
    source.fetchGate = deferred<void>();
    const run = coordinator.submit({ id: 'c4', raw: 'Inception 2010', source: 'text' });

    await vi.waitFor(() => {
      expect(source.fetchCalls).toEqual(['27205']);
    });
    expect(coordinator.cancel('c4')).toBe(true);
    source.fetchGate.resolve();

    await expect(run.result).resolves.toMatchObject({ status: 'failed', code: 'CANCELLED' });
    expect(metadata.get('27205')?.record.title).toBe('Inception');
    expect(metadata.get({ title: 'inception', year: 2010 })?.record.externalId).toBe('27205');
    expect(renderer.calls).toEqual([]);
    expect(publisher.published).toEqual([]);
  });

  it('restarts a run whose message was edited before resolution', async () => {
    const first = coordinator.submit({ id: '-1001:42', raw: 'The Thing', source: 'text' });
    await waitForState(first, 'awaiting_selection');

    const second = coordinator.submit({ id: '-1001:42', raw: 'Inception 2010', source: 'text' });

    expect(second).not.toBe(first);
    await expect(first.result).resolves.toMatchObject({ status: 'failed', code: 'CANCELLED' });
    await expect(second.result).resolves.toMatchObject({ status: 'done', externalId: '27205' });
    expect(source.searchCalls).toEqual([{ title: 'the thing' }, { title: 'inception', year: 2010 }]);
    expect(coordinator.getState('-1001:42')?.result).toMatchObject({ status: 'done', externalId: '27205' });
  });

  it('keeps the running query when an edit arrives after resolution', async () => {
    renderer.gate = deferred<void>();
    const first = coordinator.submit({ id: '-1001:43', raw: 'Inception 2010', source: 'text' });
    await waitForState(first, 'rendering');

    const second = coordinator.submit({ id: '-1001:43', raw: 'The Thing', source: 'text' });
    expect(second).toBe(first);

    renderer.gate.resolve();
    await expect(first.result).resolves.toMatchObject({ status: 'done', externalId: '27205' });
    expect(source.searchCalls).toEqual([{ title: 'inception', year: 2010 }]);
  });

  it('completes runs on one movie one at a time in lease order', async () => {
    renderer.gate = deferred<void>();
    const log: string[] = [];
    const follow = (run: QuerySubscription) => {
      run.subscribe((event) => log.push(`${run.id}:${event.state}`));
      return run;
    };

    const a = follow(coordinator.submit({ id: 'a', raw: 'Inception 2010', source: 'text' }));
    await waitForState(a, 'rendering');
    const b = follow(coordinator.submit({ id: 'b', raw: 'Inception', source: 'caption' }));
    const c = follow(coordinator.submit({ id: 'c', raw: 'Inception.2010.mkv', source: 'filename' }));

    renderer.gate.resolve();
    const results = await Promise.all([a.result, b.result, c.result]);

    const segments = log.filter((entry) => /:(resolved|done)$/.test(entry));
    expect(segments.slice(0, 2)).toEqual(['a:resolved', 'a:done']);
    for (let i = 0; i < segments.length; i += 2) {
      const [id] = (segments[i] ?? '').split(':');
      expect([segments[i], segments[i + 1]]).toEqual([`${id}:resolved`, `${id}:done`]);
    }
    expect(segments).toHaveLength(6);

    expect(results.map((r) => r.status === 'done' && r.published)).toEqual([true, false, false]);
    expect(publisher.published).toHaveLength(1);
    expect(renderer.calls).toHaveLength(1);
  });

  it('fetches a catalog id directly without searching', async () => {
    const first = coordinator.submit({ raw: 'https://www.themoviedb.org/movie/27205-inception', source: 'text' });
    await expect(first.result).resolves.toMatchObject({ status: 'done', externalId: '27205', published: true });

    const second = coordinator.submit({ raw: 'tmdb:27205', source: 'text' });
    await expect(second.result).resolves.toMatchObject({ status: 'done', externalId: '27205', published: false });

    expect(source.searchCalls).toEqual([]);
    expect(source.fetchCalls).toEqual(['27205']);
  });

  it('publishes each episode of a show once', async () => {
    const { fetchedAt: _fetchedAt, ...breakingBad } = makeRecord({ externalId: 'tv:1396', title: 'Breaking Bad', year: 2008 });
    source = new FakeMovieSource(
      { 'breaking bad': [{ externalId: 'tv:1396', title: 'Breaking Bad', year: 2008, popularity: 90 }] },
      { 'tv:1396': breakingBad },
      () => clock,
    );
    coordinator = createCoordinator();

    const episode = (raw: string) => coordinator.submit({ raw, source: 'filename' }).result;

    await expect(episode('Breaking.Bad.S01E02.720p.mkv')).resolves.toMatchObject({ externalId: 'tv:1396', published: true });
    await expect(episode('Breaking.Bad.S01E03.720p.mkv')).resolves.toMatchObject({ externalId: 'tv:1396', published: true });
    await expect(episode('Breaking.Bad.S01E02.1080p.mkv')).resolves.toMatchObject({ externalId: 'tv:1396', published: false });

    expect(source.searchCalls).toEqual([{ title: 'breaking bad', series: { season: 1, episode: 2 } }]);
    expect(source.fetchCalls).toEqual(['tv:1396']);
    expect(renderer.calls).toHaveLength(1);
    expect(publisher.published.map((post) => post.series)).toEqual([
      { season: 1, episode: 2 },
      { season: 1, episode: 3 },
    ]);
    expect(findPublication('tv:1396#S01E02')).toMatchObject({ version: 1, channel_ref: '@test_channel:1' });
  });

  it('cannot cancel finished or unknown runs', async () => {
    const run = coordinator.submit({ id: 'c3', raw: 'Inception 2010', source: 'text' });
    await run.result;

    expect(coordinator.cancel('c3')).toBe(false);
    expect(coordinator.cancel('unknown')).toBe(false);
  });

  it('retries publishing with exponential backoff', async () => {
    publisher.failures = 1;

    await expect(coordinator.submit({ raw: 'Inception 2010', source: 'text' }).result).resolves.toMatchObject({
      status: 'done',
      published: true,
    });
    expect(publisher.attempts).toBe(2);
    expect(sleep.mock.calls).toEqual([[1000]]);
  });

  it('fails after exhausting publish retries and records nothing', async () => {
    coordinator = createCoordinator({ publishMaxRetries: 2 });
    publisher.failures = 10;

    await expect(coordinator.submit({ raw: 'Inception 2010', source: 'text' }).result).resolves.toMatchObject({
      status: 'failed',
      code: 'PUBLISH_FAILED',
    });
    expect(publisher.attempts).toBe(3);
    expect(sleep.mock.calls).toEqual([[1000], [2000]]);
    expect(findPublication('27205')).toBeNull();
  });

  it('does not cache failed renders', async () => {
    renderer.fail = true;
    await expect(coordinator.submit({ raw: 'Inception 2010', source: 'text' }).result).resolves.toMatchObject({
      status: 'failed',
      code: 'RENDER_FAILED',
    });

    renderer.fail = false;
    await expect(coordinator.submit({ raw: 'Inception 2010', source: 'text' }).result).resolves.toMatchObject({
      status: 'done',
      published: true,
    });
    expect(renderer.calls).toHaveLength(2);
  });

  it('reports unparsable queries', async () => {
    await expect(coordinator.submit({ raw: '2012', source: 'text' }).result).resolves.toMatchObject({
      status: 'failed',
      code: 'UNPARSABLE_QUERY',
    });
    expect(source.searchCalls).toEqual([]);
  });

  it('replays history to late subscribers and survives throwing listeners', async () => {
    const run = coordinator.submit({ id: 'r1', raw: 'Inception 2010', source: 'text' });
    run.subscribe(() => {
      throw new Error('listener bug');
    });

    await run.result;

    const seen: QueryState[] = [];
    run.subscribe((event) => seen.push(event.state));
    expect(seen).toEqual(HAPPY_PATH);
    expect(coordinator.getState('r1')).toMatchObject({ state: 'done', result: { status: 'done' } });
  });

  it('returns the running subscription for a duplicate id', async () => {
    const first = coordinator.submit({ id: 'dup', raw: 'Inception 2010', source: 'text' });
    const second = coordinator.submit({ id: 'dup', raw: 'Inception 2010', source: 'text' });

    expect(second).toBe(first);
    await first.result;
    expect(publisher.published).toHaveLength(1);
    expect(coordinator.getState('nope')).toBeUndefined();
  });
});
