import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildApp } from './app.js';
import { closeDb, initDb } from './db/index.js';
import { MetadataCache } from './modules/metadata/metadata.cache.js';
import { PipelineCoordinator } from './modules/pipeline/pipeline.coordinator.js';
import { PublicationDeduper } from './modules/publish/publication.deduper.js';
import { RenderCache } from './modules/render/render.cache.js';
import { AmbiguityResolver } from './modules/resolver/ambiguity.resolver.js';
import { FakeMovieSource, FakePublisher, FakeRenderer, deferred, makeRecord } from './test/fakes.js';

const { fetchedAt: _fetchedAt, ...inception } = makeRecord();

describe('HTTP API', () => {
  let app: FastifyInstance;
  let coordinator: PipelineCoordinator;
  let source: FakeMovieSource;
  let token: string;

  beforeEach(async () => {
    initDb(':memory:');
    source = new FakeMovieSource(
      {
        inception: [{ externalId: '27205', title: 'Inception', year: 2010, popularity: 80 }],
        'the thing': [
          { externalId: '1091', title: 'The Thing', year: 1982, popularity: 40 },
          { externalId: '60935', title: 'The Thing', year: 2011, popularity: 35 },
        ],
      },
      { '27205': inception, '1091': { ...inception, externalId: '1091', title: 'The Thing', year: 1982 } },
      Date.now,
    );
    coordinator = new PipelineCoordinator(
      {
        source,
        metadata: new MetadataCache({ ttlMs: 60_000, ratingSignificance: 0.5 }),
        resolver: new AmbiguityResolver({ autoSelectMargin: 0.25, maxOptions: 5 }),
        renders: new RenderCache({ memorySize: 10 }),
        renderer: new FakeRenderer(),
        deduper: new PublicationDeduper({ retentionMs: 60_000, republishOnChange: true }),
        publisher: new FakePublisher(),
      },
      { selectionTimeoutMs: 60_000, publishMaxRetries: 0, publishBackoffMs: 1 },
    );
    app = await buildApp({ coordinator });

    const response = await app.inject({
      method: 'POST',
      url: '/api/auth/token',
      payload: { password: 'test-password' },
    });
    token = response.json<{ token: string }>().token;
  });

  afterEach(async () => {
    await app.close();
    closeDb();
  });

  const auth = () => ({ authorization: `Bearer ${token}` });

  it('reports health', async () => {
    const response = await app.inject({ method: 'GET', url: '/health' });
    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ status: 'ok' });
  });

  it('refuses a wrong admin password', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/auth/token',
      payload: { password: 'not-the-password' },
    });
    expect(response.statusCode).toBe(401);
  });

  it('requires a token for pipeline routes', async () => {
    const missing = await app.inject({ method: 'POST', url: '/api/queries', payload: { raw: 'Inception' } });
    expect(missing.statusCode).toBe(401);

    const forged = await app.inject({
      method: 'GET',
      url: '/api/queries/abc',
      headers: { authorization: 'Bearer not-a-jwt' },
    });
    expect(forged.statusCode).toBe(401);
  });

  it('accepts a query and exposes its progress', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/queries',
      headers: auth(),
      payload: { raw: 'Inception', year: 2010 },
    });

    expect(response.statusCode).toBe(202);
    const { queryId } = response.json<{ queryId: string }>();

    await vi.waitFor(() => {
      expect(coordinator.getState(queryId)?.state).toBe('done');
    });

    const status = await app.inject({ method: 'GET', url: `/api/queries/${queryId}`, headers: auth() });
    expect(status.statusCode).toBe(200);
    expect(status.json()).toMatchObject({
      id: queryId,
      state: 'done',
      result: { status: 'done', externalId: '27205', version: 1, published: true },
    });
    expect(source.searchCalls).toEqual([{ title: 'inception', year: 2010 }]);
  });

  it('validates query bodies', async () => {
    const response = await app.inject({ method: 'POST', url: '/api/queries', headers: auth(), payload: { raw: '' } });
    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({ error: 'Validation failed' });
  });

  it('turns channel messages into queries keyed by message', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/messages',
      headers: auth(),
      payload: { chatId: -1001, messageId: 7, document: { fileName: 'Inception.2010.1080p.mkv' } },
    });

    expect(response.statusCode).toBe(202);
    expect(response.json()).toMatchObject({ queryId: '-1001:7' });

    const empty = await app.inject({
      method: 'POST',
      url: '/api/messages',
      headers: auth(),
      payload: { chatId: -1001, messageId: 8 },
    });
    expect(empty.statusCode).toBe(422);

    await vi.waitFor(() => {
      expect(coordinator.getState('-1001:7')?.result).toMatchObject({ status: 'done', externalId: '27205' });
    });
  });

  it('cancels the run of a deleted message', async () => {
    source.searchGate = deferred<void>();
    await app.inject({
      method: 'POST',
      url: '/api/messages',
      headers: auth(),
      payload: { chatId: '-1001', messageId: '9', text: 'Inception 2010' },
    });

    const response = await app.inject({ method: 'DELETE', url: '/api/messages/-1001/9', headers: auth() });
    expect(response.json()).toEqual({ queryId: '-1001:9', cancelled: true });

    source.searchGate.resolve();
    await vi.waitFor(() => {
      expect(coordinator.getState('-1001:9')?.result).toMatchObject({ status: 'failed', code: 'CANCELLED' });
    });
  });

  it('restarts the run of an edited message', async () => {
    const post = (payload: Record<string, unknown>) =>
      app.inject({ method: 'POST', url: '/api/messages', headers: auth(), payload });

    await post({ chatId: -1001, messageId: 11, text: 'The Thing' });
    await vi.waitFor(() => {
      expect(coordinator.getState('-1001:11')?.state).toBe('awaiting_selection');
    });

    const edited = await post({ chatId: -1001, messageId: 11, text: 'Inception 2010' });
    expect(edited.statusCode).toBe(202);

    await vi.waitFor(() => {
      expect(coordinator.getState('-1001:11')?.result).toMatchObject({ status: 'done', externalId: '27205' });
    });
  });

  it('cancels the run of a message edited down to nothing', async () => {
    await app.inject({
      method: 'POST',
      url: '/api/messages',
      headers: auth(),
      payload: { chatId: -1001, messageId: 12, text: 'The Thing' },
    });
    await vi.waitFor(() => {
      expect(coordinator.getState('-1001:12')?.state).toBe('awaiting_selection');
    });

    const edited = await app.inject({
      method: 'POST',
      url: '/api/messages',
      headers: auth(),
      payload: { chatId: -1001, messageId: 12, text: '   ' },
    });
    expect(edited.statusCode).toBe(422);

    await vi.waitFor(() => {
      expect(coordinator.getState('-1001:12')?.result).toMatchObject({ status: 'failed', code: 'CANCELLED' });
    });
  });

  it('resumes a run with a selection and maps pipeline errors', async () => {
    const submitted = await app.inject({
      method: 'POST',
      url: '/api/queries',
      headers: auth(),
      payload: { raw: 'The Thing' },
    });
    const { queryId } = submitted.json<{ queryId: string }>();

    await vi.waitFor(() => {
      expect(coordinator.getState(queryId)?.state).toBe('awaiting_selection');
    });

    const invalid = await app.inject({
      method: 'POST',
      url: `/api/queries/${queryId}/selection`,
      headers: auth(),
      payload: { candidateId: '603' },
    });
    expect(invalid.statusCode).toBe(400);
    expect(invalid.json()).toMatchObject({ code: 'INVALID_SELECTION' });

    const chosen = await app.inject({
      method: 'POST',
      url: `/api/queries/${queryId}/selection`,
      headers: auth(),
      payload: { candidateId: 1091 },
    });
    expect(chosen.statusCode).toBe(202);

    await vi.waitFor(() => {
      expect(coordinator.getState(queryId)?.result).toMatchObject({ status: 'done', externalId: '1091' });
    });

    const late = await app.inject({
      method: 'POST',
      url: `/api/queries/${queryId}/selection`,
      headers: auth(),
      payload: { candidateId: '1091' },
    });
    expect(late.statusCode).toBe(409);
    expect(late.json()).toMatchObject({ code: 'SELECTION_NOT_PENDING' });
  });

  it('returns 404 for unknown queries', async () => {
    const response = await app.inject({ method: 'GET', url: '/api/queries/unknown', headers: auth() });
    expect(response.statusCode).toBe(404);
  });
});
