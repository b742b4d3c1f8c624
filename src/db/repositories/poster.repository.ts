import { getDb } from '../index.js';

export interface PosterRow {
  external_id: string;
  fingerprint: string;
  image: Buffer;
  mime_type: string;
  source_fetched_at: number;
  rendered_at: number;
}

export interface PosterUpsert {
  externalId: string;
  fingerprint: string;
  image: Buffer;
  mimeType: string;
  sourceFetchedAt: number;
  renderedAt: number;
}

export function findPosterByExternalId(externalId: string): PosterRow | null {
  const db = getDb();
  return db
    .prepare<[string], PosterRow>('SELECT * FROM poster_assets WHERE external_id = ?')
    .get(externalId) ?? null;
}

export function upsertPoster(input: PosterUpsert): void {
  const db = getDb();
  db.prepare(`
    INSERT INTO poster_assets (external_id, fingerprint, image, mime_type, source_fetched_at, rendered_at)
    VALUES (?, ?, ?, ?, ?, ?)
    ON CONFLICT(external_id) DO UPDATE SET
      fingerprint       = excluded.fingerprint,
      image             = excluded.image,
      mime_type         = excluded.mime_type,
      source_fetched_at = excluded.source_fetched_at,
      rendered_at       = excluded.rendered_at
  `).run(input.externalId, input.fingerprint, input.image, input.mimeType, input.sourceFetchedAt, input.renderedAt);
}
