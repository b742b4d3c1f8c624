import { getDb } from '../index.js';

export interface PublicationRow {
  external_id: string;
  version: number;
  channel_ref: string;
  published_at: number;
}

export function findPublication(externalId: string): PublicationRow | null {
  const db = getDb();
  return db
    .prepare<[string], PublicationRow>('SELECT * FROM publication_log WHERE external_id = ?')
    .get(externalId) ?? null;
}

export function upsertPublication(externalId: string, version: number, channelRef: string, publishedAt: number): PublicationRow {
  const db = getDb();
  const row = db.prepare<[string, number, string, number], PublicationRow>(`
    INSERT INTO publication_log (external_id, version, channel_ref, published_at)
    VALUES (?, ?, ?, ?)
    ON CONFLICT(external_id) DO UPDATE SET
      version      = excluded.version,
      channel_ref  = excluded.channel_ref,
      published_at = excluded.published_at
    RETURNING *
  `).get(externalId, version, channelRef, publishedAt);

  if (!row) {
    throw new Error(`Publication for ${externalId} missing after upsert`);
  }
  return row;
}

export function deletePublicationsBefore(cutoff: number): number {
  const db = getDb();
  return db.prepare('DELETE FROM publication_log WHERE published_at < ?').run(cutoff).changes;
}
