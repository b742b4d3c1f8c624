import { getDb } from '../index.js';

export interface MetadataRow {
  external_id: string;
  record: string;
  version: number;
  baseline_hash: string;
  baseline_rating: number;
  fetched_at: number;
  updated_at: string;
}

export interface MetadataUpsert {
  externalId: string;
  record: string;
  version: number;
  baselineHash: string;
  baselineRating: number;
  fetchedAt: number;
}

export function findMetadataByExternalId(externalId: string): MetadataRow | null {
  const db = getDb();
  return db
    .prepare<[string], MetadataRow>('SELECT * FROM metadata_records WHERE external_id = ?')
    .get(externalId) ?? null;
}

export function findMetadataByLookupKey(lookupKey: string): MetadataRow | null {
  const db = getDb();
  return db
    .prepare<[string], MetadataRow>(`
      SELECT r.* FROM metadata_keys k
      JOIN metadata_records r ON r.external_id = k.external_id
      WHERE k.lookup_key = ?
    `)
    .get(lookupKey) ?? null;
}

/**
 * Write a record and index it under the given lookup keys in one transaction.
 * `write` decides, from the current row, what to store; returning null keeps the row.
 */
export function upsertMetadata(
  externalId: string,
  lookupKeys: string[],
  write: (current: MetadataRow | null) => MetadataUpsert | null,
): MetadataRow {
  const db = getDb();

  return db.transaction(() => {
    const current = findMetadataByExternalId(externalId);
    const next = write(current);

    if (next) {
      db.prepare(`
        INSERT INTO metadata_records (external_id, record, version, baseline_hash, baseline_rating, fetched_at)
        VALUES (?, ?, ?, ?, ?, ?)
        ON CONFLICT(external_id) DO UPDATE SET
          record          = excluded.record,
          version         = excluded.version,
          baseline_hash   = excluded.baseline_hash,
          baseline_rating = excluded.baseline_rating,
          fetched_at      = excluded.fetched_at,
          updated_at      = datetime('now')
      `).run(next.externalId, next.record, next.version, next.baselineHash, next.baselineRating, next.fetchedAt);
    }

    const indexKey = db.prepare(`
      INSERT INTO metadata_keys (lookup_key, external_id) VALUES (?, ?)
      ON CONFLICT(lookup_key) DO UPDATE SET external_id = excluded.external_id
    `);
    for (const key of lookupKeys) {
      indexKey.run(key, externalId);
    }

    const stored = findMetadataByExternalId(externalId);
    if (!stored) {
      throw new Error(`Metadata for ${externalId} missing after upsert`);
    }
    return stored;
  })();
}

export function countMetadataRecords(): number {
  const db = getDb();
  return db.prepare<[], { count: number }>('SELECT COUNT(*) as count FROM metadata_records').get()?.count ?? 0;
}
