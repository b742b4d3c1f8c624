import { createHash } from 'node:crypto';
import { z } from 'zod';
import {
  findMetadataByExternalId,
  findMetadataByLookupKey,
  upsertMetadata,
  type MetadataRow,
} from '../../db/repositories/metadata.repository.js';
import { createChildLogger } from '../../lib/logger.js';
import { queryKey, type NormalizedQuery } from '../query/query.types.js';
import type { MetadataRecord, StoredMetadata } from './metadata.types.js';

const logger = createChildLogger('metadata-cache');

const storedRecordSchema = z.object({
  externalId: z.string(),
  title: z.string(),
  year: z.number().int().optional(),
  synopsis: z.string(),
  rating: z.number(),
  genres: z.array(z.string()),
  posterSource: z.string().optional(),
  language: z.string().optional(),
  fetchedAt: z.number(),
});

export interface MetadataCacheOptions {
  /** Entries older than this are misses for `get` but still served by `getStale` */
  ttlMs: number;
  /** Rating drift that counts as a content change */
  ratingSignificance: number;
  now?: () => number;
}

/** A query or an external id */
export type MetadataKey = NormalizedQuery | string;

function lookupKey(key: MetadataKey): string {
  return typeof key === 'string' ? `id:${key}` : queryKey(key);
}

/** Hash of everything that changes the rendered poster apart from the rating */
export function contentHash(record: MetadataRecord): string {
  return createHash('sha256')
    .update(JSON.stringify([record.title, record.year ?? null, record.synopsis, record.genres, record.posterSource ?? null]))
    .digest('hex');
}

export class MetadataCache {
  private readonly now: () => number;

  constructor(private readonly options: MetadataCacheOptions) {
    this.now = options.now ?? Date.now;
  }

  /** Fresh entry for a query or id, or undefined on miss/expiry */
  get(key: MetadataKey): StoredMetadata | undefined {
    const stored = this.read(key);
    if (!stored) return undefined;

    if (this.now() - stored.record.fetchedAt >= this.options.ttlMs) {
      logger.debug({ key: lookupKey(key), externalId: stored.record.externalId }, 'Metadata entry expired');
      return undefined;
    }
    return stored;
  }

  /** Last known entry regardless of age */
  getStale(key: MetadataKey): StoredMetadata | undefined {
    return this.read(key);
  }

  /**
   * Store a record and index it under its id plus `keys`.
   * An older fetch never replaces a newer one; its keys are still indexed.
   */
  put(record: MetadataRecord, keys: NormalizedQuery[] = []): StoredMetadata {
    const lookupKeys = [lookupKey(record.externalId), ...keys.map(queryKey)];
    const hash = contentHash(record);
    const significance = this.options.ratingSignificance;

    const row = upsertMetadata(record.externalId, lookupKeys, (current) => {
      const payload = {
        externalId: record.externalId,
        record: JSON.stringify(record),
        fetchedAt: record.fetchedAt,
      };

      if (!current) {
        return { ...payload, version: 1, baselineHash: hash, baselineRating: record.rating };
      }

      if (current.fetched_at > record.fetchedAt) {
        logger.debug(
          { externalId: record.externalId, stored: current.fetched_at, incoming: record.fetchedAt },
          'Ignoring older metadata fetch',
        );
        return null;
      }

      const changed =
        current.baseline_hash !== hash ||
        Math.abs(record.rating - current.baseline_rating) >= significance;

      if (!changed) {
        return {
          ...payload,
          version: current.version,
          baselineHash: current.baseline_hash,
          baselineRating: current.baseline_rating,
        };
      }

      logger.info(
        { externalId: record.externalId, version: current.version + 1 },
        'Metadata changed, bumping version',
      );
      return { ...payload, version: current.version + 1, baselineHash: hash, baselineRating: record.rating };
    });

    return toStored(row);
  }

  private read(key: MetadataKey): StoredMetadata | undefined {
    const row = typeof key === 'string'
      ? findMetadataByExternalId(key)
      : findMetadataByLookupKey(queryKey(key));
    return row ? toStored(row) : undefined;
  }
}

function toStored(row: MetadataRow): StoredMetadata {
  const parsed = storedRecordSchema.parse(JSON.parse(row.record));
  const record: MetadataRecord = {
    externalId: parsed.externalId,
    title: parsed.title,
    synopsis: parsed.synopsis,
    rating: parsed.rating,
    genres: parsed.genres,
    fetchedAt: parsed.fetchedAt,
    ...(parsed.year !== undefined && { year: parsed.year }),
    ...(parsed.posterSource !== undefined && { posterSource: parsed.posterSource }),
    ...(parsed.language !== undefined && { language: parsed.language }),
  };
  return { record, version: row.version };
}
