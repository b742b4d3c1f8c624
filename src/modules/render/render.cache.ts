import { createHash } from 'node:crypto';
import type { LRUCache } from 'lru-cache';
import { findPosterByExternalId, upsertPoster } from '../../db/repositories/poster.repository.js';
import { createCache, registerCache } from '../../lib/cache.js';
import { RenderFailedError, errorMessage } from '../../lib/errors.js';
import { createChildLogger } from '../../lib/logger.js';
import type { MetadataRecord } from '../metadata/metadata.types.js';
import type { PosterAsset, PosterRenderer } from './render.types.js';

const logger = createChildLogger('render-cache');

/** Identity of a rendered image: template version plus every record field that can show up on it */
export function renderFingerprint(record: MetadataRecord, templateVersion: string): string {
  const fields = [
    record.externalId,
    record.title,
    record.year ?? null,
    record.synopsis,
    record.rating,
    record.genres,
    record.posterSource ?? null,
    record.language ?? null,
  ];
  return createHash('sha256').update(templateVersion).update('\n').update(JSON.stringify(fields)).digest('hex');
}

interface InFlightRender {
  fingerprint: string;
  promise: Promise<PosterAsset>;
}

export interface RenderCacheOptions {
  memorySize: number;
  now?: () => number;
}

export class RenderCache {
  private readonly memory: LRUCache<string, PosterAsset>;
  private readonly inFlight = new Map<string, InFlightRender>();
  private readonly now: () => number;

  constructor(options: RenderCacheOptions) {
    this.memory = registerCache('posters', createCache<PosterAsset>({ maxSize: options.memorySize }));
    this.now = options.now ?? Date.now;
  }

  /**
   * Return the stored poster for `record` or render it.
   * One render per external ID at a time: same-fingerprint callers share it,
   * others wait for it to settle and then look again.
   */
  async getOrRender(record: MetadataRecord, renderer: PosterRenderer): Promise<PosterAsset> {
    const { externalId } = record;
    const fingerprint = renderFingerprint(record, renderer.templateVersion);

    for (;;) {
      const stored = this.lookup(externalId);
      if (stored?.fingerprint === fingerprint) {
        logger.debug({ externalId }, 'Poster cache hit');
        return stored;
      }

      const pending = this.inFlight.get(externalId);
      if (!pending) break;

      if (pending.fingerprint === fingerprint) {
        logger.debug({ externalId }, 'Joining in-flight render');
        return pending.promise;
      }

      // A failure of someone else's render is theirs to report
      await Promise.allSettled([pending.promise]);
    }

    const promise = this.render(record, renderer, fingerprint).finally(() => {
      this.inFlight.delete(externalId);
    });
    this.inFlight.set(externalId, { fingerprint, promise });
    return promise;
  }

  /** Current stored asset for an external ID, memory first */
  lookup(externalId: string): PosterAsset | undefined {
    const cached = this.memory.get(externalId);
    if (cached) return cached;

    const row = findPosterByExternalId(externalId);
    if (!row) return undefined;

    const asset: PosterAsset = {
      externalId: row.external_id,
      fingerprint: row.fingerprint,
      image: row.image,
      mimeType: row.mime_type,
      renderedAt: row.rendered_at,
      sourceFetchedAt: row.source_fetched_at,
    };
    this.memory.set(externalId, asset);
    return asset;
  }

  private async render(record: MetadataRecord, renderer: PosterRenderer, fingerprint: string): Promise<PosterAsset> {
    const { externalId } = record;
    const start = this.now();

    let image: Buffer;
    try {
      image = await renderer.render(record);
    } catch (error) {
      logger.warn({ externalId, err: error }, 'Poster render failed');
      throw new RenderFailedError(externalId, errorMessage(error), { cause: error });
    }

    const current = this.lookup(externalId);
    if (current && current.sourceFetchedAt > record.fetchedAt) {
      logger.info(
        { externalId, rendered: record.fetchedAt, stored: current.sourceFetchedAt },
        'Discarding render of an older record',
      );
      return current;
    }

    const asset: PosterAsset = {
      externalId,
      fingerprint,
      image,
      mimeType: renderer.mimeType,
      renderedAt: this.now(),
      sourceFetchedAt: record.fetchedAt,
    };

    upsertPoster(asset);
    this.memory.set(externalId, asset);

    logger.info({ externalId, bytes: image.length, ms: asset.renderedAt - start }, 'Poster rendered');
    return asset;
  }
}
