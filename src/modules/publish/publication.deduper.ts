import {
  deletePublicationsBefore,
  findPublication,
  upsertPublication,
  type PublicationRow,
} from '../../db/repositories/publication.repository.js';
import { createChildLogger } from '../../lib/logger.js';
import type { SeriesHint } from '../query/query.types.js';
import { seriesLabel } from './caption.builder.js';

const logger = createChildLogger('publication-deduper');

export interface PublicationRecord {
  externalId: string;
  version: number;
  channelRef: string;
  publishedAt: number;
}

export type PublishDecision =
  | { allowed: true }
  | { allowed: false; reason: 'AlreadyPublished'; record: PublicationRecord };

export interface PublicationDeduperOptions {
  retentionMs: number;
  /** Re-post a movie whose metadata version moved past the published one */
  republishOnChange: boolean;
  now?: () => number;
}

/** Films publish once per id; each episode or season pack of a show is its own post */
export function publicationKey(externalId: string, series?: SeriesHint): string {
  return series ? `${externalId}#${seriesLabel(series)}` : externalId;
}

function toRecord(row: PublicationRow): PublicationRecord {
  return {
    externalId: row.external_id,
    version: row.version,
    channelRef: row.channel_ref,
    publishedAt: row.published_at,
  };
}

export class PublicationDeduper {
  private readonly now: () => number;

  constructor(private readonly options: PublicationDeduperOptions) {
    this.now = options.now ?? Date.now;
  }

  shouldPublish(externalId: string, currentVersion: number): PublishDecision {
    const row = findPublication(externalId);
    if (!row) return { allowed: true };

    const record = toRecord(row);
    if (this.now() - record.publishedAt > this.options.retentionMs) {
      logger.debug({ externalId }, 'Previous publication past retention');
      return { allowed: true };
    }

    if (this.options.republishOnChange && record.version < currentVersion) {
      logger.info({ externalId, published: record.version, current: currentVersion }, 'Republishing changed movie');
      return { allowed: true };
    }

    return { allowed: false, reason: 'AlreadyPublished', record };
  }

  recordPublished(externalId: string, version: number, channelRef: string): PublicationRecord {
    return toRecord(upsertPublication(externalId, version, channelRef, this.now()));
  }

  /** Drop records past retention; returns how many were removed */
  purgeExpired(): number {
    const removed = deletePublicationsBefore(this.now() - this.options.retentionMs);
    if (removed > 0) {
      logger.info({ removed }, 'Purged expired publication records');
    }
    return removed;
  }
}
