import { MovieSourceError } from '../../lib/errors.js';
import { createChildLogger } from '../../lib/logger.js';
import { normalizeTitle } from '../query/query.normalizer.js';
import type { NormalizedQuery } from '../query/query.types.js';
import type { CandidateRecord, CatalogSource, MetadataRecord, MovieSource } from './metadata.types.js';

const logger = createChildLogger('fallback-source');

export interface FallbackSourceOptions {
  /** Later sources are consulted while fewer than this many candidates are merged */
  resultLimit: number;
}

function dedupeKey(candidate: CandidateRecord): string {
  return `${normalizeTitle(candidate.title)}|${candidate.year ?? ''}`;
}

/**
 * Searches catalogs in order, merging their results.
 * Candidates with the same title and year keep the first source's entry.
 * Full records come from whichever catalog owns the id.
 */
export class FallbackMovieSource implements MovieSource {
  constructor(
    private readonly sources: readonly CatalogSource[],
    private readonly options: FallbackSourceOptions,
  ) {
    if (sources.length === 0) throw new Error('FallbackMovieSource needs at least one source');
  }

  async fetchCandidates(query: NormalizedQuery, signal?: AbortSignal): Promise<CandidateRecord[]> {
    const merged = new Map<string, CandidateRecord>();
    const failures: unknown[] = [];

    for (const source of this.sources) {
      if (merged.size >= this.options.resultLimit) break;

      let results: CandidateRecord[];
      try {
        results = await source.fetchCandidates(query, signal);
      } catch (error) {
        if (signal?.aborted) throw error;
        logger.warn({ err: error, source: source.name, title: query.title }, 'Source search failed, trying next');
        failures.push(error);
        continue;
      }

      for (const candidate of results) {
        const key = dedupeKey(candidate);
        if (!merged.has(key)) merged.set(key, candidate);
      }
      logger.debug({ source: source.name, count: results.length, merged: merged.size }, 'Merged search results');
    }

    // Every source failed: report the primary's failure
    if (failures.length === this.sources.length) throw failures[0];

    return [...merged.values()].slice(0, this.options.resultLimit);
  }

  async fetchFullRecord(externalId: string, signal?: AbortSignal): Promise<MetadataRecord> {
    const owner = this.sources.find((source) => source.ownsId(externalId));
    if (!owner) {
      throw new MovieSourceError(`No configured source serves id ${externalId}`, 404);
    }
    return owner.fetchFullRecord(externalId, signal);
  }
}
