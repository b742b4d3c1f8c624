import { z } from 'zod';
import { omdbConfig } from '../../config/index.js';
import { MovieSourceError, errorMessage } from '../../lib/errors.js';
import { createChildLogger } from '../../lib/logger.js';
import type { NormalizedQuery } from '../query/query.types.js';
import type { CandidateRecord, CatalogSource, MetadataRecord } from './metadata.types.js';

const logger = createChildLogger('omdb-client');

// OMDb reports "N/A" for every missing field
const NOT_AVAILABLE = 'N/A';

const searchResponseSchema = z.discriminatedUnion('Response', [
  z.object({
    Response: z.literal('True'),
    Search: z.array(
      z.object({
        imdbID: z.string(),
        Title: z.string(),
        Year: z.string().default(''),
        Poster: z.string().default(NOT_AVAILABLE),
      }),
    ),
  }),
  z.object({ Response: z.literal('False'), Error: z.string().default('') }),
]);

const detailsResponseSchema = z.discriminatedUnion('Response', [
  z.object({
    Response: z.literal('True'),
    imdbID: z.string(),
    Title: z.string(),
    Year: z.string().default(''),
    Plot: z.string().default(NOT_AVAILABLE),
    imdbRating: z.string().default(NOT_AVAILABLE),
    Genre: z.string().default(NOT_AVAILABLE),
    Poster: z.string().default(NOT_AVAILABLE),
    Language: z.string().default(NOT_AVAILABLE),
  }),
  z.object({ Response: z.literal('False'), Error: z.string().default('') }),
]);

/** Languages OMDb names in full, mapped to the codes captions use */
const LANGUAGE_CODES: Record<string, string> = {
  English: 'en',
  French: 'fr',
  German: 'de',
  Spanish: 'es',
  Italian: 'it',
  Japanese: 'ja',
  Korean: 'ko',
  Hindi: 'hi',
};

export interface OmdbClientOptions {
  apiKey: string;
  baseUrl: string;
  fetchImpl?: typeof fetch;
  now?: () => number;
}

function present(value: string): string | undefined {
  return value === NOT_AVAILABLE || value === '' ? undefined : value;
}

/** "2008–2013" and "2010" both start with the first year */
function firstYear(value: string): number | undefined {
  const match = /^(\d{4})/.exec(value);
  return match?.[1] ? parseInt(match[1], 10) : undefined;
}

export class OmdbClient implements CatalogSource {
  readonly name = 'omdb';
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => number;

  constructor(private readonly options: OmdbClientOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.now = options.now ?? Date.now;
  }

  ownsId(externalId: string): boolean {
    return /^tt\d+$/.test(externalId);
  }

  async fetchCandidates(query: NormalizedQuery, signal?: AbortSignal): Promise<CandidateRecord[]> {
    const params: Record<string, string> = {
      s: query.title,
      type: query.series ? 'series' : 'movie',
    };
    if (query.year !== undefined) params.y = String(query.year);

    const data = searchResponseSchema.safeParse(await this.request(params, signal));
    if (!data.success) {
      throw new MovieSourceError(`Unexpected OMDb search response: ${data.error.message}`, undefined, {
        cause: data.error,
      });
    }

    // "Movie not found!" is an empty result, not a failure
    if (data.data.Response === 'False') {
      logger.debug({ title: query.title, reason: data.data.Error }, 'OMDb search empty');
      return [];
    }

    return data.data.Search.map((hit) => {
      const candidate: CandidateRecord = { externalId: hit.imdbID, title: hit.Title, popularity: 0 };
      const year = firstYear(hit.Year);
      if (year !== undefined) candidate.year = year;
      const poster = present(hit.Poster);
      if (poster) candidate.posterSource = poster;
      return candidate;
    });
  }

  async fetchFullRecord(externalId: string, signal?: AbortSignal): Promise<MetadataRecord> {
    const data = detailsResponseSchema.safeParse(await this.request({ i: externalId, plot: 'full' }, signal));
    if (!data.success) {
      throw new MovieSourceError(`Unexpected OMDb details response: ${data.error.message}`, undefined, {
        cause: data.error,
      });
    }
    if (data.data.Response === 'False') {
      throw new MovieSourceError(`OMDb has no record ${externalId}: ${data.data.Error}`, 404);
    }

    const details = data.data;
    const rating = parseFloat(details.imdbRating);
    const record: MetadataRecord = {
      externalId: details.imdbID,
      title: details.Title,
      synopsis: present(details.Plot) ?? '',
      rating: Number.isNaN(rating) ? 0 : Math.round(rating * 10) / 10,
      genres: (present(details.Genre) ?? '')
        .split(',')
        .map((genre) => genre.trim())
        .filter(Boolean),
      fetchedAt: this.now(),
    };

    const year = firstYear(details.Year);
    if (year !== undefined) record.year = year;
    const poster = present(details.Poster);
    if (poster) record.posterSource = poster;
    const language = present(details.Language)?.split(',')[0]?.trim();
    const code = language ? LANGUAGE_CODES[language] : undefined;
    if (code) record.language = code;

    logger.info({ externalId: record.externalId, title: record.title, year: record.year }, 'Fetched details');
    return record;
  }

  private async request(params: Record<string, string>, signal?: AbortSignal): Promise<unknown> {
    const url = new URL(this.options.baseUrl);
    url.searchParams.set('apikey', this.options.apiKey);
    url.searchParams.set('r', 'json');
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }

    let response: Response;
    try {
      response = await this.fetchImpl(url, signal ? { signal } : {});
    } catch (error) {
      throw new MovieSourceError(`OMDb request failed: ${errorMessage(error)}`, undefined, { cause: error });
    }

    if (!response.ok) {
      logger.warn({ status: response.status }, 'OMDb request rejected');
      throw new MovieSourceError(`OMDb request returned ${response.status}`, response.status);
    }

    try {
      return await response.json();
    } catch (error) {
      throw new MovieSourceError(`OMDb response is not JSON: ${errorMessage(error)}`, response.status, {
        cause: error,
      });
    }
  }
}

/** Returns null when no OMDb key is configured. */
export function createOmdbClient(): OmdbClient | null {
  if (!omdbConfig.apiKey) return null;
  return new OmdbClient({ apiKey: omdbConfig.apiKey, baseUrl: omdbConfig.baseUrl });
}
