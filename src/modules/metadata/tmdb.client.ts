import { z } from 'zod';
import { tmdbConfig } from '../../config/index.js';
import { MovieSourceError, errorMessage } from '../../lib/errors.js';
import { createChildLogger } from '../../lib/logger.js';
import type { NormalizedQuery } from '../query/query.types.js';
import type { CandidateRecord, CatalogSource, MetadataRecord } from './metadata.types.js';

const logger = createChildLogger('tmdb-client');

// ============================================================================
// Response schemas
// ============================================================================

const searchResultSchema = z.object({
  id: z.number(),
  title: z.string(),
  release_date: z.string().optional().nullable(),
  poster_path: z.string().optional().nullable(),
  popularity: z.number().optional().default(0),
});

const searchResponseSchema = z.object({
  results: z.array(searchResultSchema).default([]),
});

const detailsResponseSchema = z.object({
  id: z.number(),
  title: z.string(),
  overview: z.string().optional().nullable(),
  vote_average: z.number().optional().default(0),
  release_date: z.string().optional().nullable(),
  poster_path: z.string().optional().nullable(),
  original_language: z.string().optional().nullable(),
  genres: z.array(z.object({ id: z.number(), name: z.string() })).default([]),
});

// TV endpoints name things differently; map them onto the movie shapes
const tvSearchResponseSchema = z.object({
  results: z
    .array(
      z
        .object({
          id: z.number(),
          name: z.string(),
          first_air_date: z.string().optional().nullable(),
          poster_path: z.string().optional().nullable(),
          popularity: z.number().optional().default(0),
        })
        .transform(({ name, first_air_date, ...rest }) => ({ ...rest, title: name, release_date: first_air_date })),
    )
    .default([]),
});

const tvDetailsResponseSchema = detailsResponseSchema
  .omit({ title: true, release_date: true })
  .extend({ name: z.string(), first_air_date: z.string().optional().nullable() })
  .transform(({ name, first_air_date, ...rest }) => ({ ...rest, title: name, release_date: first_air_date }));

type SearchHit = z.output<typeof searchResultSchema>;
type Details = z.output<typeof detailsResponseSchema>;

// ============================================================================
// Client
// ============================================================================

export interface TmdbClientOptions {
  apiKey: string;
  baseUrl: string;
  imageBase: string;
  fetchImpl?: typeof fetch;
  now?: () => number;
}

function releaseYear(date: string | null | undefined): number | undefined {
  if (!date) return undefined;
  const year = parseInt(date.slice(0, 4), 10);
  return Number.isNaN(year) ? undefined : year;
}

function parseResponse<T extends z.ZodTypeAny>(schema: T, data: unknown, path: string): z.output<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new MovieSourceError(`Unexpected TMDB response from ${path}: ${result.error.message}`, undefined, {
      cause: result.error,
    });
  }
  return result.data;
}

/** Series ids carry this prefix; TMDB numbers movies and shows independently */
const TV_PREFIX = 'tv:';

export class TmdbClient implements CatalogSource {
  readonly name = 'tmdb';
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => number;

  constructor(private readonly options: TmdbClientOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.now = options.now ?? Date.now;
  }

  ownsId(externalId: string): boolean {
    return /^(?:tv:)?\d+$/.test(externalId);
  }

  /** Search by title; a year-filtered search that finds nothing is retried without the year */
  async fetchCandidates(query: NormalizedQuery, signal?: AbortSignal): Promise<CandidateRecord[]> {
    const tv = query.series !== undefined;
    let results = await this.search(query.title, query.year, tv, signal);

    if (results.length === 0 && query.year !== undefined) {
      logger.info({ title: query.title, year: query.year }, 'Retrying search without year');
      results = await this.search(query.title, undefined, tv, signal);
    }

    return results.map((result) => {
      const year = releaseYear(result.release_date);
      const candidate: CandidateRecord = {
        externalId: tv ? `${TV_PREFIX}${result.id}` : String(result.id),
        title: result.title,
        popularity: result.popularity,
      };
      if (year !== undefined) candidate.year = year;
      if (result.poster_path) candidate.posterSource = this.posterUrl(result.poster_path);
      return candidate;
    });
  }

  async fetchFullRecord(externalId: string, signal?: AbortSignal): Promise<MetadataRecord> {
    const tv = externalId.startsWith(TV_PREFIX);
    const id = encodeURIComponent(tv ? externalId.slice(TV_PREFIX.length) : externalId);

    const details: Details = tv
      ? parseResponse(tvDetailsResponseSchema, await this.request(`/tv/${id}`, {}, signal), '/tv')
      : parseResponse(detailsResponseSchema, await this.request(`/movie/${id}`, {}, signal), '/movie');

    const record: MetadataRecord = {
      externalId: tv ? `${TV_PREFIX}${details.id}` : String(details.id),
      title: details.title,
      synopsis: details.overview ?? '',
      rating: Math.round(details.vote_average * 10) / 10,
      genres: details.genres.map((genre) => genre.name),
      fetchedAt: this.now(),
    };

    const year = releaseYear(details.release_date);
    if (year !== undefined) record.year = year;
    if (details.poster_path) record.posterSource = this.posterUrl(details.poster_path);
    if (details.original_language) record.language = details.original_language;

    logger.info({ externalId: record.externalId, title: record.title, year: record.year }, 'Fetched details');
    return record;
  }

  private posterUrl(path: string): string {
    return `${this.options.imageBase}${path}`;
  }

  private async search(
    title: string,
    year: number | undefined,
    tv: boolean,
    signal?: AbortSignal,
  ): Promise<SearchHit[]> {
    const params: Record<string, string> = {
      query: title,
      include_adult: 'false',
      page: '1',
    };
    if (year !== undefined) params[tv ? 'first_air_date_year' : 'year'] = String(year);

    const path = tv ? '/search/tv' : '/search/movie';
    const data = await this.request(path, params, signal);
    const { results } = tv
      ? parseResponse(tvSearchResponseSchema, data, path)
      : parseResponse(searchResponseSchema, data, path);
    logger.debug({ title, year, tv, count: results.length }, 'TMDB search complete');
    return results;
  }

  private async request(path: string, params: Record<string, string>, signal?: AbortSignal): Promise<unknown> {
    const url = new URL(`${this.options.baseUrl}${path}`);
    url.searchParams.set('api_key', this.options.apiKey);
    url.searchParams.set('language', 'en-US');
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }

    let response: Response;
    try {
      response = await this.fetchImpl(url, signal ? { signal } : {});
    } catch (error) {
      throw new MovieSourceError(`TMDB request to ${path} failed: ${errorMessage(error)}`, undefined, { cause: error });
    }

    if (!response.ok) {
      logger.warn({ path, status: response.status }, 'TMDB request rejected');
      throw new MovieSourceError(`TMDB request to ${path} returned ${response.status}`, response.status);
    }

    try {
      return await response.json();
    } catch (error) {
      throw new MovieSourceError(`TMDB response from ${path} is not JSON: ${errorMessage(error)}`, response.status, {
        cause: error,
      });
    }
  }
}

export function createTmdbClient(): TmdbClient {
  return new TmdbClient({
    apiKey: tmdbConfig.apiKey,
    baseUrl: tmdbConfig.baseUrl,
    imageBase: tmdbConfig.imageBase,
  });
}
