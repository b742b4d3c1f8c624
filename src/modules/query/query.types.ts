export type QuerySource = 'text' | 'filename' | 'caption';

/** Raw movie reference as it arrived from the channel. */
export interface Query {
  id?: string;
  raw: string;
  source: QuerySource;
  hints?: {
    year?: number;
  };
}

/** Season/episode marker found in a release name */
export interface SeriesHint {
  readonly season: number;
  readonly episode?: number;
}

export interface NormalizedQuery {
  readonly title: string;
  readonly year?: number;
  /** Set when the reference named a catalog id (IMDb `tt…` or TMDB) directly */
  readonly externalId?: string;
  /** Set for episodes and season packs; the title is then the series name */
  readonly series?: SeriesHint;
}

/**
 * Cache/lookup key of a normalized query: `q:<title>|<year>`, with a `|tv` suffix for series.
 * A direct id query shares the record's own `id:<externalId>` key.
 */
export function queryKey(query: NormalizedQuery): string {
  if (query.externalId !== undefined) return `id:${query.externalId}`;
  return `q:${query.title}|${query.year ?? ''}${query.series ? '|tv' : ''}`;
}
