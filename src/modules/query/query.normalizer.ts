import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { UnparsableQueryError } from '../../lib/errors.js';
import type { NormalizedQuery, Query, SeriesHint } from './query.types.js';

const noiseTokensSchema = z.object({
  strong: z.array(z.string()),
  weak: z.array(z.string()),
});

const noise = noiseTokensSchema.parse(
  JSON.parse(readFileSync(new URL('./noise-tokens.json', import.meta.url), 'utf-8')),
);

/** Tokens that only ever appear in release names */
const STRONG_NOISE = new Set(noise.strong);
/** Tokens that are release info only when a strong token follows them */
const WEAK_NOISE = new Set(noise.weak);

const STRONG_NOISE_PATTERNS = [
  /^\d{3,4}[pi]$/,
  /^\d+(?:\.\d+)?(?:mb|gb)$/,
  /^[xh]26[45]$/,
  /^s\d{1,2}(?:e\d{1,3})?$/,
];

const IMDB_ID = /\b(tt\d{7,10})\b/i;
const TMDB_URL = /themoviedb\.org\/(movie|tv)\/(\d+)/i;
const TMDB_TAG = /^tmdb[\s:#]*(\d+)$/i;

const EPISODE_TOKEN = /^s(\d{1,2})(?:e(\d{1,3}))?$/;
const NUMBER_TOKEN = /^\d{1,3}$/;

const MAX_TITLE_LENGTH = 100;
export const EARLIEST_FILM_YEAR = 1888;

export interface NormalizeOptions {
  now?: Date;
}

export function isPlausibleYear(value: number, now: Date = new Date()): boolean {
  return Number.isInteger(value) && value >= EARLIEST_FILM_YEAR && value <= now.getFullYear() + 1;
}

/**
 * Canonical comparison form of a title: lowercase, apostrophes dropped,
 * other punctuation turned into spaces, whitespace collapsed.
 * Shared with the resolver so remote titles compare against queries.
 */
export function normalizeTitle(title: string): string {
  return title
    .normalize('NFKC')
    .toLowerCase()
    .replace(/['’`]/g, '')
    .replace(/&/g, ' and ')
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

function isStrongNoise(token: string): boolean {
  return STRONG_NOISE.has(token) || STRONG_NOISE_PATTERNS.some((p) => p.test(token));
}

function asYear(token: string, now: Date): number | undefined {
  if (!/^\d{4}$/.test(token)) return undefined;
  const year = parseInt(token, 10);
  return isPlausibleYear(year, now) ? year : undefined;
}

function firstLine(raw: string): string {
  return raw.split(/\r?\n/).map((line) => line.trim()).find((line) => line.length > 0) ?? '';
}

function preClean(raw: string, query: Query, now: Date): string {
  let text = query.source === 'filename' ? raw.replace(/\.(?=[a-z0-9]*[a-z])[a-z0-9]{2,4}$/i, '') : firstLine(raw);

  text = text
    .replace(/https?:\/\/\S+/gi, ' ')
    .replace(/@\w+/g, ' ')
    .replace(/\b([hx])\.(26[45])\b/gi, '$1$2')
    .replace(/\b(?:dd\+?|ddp|aac|ac3|eac3)?\s?[257]\.[01]\b/gi, ' ')
    // Bracketed groups survive only when they hold a year
    .replace(/[[({]([^\])}]*)[\])}]/g, (_match, inner: string) => {
      const trimmed = inner.trim();
      return asYear(trimmed, now) !== undefined ? ` ${trimmed} ` : ' ';
    });

  return text;
}

/** A catalog id written out in the text; ids win over any title around them */
function findExternalId(raw: string): string | undefined {
  const imdb = IMDB_ID.exec(raw);
  if (imdb?.[1]) return imdb[1].toLowerCase();

  const url = TMDB_URL.exec(raw);
  if (url?.[1] && url[2]) return url[1].toLowerCase() === 'tv' ? `tv:${url[2]}` : url[2];

  return TMDB_TAG.exec(firstLine(raw))?.[1];
}

/** tokens[i] opens a spelled-out "season <n>" marker */
function isSeasonWord(tokens: string[], i: number): boolean {
  return tokens[i] === 'season' && NUMBER_TOKEN.test(tokens[i + 1] ?? '');
}

function findSeries(tokens: string[], from: number): SeriesHint | undefined {
  for (let i = from; i < tokens.length; i++) {
    const token = tokens[i] ?? '';

    const marker = EPISODE_TOKEN.exec(token);
    if (marker?.[1]) {
      const season = parseInt(marker[1], 10);
      return marker[2] ? { season, episode: parseInt(marker[2], 10) } : { season };
    }

    if (isSeasonWord(tokens, i)) {
      const season = parseInt(tokens[i + 1] ?? '', 10);
      const episode = tokens[i + 2] === 'episode' ? tokens[i + 3] ?? '' : '';
      return NUMBER_TOKEN.test(episode) ? { season, episode: parseInt(episode, 10) } : { season };
    }
  }
  return undefined;
}

/**
 * Find where the title ends and release information starts.
 * Returns the index of the first release-marker token (or tokens.length).
 */
function findTitleEnd(tokens: string[], query: Query, now: Date): number {
  for (let i = 1; i < tokens.length; i++) {
    const token = tokens[i] ?? '';
    const rest = tokens.slice(i + 1);

    if (isStrongNoise(token) || isSeasonWord(tokens, i)) return i;

    if (WEAK_NOISE.has(token) && rest.some(isStrongNoise)) return i;

    if (asYear(token, now) !== undefined) {
      // Filenames carry release info after the year; free text only has a trailing year
      if (query.source === 'filename') return i;
      if (rest.every((t) => isStrongNoise(t) || WEAK_NOISE.has(t))) return i;
    }
  }
  return tokens.length;
}

/**
 * Extract a clean title/year query from a raw message text, filename or caption.
 * A catalog id anywhere in the text short-circuits title parsing.
 * Throws UnparsableQueryError when nothing alphabetic remains.
 */
export function normalize(query: Query, options: NormalizeOptions = {}): NormalizedQuery {
  const externalId = findExternalId(query.raw);
  if (externalId !== undefined) return { title: externalId, externalId };

  const now = options.now ?? new Date();
  const cleaned = preClean(query.raw, query, now);

  const tokens = normalizeTitle(cleaned)
    .split(' ')
    .filter((t) => t.length > 0);

  const titleEnd = findTitleEnd(tokens, query, now);
  const titleTokens = tokens.slice(0, titleEnd);

  let year: number | undefined;
  for (const token of tokens.slice(titleEnd)) {
    year = asYear(token, now);
    if (year !== undefined) break;
  }

  const hintYear = query.hints?.year;
  if (year === undefined && hintYear !== undefined && isPlausibleYear(hintYear, now)) {
    year = hintYear;
  }

  const title = titleTokens.join(' ').slice(0, MAX_TITLE_LENGTH).trim();
  if (!/\p{L}/u.test(title)) {
    throw new UnparsableQueryError(query.raw);
  }

  const series = findSeries(tokens, titleEnd);
  return {
    title,
    ...(year !== undefined ? { year } : {}),
    ...(series ? { series } : {}),
  };
}
