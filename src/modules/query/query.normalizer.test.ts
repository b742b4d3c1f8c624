import { describe, it, expect } from 'vitest';
import { UnparsableQueryError } from '../../lib/errors.js';
import { isPlausibleYear, normalize, normalizeTitle } from './query.normalizer.js';
import { queryKey } from './query.types.js';

const now = new Date('2026-06-01T12:00:00Z');

describe('normalize', () => {
  it('splits a trailing year off free text', () => {
    expect(normalize({ raw: 'Inception 2010', source: 'text' }, { now })).toEqual({
      title: 'inception',
      year: 2010,
    });
  });

  it('strips release noise from filenames', () => {
    const query = { raw: 'Inception.2010.1080p.BluRay.x264-YTS.mkv', source: 'filename' as const };
    expect(normalize(query, { now })).toEqual({ title: 'inception', year: 2010 });
  });

  it('drops bracketed tags but keeps a bracketed year', () => {
    expect(normalize({ raw: '[YTS] The Matrix (1999) 1080p', source: 'text' }, { now })).toEqual({
      title: 'the matrix',
      year: 1999,
    });
  });

  it('leaves titles without a year alone', () => {
    expect(normalize({ raw: 'The Thing', source: 'text' }, { now })).toEqual({ title: 'the thing' });
  });

  it('keeps an implausible trailing number in the title', () => {
    expect(normalize({ raw: 'Blade Runner 2049', source: 'text' }, { now })).toEqual({
      title: 'blade runner 2049',
    });
  });

  it('accepts years down to 1888', () => {
    expect(normalize({ raw: 'Xyzzy Nonexistent Film 1900', source: 'text' }, { now })).toEqual({
      title: 'xyzzy nonexistent film',
      year: 1900,
    });
  });

  it('treats language and audio tags after the year as noise', () => {
    expect(normalize({ raw: 'Interstellar 2014 Hindi Dual Audio 720p', source: 'caption' }, { now })).toEqual({
      title: 'interstellar',
      year: 2014,
    });
  });

  it('reads only the first non-empty line of a message', () => {
    expect(normalize({ raw: '\nHeat (1995)\nJoin the channel', source: 'text' }, { now })).toEqual({
      title: 'heat',
      year: 1995,
    });
  });

  it('falls back to the year hint', () => {
    expect(normalize({ raw: 'The Thing', source: 'text', hints: { year: 1982 } }, { now })).toEqual({
      title: 'the thing',
      year: 1982,
    });
  });

  it('reads season and episode markers from release names', () => {
    const query = { raw: 'Breaking.Bad.S01E02.720p.WEB.mkv', source: 'filename' as const };
    expect(normalize(query, { now })).toEqual({ title: 'breaking bad', series: { season: 1, episode: 2 } });

    expect(normalize({ raw: 'The Office S02 1080p', source: 'text' }, { now })).toEqual({
      title: 'the office',
      series: { season: 2 },
    });
  });

  it('reads spelled-out seasons and episodes', () => {
    expect(normalize({ raw: 'Dark Season 2 Complete', source: 'text' }, { now })).toEqual({
      title: 'dark',
      series: { season: 2 },
    });
    expect(normalize({ raw: 'Friends Season 3 Episode 4', source: 'text' }, { now })).toEqual({
      title: 'friends',
      series: { season: 3, episode: 4 },
    });
  });

  it('keeps a leading "season" as part of a film title', () => {
    expect(normalize({ raw: 'Season of the Witch 2011', source: 'text' }, { now })).toEqual({
      title: 'season of the witch',
      year: 2011,
    });
  });

  it('takes catalog ids from links and tags', () => {
    expect(normalize({ raw: 'https://www.imdb.com/title/tt1375666/', source: 'text' }, { now })).toEqual({
      title: 'tt1375666',
      externalId: 'tt1375666',
    });
    expect(
      normalize({ raw: 'Watch this https://www.themoviedb.org/tv/1399-game-of-thrones', source: 'text' }, { now }),
    ).toEqual({ title: 'tv:1399', externalId: 'tv:1399' });
    expect(normalize({ raw: 'tmdb:27205', source: 'text' }, { now })).toEqual({
      title: '27205',
      externalId: '27205',
    });
  });

  it('rejects input with nothing alphabetic left', () => {
    expect(() => normalize({ raw: '2012', source: 'text' }, { now })).toThrow(UnparsableQueryError);
    expect(() => normalize({ raw: '1995.mkv', source: 'filename' }, { now })).toThrow(UnparsableQueryError);
  });
});

describe('isPlausibleYear', () => {
  it('bounds years by the first film and next year', () => {
    expect(isPlausibleYear(1887, now)).toBe(false);
    expect(isPlausibleYear(1888, now)).toBe(true);
    expect(isPlausibleYear(2027, now)).toBe(true);
    expect(isPlausibleYear(2028, now)).toBe(false);
  });
});

describe('normalizeTitle', () => {
  it('drops apostrophes and punctuation', () => {
    expect(normalizeTitle("Ocean's Eleven")).toBe('oceans eleven');
    expect(normalizeTitle('Mission: Impossible – Fallout')).toBe('mission impossible fallout');
    expect(normalizeTitle('Fast & Furious')).toBe('fast and furious');
  });
});

describe('queryKey', () => {
  it('leaves the year slot empty when absent', () => {
    expect(queryKey({ title: 'the thing' })).toBe('q:the thing|');
    expect(queryKey({ title: 'the thing', year: 1982 })).toBe('q:the thing|1982');
  });

  it('separates series from films and shares the record key for ids', () => {
    expect(queryKey({ title: 'dark', series: { season: 2 } })).toBe('q:dark||tv');
    expect(queryKey({ title: 'tt1375666', externalId: 'tt1375666' })).toBe('id:tt1375666');
  });
});
