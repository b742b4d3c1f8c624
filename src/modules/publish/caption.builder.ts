import type { MetadataRecord } from '../metadata/metadata.types.js';
import type { SeriesHint } from '../query/query.types.js';

const LANGUAGES: Record<string, string> = {
  en: 'English',
  es: 'Spanish',
  fr: 'French',
  de: 'German',
  it: 'Italian',
  ja: 'Japanese',
  ko: 'Korean',
  zh: 'Chinese',
  hi: 'Hindi',
  ar: 'Arabic',
  ru: 'Russian',
  pt: 'Portuguese',
};

const STORYLINE_LIMIT = 200;
const FOOTER = '▬▬▬▬「 ᴘᴏᴡᴇʀᴇᴅ ʙʏ 」▬▬▬▬';

export function escapeHtml(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export function languageName(code: string | undefined): string {
  return (code && LANGUAGES[code]) || 'English';
}

export function truncateStoryline(text: string): string {
  return text.length > STORYLINE_LIMIT ? `${text.slice(0, STORYLINE_LIMIT - 3)}...` : text;
}

const pad = (value: number) => String(value).padStart(2, '0');

/** `S01E02`, or `S01` for a season pack */
export function seriesLabel(series: SeriesHint): string {
  return series.episode !== undefined ? `S${pad(series.season)}E${pad(series.episode)}` : `S${pad(series.season)}`;
}

/** Telegram HTML caption for a movie or series post */
export function buildCaption(record: MetadataRecord, watermark: string, series?: SeriesHint): string {
  const title = escapeHtml(record.title);
  const parts = [
    record.year !== undefined ? `<b>🍿 Name: ${title} (${record.year})</b>` : `<b>🍿 Name: ${title}</b>`,
    '',
  ];

  if (record.genres.length > 0) {
    const hashtags = record.genres
      .slice(0, 3)
      .map((genre) => `#${escapeHtml(genre.replace(/\s+/g, ''))}`)
      .join(' ');
    parts.push(`<b>🎭 Genre</b>: ${hashtags}`);
  }

  if (record.rating > 0) {
    parts.push(`<b>⭐️ Rating</b>: ${record.rating} / 10`);
  }

  parts.push(`<b>🗣️ Language</b>: #${languageName(record.language)}`);

  if (series) {
    const episode = series.episode !== undefined ? ` • Episode ${series.episode}` : '';
    parts.push(`<b>📺 Series</b>: Season ${series.season}${episode} (#${seriesLabel(series)})`);
  }

  if (record.synopsis) {
    parts.push('', '<b>💬 Storyline</b>:', `<blockquote>${escapeHtml(truncateStoryline(record.synopsis))}</blockquote>`);
  }

  if (watermark) {
    parts.push('', FOOTER, `              •${escapeHtml(watermark)}•`);
  }

  return parts.join('\n');
}
