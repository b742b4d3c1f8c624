import sharp from 'sharp';
import { createChildLogger } from '../../lib/logger.js';
import type { MetadataRecord } from '../metadata/metadata.types.js';
import type { PosterRenderer } from './render.types.js';

const logger = createChildLogger('poster-renderer');

const WIDTH = 1200;
const HEIGHT = 675;
const MARGIN = 48;
const POSTER_WIDTH = 387;
const POSTER_HEIGHT = HEIGHT - MARGIN * 2;
const TEXT_X = MARGIN * 2 + POSTER_WIDTH;
const SYNOPSIS_LINE_CHARS = 52;
const SYNOPSIS_MAX_LINES = 6;
const FONT = 'DejaVu Sans, Inter, Arial, Helvetica, sans-serif';

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/** Greedy word wrap; the last line gets an ellipsis when text is cut */
export function wrapText(text: string, lineChars: number, maxLines: number): string[] {
  const words = text.split(/\s+/).filter(Boolean);
  const lines: string[] = [];
  let line = '';

  for (const word of words) {
    const next = line ? `${line} ${word}` : word;
    if (next.length <= lineChars) {
      line = next;
      continue;
    }
    if (line) lines.push(line);
    line = word.slice(0, lineChars);
    if (lines.length === maxLines) break;
  }
  if (line && lines.length < maxLines) lines.push(line);

  const consumed = lines.join(' ').length;
  if (consumed < words.join(' ').length && lines.length > 0) {
    const last = lines[lines.length - 1] ?? '';
    lines[lines.length - 1] = `${last.slice(0, Math.max(0, lineChars - 3)).trimEnd()}...`;
  }
  return lines;
}

export interface SharpPosterRendererOptions {
  watermark: string;
  fetchImpl?: typeof fetch;
}

/**
 * Landscape channel poster: blurred backdrop of the movie poster,
 * the poster itself on the left and title, genres, rating badge and storyline on the right.
 */
export class SharpPosterRenderer implements PosterRenderer {
  readonly templateVersion = 'poster-v1';
  readonly mimeType = 'image/jpeg';
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: SharpPosterRendererOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async render(record: MetadataRecord): Promise<Buffer> {
    logger.debug({ externalId: record.externalId }, 'Rendering poster');

    const source = record.posterSource ? await this.fetchPoster(record.posterSource) : undefined;
    const layers: sharp.OverlayOptions[] = [];

    let base: sharp.Sharp;
    if (source) {
      const backdrop = await sharp(source)
        .resize(WIDTH, HEIGHT, { fit: 'cover' })
        .blur(24)
        .modulate({ brightness: 0.35 })
        .toBuffer();
      base = sharp(backdrop);

      const poster = await sharp(source)
        .resize(POSTER_WIDTH, POSTER_HEIGHT, { fit: 'cover' })
        .toBuffer();
      layers.push({ input: poster, top: MARGIN, left: MARGIN });
    } else {
      base = sharp({
        create: { width: WIDTH, height: HEIGHT, channels: 3, background: { r: 17, g: 17, b: 17 } },
      });
    }

    layers.push({ input: Buffer.from(this.overlaySvg(record, source !== undefined)), top: 0, left: 0 });

    return base
      .composite(layers)
      .jpeg({ quality: 85 })
      .toBuffer();
  }

  private async fetchPoster(url: string): Promise<Buffer> {
    const response = await this.fetchImpl(url);
    if (!response.ok) {
      throw new Error(`Failed to fetch poster: ${response.status}`);
    }
    return Buffer.from(await response.arrayBuffer());
  }

  private overlaySvg(record: MetadataRecord, hasPoster: boolean): string {
    const textX = hasPoster ? TEXT_X : MARGIN * 2;
    const lineChars = hasPoster ? SYNOPSIS_LINE_CHARS : SYNOPSIS_LINE_CHARS + 24;

    const title = escapeXml(record.title);
    const year = record.year !== undefined ? ` (${record.year})` : '';
    const genres = escapeXml(record.genres.slice(0, 3).join('  •  '));
    const synopsis = wrapText(record.synopsis, lineChars, SYNOPSIS_MAX_LINES)
      .map((line, i) => `<tspan x="${textX}" dy="${i === 0 ? 0 : 34}">${escapeXml(line)}</tspan>`)
      .join('');

    const badgeY = 200;
    const rating = record.rating > 0 ? record.rating.toFixed(1) : '–';

    return `
    <svg width="${WIDTH}" height="${HEIGHT}">
      <text x="${textX}" y="110" font-family="${FONT}" font-size="46" font-weight="bold" fill="white">${title}${year}</text>
      <text x="${textX}" y="160" font-family="${FONT}" font-size="24" fill="#bbbbbb">${genres}</text>
      <rect x="${textX}" y="${badgeY}" width="130" height="60" rx="9" ry="9" fill="#ffffff" fill-opacity="0.95"/>
      <text x="${textX + 65}" y="${badgeY + 42}" font-family="${FONT}" font-size="34"
            font-weight="bold" fill="#111" text-anchor="middle">${rating}</text>
      <text x="${textX}" y="320" font-family="${FONT}" font-size="24" fill="#eeeeee">${synopsis}</text>
      <text x="${WIDTH - MARGIN}" y="${HEIGHT - MARGIN / 2}" font-family="${FONT}" font-size="22"
            fill="#ffffff" fill-opacity="0.7" text-anchor="end">${escapeXml(this.options.watermark)}</text>
    </svg>`;
  }
}
