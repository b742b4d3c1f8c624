import { z } from 'zod';
import { telegramConfig } from '../../config/index.js';
import { PublishFailedError, errorMessage } from '../../lib/errors.js';
import { createChildLogger } from '../../lib/logger.js';
import type { MetadataRecord } from '../metadata/metadata.types.js';
import type { SeriesHint } from '../query/query.types.js';
import type { PosterAsset } from '../render/render.types.js';
import { buildCaption } from './caption.builder.js';

const logger = createChildLogger('telegram-publisher');

/** Posts a rendered poster; resolves to the channel message reference */
export interface ChannelPublisher {
  publish(asset: PosterAsset, record: MetadataRecord, series?: SeriesHint): Promise<string>;
}

const sendPhotoResponseSchema = z.discriminatedUnion('ok', [
  z.object({
    ok: z.literal(true),
    result: z.object({
      message_id: z.number(),
      chat: z.object({ id: z.union([z.number(), z.string()]) }),
    }),
  }),
  z.object({
    ok: z.literal(false),
    description: z.string().optional(),
    error_code: z.number().optional(),
  }),
]);

export interface TelegramPublisherOptions {
  botToken: string;
  apiUrl: string;
  channelId: string;
  watermark: string;
  downloadLink?: string | undefined;
  fetchImpl?: typeof fetch;
}

export class TelegramPublisher implements ChannelPublisher {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: TelegramPublisherOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async publish(asset: PosterAsset, record: MetadataRecord, series?: SeriesHint): Promise<string> {
    const form = new FormData();
    form.set('chat_id', this.options.channelId);
    form.set('caption', buildCaption(record, this.options.watermark, series));
    form.set('parse_mode', 'HTML');
    form.set('photo', new Blob([asset.image], { type: asset.mimeType }), `${asset.externalId}.jpg`);

    if (this.options.downloadLink) {
      form.set('reply_markup', JSON.stringify({
        inline_keyboard: [[{ text: '📥 Download', url: this.options.downloadLink }]],
      }));
    }

    const url = `${this.options.apiUrl}/bot${this.options.botToken}/sendPhoto`;

    let body: unknown;
    try {
      const response = await this.fetchImpl(url, { method: 'POST', body: form });
      body = await response.json();
    } catch (error) {
      throw new PublishFailedError(asset.externalId, errorMessage(error), { cause: error });
    }

    const parsed = sendPhotoResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new PublishFailedError(asset.externalId, 'unexpected response from Telegram', { cause: parsed.error });
    }
    if (!parsed.data.ok) {
      throw new PublishFailedError(asset.externalId, parsed.data.description ?? `error ${parsed.data.error_code ?? 'unknown'}`);
    }

    const channelRef = `${parsed.data.result.chat.id}:${parsed.data.result.message_id}`;
    logger.info({ externalId: asset.externalId, channelRef }, 'Poster published');
    return channelRef;
  }
}

export function createTelegramPublisher(): TelegramPublisher {
  return new TelegramPublisher({
    botToken: telegramConfig.botToken,
    apiUrl: telegramConfig.apiUrl,
    channelId: telegramConfig.channelId,
    watermark: telegramConfig.watermark,
    downloadLink: telegramConfig.downloadLink,
  });
}
