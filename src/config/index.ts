import 'dotenv/config';
import { envSchema, type Env } from './env.schema.js';

function loadConfig(): Env {
  const result = envSchema.safeParse(process.env);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid environment configuration:\n${issues}`);
  }
  return result.data;
}

export const config = loadConfig();

export const serverConfig = {
  port: config.PORT,
  publicUrl: config.PUBLIC_URL,
  corsOrigin: config.CORS_ORIGIN,
};

export const tmdbConfig = {
  apiKey: config.TMDB_API_KEY,
  baseUrl: config.TMDB_BASE_URL,
  imageBase: config.TMDB_IMAGE_BASE,
};

export const omdbConfig = {
  apiKey: config.OMDB_API_KEY,
  baseUrl: config.OMDB_BASE_URL,
};

export const searchConfig = {
  resultLimit: config.SEARCH_RESULT_LIMIT,
};

export const telegramConfig = {
  botToken: config.TELEGRAM_BOT_TOKEN,
  apiUrl: config.TELEGRAM_API_URL,
  channelId: config.TELEGRAM_CHANNEL_ID,
  watermark: config.CHANNEL_WATERMARK,
  downloadLink: config.DOWNLOAD_LINK,
};

export const jwtConfig = {
  secret: config.JWT_SECRET,
  ttl: config.JWT_TTL,
};

export const cacheConfig = {
  metadataTtlMs: config.METADATA_TTL * 1000,
  ratingSignificance: config.RATING_SIGNIFICANCE,
  posterMemorySize: config.POSTER_MEMORY_CACHE_SIZE,
};

export const pipelineConfig = {
  autoSelectMargin: config.AUTO_SELECT_MARGIN,
  selectionMaxOptions: config.SELECTION_MAX_OPTIONS,
  selectionTimeoutMs: config.SELECTION_TIMEOUT_MS,
  publicationRetentionMs: config.PUBLICATION_RETENTION_DAYS * 24 * 60 * 60 * 1000,
  republishOnChange: config.REPUBLISH_ON_CHANGE,
  publishMaxRetries: config.PUBLISH_MAX_RETRIES,
  publishBackoffMs: config.PUBLISH_BACKOFF_MS,
};
