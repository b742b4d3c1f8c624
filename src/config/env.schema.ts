import { z } from 'zod';

const booleanString = (fallback: 'true' | 'false') =>
  z
    .string()
    .default(fallback)
    .transform((val) => val === 'true');

export const envSchema = z.object({
  PORT: z.coerce.number().default(3001),
  PUBLIC_URL: z.string().url().default('http://localhost:3001'),
  CORS_ORIGIN: z.string().default('http://localhost:3000'),

  TMDB_API_KEY: z.string().min(1),
  TMDB_BASE_URL: z.string().url().default('https://api.themoviedb.org/3'),
  TMDB_IMAGE_BASE: z.string().url().default('https://image.tmdb.org/t/p/w500'),

  // IMDb data through OMDb; the source is skipped without a key
  OMDB_API_KEY: z.string().min(1).optional(),
  OMDB_BASE_URL: z.string().url().default('https://www.omdbapi.com/'),
  SEARCH_RESULT_LIMIT: z.coerce.number().int().positive().default(10),

  TELEGRAM_BOT_TOKEN: z.string().min(1),
  TELEGRAM_API_URL: z.string().url().default('https://api.telegram.org'),
  TELEGRAM_CHANNEL_ID: z.string().min(1),
  CHANNEL_WATERMARK: z.string().default(''),
  DOWNLOAD_LINK: z.string().url().optional(),

  JWT_SECRET: z.string().min(32, 'JWT_SECRET must be at least 32 characters'),
  JWT_TTL: z.string().default('7d'),
  ADMIN_PASSWORD: z.string().min(8, 'ADMIN_PASSWORD must be at least 8 characters'),

  DATABASE_PATH: z.string().default('./data/poster-relay.db'),

  // Seconds
  METADATA_TTL: z.coerce.number().positive().default(7 * 24 * 60 * 60),
  RATING_SIGNIFICANCE: z.coerce.number().nonnegative().default(0.5),
  POSTER_MEMORY_CACHE_SIZE: z.coerce.number().int().positive().default(200),

  AUTO_SELECT_MARGIN: z.coerce.number().nonnegative().default(0.25),
  SELECTION_MAX_OPTIONS: z.coerce.number().int().positive().default(5),
  SELECTION_TIMEOUT_MS: z.coerce.number().int().positive().default(10 * 60 * 1000),

  PUBLICATION_RETENTION_DAYS: z.coerce.number().positive().default(30),
  REPUBLISH_ON_CHANGE: booleanString('true'),
  PUBLISH_MAX_RETRIES: z.coerce.number().int().nonnegative().default(3),
  PUBLISH_BACKOFF_MS: z.coerce.number().int().nonnegative().default(1000),

  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('info'),
});

export type Env = z.infer<typeof envSchema>;
