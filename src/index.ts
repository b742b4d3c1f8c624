import { buildApp } from './app.js';
import { initDb, closeDb } from './db/index.js';
import { config, cacheConfig, pipelineConfig, searchConfig, serverConfig, telegramConfig } from './config/index.js';
import { logger } from './lib/logger.js';
import { MetadataCache } from './modules/metadata/metadata.cache.js';
import { FallbackMovieSource } from './modules/metadata/fallback.source.js';
import type { CatalogSource } from './modules/metadata/metadata.types.js';
import { createOmdbClient } from './modules/metadata/omdb.client.js';
import { createTmdbClient } from './modules/metadata/tmdb.client.js';
import { PipelineCoordinator } from './modules/pipeline/pipeline.coordinator.js';
import { PublicationDeduper } from './modules/publish/publication.deduper.js';
import { createTelegramPublisher } from './modules/publish/telegram.publisher.js';
import { SharpPosterRenderer } from './modules/render/poster.renderer.js';
import { RenderCache } from './modules/render/render.cache.js';
import { AmbiguityResolver } from './modules/resolver/ambiguity.resolver.js';

/** TMDB first for its popularity figures, OMDb filling in IMDb entries when configured */
function createMovieSource(): FallbackMovieSource {
  const sources: CatalogSource[] = [createTmdbClient()];
  const omdb = createOmdbClient();
  if (omdb) sources.push(omdb);

  logger.info({ sources: sources.map((source) => source.name) }, 'Movie sources configured');
  return new FallbackMovieSource(sources, { resultLimit: searchConfig.resultLimit });
}

async function main() {
  logger.info('Starting poster relay...');

  initDb(config.DATABASE_PATH);

  const deduper = new PublicationDeduper({
    retentionMs: pipelineConfig.publicationRetentionMs,
    republishOnChange: pipelineConfig.republishOnChange,
  });
  deduper.purgeExpired();

  const coordinator = new PipelineCoordinator(
    {
      source: createMovieSource(),
      metadata: new MetadataCache({
        ttlMs: cacheConfig.metadataTtlMs,
        ratingSignificance: cacheConfig.ratingSignificance,
      }),
      resolver: new AmbiguityResolver({
        autoSelectMargin: pipelineConfig.autoSelectMargin,
        maxOptions: pipelineConfig.selectionMaxOptions,
      }),
      renders: new RenderCache({ memorySize: cacheConfig.posterMemorySize }),
      renderer: new SharpPosterRenderer({ watermark: telegramConfig.watermark }),
      deduper,
      publisher: createTelegramPublisher(),
    },
    {
      selectionTimeoutMs: pipelineConfig.selectionTimeoutMs,
      publishMaxRetries: pipelineConfig.publishMaxRetries,
      publishBackoffMs: pipelineConfig.publishBackoffMs,
    }
  );

  const app = await buildApp({ coordinator });

  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Received shutdown signal');
    await app.close();
    closeDb();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  try {
    await app.listen({ port: serverConfig.port, host: '0.0.0.0' });
    logger.info({ port: serverConfig.port, url: serverConfig.publicUrl }, 'Server started');
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Startup failed');
  process.exit(1);
});
