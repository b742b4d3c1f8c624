import Fastify from 'fastify';
import cors from '@fastify/cors';
import { serverConfig } from './config/index.js';
import { getCacheStats } from './lib/cache.js';
import { logger } from './lib/logger.js';
import { errorHandler } from './middleware/error-handler.js';
import { setupRateLimit } from './middleware/rate-limit.js';
import { authRoutes } from './modules/auth/auth.routes.js';
import type { PipelineCoordinator } from './modules/pipeline/pipeline.coordinator.js';
import { pipelineRoutes } from './modules/pipeline/pipeline.routes.js';

export interface AppDependencies {
  coordinator: PipelineCoordinator;
}

export async function buildApp({ coordinator }: AppDependencies) {
  const app = Fastify({ logger: false });

  await app.register(cors, {
    origin: serverConfig.corsOrigin.split(',').map((o) => o.trim()),
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  });

  await setupRateLimit(app);

  app.setErrorHandler(errorHandler);

  app.get('/health', async () => ({
    status: 'ok',
    timestamp: new Date().toISOString(),
    caches: getCacheStats(),
  }));

  await app.register(authRoutes);
  await app.register(pipelineRoutes, { coordinator });

  app.addHook('onRequest', async (request) => {
    logger.debug(
      {
        method: request.method,
        url: request.url,
      },
      'Incoming request'
    );
  });

  app.addHook('onResponse', async (request, reply) => {
    logger.info(
      {
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        responseTime: reply.elapsedTime,
      },
      'Request completed'
    );
  });

  return app;
}
