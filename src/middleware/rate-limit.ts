import type { FastifyInstance } from 'fastify';
import rateLimit from '@fastify/rate-limit';

/** Per-route override for the admin token endpoint */
export const loginRateLimit = {
  max: 5,
  timeWindow: '15 minutes',
};

export async function setupRateLimit(app: FastifyInstance): Promise<void> {
  await app.register(rateLimit, {
    global: true,
    max: 120,
    timeWindow: '1 minute',
  });
}
