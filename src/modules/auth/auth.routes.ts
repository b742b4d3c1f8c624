import { createHash, timingSafeEqual } from 'node:crypto';
import type { FastifyInstance } from 'fastify';
import { config } from '../../config/index.js';
import { signAdminToken } from '../../lib/jwt.js';
import { createChildLogger } from '../../lib/logger.js';
import { loginRateLimit } from '../../middleware/rate-limit.js';
import { tokenBodySchema, type TokenBody } from './auth.schemas.js';

const logger = createChildLogger('auth');

function passwordMatches(candidate: string): boolean {
  const digest = (value: string) => createHash('sha256').update(value).digest();
  return timingSafeEqual(digest(candidate), digest(config.ADMIN_PASSWORD));
}

export async function authRoutes(app: FastifyInstance) {
  app.post<{ Body: TokenBody }>(
    '/api/auth/token',
    { config: { rateLimit: loginRateLimit } },
    async (request, reply) => {
      const body = tokenBodySchema.safeParse(request.body);
      if (!body.success) {
        return reply.status(400).send({ error: 'Validation failed', details: body.error.issues });
      }

      if (!passwordMatches(body.data.password)) {
        logger.warn({ ip: request.ip }, 'Rejected admin login');
        return reply.status(401).send({ error: 'Invalid password' });
      }

      const token = await signAdminToken('admin');
      return { token };
    }
  );
}
