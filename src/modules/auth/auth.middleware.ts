import type { FastifyRequest, FastifyReply } from 'fastify';
import { verifyAdminToken } from '../../lib/jwt.js';

export async function verifyAdminAuth(
  request: FastifyRequest,
  reply: FastifyReply
): Promise<void> {
  const authHeader = request.headers.authorization;

  if (!authHeader || !authHeader.startsWith('Bearer ')) {
    return reply.status(401).send({ error: 'Unauthorized: Missing or invalid authorization header' });
  }

  const payload = await verifyAdminToken(authHeader.slice(7));
  if (!payload) {
    return reply.status(401).send({ error: 'Unauthorized: Invalid token or insufficient permissions' });
  }
}
