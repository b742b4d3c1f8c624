import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';
import { PipelineError } from '../lib/errors.js';
import { createChildLogger } from '../lib/logger.js';

const logger = createChildLogger('error-handler');

export function errorHandler(error: FastifyError | Error, request: FastifyRequest, reply: FastifyReply) {
  if (error instanceof PipelineError) {
    return reply.status(error.statusCode).send({ error: error.message, code: error.code });
  }

  if (error instanceof ZodError) {
    return reply.status(400).send({ error: 'Validation failed', details: error.issues });
  }

  if ('validation' in error && error.validation) {
    return reply.status(400).send({ error: 'Validation failed', details: error.validation });
  }

  if ('statusCode' in error && typeof error.statusCode === 'number' && error.statusCode < 500) {
    return reply.status(error.statusCode).send({ error: error.message });
  }

  logger.error({ err: error, method: request.method, url: request.url }, 'Unhandled error');
  return reply.status(500).send({ error: 'Internal server error' });
}
