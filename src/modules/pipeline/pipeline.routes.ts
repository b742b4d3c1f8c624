import type { FastifyInstance } from 'fastify';
import { verifyAdminAuth } from '../auth/auth.middleware.js';
import { extractQuery, messageQueryId, type InboundMessage } from '../query/query.extractor.js';
import type { Query } from '../query/query.types.js';
import type { PipelineCoordinator } from './pipeline.coordinator.js';
import {
  messageBodySchema,
  queryBodySchema,
  selectionBodySchema,
  type MessageBody,
  type QueryBody,
  type SelectionBody,
} from './pipeline.schemas.js';

export interface PipelineRoutesOptions {
  coordinator: PipelineCoordinator;
}

export async function pipelineRoutes(app: FastifyInstance, { coordinator }: PipelineRoutesOptions) {
  // ═══════════════════════════════════════════════════════════════════════════
  // Channel messages (an edit is re-posted under the same chat and message id)
  // ═══════════════════════════════════════════════════════════════════════════

  app.post<{ Body: MessageBody }>(
    '/api/messages',
    { preHandler: verifyAdminAuth },
    async (request, reply) => {
      const body = messageBodySchema.safeParse(request.body);
      if (!body.success) {
        return reply.status(400).send({ error: 'Validation failed', details: body.error.issues });
      }

      const message: InboundMessage = body.data;
      const query = extractQuery(message);
      if (!query) {
        // An edit may have removed the reference; stop whatever the old text started
        coordinator.cancel(messageQueryId(message.chatId, message.messageId));
        return reply.status(422).send({ error: 'Message carries no movie reference' });
      }

      const run = coordinator.submit(query);
      return reply.status(202).send({ queryId: run.id, state: run.state });
    }
  );

  // Deleted or edited message: stop its run if it has not resolved yet
  app.delete<{ Params: { chatId: string; messageId: string } }>(
    '/api/messages/:chatId/:messageId',
    { preHandler: verifyAdminAuth },
    async (request) => {
      const queryId = messageQueryId(request.params.chatId, request.params.messageId);
      return { queryId, cancelled: coordinator.cancel(queryId) };
    }
  );

  // ═══════════════════════════════════════════════════════════════════════════
  // Queries
  // ═══════════════════════════════════════════════════════════════════════════

  app.post<{ Body: QueryBody }>(
    '/api/queries',
    { preHandler: verifyAdminAuth },
    async (request, reply) => {
      const body = queryBodySchema.safeParse(request.body);
      if (!body.success) {
        return reply.status(400).send({ error: 'Validation failed', details: body.error.issues });
      }

      const query: Query = { raw: body.data.raw, source: body.data.source };
      if (body.data.year !== undefined) query.hints = { year: body.data.year };

      const run = coordinator.submit(query);
      return reply.status(202).send({ queryId: run.id, state: run.state });
    }
  );

  app.get<{ Params: { id: string } }>(
    '/api/queries/:id',
    { preHandler: verifyAdminAuth },
    async (request, reply) => {
      const snapshot = coordinator.getState(request.params.id);
      if (!snapshot) {
        return reply.status(404).send({ error: 'Query not found' });
      }
      return snapshot;
    }
  );

  app.post<{ Params: { id: string }; Body: SelectionBody }>(
    '/api/queries/:id/selection',
    { preHandler: verifyAdminAuth },
    async (request, reply) => {
      const body = selectionBodySchema.safeParse(request.body);
      if (!body.success) {
        return reply.status(400).send({ error: 'Validation failed', details: body.error.issues });
      }

      coordinator.provideSelection(request.params.id, body.data.candidateId);
      return reply.status(202).send({ queryId: request.params.id });
    }
  );
}
