import fp from 'fastify-plugin';
import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { translateHook } from '../../application/hook-translation.js';

interface AcceptedReply {
  status: 'accepted';
  event_ids: string[];
}

/**
 * Hook receiver.
 *
 * POST /api/hooks   - lifecycle hook ingestion
 * POST /api/events  - alias
 *
 * Always answers 202: a failing hook must never disturb the pipeline that
 * fired it. Rejected bodies and drafts are logged only.
 */
async function hookRoutes(fastify: FastifyInstance): Promise<void> {
  const { store, progressFile } = fastify.pipeline;

  const ingest = async (request: FastifyRequest, reply: FastifyReply) => {
    const eventIds: string[] = [];

    try {
      for (const draft of translateHook(request.body, progressFile)) {
        try {
          eventIds.push(store.append(draft));
        } catch (err: unknown) {
          request.log.warn({ err, event_type: draft.event_type }, 'Hook event rejected');
        }
      }
    } catch (err: unknown) {
      request.log.warn({ err }, 'Hook payload rejected');
    }

    const body: AcceptedReply = { status: 'accepted', event_ids: eventIds };
    return reply.status(202).send(body);
  };

  // Body parsing failures (malformed JSON, empty body) land here.
  const acceptAnyway = (error: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
    request.log.warn({ err: error }, 'Unreadable hook body');
    const body: AcceptedReply = { status: 'accepted', event_ids: [] };
    return reply.status(202).send(body);
  };

  fastify.post('/api/hooks', { errorHandler: acceptAnyway }, ingest);
  fastify.post('/api/events', { errorHandler: acceptAnyway }, ingest);
}

export default fp(hookRoutes, {
  name: 'hook-routes',
  dependencies: ['pipeline'],
  fastify: '5.x',
});
