import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { getAgentEvents, getPipelineStatus } from '../../application/pipeline-queries.js';

/**
 * Parses a querystring value to an integer.
 * Returns `undefined` for missing values, `NaN` for anything else non-integral.
 */
function safeInt(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (value.trim() === '' || !Number.isFinite(n) || n !== Math.floor(n)) return NaN;
  return n;
}

/**
 * Read-only query API routes.
 *
 * GET /api/state                      - full pipeline snapshot
 * GET /api/agents/:agent_id/events    - one agent's history
 * GET /api/health                     - liveness and store counters
 */
async function queryRoutes(fastify: FastifyInstance): Promise<void> {
  const { store, delivery } = fastify.pipeline;

  fastify.get('/api/state', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.status(200).send(getPipelineStatus(store));
  });

  /**
   * Query params: label (`key` or `key=value`), limit
   */
  fastify.get(
    '/api/agents/:agent_id/events',
    async (
      request: FastifyRequest<{
        Params: { agent_id: string };
        Querystring: { label?: string; limit?: string };
      }>,
      reply: FastifyReply,
    ) => {
      const q = request.query;
      const limit = safeInt(q.limit);

      if (limit !== undefined && Number.isNaN(limit)) {
        return reply.status(400).send({ error: 'limit must be an integer' });
      }
      if (q.label !== undefined && q.label.trim() === '') {
        return reply.status(400).send({ error: 'label must not be empty' });
      }

      const result = getAgentEvents(store, request.params.agent_id, { label: q.label, limit });
      return reply.status(200).send(result);
    },
  );

  fastify.get('/api/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.status(200).send({
      status: 'ok',
      events: store.size,
      last_seq: store.lastSeq,
      subscribers: delivery.subscriberCount,
    });
  });
}

export default fp(queryRoutes, {
  name: 'query-routes',
  dependencies: ['pipeline'],
  fastify: '5.x',
});
