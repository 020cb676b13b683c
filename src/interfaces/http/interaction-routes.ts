import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { reportInteraction } from '../../application/report-interaction.js';
import { ValidationError } from '../../domain/index.js';

/**
 * POST /api/interactions - same contract as the `report_interaction` tool.
 */
async function interactionRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.post(
    '/api/interactions',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      try {
        const interactionId = reportInteraction(fastify.pipeline.store, request.body);
        return reply.status(201).send({ status: 'recorded', interaction_id: interactionId });
      } catch (err: unknown) {
        if (err instanceof ValidationError) {
          return reply.status(400).send({ error: err.message, issues: err.issues });
        }
        throw err;
      }
    },
  );
}

export default fp(interactionRoutes, {
  name: 'interaction-routes',
  dependencies: ['pipeline'],
  fastify: '5.x',
});
