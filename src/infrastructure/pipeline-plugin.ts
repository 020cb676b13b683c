import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { EventStore } from '../application/event-store.js';
import type { LiveDelivery } from '../application/live-delivery.js';

export interface Pipeline {
  store: EventStore;
  delivery: LiveDelivery;
  /** Basename of the progress log; tool writes to it also yield phase updates. */
  progressFile: string;
}

export interface PipelinePluginOptions {
  pipeline: Pipeline;
}

/**
 * Fastify plugin that exposes the shared event store and live delivery.
 *
 * - Decorates `fastify.pipeline` for routes and the WebSocket endpoint.
 * - Closes every live subscription on server shutdown.
 */
async function pipelinePlugin(fastify: FastifyInstance, options: PipelinePluginOptions): Promise<void> {
  fastify.decorate('pipeline', options.pipeline);

  fastify.addHook('onClose', async () => {
    options.pipeline.delivery.close();
    fastify.log.info('Live delivery closed');
  });
}

export default fp(pipelinePlugin, {
  name: 'pipeline',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.pipeline` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    pipeline: Pipeline;
  }
}
