import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import type { Logger } from 'pino';
import { EventStore } from './application/event-store.js';
import { LiveDelivery } from './application/live-delivery.js';
import type { AppConfig } from './infrastructure/config.js';
import { componentLogger } from './infrastructure/logger.js';
import { pipelinePlugin } from './infrastructure/index.js';
import type { Pipeline } from './infrastructure/index.js';
import { hookRoutes, interactionRoutes, queryRoutes } from './interfaces/http/index.js';
import { WebSocketServer } from './interfaces/ws/websocket-server.js';

export type PipelineConfig = Pick<AppConfig, 'orphanGraceMs' | 'recentEvents' | 'subscriberCapacity'> & {
  watch: Pick<AppConfig['watch'], 'fileName'>;
};

/** Wires the store and live delivery that every adapter shares. */
export function createPipeline(config: PipelineConfig, root: Logger): Pipeline {
  const store = new EventStore({
    log: componentLogger(root, 'store'),
    orphanGraceMs: config.orphanGraceMs,
    recentEvents: config.recentEvents,
  });
  const delivery = new LiveDelivery(store, {
    log: componentLogger(root, 'delivery'),
    capacity: config.subscriberCapacity,
  });
  return { store, delivery, progressFile: config.watch.fileName };
}

export interface BuildAppOptions {
  pipeline: Pipeline;
  /** Shared with Fastify, so request logs follow the same destination. */
  log: Logger;
  /** Attach the `/ws` live stream to the HTTP server. */
  websocket?: boolean;
  heartbeatMs?: number;
}

/**
 * Builds the Fastify server.
 *
 * Order:
 * 1) Shared pipeline plugin
 * 2) HTTP routes
 * 3) WebSocket endpoint on the same HTTP server
 */
export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const loggerInstance: FastifyBaseLogger = options.log;
  const fastify = Fastify({ loggerInstance });

  // --------------------------------------------------
  // Infrastructure
  // --------------------------------------------------

  await fastify.register(pipelinePlugin, { pipeline: options.pipeline });

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  await fastify.register(hookRoutes);
  await fastify.register(interactionRoutes);
  await fastify.register(queryRoutes);

  // --------------------------------------------------
  // Live stream
  // --------------------------------------------------

  if (options.websocket) {
    const wsServer = new WebSocketServer(
      options.pipeline.delivery,
      options.pipeline.store,
      componentLogger(options.log, 'ws'),
      { heartbeatMs: options.heartbeatMs },
    );
    wsServer.attach(fastify.server);

    // onClose MUST be registered before listen()
    fastify.addHook('onClose', async () => {
      wsServer.close();
    });
  }

  return fastify;
}

/**
 * Binds the HTTP server. With `required: false` (MCP mode) a bind failure,
 * such as a port still held by another session, is logged and reported as
 * `false` so the stdio tools keep working without the dashboard surface.
 */
export async function listenHttp(
  listen: () => Promise<unknown>,
  log: Logger,
  required: boolean,
): Promise<boolean> {
  try {
    await listen();
    return true;
  } catch (err: unknown) {
    if (required) throw err;
    log.warn({ err }, 'HTTP server unavailable, continuing with MCP over stdio only');
    return false;
  }
}
