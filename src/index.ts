#!/usr/bin/env node
import type { FastifyInstance } from 'fastify';
import type { Logger } from 'pino';
import { buildApp, createPipeline, listenHttp } from './app.js';
import { loadConfig, type AppConfig } from './infrastructure/config.js';
import { componentLogger, createLogger } from './infrastructure/logger.js';
import { ProgressWatcher } from './infrastructure/progress/index.js';
import { forwardHook, readStdin } from './interfaces/cli/hook-forwarder.js';
import { runMcpServer } from './interfaces/rpc/index.js';

const USAGE = 'Usage: pipeline-observatory [serve|mcp|hook]';

/**
 * Starts the HTTP + WebSocket server and, when configured, the progress
 * watcher. In `mcp` mode every log line goes to stderr.
 */
async function serve(config: AppConfig, mcp: boolean): Promise<void> {
  const root = createLogger({ level: config.logLevel, stderr: mcp });
  const pipeline = createPipeline(config, root);

  const fastify = await buildApp({
    pipeline,
    log: root,
    websocket: true,
  });

  let watcher: ProgressWatcher | null = null;
  if (config.watch.file !== null) {
    watcher = new ProgressWatcher({
      file: config.watch.file,
      intervalMs: config.watch.intervalMs,
      store: pipeline.store,
      log: componentLogger(root, 'watcher'),
    });
  }

  fastify.addHook('onClose', async () => {
    watcher?.stop();
  });

  const shutdown = registerShutdown(fastify, root);

  await listenHttp(
    () => fastify.listen({ host: config.host, port: config.port }),
    root,
    !mcp,
  );

  if (watcher) await watcher.start();

  if (mcp) {
    // The client owns this process: when stdio closes, release the port.
    await runMcpServer(pipeline.store, componentLogger(root, 'mcp'), {
      onClose: () => shutdown('stdio closed'),
    });
  }
}

/** Closes Fastify (watcher, WebSocket clients, HTTP) and exits. */
function registerShutdown(fastify: FastifyInstance, log: Logger): (reason: string) => void {
  let closing = false;
  const shutdown = (reason: string) => {
    if (closing) return;
    closing = true;
    log.info({ reason }, 'Shutting down');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ err }, 'Shutdown failed');
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
  return shutdown;
}

/** Hook mode: forward stdin and exit 0 no matter what. */
async function hook(): Promise<void> {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (err: unknown) {
    process.stderr.write(`pipeline-observatory: ${err instanceof Error ? err.message : String(err)}\n`);
    return;
  }
  const log = componentLogger(createLogger({ level: config.logLevel, stderr: true }), 'hook');
  const raw = await readStdin();
  await forwardHook(raw, { url: config.serverUrl, timeoutMs: config.hookTimeoutMs, log });
}

async function main(argv: readonly string[]): Promise<void> {
  const command = argv[2] ?? 'serve';

  switch (command) {
    case 'serve':
      return serve(loadConfig(), false);
    case 'mcp':
      return serve(loadConfig(), true);
    case 'hook':
      await hook().catch((err: unknown) => {
        process.stderr.write(`pipeline-observatory: ${err instanceof Error ? err.message : String(err)}\n`);
      });
      process.exit(0);
      return;
    default:
      process.stderr.write(`${USAGE}\n`);
      process.exit(2);
  }
}

main(process.argv).catch((err: unknown) => {
  console.error('Fatal: failed to start server', err);
  process.exit(1);
});
