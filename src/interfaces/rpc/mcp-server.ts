import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import type { Logger } from 'pino';
import type { EventStore } from '../../application/event-store.js';
import { createToolHandlers, toolSchemas } from './tools.js';

export const SERVER_INFO = { name: 'pipeline-observatory', version: '0.1.0' } as const;

export function createMcpServer(store: EventStore, log: Logger): McpServer {
  const server = new McpServer(SERVER_INFO);
  const handlers = createToolHandlers(store, log);

  server.registerTool('get_pipeline_status', toolSchemas.get_pipeline_status, handlers.get_pipeline_status);
  server.registerTool('get_agent_events', toolSchemas.get_agent_events, handlers.get_agent_events);
  server.registerTool('report_interaction', toolSchemas.report_interaction, handlers.report_interaction);

  return server;
}

export interface RunMcpOptions {
  /** Defaults to stdio. */
  transport?: Transport;
  /** Called once the client side of the transport has gone away. */
  onClose?: () => void;
}

/** Serves the tools over stdio. stdout belongs to the protocol from here on. */
export async function runMcpServer(store: EventStore, log: Logger, options: RunMcpOptions = {}): Promise<McpServer> {
  const server = createMcpServer(store, log);
  server.server.onclose = () => {
    log.info('MCP transport closed');
    options.onClose?.();
  };
  await server.connect(options.transport ?? new StdioServerTransport());
  log.info('MCP server connected (stdio)');
  return server;
}
