export { createMcpServer, runMcpServer, SERVER_INFO } from './mcp-server.js';
export type { RunMcpOptions } from './mcp-server.js';
export { createToolHandlers, textContent, errorContent, toolSchemas } from './tools.js';
export type { ToolHandlers, ToolResponse } from './tools.js';
