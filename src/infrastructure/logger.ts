import pino, { type Logger } from 'pino';
import type { LogLevel } from './config.js';

export type Component = 'store' | 'delivery' | 'watcher' | 'ws' | 'mcp' | 'hook';

export interface LoggerOptions {
  level: LogLevel;
  /** Route output to stderr; stdout then belongs to the MCP transport. */
  stderr?: boolean;
}

export function createLogger(options: LoggerOptions): Logger {
  const base = { name: 'pipeline-observatory' };
  return options.stderr
    ? pino({ ...base, level: options.level }, pino.destination(2))
    : pino({ ...base, level: options.level });
}

export function componentLogger(root: Logger, component: Component): Logger {
  return root.child({ component });
}
