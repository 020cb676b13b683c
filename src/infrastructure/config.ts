import { join } from 'node:path';
import { z } from 'zod';
import { ConfigError } from '../domain/index.js';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const intFrom = (fallback: number, min: number) =>
  z.coerce.number().int().min(min).default(fallback);

/**
 * Environment variables understood by the server.
 * Empty strings count as unset.
 */
const envSchema = z.object({
  HOST: z.string().min(1).default('127.0.0.1'),
  PORT: z.coerce.number().int().min(0).max(65_535).default(8765),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  PIPELINE_WATCH_DIR: z.string().min(1).optional(),
  PIPELINE_WATCH_FILE: z.string().min(1).default('PROGRESS.md'),
  PIPELINE_POLL_INTERVAL_MS: intFrom(1000, 10),
  PIPELINE_SUBSCRIBER_CAPACITY: intFrom(256, 1),
  PIPELINE_ORPHAN_GRACE_MS: intFrom(15 * 60 * 1000, 0),
  PIPELINE_RECENT_EVENTS: intFrom(20, 0),
  PIPELINE_HOOK_TIMEOUT_MS: intFrom(5000, 1),
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface AppConfig {
  host: string;
  port: number;
  logLevel: LogLevel;
  /** Base URL the `hook` command forwards to. */
  serverUrl: string;
  watch: {
    /** Absolute or relative path of the progress log; null when disabled. */
    file: string | null;
    fileName: string;
    intervalMs: number;
  };
  subscriberCapacity: number;
  orphanGraceMs: number;
  recentEvents: number;
  hookTimeoutMs: number;
}

/**
 * Parses configuration from the environment.
 *
 * @throws ConfigError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    );
  }

  const e = parsed.data;
  // The hook command always talks to the local listener.
  const connectHost = e.HOST === '0.0.0.0' || e.HOST === '::' ? '127.0.0.1' : e.HOST;

  return {
    host: e.HOST,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    serverUrl: `http://${connectHost.includes(':') ? `[${connectHost}]` : connectHost}:${e.PORT}`,
    watch: {
      file: e.PIPELINE_WATCH_DIR === undefined ? null : join(e.PIPELINE_WATCH_DIR, e.PIPELINE_WATCH_FILE),
      fileName: e.PIPELINE_WATCH_FILE,
      intervalMs: e.PIPELINE_POLL_INTERVAL_MS,
    },
    subscriberCapacity: e.PIPELINE_SUBSCRIBER_CAPACITY,
    orphanGraceMs: e.PIPELINE_ORPHAN_GRACE_MS,
    recentEvents: e.PIPELINE_RECENT_EVENTS,
    hookTimeoutMs: e.PIPELINE_HOOK_TIMEOUT_MS,
  };
}
