import { createHash } from 'node:crypto';
import type { Logger } from 'pino';

export interface ForwardOptions {
  /** Base URL of the running server, e.g. `http://127.0.0.1:8765`. */
  url: string;
  timeoutMs: number;
  log: Logger;
}

export type ForwardResult =
  | { status: 'sent'; httpStatus: number }
  | { status: 'skipped'; reason: string }
  | { status: 'failed'; reason: string };

/**
 * Stamps a content-derived nonce on an object payload that has none, so a
 * hook that fires twice with the same body is stored once.
 */
export function withNonce(raw: string): string | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return null;
  if ('nonce' in parsed) return raw;
  const nonce = createHash('sha256').update(raw).digest('hex').slice(0, 32);
  return JSON.stringify({ ...parsed, nonce });
}

/**
 * Forwards one hook payload to `POST /api/hooks`.
 *
 * Never throws: the caller is a lifecycle hook and must exit 0 whatever
 * happens to the observatory.
 */
export async function forwardHook(raw: string, options: ForwardOptions): Promise<ForwardResult> {
  const { log } = options;

  if (raw.trim() === '') {
    log.debug('Empty hook payload, nothing to forward');
    return { status: 'skipped', reason: 'empty payload' };
  }

  const body = withNonce(raw);
  if (body === null) {
    log.warn('Hook payload is not a JSON object, skipping');
    return { status: 'skipped', reason: 'not a JSON object' };
  }

  const endpoint = new URL('/api/hooks', options.url).toString();
  try {
    const response = await fetch(endpoint, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body,
      signal: AbortSignal.timeout(options.timeoutMs),
    });

    if (response.ok) {
      log.debug({ status: response.status }, 'Hook forwarded');
    } else {
      log.warn({ status: response.status, endpoint }, 'Hook receiver returned non-OK status');
    }
    return { status: 'sent', httpStatus: response.status };
  } catch (err: unknown) {
    log.warn({ err, endpoint }, 'Failed to forward hook');
    const reason = err instanceof Error ? err.message : String(err);
    return { status: 'failed', reason };
  }
}

export async function readStdin(stream: NodeJS.ReadableStream = process.stdin): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf-8');
}
