import { describe, it, expect, vi } from 'vitest';
import { listenHttp } from '../src/app.js';
import { fakeLogger } from './helpers.js';

function addressInUse(): Error {
  return Object.assign(new Error('listen EADDRINUSE: address already in use 127.0.0.1:8765'), { code: 'EADDRINUSE' });
}

describe('listenHttp', () => {
  it('reports true once the server is bound', async () => {
    const listen = vi.fn().mockResolvedValue('http://127.0.0.1:8765');
    expect(await listenHttp(listen, fakeLogger(), true)).toBe(true);
    expect(listen).toHaveBeenCalledTimes(1);
  });

  it('rethrows a bind failure when HTTP is required', async () => {
    const listen = vi.fn().mockRejectedValue(addressInUse());
    await expect(listenHttp(listen, fakeLogger(), true)).rejects.toThrow('EADDRINUSE');
  });

  it('logs and carries on without HTTP in MCP mode', async () => {
    const log = fakeLogger();
    const err = addressInUse();

    expect(await listenHttp(vi.fn().mockRejectedValue(err), log, false)).toBe(false);
    expect(log.warn).toHaveBeenCalledWith({ err }, 'HTTP server unavailable, continuing with MCP over stdio only');
  });
});
