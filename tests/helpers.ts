import { vi } from 'vitest';
import { EventStore, type EventStoreOptions } from '../src/application/event-store.js';

export function fakeLogger() {
  const log = {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: vi.fn(),
  };
  log.child.mockReturnValue(log);
  return log as unknown as import('pino').Logger;
}

/** Manually advanced clock, starting at 2026-03-01T10:00:00Z. */
export function manualClock(start = '2026-03-01T10:00:00.000Z') {
  let now = Date.parse(start);
  return {
    clock: () => new Date(now),
    advance(ms: number) {
      now += ms;
    },
  };
}

export function sequentialIds(prefix = 'evt') {
  let n = 0;
  return () => `${prefix}-${++n}`;
}

export function makeStore(overrides: Partial<EventStoreOptions> = {}) {
  const time = manualClock();
  const log = overrides.log ?? fakeLogger();
  const store = new EventStore({
    clock: time.clock,
    generateId: sequentialIds(),
    ...overrides,
    log,
  });
  return { store, log, time };
}
