import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Duplex } from 'node:stream';
import type { IncomingMessage } from 'node:http';
import { EventStore } from '../../src/application/event-store.js';
import { LiveDelivery } from '../../src/application/live-delivery.js';
import {
  OPCODE,
  WebSocketServer,
  encodeControlFrame,
  encodeTextFrame,
  tryParseFrame,
} from '../../src/interfaces/ws/websocket-server.js';
import { fakeLogger, makeStore } from '../helpers.js';

/** Client → server frames are masked. */
function maskedFrame(opcode: number, payload: Buffer, mask = Buffer.from([1, 2, 3, 4])): Buffer {
  const header = Buffer.from([0x80 | opcode, 0x80 | payload.length]);
  const body = Buffer.alloc(payload.length);
  for (let i = 0; i < payload.length; i++) {
    body.writeUInt8(payload.readUInt8(i) ^ mask.readUInt8(i % 4), i);
  }
  return Buffer.concat([header, mask, body]);
}

function fakeSocket() {
  const written: Buffer[] = [];
  const socket = new Duplex({
    read() {},
    write(chunk: Buffer, _encoding, callback) {
      written.push(chunk);
      callback();
    },
  });
  return { socket, written };
}

function textFrames(written: Buffer[]): unknown[] {
  return written.flatMap((chunk) => {
    const frame = tryParseFrame(chunk);
    return frame && frame.opcode === OPCODE.TEXT ? [JSON.parse(frame.payload.toString('utf-8'))] : [];
  });
}

// ─── frame codec ───

describe('frame codec', () => {
  it('round-trips a short text frame', () => {
    const frame = tryParseFrame(encodeTextFrame('{"a":1}'));
    expect(frame?.opcode).toBe(OPCODE.TEXT);
    expect(frame?.payload.toString()).toBe('{"a":1}');
  });

  it('uses the 16-bit and 64-bit length forms', () => {
    const medium = encodeTextFrame('x'.repeat(300));
    expect(medium.readUInt8(1)).toBe(126);
    expect(medium.readUInt16BE(2)).toBe(300);

    const large = encodeTextFrame('x'.repeat(70_000));
    expect(large.readUInt8(1)).toBe(127);
    expect(large.readBigUInt64BE(2)).toBe(70_000n);
    expect(large.length).toBe(10 + 70_000);
  });

  it('unmasks client frames', () => {
    const frame = tryParseFrame(maskedFrame(OPCODE.PING, Buffer.from('hi')));
    expect(frame).toEqual({ opcode: OPCODE.PING, payload: Buffer.from('hi'), nextOffset: 2 + 4 + 2 });
  });

  it('waits for more bytes on a partial frame', () => {
    const full = maskedFrame(OPCODE.TEXT, Buffer.from('hello'));
    expect(tryParseFrame(full.subarray(0, 5))).toBeNull();
    expect(tryParseFrame(full.subarray(0, 1))).toBeNull();
  });

  it('refuses oversized inbound payloads', () => {
    const header = Buffer.alloc(10);
    header.writeUInt8(0x81, 0);
    header.writeUInt8(127, 1);
    header.writeBigUInt64BE(10_000_000n, 2);
    expect(() => tryParseFrame(header)).toThrow('exceeds');
  });

  it('drops an oversized control payload', () => {
    expect(encodeControlFrame(OPCODE.PONG, Buffer.alloc(200))).toEqual(Buffer.from([0x8a, 0x00]));
  });
});

// ─── server ───

describe('WebSocketServer', () => {
  let store: EventStore;
  let delivery: LiveDelivery;
  let server: WebSocketServer;

  beforeEach(() => {
    const log = fakeLogger();
    ({ store } = makeStore({ log }));
    delivery = new LiveDelivery(store, { log, capacity: 8 });
    server = new WebSocketServer(delivery, store, log);
  });

  afterEach(() => {
    server.close();
  });

  it('greets a client, then streams committed events', async () => {
    store.append({ event_type: 'agent_start', session_id: 's1', agent_id: 'a1', agent_type: 'coder', payload: {} });

    const { socket, written } = fakeSocket();
    server.accept(socket);

    expect(textFrames(written)).toEqual([{ type: 'hello', subscription_id: expect.any(Number), last_seq: 1 }]);
    expect(delivery.subscriberCount).toBe(1);

    store.append({ event_type: 'agent_stop', session_id: 's1', agent_id: 'a1', payload: { outcome: 'completed' } });

    await vi.waitFor(() => expect(textFrames(written)).toHaveLength(2));
    expect(textFrames(written)[1]).toMatchObject({
      type: 'event',
      event: { seq: 2, event_type: 'agent_stop', agent_id: 'a1' },
    });
  });

  it('answers a ping with a pong', () => {
    const { socket, written } = fakeSocket();
    server.accept(socket);

    socket.push(maskedFrame(OPCODE.PING, Buffer.from('p')));

    return vi.waitFor(() => {
      const pong = written.map((chunk) => tryParseFrame(chunk)).find((f) => f?.opcode === OPCODE.PONG);
      expect(pong?.payload.toString()).toBe('p');
    });
  });

  it('unsubscribes when the client sends a close frame', async () => {
    const { socket } = fakeSocket();
    server.accept(socket);
    expect(server.clientCount).toBe(1);

    socket.push(maskedFrame(OPCODE.CLOSE, Buffer.alloc(0)));

    await vi.waitFor(() => expect(server.clientCount).toBe(0));
    expect(delivery.subscriberCount).toBe(0);
    expect(socket.destroyed).toBe(true);
  });

  it('unsubscribes when the socket closes', async () => {
    const { socket } = fakeSocket();
    server.accept(socket);
    socket.destroy();

    await vi.waitFor(() => expect(delivery.subscriberCount).toBe(0));
  });

  it('rejects upgrades on other paths', () => {
    const { socket } = fakeSocket();
    const req = { url: '/other', headers: { 'sec-websocket-key': 'dGhlIHNhbXBsZSBub25jZQ==' } };
    server.handleUpgrade(req as unknown as IncomingMessage, socket, Buffer.alloc(0));
    expect(socket.destroyed).toBe(true);
    expect(server.clientCount).toBe(0);
  });

  it('completes the handshake on /ws', () => {
    const { socket, written } = fakeSocket();
    const req = { url: '/ws', headers: { 'sec-websocket-key': 'dGhlIHNhbXBsZSBub25jZQ==' } };
    server.handleUpgrade(req as unknown as IncomingMessage, socket, Buffer.alloc(0));

    expect(written[0]?.toString()).toContain('Sec-WebSocket-Accept: s3pPLMBiTxaQ9kYGzzhZRbK+xOo=');
    expect(server.clientCount).toBe(1);
  });
});
