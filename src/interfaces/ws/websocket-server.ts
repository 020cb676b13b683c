import type { IncomingMessage, Server as HttpServer } from 'node:http';
import { Socket } from 'node:net';
import type { Duplex } from 'node:stream';
import { createHash } from 'node:crypto';
import type { Logger } from 'pino';
import type { EventStore } from '../../application/event-store.js';
import type { DeliveryItem, LiveDelivery, Subscription } from '../../application/live-delivery.js';
import type { PipelineEvent } from '../../domain/index.js';
import { TransportError } from '../../domain/index.js';

/**
 * Minimal WebSocket server using raw Node.js HTTP upgrade.
 *
 * Implements RFC 6455 for:
 * - accepting dashboard clients on /ws
 * - one live subscription and drain loop per client
 * - server heartbeat PING → client PONG (alive tracking)
 * - incoming PING → respond PONG immediately
 * - incoming CLOSE → echo close + graceful teardown
 *
 * Browser-to-server frames are always masked per RFC 6455 §5.3.
 * Multiple frames per TCP chunk are consumed in a loop.
 */

const WS_GUID = '258EAFA5-E914-47DA-95CA-C5AB0DC85B11';
const WS_PATH = '/ws';
const DEFAULT_HEARTBEAT_MS = 30_000;
/** Dashboard clients only send control frames; anything bigger is hostile. */
const MAX_INBOUND_PAYLOAD = 64 * 1024;

export const OPCODE = {
  TEXT: 0x01,
  CLOSE: 0x08,
  PING: 0x09,
  PONG: 0x0a,
} as const;

export type ServerFrame =
  | { type: 'hello'; subscription_id: number; last_seq: number }
  | { type: 'event'; event: PipelineEvent }
  | { type: 'gap'; dropped: number; first_dropped_seq: number; last_dropped_seq: number };

let nextClientId = 1;

interface WsClient {
  id: number;
  socket: Duplex;
  subscription: Subscription;
  alive: boolean;
  closed: boolean;
  buffer: Buffer;
}

export interface WebSocketServerOptions {
  heartbeatMs?: number;
}

/* -------------------------------------------------------------------- */
/*  Frame codec                                                         */
/* -------------------------------------------------------------------- */

export interface ParsedFrame {
  opcode: number;
  payload: Buffer;
  nextOffset: number;
}

/**
 * Parse ONE WebSocket frame from the front of `buf`.
 * Returns null when more bytes are needed.
 * Throws on payloads above the inbound limit.
 */
export function tryParseFrame(buf: Buffer): ParsedFrame | null {
  if (buf.length < 2) return null;

  const b0 = buf.readUInt8(0);
  const b1 = buf.readUInt8(1);

  const opcode = b0 & 0x0f;
  const masked = (b1 & 0x80) === 0x80;

  let payloadLen = b1 & 0x7f;
  let offset = 2;

  if (payloadLen === 126) {
    if (buf.length < offset + 2) return null;
    payloadLen = buf.readUInt16BE(offset);
    offset += 2;
  } else if (payloadLen === 127) {
    if (buf.length < offset + 8) return null;
    const big = buf.readBigUInt64BE(offset);
    if (big > BigInt(MAX_INBOUND_PAYLOAD)) {
      throw new Error(`WebSocket payload of ${big} bytes exceeds ${MAX_INBOUND_PAYLOAD}`);
    }
    payloadLen = Number(big);
    offset += 8;
  }

  if (payloadLen > MAX_INBOUND_PAYLOAD) {
    throw new Error(`WebSocket payload of ${payloadLen} bytes exceeds ${MAX_INBOUND_PAYLOAD}`);
  }

  const maskLen = masked ? 4 : 0;
  const totalNeeded = offset + maskLen + payloadLen;
  if (buf.length < totalNeeded) return null;

  let maskingKey: Buffer | null = null;
  if (masked) {
    maskingKey = buf.subarray(offset, offset + 4);
    offset += 4;
  }

  let payload = buf.subarray(offset, offset + payloadLen);

  if (maskingKey) {
    const unmasked = Buffer.allocUnsafe(payload.length);
    for (let i = 0; i < payload.length; i++) {
      unmasked.writeUInt8(payload.readUInt8(i) ^ maskingKey.readUInt8(i % 4), i);
    }
    payload = unmasked;
  }

  return { opcode, payload, nextOffset: offset + payloadLen };
}

/** Server → client control frame (unmasked). */
export function encodeControlFrame(opcode: number, payload: Buffer = Buffer.alloc(0)): Buffer {
  // RFC 6455 §5.5: control frames MUST have payload ≤ 125
  const body = payload.length > 125 ? Buffer.alloc(0) : payload;
  const header = Buffer.alloc(2);
  header.writeUInt8(0x80 | opcode, 0); // FIN + opcode
  header.writeUInt8(body.length, 1);
  return Buffer.concat([header, body]);
}

/** Server → client text frame (unmasked). */
export function encodeTextFrame(data: string): Buffer {
  const payload = Buffer.from(data, 'utf-8');
  const len = payload.length;

  let header: Buffer;
  if (len < 126) {
    header = Buffer.alloc(2);
    header.writeUInt8(len, 1);
  } else if (len <= 0xffff) {
    header = Buffer.alloc(4);
    header.writeUInt8(126, 1);
    header.writeUInt16BE(len, 2);
  } else {
    // Snapshots of long sessions can exceed 64 KiB.
    header = Buffer.alloc(10);
    header.writeUInt8(127, 1);
    header.writeBigUInt64BE(BigInt(len), 2);
  }
  header.writeUInt8(0x80 | OPCODE.TEXT, 0); // FIN + TEXT

  return Buffer.concat([header, payload]);
}

export function toServerFrame(item: DeliveryItem): ServerFrame {
  if (item.kind === 'event') return { type: 'event', event: item.event };
  return {
    type: 'gap',
    dropped: item.dropped,
    first_dropped_seq: item.first_dropped_seq,
    last_dropped_seq: item.last_dropped_seq,
  };
}

/* -------------------------------------------------------------------- */
/*  Server                                                              */
/* -------------------------------------------------------------------- */

export class WebSocketServer {
  private clients: Set<WsClient> = new Set();
  private readonly delivery: LiveDelivery;
  private readonly store: EventStore;
  private readonly log: Logger;
  private readonly heartbeatMs: number;
  private pingInterval: ReturnType<typeof setInterval> | null = null;

  constructor(delivery: LiveDelivery, store: EventStore, log: Logger, options: WebSocketServerOptions = {}) {
    this.delivery = delivery;
    this.store = store;
    this.log = log;
    this.heartbeatMs = options.heartbeatMs ?? DEFAULT_HEARTBEAT_MS;
  }

  /* ------------------------------------------------------------------ */
  /*  Attach to HTTP server                                             */
  /* ------------------------------------------------------------------ */

  attach(server: HttpServer): void {
    server.on('upgrade', (req: IncomingMessage, socket: Duplex, head: Buffer) => {
      this.handleUpgrade(req, socket, head);
    });
    this.startHeartbeat();
    this.log.info({ path: WS_PATH }, 'WebSocket server attached');
  }

  handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer): void {
    const path = (req.url ?? '').split('?')[0];
    if (path !== WS_PATH) {
      socket.destroy();
      return;
    }

    const key = req.headers['sec-websocket-key'];
    if (!key || Array.isArray(key)) {
      socket.destroy();
      return;
    }

    const accept = createHash('sha1')
      .update(key + WS_GUID)
      .digest('base64');

    socket.write(
      'HTTP/1.1 101 Switching Protocols\r\n' +
        'Upgrade: websocket\r\n' +
        'Connection: Upgrade\r\n' +
        `Sec-WebSocket-Accept: ${accept}\r\n` +
        '\r\n',
    );

    if (socket instanceof Socket) {
      // The HTTP parser ends the readable side right after the upgrade;
      // without half-open the socket would close itself within a tick.
      socket.allowHalfOpen = true;
      socket.setTimeout(0);
      socket.setNoDelay(true);
      socket.setKeepAlive(true, 30_000);
    }

    this.accept(socket, head);
  }

  /**
   * Registers an upgraded connection: one subscription, a hello frame,
   * then the drain loop.
   */
  accept(socket: Duplex, head: Buffer = Buffer.alloc(0)): void {
    const subscription = this.delivery.subscribe();
    const client: WsClient = {
      id: nextClientId++,
      socket,
      subscription,
      alive: true,
      closed: false,
      buffer: head.length > 0 ? Buffer.from(head) : Buffer.alloc(0),
    };

    this.clients.add(client);
    this.log.info(
      { clientId: client.id, subscriptionId: subscription.id, clientCount: this.clients.size },
      'WebSocket upgrade accepted',
    );

    const hello: ServerFrame = {
      type: 'hello',
      subscription_id: subscription.id,
      last_seq: this.store.lastSeq,
    };
    this.safeWrite(client, encodeTextFrame(JSON.stringify(hello)));

    socket.on('data', (chunk: Buffer) => this.onData(client, chunk));

    socket.on('end', () => {
      // Readable EOF only; see allowHalfOpen above.
      this.log.debug({ clientId: client.id }, 'Socket end event (readable EOF, ignored)');
    });

    socket.on('close', () => {
      this.gracefulClose(client, 'close');
    });

    socket.on('error', (err: Error) => {
      if (!client.closed) {
        this.log.debug({ clientId: client.id, err }, 'Socket error event');
      }
      this.gracefulClose(client, 'error');
    });

    this.pump(client).catch((err: unknown) => {
      this.log.warn({ clientId: client.id, err }, 'Delivery loop failed');
      this.gracefulClose(client, 'write_error');
    });

    socket.resume();
  }

  /* ------------------------------------------------------------------ */
  /*  Public helpers                                                     */
  /* ------------------------------------------------------------------ */

  get clientCount(): number {
    return this.clients.size;
  }

  close(): void {
    if (this.pingInterval) {
      clearInterval(this.pingInterval);
      this.pingInterval = null;
    }
    const goingAway = Buffer.alloc(2);
    goingAway.writeUInt16BE(1001, 0);
    for (const client of this.clients) {
      this.safeWrite(client, encodeControlFrame(OPCODE.CLOSE, goingAway));
      this.gracefulClose(client, 'server_shutdown');
    }
    this.clients.clear();
  }

  /* ------------------------------------------------------------------ */
  /*  Private - delivery                                                */
  /* ------------------------------------------------------------------ */

  /**
   * Drain loop: one frame per queued item, each awaited until the socket
   * accepts it, so a slow client backs up its own queue and nothing else.
   */
  private async pump(client: WsClient): Promise<void> {
    for await (const item of client.subscription) {
      if (client.closed) break;
      await this.writeFrame(client, encodeTextFrame(JSON.stringify(toServerFrame(item))));
    }
  }

  private writeFrame(client: WsClient, frame: Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
      if (client.closed || client.socket.destroyed) {
        resolve();
        return;
      }
      client.socket.write(frame, (err) => {
        if (err) reject(new TransportError(`ws#${client.id}`, 'Socket write failed', { cause: err }));
        else resolve();
      });
    });
  }

  /* ------------------------------------------------------------------ */
  /*  Private - inbound frames                                          */
  /* ------------------------------------------------------------------ */

  private onData(client: WsClient, chunk: Buffer): void {
    if (client.closed) return;

    client.buffer = Buffer.concat([client.buffer, chunk]);

    // consume as many complete frames as possible
    while (client.buffer.length > 0) {
      let frame: ParsedFrame | null;
      try {
        frame = tryParseFrame(client.buffer);
      } catch (err: unknown) {
        this.log.warn({ clientId: client.id, err }, 'WebSocket frame parse error, closing client');
        this.gracefulClose(client, 'frame_parse_error');
        return;
      }

      if (!frame) break; // need more bytes

      client.buffer = client.buffer.subarray(frame.nextOffset);
      client.alive = true; // any valid frame resets heartbeat

      if (frame.opcode === OPCODE.PONG) {
        this.log.debug({ clientId: client.id }, 'Pong received');
        continue;
      }

      if (frame.opcode === OPCODE.PING) {
        this.safeWrite(client, encodeControlFrame(OPCODE.PONG, frame.payload));
        continue;
      }

      if (frame.opcode === OPCODE.CLOSE) {
        this.log.debug({ clientId: client.id }, 'Close frame received from client');
        this.safeWrite(client, encodeControlFrame(OPCODE.CLOSE, frame.payload));
        this.gracefulClose(client, 'close_frame');
        return;
      }

      // TEXT / BINARY / CONTINUATION: the stream is one-way
    }
  }

  /* ------------------------------------------------------------------ */
  /*  Private - lifecycle                                               */
  /* ------------------------------------------------------------------ */

  private startHeartbeat(): void {
    if (this.pingInterval) return;
    // PING every interval, drop clients that did not answer the previous one
    this.pingInterval = setInterval(() => {
      for (const client of this.clients) {
        if (!client.alive) {
          this.log.debug({ clientId: client.id }, 'Heartbeat timeout, removing client');
          this.gracefulClose(client, 'heartbeat_timeout');
          continue;
        }
        client.alive = false;
        this.safeWrite(client, encodeControlFrame(OPCODE.PING));
      }
    }, this.heartbeatMs);
    this.pingInterval.unref();
  }

  /**
   * Idempotent teardown. Ends the client's subscription, which in turn
   * ends its drain loop. `reason` is logged so operators can see why a
   * client dropped.
   */
  private gracefulClose(client: WsClient, reason: string): void {
    if (client.closed) return;
    client.closed = true;
    this.clients.delete(client);
    this.delivery.unsubscribe(client.subscription);

    if (!client.socket.destroyed) {
      client.socket.destroy();
    }

    this.log.info(
      { clientId: client.id, reason, clientCount: this.clients.size },
      'WebSocket client disconnected',
    );
  }

  /**
   * Write to socket with error guard. Returns true on success.
   */
  private safeWrite(client: WsClient, data: Buffer): boolean {
    if (client.closed || client.socket.destroyed) return false;
    try {
      client.socket.write(data);
      return true;
    } catch (err: unknown) {
      this.log.debug({ clientId: client.id, err }, 'Socket write threw');
      this.gracefulClose(client, 'write_error');
      return false;
    }
  }
}
