import type { Logger } from 'pino';
import type { PipelineEvent } from '../domain/index.js';
import type { EventStore } from './event-store.js';

const DEFAULT_CAPACITY = 256;

/** Synthetic marker standing in for events dropped under backpressure. */
export interface GapMarker {
  kind: 'gap';
  dropped: number;
  first_dropped_seq: number;
  last_dropped_seq: number;
}

export type DeliveryItem = { kind: 'event'; event: PipelineEvent } | GapMarker;

let nextSubscriptionId = 1;

/**
 * Per-connection bounded queue, drained by exactly one delivery loop.
 *
 * `offer()` never blocks: when `capacity` events are already buffered the
 * oldest one is dropped and folded into a single gap marker at the head of
 * the queue. The marker itself does not count toward capacity.
 */
export class Subscription implements AsyncIterable<DeliveryItem> {
  readonly id: number;
  readonly capacity: number;

  private readonly queue: DeliveryItem[] = [];
  private waiter: ((result: IteratorResult<DeliveryItem>) => void) | null = null;
  private active = true;

  constructor(capacity: number) {
    this.id = nextSubscriptionId++;
    this.capacity = Math.max(1, capacity);
  }

  get isActive(): boolean {
    return this.active;
  }

  /** Buffered items, gap marker included. */
  get pending(): number {
    return this.queue.length;
  }

  offer(event: PipelineEvent): void {
    if (!this.active) return;

    const item: DeliveryItem = { kind: 'event', event };
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ value: item, done: false });
      return;
    }

    const head = this.queue[0];
    const buffered = head?.kind === 'gap' ? this.queue.length - 1 : this.queue.length;
    if (buffered >= this.capacity) this.dropOldest();
    this.queue.push(item);
  }

  /** Takes everything buffered without waiting. */
  drain(): DeliveryItem[] {
    return this.queue.splice(0, this.queue.length);
  }

  next(): Promise<IteratorResult<DeliveryItem>> {
    const item = this.queue.shift();
    if (item !== undefined) return Promise.resolve({ value: item, done: false });
    if (!this.active) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  /** Ends iteration; buffered items are discarded. */
  close(): void {
    if (!this.active) return;
    this.active = false;
    this.queue.length = 0;
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ value: undefined, done: true });
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<DeliveryItem> {
    return {
      next: () => this.next(),
      return: () => {
        this.close();
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }

  private dropOldest(): void {
    const head = this.queue[0];
    if (head?.kind === 'gap') {
      const oldest = this.queue[1];
      if (oldest?.kind !== 'event') return;
      this.queue.splice(1, 1);
      head.dropped += 1;
      head.last_dropped_seq = oldest.event.seq;
      return;
    }
    if (head?.kind !== 'event') return;
    this.queue[0] = {
      kind: 'gap',
      dropped: 1,
      first_dropped_seq: head.event.seq,
      last_dropped_seq: head.event.seq,
    };
  }
}

export interface LiveDeliveryOptions {
  log: Logger;
  capacity?: number;
}

/**
 * Fans every committed event out to all active subscriptions.
 *
 * Registered as an append listener, so fan-out happens inside the store's
 * turn and every subscription sees the commit order. Only enqueueing
 * happens here; socket writes belong to each subscription's drain loop.
 */
export class LiveDelivery {
  private readonly subscriptions = new Set<Subscription>();
  private readonly log: Logger;
  private readonly capacity: number;
  private readonly detach: () => void;

  constructor(store: EventStore, options: LiveDeliveryOptions) {
    this.log = options.log;
    this.capacity = options.capacity ?? DEFAULT_CAPACITY;
    this.detach = store.onAppend((event) => this.fanOut(event));
  }

  get subscriberCount(): number {
    return this.subscriptions.size;
  }

  subscribe(): Subscription {
    const subscription = new Subscription(this.capacity);
    this.subscriptions.add(subscription);
    this.log.debug(
      { subscriptionId: subscription.id, subscriberCount: this.subscriptions.size },
      'Subscription opened',
    );
    return subscription;
  }

  /** Idempotent. */
  unsubscribe(subscription: Subscription): void {
    subscription.close();
    if (!this.subscriptions.delete(subscription)) return;
    this.log.debug(
      { subscriptionId: subscription.id, subscriberCount: this.subscriptions.size },
      'Subscription closed',
    );
  }

  close(): void {
    this.detach();
    for (const subscription of this.subscriptions) subscription.close();
    this.subscriptions.clear();
  }

  private fanOut(event: PipelineEvent): void {
    for (const subscription of this.subscriptions) {
      subscription.offer(event);
    }
  }
}
