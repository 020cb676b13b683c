import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import type {
  AgentStartEvent,
  AgentStatusCard,
  DelegationLink,
  EventDraft,
  InteractionEvent,
  PipelineEvent,
  PipelineSnapshot,
} from '../domain/index.js';
import { agentIdOf, matchesLabel } from '../domain/index.js';
import { eventDraftSchema, toValidationError, type ValidatedDraft } from './event-schema.js';
import {
  adoptPlaceholder,
  buildDelegationForest,
  cardKeyOf,
  deriveCard,
  deriveDelegation,
  projectCard,
  resolvePhaseAgent,
} from './derivation.js';

const DEFAULT_ORPHAN_GRACE_MS = 15 * 60 * 1000;
const DEFAULT_RECENT_EVENTS = 20;

export type AppendListener = (event: PipelineEvent) => void;

export interface EventStoreOptions {
  log: Logger;
  clock?: () => Date;
  generateId?: () => string;
  /** 0 disables the stale-agent projection. */
  orphanGraceMs?: number;
  recentEvents?: number;
}

/**
 * De-dup key: (session, subject, type, producer nonce or producer timestamp).
 * Drafts carrying neither token are never treated as retries.
 */
function dedupKeyOf(draft: ValidatedDraft): string | undefined {
  const token = draft.nonce ?? draft.timestamp;
  if (token === undefined) return undefined;
  const subject =
    draft.event_type === 'interaction'
      ? `${draft.payload.source}->${draft.payload.target}`
      : draft.agent_id ?? '';
  return [draft.session_id, subject, draft.event_type, token].join('\u0000');
}

function freeze<T extends PipelineEvent>(event: T): T {
  Object.freeze(event.payload);
  Object.freeze(event.labels);
  return Object.freeze(event);
}

/**
 * Single source of truth for the ordered event log and its derived views.
 *
 * `append`, `snapshot` and `eventsFor` are synchronous and perform no I/O,
 * so each runs to completion before any other producer, reader or delivery
 * loop gets the thread. That run-to-completion turn is the store's lock:
 * no caller can observe a partially applied append, and listeners are
 * notified inside the same turn, in commit order.
 *
 * Readers only ever receive frozen events and cloned derived state.
 */
export class EventStore {
  private readonly events: PipelineEvent[] = [];
  private readonly ids = new Set<string>();
  private readonly byDedupKey = new Map<string, string>();
  private readonly byAgent = new Map<string, PipelineEvent[]>();
  private readonly cards = new Map<string, AgentStatusCard>();
  private readonly links = new Map<string, DelegationLink>();
  private readonly participants = new Set<string>();
  private readonly timeline: InteractionEvent[] = [];
  private readonly listeners = new Set<AppendListener>();

  private readonly log: Logger;
  private readonly clock: () => Date;
  private readonly generateId: () => string;
  private readonly orphanGraceMs: number;
  private readonly recentEvents: number;

  private nextSeq = 1;

  constructor(options: EventStoreOptions) {
    this.log = options.log;
    this.clock = options.clock ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
    this.orphanGraceMs = options.orphanGraceMs ?? DEFAULT_ORPHAN_GRACE_MS;
    this.recentEvents = options.recentEvents ?? DEFAULT_RECENT_EVENTS;
  }

  get size(): number {
    return this.events.length;
  }

  get lastSeq(): number {
    return this.nextSeq - 1;
  }

  /**
   * Validates, de-duplicates and commits one event, then updates the
   * touched card and delegation link and notifies listeners.
   *
   * Returns the stored `event_id`; a retried draft returns the id of the
   * original without changing anything.
   *
   * @throws ValidationError when the draft is malformed. Nothing is stored.
   */
  append(draft: EventDraft): string {
    const parsed = eventDraftSchema.safeParse(draft);
    if (!parsed.success) {
      throw toValidationError(`Rejected ${String(draft.event_type)} event`, parsed.error);
    }
    const valid = parsed.data;

    if (valid.event_id !== undefined && this.ids.has(valid.event_id)) {
      this.log.debug({ event_id: valid.event_id }, 'Duplicate event_id ignored');
      return valid.event_id;
    }
    const dedupKey = dedupKeyOf(valid);
    const original = dedupKey === undefined ? undefined : this.byDedupKey.get(dedupKey);
    if (original !== undefined) {
      this.log.debug({ event_id: original, event_type: valid.event_type }, 'Duplicate delivery ignored');
      return original;
    }

    const event = freeze(this.materialize(valid));
    this.commit(event, dedupKey);

    this.log.debug(
      { event_id: event.event_id, event_type: event.event_type, seq: event.seq },
      'Event appended',
    );

    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err: unknown) {
        this.log.warn({ err, event_id: event.event_id }, 'Append listener failed');
      }
    }
    return event.event_id;
  }

  /** Consistent point-in-time copy of every derived view. */
  snapshot(): PipelineSnapshot {
    const now = this.clock();
    const agents = [...this.cards.values()].map((card) => projectCard(card, now, this.orphanGraceMs));
    const projected = new Map(agents.map((card) => [card.agent_id, card]));

    return {
      generated_at: now.toISOString(),
      event_count: this.events.length,
      last_seq: this.lastSeq,
      agents: structuredClone(agents),
      hierarchy: buildDelegationForest(this.links, this.participants, projected),
      timeline: [...this.timeline],
      recent_events: this.recentEvents > 0 ? this.events.slice(-this.recentEvents) : [],
    };
  }

  /**
   * Raw history of one agent, ordered by ingestion. The slice is copied
   * now; the returned iterable filters lazily and can be iterated again.
   *
   * `label` is `key=value` (exact) or `key` (presence).
   */
  eventsFor(agentId: string, label?: string): Iterable<PipelineEvent> {
    const slice = [...(this.byAgent.get(agentId) ?? [])];
    return {
      *[Symbol.iterator]() {
        for (const event of slice) {
          if (label === undefined || matchesLabel(event.labels, label)) yield event;
        }
      },
    };
  }

  hasAgent(agentId: string): boolean {
    return this.cards.has(agentId) || this.byAgent.has(agentId);
  }

  /** Registers a listener called synchronously for every committed event. */
  onAppend(listener: AppendListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /* ------------------------------------------------------------------ */
  /*  Private                                                           */
  /* ------------------------------------------------------------------ */

  private materialize(draft: ValidatedDraft): PipelineEvent {
    const base = {
      event_id: draft.event_id ?? this.generateId(),
      seq: this.nextSeq,
      timestamp: draft.timestamp === undefined
        ? this.clock().toISOString()
        : new Date(draft.timestamp).toISOString(),
      session_id: draft.session_id,
      labels: { ...draft.labels },
    };

    switch (draft.event_type) {
      case 'agent_start':
        return { ...base, event_type: 'agent_start', agent_id: draft.agent_id, agent_type: draft.agent_type, payload: { ...draft.payload } };
      case 'agent_stop':
        return { ...base, event_type: 'agent_stop', agent_id: draft.agent_id, agent_type: draft.agent_type, payload: { ...draft.payload } };
      case 'tool_use':
        return { ...base, event_type: 'tool_use', agent_id: draft.agent_id, agent_type: draft.agent_type, payload: { ...draft.payload } };
      case 'interaction':
        return { ...base, event_type: 'interaction', payload: { ...draft.payload } };
      case 'phase_update':
        return {
          ...base,
          event_type: 'phase_update',
          agent_id: resolvePhaseAgent(this.cards, draft.agent_id),
          agent_type: draft.agent_type,
          payload: { ...draft.payload },
        };
    }
  }

  private commit(event: PipelineEvent, dedupKey: string | undefined): void {
    this.nextSeq += 1;
    this.events.push(event);
    this.ids.add(event.event_id);
    if (dedupKey !== undefined) this.byDedupKey.set(dedupKey, event.event_id);

    const adopted = event.event_type === 'agent_start' ? this.takePlaceholder(event) : undefined;

    const agentId = agentIdOf(event);
    if (agentId !== undefined) {
      const history = this.byAgent.get(agentId);
      if (history) history.push(event);
      else this.byAgent.set(agentId, [event]);
    }

    const link = deriveDelegation(event);
    if (event.event_type === 'interaction') {
      this.timeline.push(event);
      if (link !== undefined) {
        this.participants.add(event.payload.source);
        this.participants.add(event.payload.target);
        this.links.set(event.payload.target, link);
      }
    }

    const key = cardKeyOf(event);
    if (key !== undefined) {
      const card = deriveCard(adopted ?? this.cards.get(key), event, this.links.get(key));
      if (card !== undefined) {
        this.cards.set(key, card);
        this.participants.add(key);
      }
    }
  }

  /**
   * A phase line can arrive before its agent's start hook, leaving a
   * placeholder keyed by the agent type. When an agent of that type starts
   * under its own id, the placeholder and its history move over to it.
   */
  private takePlaceholder(event: AgentStartEvent): AgentStatusCard | undefined {
    const typeKey = event.agent_type;
    if (typeKey === event.agent_id || this.cards.has(event.agent_id)) return undefined;
    const placeholder = this.cards.get(typeKey);
    if (placeholder === undefined || !placeholder.placeholder) return undefined;

    this.cards.delete(typeKey);
    const moved = this.byAgent.get(typeKey) ?? [];
    this.byAgent.delete(typeKey);
    const own = this.byAgent.get(event.agent_id) ?? [];
    this.byAgent.set(event.agent_id, [...moved, ...own].sort((a, b) => a.seq - b.seq));
    if (!this.isLinked(typeKey)) this.participants.delete(typeKey);

    this.log.debug({ placeholder: typeKey, agent_id: event.agent_id }, 'Placeholder adopted by started agent');
    return adoptPlaceholder(placeholder, event, this.links.get(event.agent_id));
  }

  private isLinked(id: string): boolean {
    if (this.links.has(id)) return true;
    for (const link of this.links.values()) {
      if (link.parent === id) return true;
    }
    return false;
  }
}
