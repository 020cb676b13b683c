/**
 * Core domain types for the pipeline event model.
 *
 * These types define the canonical shape of an event as it flows
 * through the store. They carry no framework dependencies.
 */

export const EVENT_TYPES = [
  'agent_start',
  'agent_stop',
  'tool_use',
  'interaction',
  'phase_update',
] as const;

export type EventType = (typeof EVENT_TYPES)[number];

/** Closed set of interaction classifications accepted from participants. */
export const INTERACTION_TYPES = [
  'query',
  'delegation',
  'result',
  'decision',
  'response',
] as const;

export type InteractionType = (typeof INTERACTION_TYPES)[number];

export type StopOutcome = 'completed' | 'failed';

/** `#tag` becomes `{ tag: '' }`, `#key=value` becomes `{ key: 'value' }`. */
export type Labels = Readonly<Record<string, string>>;

interface EventBase {
  readonly event_id: string;
  /** Monotonic ingestion counter; the only ordering key. */
  readonly seq: number;
  readonly timestamp: string; // ISO-8601
  readonly session_id: string;
  readonly labels: Labels;
}

export interface AgentStartEvent extends EventBase {
  readonly event_type: 'agent_start';
  readonly agent_id: string;
  readonly agent_type: string;
  readonly payload: {
    readonly message?: string | undefined;
    readonly parent_session_id?: string | undefined;
  };
}

export interface AgentStopEvent extends EventBase {
  readonly event_type: 'agent_stop';
  readonly agent_id: string;
  readonly agent_type?: string | undefined;
  readonly payload: {
    readonly outcome: StopOutcome;
    readonly message?: string | undefined;
    readonly transcript_path?: string | undefined;
  };
}

export interface ToolUseEvent extends EventBase {
  readonly event_type: 'tool_use';
  readonly agent_id?: string | undefined;
  readonly agent_type?: string | undefined;
  readonly payload: {
    readonly tool_name?: string | undefined;
    readonly file_path?: string | undefined;
  };
}

/**
 * Directed exchange between two participants (`user`, `main_agent` or a
 * named sub-agent). Only `delegation` interactions shape the hierarchy.
 */
export interface InteractionEvent extends EventBase {
  readonly event_type: 'interaction';
  readonly payload: {
    readonly source: string;
    readonly target: string;
    readonly summary: string;
    readonly interaction_type: InteractionType;
  };
}

/** Synthesized from a progress-log line. */
export interface PhaseUpdateEvent extends EventBase {
  readonly event_type: 'phase_update';
  readonly agent_id: string;
  readonly agent_type: string;
  readonly payload: {
    readonly phase: number;
    readonly total_phases: number;
    readonly phase_name: string;
    readonly summary: string;
    readonly reported_at: string;
  };
}

export type PipelineEvent =
  | AgentStartEvent
  | AgentStopEvent
  | ToolUseEvent
  | InteractionEvent
  | PhaseUpdateEvent;

type DraftOf<E> = E extends PipelineEvent
  ? Omit<E, 'event_id' | 'seq' | 'timestamp' | 'labels' | 'session_id'> & {
      readonly event_id?: string | undefined;
      readonly timestamp?: string | undefined;
      readonly session_id?: string | undefined;
      readonly labels?: Labels | undefined;
      /** Producer-supplied retry token used for de-duplication. */
      readonly nonce?: string | undefined;
    }
  : never;

/**
 * What a producer submits to `EventStore.append()`.
 * Identity, ordering and clock fields are filled in by the store.
 */
export type EventDraft = DraftOf<PipelineEvent>;

/** Agent the event concerns, or undefined for interactions and anonymous tool use. */
export function agentIdOf(event: PipelineEvent): string | undefined {
  return event.event_type === 'interaction' ? undefined : event.agent_id;
}

/**
 * Evaluates a label expression: `key=value` (exact match) or `key` (presence).
 */
export function matchesLabel(labels: Labels, expression: string): boolean {
  const eq = expression.indexOf('=');
  if (eq === -1) return Object.hasOwn(labels, expression);
  const key = expression.slice(0, eq);
  return Object.hasOwn(labels, key) && labels[key] === expression.slice(eq + 1);
}
