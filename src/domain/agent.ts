import type { InteractionEvent, Labels, PipelineEvent } from './event.js';

export type LifecycleState = 'spawned' | 'running' | 'completed' | 'failed' | 'orphaned';

export const TERMINAL_STATES: ReadonlySet<LifecycleState> = new Set([
  'completed',
  'failed',
  'orphaned',
]);

/**
 * Derived projection of one sub-agent. Never mutated directly: the
 * derivation engine returns a fresh card for every event that touches it.
 */
export interface AgentStatusCard {
  readonly agent_id: string;
  readonly agent_type: string;
  readonly session_id: string;
  readonly lifecycle_state: LifecycleState;
  readonly state_history: readonly LifecycleState[];
  readonly current_phase: string | null;
  readonly phase_index: number | null;
  readonly total_phases: number | null;
  readonly phase_summary: string | null;
  readonly started_at: string | null;
  readonly stopped_at: string | null;
  readonly last_update_timestamp: string;
  readonly labels: Labels;
  /** Created from a phase line before any lifecycle hook fired. */
  readonly placeholder: boolean;
  readonly delegation_parent: string | null;
  readonly task_summary: string | null;
  /** Set only by the snapshot projection when the orphan grace period elapsed. */
  readonly stale?: boolean;
}

export interface DelegationLink {
  readonly parent: string;
  readonly summary: string;
  readonly delegated_at: string;
  readonly seq: number;
}

export interface DelegationNode {
  readonly id: string;
  readonly parent: string | null;
  readonly summary: string | null;
  readonly delegated_at: string | null;
  /** Null for participants without a status card (`user`, `main_agent`). */
  readonly lifecycle_state: LifecycleState | null;
  readonly children: DelegationNode[];
}

export interface PipelineSnapshot {
  readonly generated_at: string;
  readonly event_count: number;
  readonly last_seq: number;
  readonly agents: AgentStatusCard[];
  readonly hierarchy: DelegationNode[];
  readonly timeline: InteractionEvent[];
  readonly recent_events: PipelineEvent[];
}
