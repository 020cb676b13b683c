import type { PipelineEvent, PipelineSnapshot } from '../domain/index.js';
import type { EventStore } from './event-store.js';

const DEFAULT_LIMIT = 50;
const MAX_LIMIT = 500;

export interface AgentEventsParams {
  label?: string | undefined;
  limit?: number | undefined;
}

export interface AgentEventsResult {
  agent_id: string;
  found: boolean;
  label: string | null;
  events: PipelineEvent[];
}

/**
 * Use case: full pipeline status (cards, forest, timeline).
 */
export function getPipelineStatus(store: EventStore): PipelineSnapshot {
  return store.snapshot();
}

/**
 * Use case: most recent events of one agent, optionally label-filtered.
 * Clamps limit to [1, 500], defaults to 50. Unknown agents are a
 * `found: false` result, not an error.
 */
export function getAgentEvents(
  store: EventStore,
  agentId: string,
  params: AgentEventsParams = {},
): AgentEventsResult {
  const label = params.label ?? null;
  if (!store.hasAgent(agentId)) {
    return { agent_id: agentId, found: false, label, events: [] };
  }

  const limit = Math.min(Math.max(params.limit ?? DEFAULT_LIMIT, 1), MAX_LIMIT);
  const events = [...store.eventsFor(agentId, params.label)];

  return {
    agent_id: agentId,
    found: true,
    label,
    events: events.slice(-limit),
  };
}
