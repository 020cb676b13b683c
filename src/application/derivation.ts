import type {
  AgentStartEvent,
  AgentStatusCard,
  AgentStopEvent,
  DelegationLink,
  DelegationNode,
  LifecycleState,
  Labels,
  PhaseUpdateEvent,
  PipelineEvent,
} from '../domain/index.js';
import { TERMINAL_STATES } from '../domain/index.js';

/**
 * Derivation engine: pure functions that project the event log into
 * agent status cards and the delegation forest.
 *
 * Every function takes the previous value for the single key an event
 * touches and returns the next one. Nothing here reads the full log, so
 * the store can apply one event in constant time.
 */

/** Key of the status card an event touches, if any. */
export function cardKeyOf(event: PipelineEvent): string | undefined {
  if (event.event_type === 'interaction') {
    return event.payload.interaction_type === 'delegation' ? event.payload.target : undefined;
  }
  return event.agent_id;
}

function mergeLabels(base: Labels, next: Labels): Labels {
  return Object.keys(next).length === 0 ? base : { ...base, ...next };
}

function advance(card: AgentStatusCard, next: LifecycleState): Pick<AgentStatusCard, 'lifecycle_state' | 'state_history'> {
  return { lifecycle_state: next, state_history: [...card.state_history, next] };
}

function emptyCard(
  event: AgentStartEvent | AgentStopEvent | PhaseUpdateEvent,
  link: DelegationLink | undefined,
): AgentStatusCard {
  return {
    agent_id: event.agent_id,
    agent_type: event.agent_type ?? event.agent_id,
    session_id: event.session_id,
    lifecycle_state: 'spawned',
    state_history: [],
    current_phase: null,
    phase_index: null,
    total_phases: null,
    phase_summary: null,
    started_at: null,
    stopped_at: null,
    last_update_timestamp: event.timestamp,
    labels: event.labels,
    placeholder: false,
    delegation_parent: link?.parent ?? null,
    task_summary: link?.summary ?? null,
  };
}

/**
 * Computes the next status card for the agent `event` concerns.
 *
 * Returns `undefined` when the event does not create or change a card
 * (anonymous tool use, non-delegation interactions, tool use or
 * delegation naming an agent with no card yet).
 *
 * `link` is the delegation already recorded for the agent, applied when a
 * card is created after its delegation arrived.
 */
export function deriveCard(
  previous: AgentStatusCard | undefined,
  event: PipelineEvent,
  link?: DelegationLink,
): AgentStatusCard | undefined {
  switch (event.event_type) {
    case 'agent_start': {
      if (previous === undefined) {
        const card = emptyCard(event, link);
        return {
          ...card,
          agent_type: event.agent_type,
          lifecycle_state: 'running',
          state_history: ['spawned', 'running'],
          started_at: event.timestamp,
        };
      }
      const refreshed: AgentStatusCard = {
        ...previous,
        agent_type: event.agent_type,
        session_id: event.session_id || previous.session_id,
        last_update_timestamp: event.timestamp,
        labels: mergeLabels(previous.labels, event.labels),
      };
      // Terminal states never regress; a late or repeated start only refreshes metadata.
      if (previous.placeholder) {
        return { ...refreshed, placeholder: false, started_at: event.timestamp };
      }
      return refreshed;
    }

    case 'agent_stop': {
      if (previous === undefined) {
        const card = emptyCard(event, link);
        return {
          ...card,
          lifecycle_state: 'orphaned',
          state_history: ['orphaned'],
          stopped_at: event.timestamp,
        };
      }
      const base: AgentStatusCard = {
        ...previous,
        last_update_timestamp: event.timestamp,
        labels: mergeLabels(previous.labels, event.labels),
      };
      if (TERMINAL_STATES.has(previous.lifecycle_state)) return base;
      if (previous.placeholder || previous.started_at === null) {
        return { ...base, ...advance(previous, 'orphaned'), stopped_at: event.timestamp };
      }
      return {
        ...base,
        ...advance(previous, event.payload.outcome),
        stopped_at: event.timestamp,
      };
    }

    case 'phase_update': {
      const phase = {
        current_phase: event.payload.phase_name,
        phase_index: event.payload.phase,
        total_phases: event.payload.total_phases,
        phase_summary: event.payload.summary,
        last_update_timestamp: event.timestamp,
      };
      if (previous === undefined) {
        // The lifecycle hook may not have fired yet.
        return {
          ...emptyCard(event, link),
          ...phase,
          lifecycle_state: 'running',
          state_history: ['running'],
          placeholder: true,
        };
      }
      return {
        ...previous,
        ...phase,
        labels: mergeLabels(previous.labels, event.labels),
      };
    }

    case 'tool_use':
      if (previous === undefined) return undefined;
      return { ...previous, last_update_timestamp: event.timestamp };

    case 'interaction':
      if (previous === undefined || event.payload.interaction_type !== 'delegation') {
        return undefined;
      }
      return {
        ...previous,
        delegation_parent: event.payload.source,
        task_summary: event.payload.summary,
        last_update_timestamp: event.timestamp,
      };
  }
}

/**
 * Next delegation link for the target of a delegation interaction.
 * The most recent delegation wins; a re-target is not an error.
 */
export function deriveDelegation(event: PipelineEvent): DelegationLink | undefined {
  if (event.event_type !== 'interaction' || event.payload.interaction_type !== 'delegation') {
    return undefined;
  }
  return {
    parent: event.payload.source,
    summary: event.payload.summary,
    delegated_at: event.timestamp,
    seq: event.seq,
  };
}

/**
 * Picks the card a progress-log line refers to. Lines name an agent, which
 * may be an `agent_id` or an `agent_type`. In order:
 * - a started card with that exact id
 * - the most recently updated live, started card of that type
 * - the name itself (an existing placeholder, or a new one)
 */
export function resolvePhaseAgent(
  cards: ReadonlyMap<string, AgentStatusCard>,
  name: string,
): string {
  const exact = cards.get(name);
  if (exact !== undefined && !exact.placeholder) return name;

  let match: AgentStatusCard | undefined;
  for (const card of cards.values()) {
    if (card.placeholder || card.agent_type !== name || TERMINAL_STATES.has(card.lifecycle_state)) continue;
    if (match === undefined || card.last_update_timestamp >= match.last_update_timestamp) match = card;
  }
  return match?.agent_id ?? name;
}

/**
 * Re-keys a placeholder, built from phase lines logged under the agent's
 * type, onto the agent that has just started. Feed the result to
 * `deriveCard` as the previous card to promote it.
 */
export function adoptPlaceholder(
  placeholder: AgentStatusCard,
  event: AgentStartEvent,
  link?: DelegationLink,
): AgentStatusCard {
  return {
    ...placeholder,
    agent_id: event.agent_id,
    delegation_parent: link?.parent ?? placeholder.delegation_parent,
    task_summary: link?.summary ?? placeholder.task_summary,
  };
}

/**
 * Snapshot-time view of a card: a started agent that has been silent for
 * longer than `graceMs` is flagged `stale`. Its lifecycle state is left as
 * `running`, so a late stop still completes it.
 */
export function projectCard(card: AgentStatusCard, now: Date, graceMs: number): AgentStatusCard {
  if (graceMs <= 0 || card.lifecycle_state !== 'running' || card.placeholder) return card;
  const silentFor = now.getTime() - Date.parse(card.last_update_timestamp);
  if (!(silentFor > graceMs)) return card;
  return { ...card, stale: true };
}

/**
 * Builds the delegation forest.
 *
 * `participants` fixes root order (first appearance). Children are ordered
 * by delegation order. A participant only reachable through a cycle is
 * promoted to a root so that no node disappears.
 */
export function buildDelegationForest(
  links: ReadonlyMap<string, DelegationLink>,
  participants: Iterable<string>,
  cards: ReadonlyMap<string, AgentStatusCard>,
): DelegationNode[] {
  const childrenOf = new Map<string, string[]>();
  const ordered = [...links.entries()].sort(([, a], [, b]) => a.seq - b.seq);
  for (const [target, link] of ordered) {
    const siblings = childrenOf.get(link.parent);
    if (siblings) siblings.push(target);
    else childrenOf.set(link.parent, [target]);
  }

  const visited = new Set<string>();

  const build = (nodeId: string): DelegationNode => {
    visited.add(nodeId);
    const link = links.get(nodeId);
    const children: DelegationNode[] = [];
    for (const childId of childrenOf.get(nodeId) ?? []) {
      if (!visited.has(childId)) children.push(build(childId));
    }
    return {
      id: nodeId,
      parent: link?.parent ?? null,
      summary: link?.summary ?? null,
      delegated_at: link?.delegated_at ?? null,
      lifecycle_state: cards.get(nodeId)?.lifecycle_state ?? null,
      children,
    };
  };

  const all = [...participants];
  const roots: DelegationNode[] = [];
  for (const nodeId of all) {
    if (!links.has(nodeId) && !visited.has(nodeId)) roots.push(build(nodeId));
  }
  for (const nodeId of all) {
    if (!visited.has(nodeId)) roots.push(build(nodeId));
  }
  return roots;
}
