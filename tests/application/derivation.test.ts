import { describe, it, expect } from 'vitest';
import {
  adoptPlaceholder,
  buildDelegationForest,
  deriveCard,
  deriveDelegation,
  projectCard,
  resolvePhaseAgent,
} from '../../src/application/derivation.js';
import type { AgentStatusCard, DelegationLink, PipelineEvent } from '../../src/domain/index.js';

let seq = 0;
const at = (minute: number) => `2026-03-01T10:${String(minute).padStart(2, '0')}:00.000Z`;

function envelope(minute = 0) {
  seq += 1;
  return { event_id: `e-${seq}`, seq, timestamp: at(minute), session_id: 's1', labels: {} };
}

const started = (agent_id: string, agent_type = 'coder', minute = 0): PipelineEvent => ({
  ...envelope(minute),
  event_type: 'agent_start',
  agent_id,
  agent_type,
  payload: {},
});

const stopped = (agent_id: string, outcome: 'completed' | 'failed' = 'completed'): PipelineEvent => ({
  ...envelope(5),
  event_type: 'agent_stop',
  agent_id,
  payload: { outcome },
});

function card(overrides: Partial<AgentStatusCard> = {}): AgentStatusCard {
  const base = deriveCard(undefined, started('a1'));
  if (base === undefined) throw new Error('expected a card');
  return { ...base, ...overrides };
}

describe('deriveCard', () => {
  it('starts a new card as spawned → running', () => {
    const next = deriveCard(undefined, started('a1', 'coder', 3));
    expect(next?.lifecycle_state).toBe('running');
    expect(next?.state_history).toEqual(['spawned', 'running']);
    expect(next?.started_at).toBe(at(3));
    expect(next?.placeholder).toBe(false);
  });

  it('completes or fails a running card by outcome', () => {
    expect(deriveCard(card(), stopped('a1'))?.lifecycle_state).toBe('completed');
    expect(deriveCard(card(), stopped('a1', 'failed'))?.lifecycle_state).toBe('failed');
  });

  it('leaves a terminal card in its state', () => {
    const done = card({ lifecycle_state: 'failed', state_history: ['spawned', 'running', 'failed'] });
    expect(deriveCard(done, stopped('a1'))?.lifecycle_state).toBe('failed');
    expect(deriveCard(done, started('a1'))?.lifecycle_state).toBe('failed');
  });

  it('orphans a placeholder that stops before starting', () => {
    const placeholder = card({ placeholder: true, started_at: null, state_history: ['running'] });
    const next = deriveCard(placeholder, stopped('a1'));
    expect(next?.lifecycle_state).toBe('orphaned');
    expect(next?.state_history).toEqual(['running', 'orphaned']);
  });

  it('merges labels from later events', () => {
    const labelled: PipelineEvent = { ...stopped('a1'), labels: { wave: '2' } };
    const next = deriveCard(card({ labels: { team: 'core' } }), labelled);
    expect(next?.labels).toEqual({ team: 'core', wave: '2' });
  });

  it('ignores tool use and delegation for agents with no card', () => {
    const tool: PipelineEvent = {
      ...envelope(),
      event_type: 'tool_use',
      agent_id: 'nobody',
      payload: { tool_name: 'Read' },
    };
    expect(deriveCard(undefined, tool)).toBeUndefined();
  });

  it('refreshes the update time on tool use', () => {
    const tool: PipelineEvent = {
      ...envelope(9),
      event_type: 'tool_use',
      agent_id: 'a1',
      payload: { file_path: 'src/index.ts' },
    };
    expect(deriveCard(card(), tool)?.last_update_timestamp).toBe(at(9));
  });
});

describe('deriveDelegation', () => {
  it('links the target to its source', () => {
    const event: PipelineEvent = {
      ...envelope(2),
      event_type: 'interaction',
      payload: { source: 'main_agent', target: 'a1', summary: 'write docs', interaction_type: 'delegation' },
    };
    expect(deriveDelegation(event)).toEqual({
      parent: 'main_agent',
      summary: 'write docs',
      delegated_at: at(2),
      seq: event.seq,
    });
  });

  it('ignores other interaction types', () => {
    const event: PipelineEvent = {
      ...envelope(),
      event_type: 'interaction',
      payload: { source: 'a1', target: 'main_agent', summary: 'done', interaction_type: 'result' },
    };
    expect(deriveDelegation(event)).toBeUndefined();
  });
});

describe('resolvePhaseAgent', () => {
  it('prefers an exact id, then the latest live card of that type', () => {
    const cards = new Map<string, AgentStatusCard>([
      ['old', card({ agent_id: 'old', agent_type: 'coder', lifecycle_state: 'completed' })],
      ['x1', card({ agent_id: 'x1', agent_type: 'coder' })],
      ['x2', card({ agent_id: 'x2', agent_type: 'coder' })],
    ]);
    expect(resolvePhaseAgent(cards, 'old')).toBe('old');
    expect(resolvePhaseAgent(cards, 'coder')).toBe('x2');
    expect(resolvePhaseAgent(cards, 'reviewer')).toBe('reviewer');
  });

  it('picks the most recently updated live card, not the newest one', () => {
    const cards = new Map<string, AgentStatusCard>([
      ['x1', card({ agent_id: 'x1', agent_type: 'coder', last_update_timestamp: at(9) })],
      ['x2', card({ agent_id: 'x2', agent_type: 'coder', last_update_timestamp: at(2) })],
    ]);
    expect(resolvePhaseAgent(cards, 'coder')).toBe('x1');
  });

  it('prefers a started agent over a placeholder of the same name', () => {
    const cards = new Map<string, AgentStatusCard>([
      ['coder', card({ agent_id: 'coder', agent_type: 'coder', placeholder: true, last_update_timestamp: at(9) })],
      ['x1', card({ agent_id: 'x1', agent_type: 'coder', last_update_timestamp: at(1) })],
    ]);
    expect(resolvePhaseAgent(cards, 'coder')).toBe('x1');
  });

  it('falls back to the placeholder while no agent of that type runs', () => {
    const cards = new Map<string, AgentStatusCard>([
      ['coder', card({ agent_id: 'coder', agent_type: 'coder', placeholder: true })],
      ['x1', card({ agent_id: 'x1', agent_type: 'coder', lifecycle_state: 'completed' })],
    ]);
    expect(resolvePhaseAgent(cards, 'coder')).toBe('coder');
  });
});

describe('adoptPlaceholder', () => {
  it('re-keys the placeholder so the start promotes it with its phase', () => {
    const placeholder = card({
      agent_id: 'researcher',
      agent_type: 'researcher',
      placeholder: true,
      started_at: null,
      state_history: ['running'],
      current_phase: 'survey',
      phase_index: 1,
      total_phases: 6,
    });
    const start = started('abc123', 'researcher', 4);
    if (start.event_type !== 'agent_start') throw new Error('expected a start event');
    const link: DelegationLink = { parent: 'main_agent', summary: 'dig in', delegated_at: at(4), seq: 99 };

    const adopted = adoptPlaceholder(placeholder, start, link);
    expect(adopted.agent_id).toBe('abc123');
    expect(adopted.delegation_parent).toBe('main_agent');
    expect(adopted.task_summary).toBe('dig in');

    const next = deriveCard(adopted, start);
    expect(next).toMatchObject({
      agent_id: 'abc123',
      placeholder: false,
      lifecycle_state: 'running',
      started_at: at(4),
      current_phase: 'survey',
      phase_index: 1,
    });
  });
});

describe('projectCard', () => {
  const now = new Date(at(30));

  it('marks a silent running card stale past the grace period', () => {
    const projected = projectCard(card({ last_update_timestamp: at(0) }), now, 15 * 60 * 1000);
    expect(projected.lifecycle_state).toBe('running');
    expect(projected.stale).toBe(true);
  });

  it('keeps recently updated, placeholder and terminal cards', () => {
    const grace = 15 * 60 * 1000;
    expect(projectCard(card({ last_update_timestamp: at(20) }), now, grace).stale).toBeUndefined();
    expect(projectCard(card({ placeholder: true }), now, grace).stale).toBeUndefined();
    expect(projectCard(card({ lifecycle_state: 'completed' }), now, grace).stale).toBeUndefined();
  });
});

describe('buildDelegationForest', () => {
  const link = (parent: string, s: number): DelegationLink => ({
    parent,
    summary: `from ${parent}`,
    delegated_at: at(s),
    seq: s,
  });

  it('orders siblings by delegation order, not insertion order', () => {
    const links = new Map([
      ['b', link('root', 2)],
      ['a', link('root', 1)],
    ]);
    const [root] = buildDelegationForest(links, ['root', 'b', 'a'], new Map());
    expect(root?.children.map((c) => c.id)).toEqual(['a', 'b']);
  });

  it('keeps participants without delegations as roots in appearance order', () => {
    const forest = buildDelegationForest(new Map(), ['user', 'main_agent'], new Map());
    expect(forest.map((n) => n.id)).toEqual(['user', 'main_agent']);
    expect(forest[0]?.parent).toBeNull();
  });
});
