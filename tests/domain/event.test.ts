import { describe, it, expect } from 'vitest';
import { agentIdOf, matchesLabel } from '../../src/domain/index.js';
import type { PipelineEvent } from '../../src/domain/index.js';

const base = {
  event_id: 'e-1',
  seq: 1,
  timestamp: '2026-03-01T10:00:00.000Z',
  session_id: 's1',
  labels: {},
};

describe('matchesLabel', () => {
  const labels = { wave: '2', urgent: '' };

  it('matches key=value exactly', () => {
    expect(matchesLabel(labels, 'wave=2')).toBe(true);
    expect(matchesLabel(labels, 'wave=3')).toBe(false);
  });

  it('matches a bare key by presence', () => {
    expect(matchesLabel(labels, 'urgent')).toBe(true);
    expect(matchesLabel(labels, 'wave')).toBe(true);
    expect(matchesLabel(labels, 'missing')).toBe(false);
  });

  it('matches an empty value with a trailing "="', () => {
    expect(matchesLabel(labels, 'urgent=')).toBe(true);
    expect(matchesLabel(labels, 'wave=')).toBe(false);
  });

  it('ignores inherited properties', () => {
    expect(matchesLabel(labels, 'toString')).toBe(false);
  });
});

describe('agentIdOf', () => {
  it('returns the agent of lifecycle events', () => {
    const event: PipelineEvent = {
      ...base,
      event_type: 'agent_start',
      agent_id: 'a1',
      agent_type: 'coder',
      payload: {},
    };
    expect(agentIdOf(event)).toBe('a1');
  });

  it('returns undefined for interactions', () => {
    const event: PipelineEvent = {
      ...base,
      event_type: 'interaction',
      payload: { source: 'user', target: 'main_agent', summary: 'go', interaction_type: 'query' },
    };
    expect(agentIdOf(event)).toBeUndefined();
  });
});
