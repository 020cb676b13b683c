import { describe, it, expect } from 'vitest';
import { lastProgressLine, parseProgressLine, toPhaseDraft } from '../../src/application/progress-line.js';

const LINE = '[2026-03-01 10:00:00] [coder] Phase 2/5: implement -- wrote the parser #wave=2 #urgent';

describe('parseProgressLine', () => {
  it('parses every field and the trailing labels', () => {
    expect(parseProgressLine(LINE)).toEqual({
      reported_at: '2026-03-01 10:00:00',
      agent: 'coder',
      phase: 2,
      total_phases: 5,
      phase_name: 'implement',
      summary: 'wrote the parser',
      labels: { wave: '2', urgent: '' },
    });
  });

  it('tolerates surrounding whitespace', () => {
    expect(parseProgressLine(`  ${LINE}  `)?.agent).toBe('coder');
  });

  it('returns null for anything else', () => {
    expect(parseProgressLine('# Progress')).toBeNull();
    expect(parseProgressLine('[ts] [coder] Phase two/5: x -- y')).toBeNull();
    expect(parseProgressLine('[ts] [coder] Phase 1/5: x y')).toBeNull();
    expect(parseProgressLine('')).toBeNull();
  });

  it('keeps a lone "#" in the summary text', () => {
    expect(parseProgressLine('[t] [a] Phase 1/1: done -- item # 3')?.summary).toBe('item # 3');
  });
});

describe('lastProgressLine', () => {
  it('picks the last phase line of a block', () => {
    const content = [
      '# Progress',
      '[t1] [coder] Phase 1/2: plan -- outlined',
      '[t2] [coder] Phase 2/2: build -- shipped',
      'trailing notes',
      '',
    ].join('\n');
    expect(lastProgressLine(content)?.phase_name).toBe('build');
  });

  it('returns null when there is none', () => {
    expect(lastProgressLine('nothing here\r\n')).toBeNull();
  });
});

describe('toPhaseDraft', () => {
  it('builds a phase_update keyed by the line contents', () => {
    const line = parseProgressLine(LINE);
    if (!line) throw new Error('expected a line');

    expect(toPhaseDraft(line, 's9')).toEqual({
      event_type: 'phase_update',
      session_id: 's9',
      agent_id: 'coder',
      agent_type: 'coder',
      labels: { wave: '2', urgent: '' },
      nonce: '2026-03-01 10:00:00|2/5|implement',
      payload: {
        phase: 2,
        total_phases: 5,
        phase_name: 'implement',
        summary: 'wrote the parser',
        reported_at: '2026-03-01 10:00:00',
      },
    });
  });
});
