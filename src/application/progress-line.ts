import type { EventDraft } from '../domain/index.js';

/**
 * `[TIMESTAMP] [AGENT] Phase N/M: phase-name -- summary #label #key=value`
 */
const PROGRESS_LINE_RE =
  /^\[([^\]]+)\]\s+\[([^\]]+)\]\s+Phase\s+(\d+)\/(\d+):\s+(\S+)\s+--\s+(.+)$/;

export interface ProgressLine {
  reported_at: string;
  agent: string;
  phase: number;
  total_phases: number;
  phase_name: string;
  summary: string;
  labels: Record<string, string>;
}

/**
 * Splits trailing hashtag tokens from the summary text.
 * `#tag` → `{ tag: '' }`, `#key=value` → `{ key: 'value' }`.
 */
function splitLabels(rest: string): { summary: string; labels: Record<string, string> } {
  const labels: Record<string, string> = {};
  const words: string[] = [];

  for (const word of rest.split(/\s+/)) {
    if (word.startsWith('#') && word.length > 1) {
      const tag = word.slice(1);
      const eq = tag.indexOf('=');
      if (eq === -1) labels[tag] = '';
      else labels[tag.slice(0, eq)] = tag.slice(eq + 1);
    } else if (word !== '') {
      words.push(word);
    }
  }

  return { summary: words.join(' '), labels };
}

/** Returns null for anything that is not a phase line. */
export function parseProgressLine(line: string): ProgressLine | null {
  const match = PROGRESS_LINE_RE.exec(line.trim());
  if (!match) return null;

  const [, reportedAt, agent, phase, total, phaseName, rest] = match;
  if (
    reportedAt === undefined ||
    agent === undefined ||
    phase === undefined ||
    total === undefined ||
    phaseName === undefined ||
    rest === undefined
  ) {
    return null;
  }

  const { summary, labels } = splitLabels(rest);
  return {
    reported_at: reportedAt.trim(),
    agent: agent.trim(),
    phase: Number(phase),
    total_phases: Number(total),
    phase_name: phaseName,
    summary,
    labels,
  };
}

/** Last phase line in a block of text, e.g. the content of a progress-log write. */
export function lastProgressLine(content: string): ProgressLine | null {
  const lines = content.split(/\r?\n/);
  for (let i = lines.length - 1; i >= 0; i--) {
    const parsed = parseProgressLine(lines[i] ?? '');
    if (parsed) return parsed;
  }
  return null;
}

/**
 * Synthetic `phase_update` draft. The nonce turns a line that is read
 * twice (after a rotation, or a repeated hook) into a duplicate.
 */
export function toPhaseDraft(line: ProgressLine, sessionId = ''): EventDraft {
  return {
    event_type: 'phase_update',
    session_id: sessionId,
    agent_id: line.agent,
    agent_type: line.agent,
    labels: line.labels,
    nonce: `${line.reported_at}|${line.phase}/${line.total_phases}|${line.phase_name}`,
    payload: {
      phase: line.phase,
      total_phases: line.total_phases,
      phase_name: line.phase_name,
      summary: line.summary,
      reported_at: line.reported_at,
    },
  };
}
