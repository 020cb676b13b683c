import { basename } from 'node:path';
import { z } from 'zod';
import type { EventDraft } from '../domain/index.js';
import { ValidationError } from '../domain/index.js';
import { toValidationError } from './event-schema.js';
import { lastProgressLine, toPhaseDraft } from './progress-line.js';

export const DEFAULT_PROGRESS_FILE = 'PROGRESS.md';

const optionalText = z.string().optional();

/**
 * Canonical hook body, as posted by scripts that already speak the event model.
 * `status: "failed"` is accepted as an alias of `outcome: "failed"`.
 */
export const canonicalHookSchema = z
  .object({
    event_type: z.enum(['agent_start', 'agent_stop', 'tool_use']),
    event_id: optionalText,
    session_id: z.string().default(''),
    agent_id: optionalText,
    agent_type: optionalText,
    parent_session_id: optionalText,
    tool_name: optionalText,
    file_path: optionalText,
    outcome: z.enum(['completed', 'failed']).optional(),
    status: optionalText,
    message: optionalText,
    transcript_path: optionalText,
    labels: z.record(z.string(), z.string()).optional(),
    nonce: optionalText,
    timestamp: optionalText,
  })
  .passthrough();

/** Raw lifecycle hook payload emitted by the assistant runtime. */
export const assistantHookSchema = z
  .object({
    hook_event_name: z.string().min(1),
    session_id: z.string().default(''),
    agent_id: optionalText,
    agent_type: optionalText,
    agent_transcript_path: optionalText,
    tool_name: optionalText,
    tool_use_id: optionalText,
    tool_input: z
      .object({
        file_path: optionalText,
        content: optionalText,
        new_string: optionalText,
      })
      .passthrough()
      .optional(),
    nonce: optionalText,
  })
  .passthrough();

type CanonicalHook = z.infer<typeof canonicalHookSchema>;
type AssistantHook = z.infer<typeof assistantHookSchema>;

function fromCanonical(body: CanonicalHook): EventDraft[] {
  const common = {
    event_id: body.event_id,
    session_id: body.session_id,
    labels: body.labels,
    nonce: body.nonce,
    timestamp: body.timestamp,
  };

  switch (body.event_type) {
    case 'agent_start':
      return [{
        ...common,
        event_type: 'agent_start',
        agent_id: body.agent_id ?? body.agent_type ?? '',
        agent_type: body.agent_type ?? body.agent_id ?? '',
        payload: { message: body.message, parent_session_id: body.parent_session_id },
      }];
    case 'agent_stop':
      return [{
        ...common,
        event_type: 'agent_stop',
        agent_id: body.agent_id ?? body.agent_type ?? '',
        agent_type: body.agent_type,
        payload: {
          outcome: body.outcome ?? (body.status === 'failed' ? 'failed' : 'completed'),
          message: body.message,
          transcript_path: body.transcript_path,
        },
      }];
    case 'tool_use':
      return [{
        ...common,
        event_type: 'tool_use',
        agent_id: body.agent_id,
        agent_type: body.agent_type,
        payload: { tool_name: body.tool_name, file_path: body.file_path },
      }];
  }
}

function fromAssistant(body: AssistantHook, progressFile: string): EventDraft[] {
  const sessionId = body.session_id;
  // Best human-readable name the payload offers.
  const label = body.agent_type || body.agent_id || 'unknown';
  const agentId = body.agent_id || label;

  switch (body.hook_event_name) {
    case 'SubagentStart':
      return [
        {
          event_type: 'agent_start',
          session_id: sessionId,
          agent_id: agentId,
          agent_type: label,
          nonce: body.nonce,
          payload: { message: `Agent ${label} started`, parent_session_id: sessionId },
        },
        {
          event_type: 'interaction',
          session_id: sessionId,
          nonce: body.nonce,
          payload: {
            source: 'main_agent',
            target: agentId,
            summary: `Delegated to ${label}`,
            interaction_type: 'delegation',
          },
        },
      ];

    case 'SubagentStop':
      return [
        {
          event_type: 'agent_stop',
          session_id: sessionId,
          agent_id: agentId,
          agent_type: label,
          nonce: body.nonce,
          payload: {
            outcome: 'completed',
            message: `Agent ${label} stopped`,
            transcript_path: body.agent_transcript_path,
          },
        },
        {
          event_type: 'interaction',
          session_id: sessionId,
          nonce: body.nonce,
          payload: {
            source: agentId,
            target: 'main_agent',
            summary: `${label} returned results`,
            interaction_type: 'result',
          },
        },
      ];

    case 'PostToolUse': {
      const filePath = body.tool_input?.file_path;
      const drafts: EventDraft[] = [{
        event_type: 'tool_use',
        session_id: sessionId,
        agent_id: body.agent_id || undefined,
        agent_type: body.agent_type || undefined,
        nonce: body.nonce ?? body.tool_use_id,
        payload: { tool_name: body.tool_name, file_path: filePath },
      }];

      if (filePath !== undefined && basename(filePath) === progressFile) {
        const content = body.tool_input?.content || body.tool_input?.new_string || '';
        const line = lastProgressLine(content);
        if (line) drafts.push(toPhaseDraft(line, sessionId));
      }
      return drafts;
    }

    default:
      throw new ValidationError(`Unsupported hook event: ${body.hook_event_name}`);
  }
}

/**
 * Maps a hook request body onto canonical event drafts.
 *
 * Field-level validation is left to `EventStore.append()`; this only
 * decides which shape the body has and renames fields.
 *
 * @throws ValidationError when the body matches neither hook shape.
 */
export function translateHook(body: unknown, progressFile = DEFAULT_PROGRESS_FILE): EventDraft[] {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new ValidationError('Hook body must be a JSON object');
  }

  if ('hook_event_name' in body) {
    const parsed = assistantHookSchema.safeParse(body);
    if (!parsed.success) throw toValidationError('Malformed hook payload', parsed.error);
    return fromAssistant(parsed.data, progressFile);
  }

  const parsed = canonicalHookSchema.safeParse(body);
  if (!parsed.success) throw toValidationError('Malformed hook payload', parsed.error);
  return fromCanonical(parsed.data);
}
