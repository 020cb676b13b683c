import { z, type ZodError } from 'zod';
import { INTERACTION_TYPES, ValidationError } from '../domain/index.js';

const id = z.string().trim().min(1).max(255);
const text = z.string().max(4096);

/** Shared optional envelope fields every producer may set. */
const envelope = {
  event_id: z.string().uuid().optional(),
  timestamp: z.string().datetime({ offset: true, message: 'Must be a valid ISO-8601 datetime' }).optional(),
  labels: z.record(z.string(), z.string()).optional(),
  nonce: z.string().min(1).max(255).optional(),
};

export const interactionTypeSchema = z.enum(INTERACTION_TYPES);

export const agentStartDraftSchema = z.object({
  ...envelope,
  event_type: z.literal('agent_start'),
  session_id: id,
  agent_id: id,
  agent_type: id,
  payload: z.object({
    message: text.optional(),
    parent_session_id: z.string().optional(),
  }).default({}),
});

export const agentStopDraftSchema = z.object({
  ...envelope,
  event_type: z.literal('agent_stop'),
  session_id: id,
  agent_id: id,
  agent_type: id.optional(),
  payload: z.object({
    outcome: z.enum(['completed', 'failed']).default('completed'),
    message: text.optional(),
    transcript_path: z.string().optional(),
  }).default({}),
});

export const toolUseDraftSchema = z.object({
  ...envelope,
  event_type: z.literal('tool_use'),
  session_id: id,
  agent_id: id.optional(),
  agent_type: id.optional(),
  payload: z.object({
    tool_name: id.optional(),
    file_path: z.string().min(1).optional(),
  }),
});

export const interactionDraftSchema = z.object({
  ...envelope,
  event_type: z.literal('interaction'),
  session_id: z.string().default(''),
  payload: z.object({
    source: id,
    target: id,
    summary: text.min(1),
    interaction_type: interactionTypeSchema,
  }),
});

export const phaseUpdateDraftSchema = z.object({
  ...envelope,
  event_type: z.literal('phase_update'),
  session_id: z.string().default(''),
  agent_id: id,
  agent_type: id,
  payload: z.object({
    phase: z.number().int().nonnegative(),
    total_phases: z.number().int().nonnegative(),
    phase_name: id,
    summary: text,
    reported_at: z.string(),
  }),
});

/**
 * Validates a draft before it reaches the log.
 * `tool_use` must name the tool or the file it touched.
 */
export const eventDraftSchema = z
  .discriminatedUnion('event_type', [
    agentStartDraftSchema,
    agentStopDraftSchema,
    toolUseDraftSchema,
    interactionDraftSchema,
    phaseUpdateDraftSchema,
  ])
  .superRefine((draft, ctx) => {
    if (
      draft.event_type === 'tool_use' &&
      draft.payload.tool_name === undefined &&
      draft.payload.file_path === undefined
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['payload'],
        message: 'tool_use requires tool_name or file_path',
      });
    }
  });

export type ValidatedDraft = z.infer<typeof eventDraftSchema>;

/**
 * Arguments of the `report_interaction` tool and `POST /api/interactions`.
 */
export const reportInteractionSchema = z
  .object({
    source: id,
    target: id,
    summary: text.min(1),
    interaction_type: interactionTypeSchema,
    labels: z.record(z.string(), z.string()).optional(),
    session_id: z.string().optional(),
  })
  .strict();

export type ReportInteractionInput = z.infer<typeof reportInteractionSchema>;

export const agentEventsQuerySchema = z
  .object({
    agent_id: id,
    label: z.string().min(1).optional(),
    limit: z.number().int().optional(),
  })
  .strict();

export type AgentEventsQuery = z.infer<typeof agentEventsQuerySchema>;

/** Flattens zod issues into the domain error. */
export function toValidationError(message: string, error: ZodError): ValidationError {
  return new ValidationError(
    message,
    error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    })),
  );
}
