import { z } from 'zod';
import type { Logger } from 'pino';
import type { EventStore } from '../../application/event-store.js';
import { agentEventsQuerySchema, reportInteractionSchema, toValidationError } from '../../application/event-schema.js';
import { getAgentEvents, getPipelineStatus } from '../../application/pipeline-queries.js';
import { reportInteraction } from '../../application/report-interaction.js';
import { ValidationError } from '../../domain/index.js';

export type ToolResponse = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: true;
};

const pipelineStatusSchema = z.object({}).strict();

export function textContent(value: unknown): ToolResponse {
  const text = typeof value === 'string' ? value : JSON.stringify(value, null, 2);
  return { content: [{ type: 'text', text }] };
}

export function errorContent(error: unknown): ToolResponse {
  const message = error instanceof Error ? error.message : String(error);
  const issues = error instanceof ValidationError && error.issues.length > 0
    ? `\n${error.issues.map((i) => `- ${i.path || '(root)'}: ${i.message}`).join('\n')}`
    : '';
  return {
    content: [{ type: 'text', text: `Error: ${message}${issues}` }],
    isError: true,
  };
}

export interface ToolHandlers {
  get_pipeline_status: (raw: z.infer<typeof pipelineStatusSchema>) => Promise<ToolResponse>;
  get_agent_events: (raw: z.infer<typeof agentEventsQuerySchema>) => Promise<ToolResponse>;
  report_interaction: (raw: z.infer<typeof reportInteractionSchema>) => Promise<ToolResponse>;
}

/**
 * Tool-call handlers over one store. Validation failures come back as
 * `isError` content; nothing thrown here reaches the transport.
 */
export function createToolHandlers(store: EventStore, log: Logger): ToolHandlers {
  const fail = (tool: string, err: unknown): ToolResponse => {
    log.warn({ err, tool }, 'Tool call rejected');
    return errorContent(err);
  };

  return {
    async get_pipeline_status(raw) {
      const parsed = pipelineStatusSchema.safeParse(raw);
      if (!parsed.success) return fail('get_pipeline_status', toValidationError('Invalid arguments', parsed.error));
      return textContent(getPipelineStatus(store));
    },

    async get_agent_events(raw) {
      const parsed = agentEventsQuerySchema.safeParse(raw);
      if (!parsed.success) return fail('get_agent_events', toValidationError('Invalid arguments', parsed.error));
      const { agent_id, label, limit } = parsed.data;
      return textContent(getAgentEvents(store, agent_id, { label, limit }));
    },

    async report_interaction(raw) {
      try {
        const interactionId = reportInteraction(store, raw);
        log.debug({ interaction_id: interactionId }, 'Interaction reported');
        return textContent({ status: 'recorded', interaction_id: interactionId });
      } catch (err: unknown) {
        return fail('report_interaction', err);
      }
    },
  };
}

export const toolSchemas = {
  get_pipeline_status: {
    description: 'Current pipeline state: agent status cards, delegation hierarchy and interaction timeline.',
    inputSchema: pipelineStatusSchema.shape,
  },
  get_agent_events: {
    description: 'Most recent events of one agent, optionally filtered by a `key` or `key=value` label. Default limit 50, max 500.',
    inputSchema: agentEventsQuerySchema.shape,
  },
  report_interaction: {
    description: 'Record an interaction between participants (query, delegation, result, decision, response).',
    inputSchema: reportInteractionSchema.shape,
  },
} as const;
