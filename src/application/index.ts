export {
  eventDraftSchema,
  reportInteractionSchema,
  agentEventsQuerySchema,
  interactionTypeSchema,
  toValidationError,
} from './event-schema.js';
export type { ValidatedDraft, ReportInteractionInput, AgentEventsQuery } from './event-schema.js';
export {
  cardKeyOf,
  deriveCard,
  deriveDelegation,
  resolvePhaseAgent,
  projectCard,
  adoptPlaceholder,
  buildDelegationForest,
} from './derivation.js';
export { EventStore } from './event-store.js';
export type { EventStoreOptions, AppendListener } from './event-store.js';
export { LiveDelivery, Subscription } from './live-delivery.js';
export type { LiveDeliveryOptions, GapMarker, DeliveryItem } from './live-delivery.js';
export { getPipelineStatus, getAgentEvents } from './pipeline-queries.js';
export type { AgentEventsParams, AgentEventsResult } from './pipeline-queries.js';
export { parseProgressLine, lastProgressLine, toPhaseDraft } from './progress-line.js';
export type { ProgressLine } from './progress-line.js';
export { translateHook, DEFAULT_PROGRESS_FILE } from './hook-translation.js';
export { reportInteraction } from './report-interaction.js';
