export type {
  EventType,
  InteractionType,
  StopOutcome,
  Labels,
  AgentStartEvent,
  AgentStopEvent,
  ToolUseEvent,
  InteractionEvent,
  PhaseUpdateEvent,
  PipelineEvent,
  EventDraft,
} from './event.js';
export { EVENT_TYPES, INTERACTION_TYPES, agentIdOf, matchesLabel } from './event.js';
export type {
  LifecycleState,
  AgentStatusCard,
  DelegationLink,
  DelegationNode,
  PipelineSnapshot,
} from './agent.js';
export { TERMINAL_STATES } from './agent.js';
export type { PipelineErrorCode, ValidationIssue } from './errors.js';
export {
  PipelineError,
  ValidationError,
  TransportError,
  WatchSourceUnavailable,
  ConfigError,
} from './errors.js';
