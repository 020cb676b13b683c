import type { EventStore } from './event-store.js';
import { reportInteractionSchema, toValidationError } from './event-schema.js';

/**
 * Use case: record an interaction reported by a participant.
 *
 * @throws ValidationError for unknown fields or an unknown `interaction_type`.
 */
export function reportInteraction(store: EventStore, input: unknown): string {
  const parsed = reportInteractionSchema.safeParse(input);
  if (!parsed.success) throw toValidationError('Invalid interaction', parsed.error);

  const { source, target, summary, interaction_type, labels, session_id } = parsed.data;
  return store.append({
    event_type: 'interaction',
    session_id: session_id ?? '',
    labels,
    payload: { source, target, summary, interaction_type },
  });
}
