import { z } from 'zod';
import { EVENT_TYPES, compareTimestamps } from '../domain/index.js';
import type { SimulationEvent } from '../domain/index.js';
import { InvalidQueryError } from './errors.js';

export const DEFAULT_LIMIT = 1000;
export const MAX_LIMIT = 10000;

const isoTimestamp = z.string().datetime({ offset: true, message: 'Must be a valid ISO-8601 datetime' });

/**
 * Query object for `EventService.getFilteredEvents`.
 *
 * Every predicate is optional; an empty array imposes no constraint.
 * Turn and timestamp bounds are inclusive.
 */
export const eventFilterSchema = z.object({
  event_types: z.array(z.enum(EVENT_TYPES)).optional(),
  agent_ids: z.array(z.string()).optional(),
  turn_start: z.number().int().min(0).optional(),
  turn_end: z.number().int().min(0).optional(),
  start_timestamp: isoTimestamp.optional(),
  end_timestamp: isoTimestamp.optional(),
  limit: z.number().int().min(1).max(MAX_LIMIT).default(DEFAULT_LIMIT),
  offset: z.number().int().min(0).default(0),
});

export type EventFilterInput = z.input<typeof eventFilterSchema>;
export type EventFilter = z.output<typeof eventFilterSchema>;

/**
 * Validates and normalizes a filter, applying limit/offset defaults.
 * @throws InvalidQueryError when any field is out of range or malformed
 */
export function createEventFilter(input: EventFilterInput = {}): EventFilter {
  const parsed = eventFilterSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidQueryError('Invalid event filter', parsed.error.issues);
  }
  return parsed.data;
}

export function matchesFilter(event: SimulationEvent, filter: EventFilter): boolean {
  if (filter.start_timestamp !== undefined && compareTimestamps(event.timestamp, filter.start_timestamp) < 0) {
    return false;
  }
  if (filter.end_timestamp !== undefined && compareTimestamps(event.timestamp, filter.end_timestamp) > 0) {
    return false;
  }

  if (filter.event_types !== undefined && filter.event_types.length > 0) {
    if (!filter.event_types.includes(event.event_type)) return false;
  }

  if (filter.agent_ids !== undefined && filter.agent_ids.length > 0) {
    if (event.agent_id === null || !filter.agent_ids.includes(event.agent_id)) return false;
  }

  if (filter.turn_start !== undefined && event.turn_number < filter.turn_start) return false;
  if (filter.turn_end !== undefined && event.turn_number > filter.turn_end) return false;

  return true;
}
