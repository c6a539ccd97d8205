import { z } from 'zod';
import type { SimulationEvent } from '../domain/index.js';

const objectMap = z.record(z.string(), z.unknown());

/**
 * Envelope fields shared by every persisted event line.
 *
 * `agent_id`, `description` and `caused_by` tolerate absence and `null`
 * so logs written by older producers still parse.
 */
const envelope = {
  event_id: z.string().min(1),
  timestamp: z.string().datetime({ offset: true, message: 'Must be a valid ISO-8601 datetime' }),
  turn_number: z.number().int().min(0),
  simulation_id: z.string().min(1),
  agent_id: z.string().nullable().default(null),
  description: z.string().nullable().default(null),
  caused_by: z
    .array(z.string())
    .nullable()
    .default([])
    .transform((ids) => ids ?? []),
};

// `details` keeps unknown keys: producers may attach their own fields.

const milestoneEventSchema = z.object({
  ...envelope,
  event_type: z.literal('MILESTONE'),
  details: z.object({ milestone_type: z.string() }).passthrough(),
});

const decisionEventSchema = z.object({
  ...envelope,
  event_type: z.literal('DECISION'),
  details: z
    .object({
      decision_type: z.string(),
      old_value: z.unknown().optional(),
      new_value: z.unknown().optional(),
    })
    .passthrough(),
});

const actionEventSchema = z.object({
  ...envelope,
  event_type: z.literal('ACTION'),
  details: z.object({ action_type: z.string(), action_payload: objectMap }).passthrough(),
});

const stateEventSchema = z.object({
  ...envelope,
  event_type: z.literal('STATE'),
  details: z
    .object({
      variable_name: z.string(),
      old_value: z.unknown(),
      new_value: z.unknown(),
      scope: z.string(),
    })
    .passthrough(),
});

const detailEventSchema = z.object({
  ...envelope,
  event_type: z.literal('DETAIL'),
  details: z
    .object({ calculation_type: z.string(), intermediate_values: objectMap })
    .passthrough(),
});

const systemEventSchema = z.object({
  ...envelope,
  event_type: z.literal('SYSTEM'),
  details: z
    .object({
      status: z.string(),
      error_type: z.string().optional(),
      retry_count: z.number().int().optional(),
    })
    .passthrough(),
});

/** Zod schema for one line of a segment file. */
export const storedEventSchema = z.discriminatedUnion('event_type', [
  milestoneEventSchema,
  decisionEventSchema,
  actionEventSchema,
  stateEventSchema,
  detailEventSchema,
  systemEventSchema,
]);

/**
 * Serializes an event to a single JSON line (no trailing newline).
 * Envelope keys are written in a fixed order.
 */
export function serializeEvent(event: SimulationEvent): string {
  return JSON.stringify({
    event_id: event.event_id,
    timestamp: event.timestamp,
    turn_number: event.turn_number,
    simulation_id: event.simulation_id,
    event_type: event.event_type,
    agent_id: event.agent_id,
    description: event.description,
    caused_by: event.caused_by,
    details: event.details,
  });
}

/**
 * Parses one segment line.
 * Returns null for blank, truncated, non-JSON or schema-invalid lines.
 */
export function parseEventLine(line: string): SimulationEvent | null {
  const trimmed = line.trim();
  if (trimmed.length === 0) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(trimmed);
  } catch {
    return null;
  }

  const parsed = storedEventSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}
