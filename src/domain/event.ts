/**
 * Core domain types for the simulation event stream.
 *
 * Every event shares one envelope; the `event_type` discriminator selects
 * the shape of `details`. The union is closed: six variants, no runtime
 * schema generation. `details` stays an open map so producer-specific keys
 * survive a write/read round-trip.
 */

export const EVENT_TYPES = [
  'MILESTONE',
  'DECISION',
  'ACTION',
  'STATE',
  'DETAIL',
  'SYSTEM',
] as const;

export type EventType = (typeof EVENT_TYPES)[number];

/** Free-form key/value payload. */
export type EventDetails = Record<string, unknown>;

interface EventEnvelope<TType extends EventType, TDetails extends EventDetails> {
  /** ULID — lexicographically sortable, time-ordered. */
  readonly event_id: string;
  readonly timestamp: string; // ISO-8601 UTC
  readonly turn_number: number;
  readonly simulation_id: string;
  readonly event_type: TType;
  readonly agent_id: string | null;
  readonly description: string | null;
  /** Parent event ids, in the order the producer declared them. */
  readonly caused_by: readonly string[];
  readonly details: TDetails;
}

export interface MilestoneDetails extends EventDetails {
  milestone_type: string;
}

export interface DecisionDetails extends EventDetails {
  decision_type: string;
  old_value?: unknown;
  new_value?: unknown;
}

export interface ActionDetails extends EventDetails {
  action_type: string;
  action_payload: Record<string, unknown>;
}

export interface StateDetails extends EventDetails {
  variable_name: string;
  old_value?: unknown;
  new_value?: unknown;
  scope: string;
}

export interface DetailDetails extends EventDetails {
  calculation_type: string;
  intermediate_values: Record<string, unknown>;
}

export interface SystemDetails extends EventDetails {
  status: string;
  error_type?: string;
  retry_count?: number;
}

/** Turn boundaries and simulation phase transitions. */
export type MilestoneEvent = EventEnvelope<'MILESTONE', MilestoneDetails>;
/** Agent strategic decisions and policy changes. */
export type DecisionEvent = EventEnvelope<'DECISION', DecisionDetails>;
/** Individual agent actions and transactions. */
export type ActionEvent = EventEnvelope<'ACTION', ActionDetails>;
/** State variable transitions. */
export type StateEvent = EventEnvelope<'STATE', StateDetails>;
/** Granular calculations and intermediate values. */
export type DetailEvent = EventEnvelope<'DETAIL', DetailDetails>;
/** Simulation lifecycle, retries and failures. */
export type SystemEvent = EventEnvelope<'SYSTEM', SystemDetails>;

export type SimulationEvent =
  | MilestoneEvent
  | DecisionEvent
  | ActionEvent
  | StateEvent
  | DetailEvent
  | SystemEvent;

export function isEventType(value: string): value is EventType {
  return (EVENT_TYPES as readonly string[]).includes(value);
}

const FRACTION = /\.(\d+)/;

/**
 * Instant of an ISO-8601 timestamp as `[epoch ms of the whole second,
 * nanoseconds into that second]`. `Date.parse` alone stops at milliseconds;
 * the fraction is read separately so microsecond stamps keep their order.
 */
export function timestampKey(timestamp: string): [number, number] {
  const match = FRACTION.exec(timestamp);
  if (match === null) return [Date.parse(timestamp), 0];
  const digits = match[1] ?? '';
  return [Date.parse(timestamp.replace(FRACTION, '')), Number(digits.slice(0, 9).padEnd(9, '0'))];
}

/** Negative, zero or positive as `a` is before, at or after `b`. */
export function compareTimestamps(a: string, b: string): number {
  const [aWhole, aNanos] = timestampKey(a);
  const [bWhole, bNanos] = timestampKey(b);
  return aWhole !== bWhole ? aWhole - bWhole : aNanos - bNanos;
}

/**
 * Total order used by every read path: timestamp first, event_id second.
 * Independent of the file or line an event was read from.
 */
export function compareEvents(a: SimulationEvent, b: SimulationEvent): number {
  const byTime = compareTimestamps(a.timestamp, b.timestamp);
  if (byTime !== 0) return byTime;
  if (a.event_id < b.event_id) return -1;
  if (a.event_id > b.event_id) return 1;
  return 0;
}
