import type { EventType } from './event.js';

/**
 * Verbosity levels, lowest first. Each level includes every event type
 * admitted by the levels before it.
 */
export const VERBOSITY_LEVELS = [
  'MILESTONE',
  'DECISION',
  'ACTION',
  'STATE',
  'DETAIL',
] as const;

export type VerbosityLevel = (typeof VERBOSITY_LEVELS)[number];

/** Lowest verbosity at which each event type is persisted. SYSTEM is DETAIL-tier. */
const MINIMUM_VERBOSITY: Readonly<Record<EventType, VerbosityLevel>> = {
  MILESTONE: 'MILESTONE',
  DECISION: 'DECISION',
  ACTION: 'ACTION',
  STATE: 'STATE',
  DETAIL: 'DETAIL',
  SYSTEM: 'DETAIL',
};

export function isVerbosityLevel(value: string): value is VerbosityLevel {
  return (VERBOSITY_LEVELS as readonly string[]).includes(value);
}

/** Position of `level` in the total order (MILESTONE = 0). */
export function verbosityRank(level: VerbosityLevel): number {
  return VERBOSITY_LEVELS.indexOf(level);
}

export function minimumVerbosityFor(eventType: EventType): VerbosityLevel {
  return MINIMUM_VERBOSITY[eventType];
}

/**
 * Decides whether an event of `eventType` is persisted at `verbosity`.
 */
export function shouldLogEvent(eventType: EventType, verbosity: VerbosityLevel): boolean {
  return verbosityRank(verbosity) >= verbosityRank(minimumVerbosityFor(eventType));
}
