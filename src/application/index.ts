export { InvalidQueryError } from './errors.js';
export {
  createMilestoneEvent,
  createDecisionEvent,
  createActionEvent,
  createStateEvent,
  createDetailEvent,
  createSystemEvent,
} from './event-builders.js';
export type {
  MilestoneEventInput,
  DecisionEventInput,
  ActionEventInput,
  StateEventInput,
  DetailEventInput,
  SystemEventInput,
} from './event-builders.js';
export { storedEventSchema, serializeEvent, parseEventLine } from './event-schema.js';
export {
  DEFAULT_LIMIT,
  MAX_LIMIT,
  eventFilterSchema,
  createEventFilter,
  matchesFilter,
} from './event-filter.js';
export type { EventFilter, EventFilterInput } from './event-filter.js';
export { EventService, DEFAULT_CAUSALITY_DEPTH } from './event-service.js';
export type {
  EventServiceOptions,
  SimulationSummary,
  EventPage,
  CausalityChain,
} from './event-service.js';
