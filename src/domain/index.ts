export { EVENT_TYPES, isEventType, compareEvents, compareTimestamps, timestampKey } from './event.js';
export type {
  EventType,
  EventDetails,
  SimulationEvent,
  MilestoneEvent,
  DecisionEvent,
  ActionEvent,
  StateEvent,
  DetailEvent,
  SystemEvent,
  MilestoneDetails,
  DecisionDetails,
  ActionDetails,
  StateDetails,
  DetailDetails,
  SystemDetails,
} from './event.js';
export {
  VERBOSITY_LEVELS,
  isVerbosityLevel,
  verbosityRank,
  minimumVerbosityFor,
  shouldLogEvent,
} from './verbosity.js';
export type { VerbosityLevel } from './verbosity.js';
export {
  buildCausalityIndex,
  collectUpstream,
  collectDownstream,
  verifyCausality,
} from './causality.js';
export type {
  CausalityIndex,
  CausalityReport,
  MissingParent,
  TemporalViolation,
} from './causality.js';
