import { monotonicFactory } from 'ulidx';
import type {
  ActionEvent,
  DecisionDetails,
  DecisionEvent,
  DetailEvent,
  MilestoneEvent,
  StateEvent,
  SystemDetails,
  SystemEvent,
} from '../domain/index.js';

/**
 * Monotonic within a millisecond: ids created in the same ms still sort
 * in creation order.
 */
const nextEventId = monotonicFactory();

/** Fields every builder accepts. */
interface BaseEventInput {
  simulation_id: string;
  turn_number: number;
  description?: string | null;
  caused_by?: readonly string[];
}

export interface MilestoneEventInput extends BaseEventInput {
  milestone_type: string;
}

export interface DecisionEventInput extends BaseEventInput {
  agent_id: string;
  decision_type: string;
  old_value?: unknown;
  new_value?: unknown;
}

export interface ActionEventInput extends BaseEventInput {
  agent_id: string;
  action_type: string;
  action_payload: Record<string, unknown>;
}

export interface StateEventInput extends BaseEventInput {
  variable_name: string;
  old_value: unknown;
  new_value: unknown;
  agent_id?: string | null;
  /** Defaults to "global". */
  scope?: string;
}

export interface DetailEventInput extends BaseEventInput {
  calculation_type: string;
  intermediate_values: Record<string, unknown>;
}

export interface SystemEventInput extends BaseEventInput {
  status: string;
  error_type?: string;
  retry_count?: number;
  /** Extra keys merged into `details`. */
  extra?: Record<string, unknown>;
}

/**
 * Stamps id + timestamp from the same instant and copies the shared
 * provenance fields.
 */
function envelope(input: BaseEventInput, agentId: string | null) {
  if (input.simulation_id.length === 0) {
    throw new TypeError('simulation_id must be a non-empty string');
  }
  if (!Number.isInteger(input.turn_number) || input.turn_number < 0) {
    throw new RangeError(`turn_number must be a non-negative integer, got ${input.turn_number}`);
  }

  const now = Date.now();
  return {
    event_id: nextEventId(now),
    timestamp: new Date(now).toISOString(),
    turn_number: input.turn_number,
    simulation_id: input.simulation_id,
    agent_id: agentId,
    description: input.description ?? null,
    caused_by: [...(input.caused_by ?? [])],
  };
}

function requireAgent(agentId: string, eventType: string): string {
  if (agentId.length === 0) {
    throw new TypeError(`${eventType} events require agent_id`);
  }
  return agentId;
}

export function createMilestoneEvent(input: MilestoneEventInput): MilestoneEvent {
  return {
    ...envelope(input, null),
    event_type: 'MILESTONE',
    details: { milestone_type: input.milestone_type },
  };
}

/** `old_value` / `new_value` are omitted from details when not supplied. */
export function createDecisionEvent(input: DecisionEventInput): DecisionEvent {
  const details: DecisionDetails = { decision_type: input.decision_type };
  if (input.old_value !== undefined && input.old_value !== null) details.old_value = input.old_value;
  if (input.new_value !== undefined && input.new_value !== null) details.new_value = input.new_value;

  return {
    ...envelope(input, requireAgent(input.agent_id, 'DECISION')),
    event_type: 'DECISION',
    details,
  };
}

export function createActionEvent(input: ActionEventInput): ActionEvent {
  return {
    ...envelope(input, requireAgent(input.agent_id, 'ACTION')),
    event_type: 'ACTION',
    details: {
      action_type: input.action_type,
      action_payload: input.action_payload,
    },
  };
}

export function createStateEvent(input: StateEventInput): StateEvent {
  return {
    ...envelope(input, input.agent_id ?? null),
    event_type: 'STATE',
    details: {
      variable_name: input.variable_name,
      old_value: input.old_value,
      new_value: input.new_value,
      scope: input.scope ?? 'global',
    },
  };
}

export function createDetailEvent(input: DetailEventInput): DetailEvent {
  return {
    ...envelope(input, null),
    event_type: 'DETAIL',
    details: {
      calculation_type: input.calculation_type,
      intermediate_values: input.intermediate_values,
    },
  };
}

export function createSystemEvent(input: SystemEventInput): SystemEvent {
  const details: SystemDetails = { ...input.extra, status: input.status };
  if (input.error_type !== undefined && input.error_type.length > 0) {
    details.error_type = input.error_type;
  }
  if (input.retry_count !== undefined) details.retry_count = input.retry_count;

  return {
    ...envelope(input, null),
    event_type: 'SYSTEM',
    details,
  };
}
