import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import pino from 'pino';
import type { Logger } from 'pino';
import type {
  ActionEvent,
  DecisionEvent,
  DetailEvent,
  MilestoneEvent,
  SimulationEvent,
  StateEvent,
  SystemEvent,
} from '../src/domain/index.js';
import { serializeEvent } from '../src/application/event-schema.js';

// ─── Events ──────────────────────────────────────────────────

interface EnvelopeOverrides {
  event_id?: string;
  timestamp?: string;
  turn_number?: number;
  simulation_id?: string;
  agent_id?: string | null;
  description?: string | null;
  caused_by?: string[];
}

let counter = 0;
const BASE_TIME = Date.parse('2026-03-01T00:00:00.000Z');

/** Envelope with sensible defaults; each call gets a fresh id and a later timestamp. */
function envelope(overrides: EnvelopeOverrides) {
  counter++;
  return {
    event_id: overrides.event_id ?? `evt-${String(counter).padStart(5, '0')}`,
    timestamp: overrides.timestamp ?? new Date(BASE_TIME + counter * 1000).toISOString(),
    turn_number: overrides.turn_number ?? 1,
    simulation_id: overrides.simulation_id ?? 'sim-test',
    agent_id: overrides.agent_id ?? null,
    description: overrides.description ?? null,
    caused_by: overrides.caused_by ?? [],
  };
}

export function milestoneEvent(overrides: EnvelopeOverrides = {}, milestoneType = 'turn_start'): MilestoneEvent {
  return { ...envelope(overrides), event_type: 'MILESTONE', details: { milestone_type: milestoneType } };
}

export function decisionEvent(overrides: EnvelopeOverrides = {}, decisionType = 'adjust_price'): DecisionEvent {
  return {
    ...envelope({ agent_id: 'agent-a', ...overrides }),
    event_type: 'DECISION',
    details: { decision_type: decisionType },
  };
}

export function actionEvent(overrides: EnvelopeOverrides = {}, actionType = 'trade'): ActionEvent {
  return {
    ...envelope({ agent_id: 'agent-a', ...overrides }),
    event_type: 'ACTION',
    details: { action_type: actionType, action_payload: { amount: 10 } },
  };
}

export function stateEvent(overrides: EnvelopeOverrides = {}, variableName = 'gdp'): StateEvent {
  return {
    ...envelope(overrides),
    event_type: 'STATE',
    details: { variable_name: variableName, old_value: 100, new_value: 105, scope: 'global' },
  };
}

export function detailEvent(overrides: EnvelopeOverrides = {}): DetailEvent {
  return {
    ...envelope(overrides),
    event_type: 'DETAIL',
    details: { calculation_type: 'interest', intermediate_values: { rate: 0.05 } },
  };
}

export function systemEvent(overrides: EnvelopeOverrides = {}, status = 'ok'): SystemEvent {
  return { ...envelope(overrides), event_type: 'SYSTEM', details: { status } };
}

// ─── Logging ─────────────────────────────────────────────────

export interface LogRecord {
  level: number;
  msg: string;
  [key: string]: unknown;
}

/** pino logger that collects every record in memory. */
export function captureLogger(level = 'debug'): { logger: Logger; records: LogRecord[] } {
  const records: LogRecord[] = [];
  const logger = pino(
    { level },
    {
      write(line: string) {
        records.push(JSON.parse(line));
      },
    },
  );
  return { logger, records };
}

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

// ─── Filesystem ──────────────────────────────────────────────

export function makeTempDir(): string {
  return mkdtempSync(join(tmpdir(), 'turnlog-test-'));
}

export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/** Writes raw lines (or events, serialized) to `<root>/<simulationId>/<name>`. */
export function writeSegment(
  root: string,
  simulationId: string,
  name: string,
  lines: ReadonlyArray<string | SimulationEvent>,
): string {
  const dir = join(root, simulationId);
  mkdirSync(dir, { recursive: true });
  const path = join(dir, name);
  const body = lines.map((line) => (typeof line === 'string' ? line : serializeEvent(line))).join('\n');
  writeFileSync(path, lines.length > 0 ? `${body}\n` : '', 'utf-8');
  return path;
}
