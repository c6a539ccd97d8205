import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { EventService } from '../../src/application/event-service.js';
import { InvalidQueryError } from '../../src/application/errors.js';
import { serializeEvent } from '../../src/application/event-schema.js';
import {
  actionEvent,
  captureLogger,
  decisionEvent,
  makeTempDir,
  milestoneEvent,
  removeTempDir,
  stateEvent,
  writeSegment,
} from '../helpers.js';
import type { LogRecord } from '../helpers.js';

const ROTATED = 'events_2026-03-01_00-00-00-000001.jsonl';
const ROTATED_LATER = 'events_2026-03-01_00-05-00-000000.jsonl';

const at = (second: number): string => new Date(Date.UTC(2026, 2, 1, 0, 0, second)).toISOString();
const ids = (events: ReadonlyArray<{ event_id: string }>): string[] => events.map((e) => e.event_id);

let root: string;
let records: LogRecord[];
let service: EventService;

beforeEach(() => {
  root = makeTempDir();
  const captured = captureLogger();
  records = captured.records;
  service = new EventService({ outputRoot: root, logger: captured.logger });
});

afterEach(() => {
  removeTempDir(root);
});

/** Turn 1: m1, a1 · turn 2: d1, m2, a2 · turn 3: m3 */
function sixEventTurns() {
  return [
    milestoneEvent({ event_id: 'm1', turn_number: 1, timestamp: at(1) }),
    actionEvent({ event_id: 'a1', turn_number: 1, timestamp: at(2), agent_id: 'firm-1' }),
    decisionEvent({ event_id: 'd1', turn_number: 2, timestamp: at(3), agent_id: 'bank' }),
    milestoneEvent({ event_id: 'm2', turn_number: 2, timestamp: at(4) }),
    actionEvent({ event_id: 'a2', turn_number: 2, timestamp: at(5), agent_id: 'firm-2' }),
    milestoneEvent({ event_id: 'm3', turn_number: 3, timestamp: at(6) }),
  ];
}

// ─── listSimulations ─────────────────────────────────────────

describe('listSimulations', () => {
  it('returns [] when the output root does not exist', async () => {
    const missing = new EventService({ outputRoot: join(root, 'nope'), logger: captureLogger().logger });
    expect(await missing.listSimulations()).toEqual([]);
  });

  it('summarizes each directory that holds segments, sorted by id', async () => {
    writeSegment(root, 'beta-002', ROTATED, [
      milestoneEvent({ timestamp: at(10) }),
      actionEvent({ timestamp: at(11) }),
    ]);
    writeSegment(root, 'beta-002', 'events.jsonl', [actionEvent({ timestamp: at(12) })]);
    writeSegment(root, 'alpha-001', 'events.jsonl', [
      milestoneEvent({ timestamp: at(1) }),
      actionEvent({ timestamp: at(2) }),
      stateEvent({ timestamp: at(3) }),
    ]);
    mkdirSync(join(root, 'no-segments'));
    writeFileSync(join(root, 'no-segments', 'notes.txt'), 'hello\n');
    writeFileSync(join(root, 'stray.jsonl'), '');

    expect(await service.listSimulations()).toEqual([
      { id: 'alpha-001', name: 'alpha', start_time: at(1), event_count: 3 },
      { id: 'beta-002', name: 'beta', start_time: at(10), event_count: 3 },
    ]);
  });

  it('reports a null start_time when the first line is unreadable', async () => {
    writeSegment(root, 'gamma', 'events.jsonl', ['garbage', actionEvent({ timestamp: at(5) })]);

    expect(await service.listSimulations()).toEqual([
      { id: 'gamma', name: 'gamma', start_time: null, event_count: 2 },
    ]);
  });
});

// ─── getFilteredEvents ───────────────────────────────────────

describe('getFilteredEvents', () => {
  beforeEach(() => {
    writeSegment(root, 'sim-1', 'events.jsonl', sixEventTurns());
  });

  it('returns every event sorted by timestamp with no filter', async () => {
    const page = await service.getFilteredEvents('sim-1');
    expect(ids(page.events)).toEqual(['m1', 'a1', 'd1', 'm2', 'a2', 'm3']);
    expect(page.total).toBe(6);
    expect(page.has_more).toBe(false);
  });

  it('filters by event type', async () => {
    const milestones = await service.getFilteredEvents('sim-1', { event_types: ['MILESTONE'] });
    expect(ids(milestones.events)).toEqual(['m1', 'm2', 'm3']);

    const actions = await service.getFilteredEvents('sim-1', { event_types: ['ACTION'] });
    expect(ids(actions.events)).toEqual(['a1', 'a2']);
    expect(actions.total).toBe(2);
  });

  it('filters by turn range', async () => {
    const page = await service.getFilteredEvents('sim-1', { turn_start: 2, turn_end: 2 });
    expect(ids(page.events)).toEqual(['d1', 'm2', 'a2']);
  });

  it('filters by agent', async () => {
    const page = await service.getFilteredEvents('sim-1', { agent_ids: ['bank', 'firm-2'] });
    expect(ids(page.events)).toEqual(['d1', 'a2']);
  });

  it('paginates after sorting', async () => {
    const first = await service.getFilteredEvents('sim-1', { limit: 2, offset: 0 });
    expect(ids(first.events)).toEqual(['m1', 'a1']);
    expect(first).toMatchObject({ total: 6, has_more: true });

    const middle = await service.getFilteredEvents('sim-1', { limit: 2, offset: 2 });
    expect(ids(middle.events)).toEqual(['d1', 'm2']);
    expect(middle.has_more).toBe(true);

    const last = await service.getFilteredEvents('sim-1', { limit: 2, offset: 4 });
    expect(ids(last.events)).toEqual(['a2', 'm3']);
    expect(last.has_more).toBe(false);

    const past = await service.getFilteredEvents('sim-1', { limit: 2, offset: 10 });
    expect(past).toEqual({ events: [], total: 6, has_more: false });
  });

  it('rejects an invalid filter', async () => {
    await expect(service.getFilteredEvents('sim-1', { limit: 0 })).rejects.toBeInstanceOf(InvalidQueryError);
  });

  it('returns an empty page for a missing simulation', async () => {
    expect(await service.getFilteredEvents('sim-404')).toEqual({ events: [], total: 0, has_more: false });
  });

  it('treats ids that escape the output root as missing', async () => {
    writeSegment(root, 'sim-1', 'events.jsonl', sixEventTurns());
    expect(await service.getFilteredEvents('../sim-1')).toEqual({ events: [], total: 0, has_more: false });
    expect(await service.getFilteredEvents('..')).toEqual({ events: [], total: 0, has_more: false });
  });
});

describe('getFilteredEvents across segments', () => {
  it('merges rotated and current segments and sorts by timestamp then id', async () => {
    writeSegment(root, 'sim-2', ROTATED_LATER, [actionEvent({ event_id: 'r2', timestamp: at(20) })]);
    writeSegment(root, 'sim-2', ROTATED, [
      actionEvent({ event_id: 'r1b', timestamp: at(10) }),
      actionEvent({ event_id: 'r1a', timestamp: at(10) }),
    ]);
    writeSegment(root, 'sim-2', 'events.jsonl', [actionEvent({ event_id: 'c1', timestamp: at(15) })]);

    const page = await service.getFilteredEvents('sim-2');
    expect(ids(page.events)).toEqual(['r1a', 'r1b', 'c1', 'r2']);
  });

  it('sorts and bounds microsecond timestamps within one millisecond', async () => {
    writeSegment(root, 'sim-us', 'events.jsonl', [
      actionEvent({ event_id: 'a-later', timestamp: '2026-03-01T00:00:00.000900+00:00' }),
      actionEvent({ event_id: 'z-earlier', timestamp: '2026-03-01T00:00:00.000100+00:00' }),
    ]);

    const all = await service.getFilteredEvents('sim-us');
    expect(ids(all.events)).toEqual(['z-earlier', 'a-later']);

    const bounded = await service.getFilteredEvents('sim-us', {
      start_timestamp: '2026-03-01T00:00:00.000500+00:00',
    });
    expect(ids(bounded.events)).toEqual(['a-later']);
  });

  it('skips malformed and partially written lines', async () => {
    const good = actionEvent({ event_id: 'good', timestamp: at(1) });
    const tail = actionEvent({ event_id: 'tail', timestamp: at(2) });
    const partial = serializeEvent(tail).slice(0, 40);
    mkdirSync(join(root, 'sim-3'));
    writeFileSync(
      join(root, 'sim-3', 'events.jsonl'),
      `${serializeEvent(good)}\n{broken\n\n${partial}`,
    );

    const page = await service.getFilteredEvents('sim-3');
    expect(ids(page.events)).toEqual(['good']);

    const skipped = records.find((r) => r.msg === 'Skipped malformed event lines');
    expect(skipped?.['skipped']).toBe(2);
  });
});

// ─── getEventById ────────────────────────────────────────────

describe('getEventById', () => {
  it('returns the first match scanning oldest segment first', async () => {
    const older = actionEvent({ event_id: 'dup', timestamp: at(1), description: 'older' });
    const newer = actionEvent({ event_id: 'dup', timestamp: at(2), description: 'newer' });
    writeSegment(root, 'sim-1', 'events.jsonl', [newer]);
    writeSegment(root, 'sim-1', ROTATED, [older]);

    const found = await service.getEventById('sim-1', 'dup');
    expect(found?.description).toBe('older');
  });

  it('returns null when the event is absent', async () => {
    writeSegment(root, 'sim-1', 'events.jsonl', sixEventTurns());
    expect(await service.getEventById('sim-1', 'missing')).toBeNull();
    expect(await service.getEventById('sim-404', 'm1')).toBeNull();
  });
});

// ─── getCausalityChain ───────────────────────────────────────

describe('getCausalityChain', () => {
  beforeEach(() => {
    writeSegment(root, 'sim-c', 'events.jsonl', [
      milestoneEvent({ event_id: 'turn_start', timestamp: at(1) }),
      actionEvent({ event_id: 'act', timestamp: at(2), caused_by: ['turn_start'] }),
      stateEvent({ event_id: 'state_change', timestamp: at(3), caused_by: ['act'] }),
      milestoneEvent({ event_id: 'turn_end', timestamp: at(4), caused_by: ['state_change'] }),
    ]);
  });

  it('returns ancestors within the default depth and direct children', async () => {
    const chain = await service.getCausalityChain('sim-c', 'turn_end');
    expect(chain?.event_id).toBe('turn_end');
    expect(chain?.event.event_id).toBe('turn_end');
    expect(ids(chain?.upstream ?? [])).toEqual(['state_change', 'act', 'turn_start']);
    expect(chain?.downstream).toEqual([]);
  });

  it('bounds the upstream walk by depth', async () => {
    const chain = await service.getCausalityChain('sim-c', 'turn_end', 2);
    expect(ids(chain?.upstream ?? [])).toEqual(['state_change', 'act']);
  });

  it('has no upstream for a root event', async () => {
    const chain = await service.getCausalityChain('sim-c', 'turn_start');
    expect(chain?.upstream).toEqual([]);
    expect(ids(chain?.downstream ?? [])).toEqual(['act']);
  });

  it('returns null for an unknown event', async () => {
    expect(await service.getCausalityChain('sim-c', 'missing')).toBeNull();
  });

  it('rejects a negative or fractional depth', async () => {
    await expect(service.getCausalityChain('sim-c', 'turn_end', -1)).rejects.toBeInstanceOf(InvalidQueryError);
    await expect(service.getCausalityChain('sim-c', 'turn_end', 1.5)).rejects.toBeInstanceOf(InvalidQueryError);
  });
});

// ─── verifyCausality ─────────────────────────────────────────

describe('verifyCausality', () => {
  it('reports dangling parents and logs a warning', async () => {
    writeSegment(root, 'sim-v', 'events.jsonl', [
      milestoneEvent({ event_id: 'root', timestamp: at(1) }),
      actionEvent({ event_id: 'orphan', timestamp: at(2), caused_by: ['ghost'] }),
    ]);

    const report = await service.verifyCausality('sim-v');
    expect(report.checked).toBe(2);
    expect(report.missing_parents).toEqual([{ event_id: 'orphan', parent_id: 'ghost' }]);
    expect(report.valid).toBe(false);

    const warning = records.find((r) => r.msg === 'Causality integrity check failed');
    expect(warning?.['missingParents']).toBe(1);
  });

  it('is valid for an empty simulation', async () => {
    const report = await service.verifyCausality('sim-404');
    expect(report).toMatchObject({ checked: 0, valid: true });
  });
});
