import { describe, it, expect } from 'vitest';
import { createEventFilter, matchesFilter } from '../../src/application/event-filter.js';
import type { EventFilterInput } from '../../src/application/event-filter.js';
import { InvalidQueryError } from '../../src/application/errors.js';
import { actionEvent, milestoneEvent, stateEvent } from '../helpers.js';

// ─── createEventFilter ───────────────────────────────────────

describe('createEventFilter', () => {
  it('applies limit and offset defaults', () => {
    expect(createEventFilter()).toEqual({ limit: 1000, offset: 0 });
  });

  it('keeps supplied predicates', () => {
    const filter = createEventFilter({ event_types: ['ACTION'], turn_start: 2, limit: 5, offset: 10 });
    expect(filter).toEqual({ event_types: ['ACTION'], turn_start: 2, limit: 5, offset: 10 });
  });

  const invalid: Array<[string, EventFilterInput]> = [
    ['limit below 1', { limit: 0 }],
    ['limit above 10000', { limit: 10001 }],
    ['negative offset', { offset: -1 }],
    ['negative turn_start', { turn_start: -1 }],
    ['fractional turn_end', { turn_end: 1.5 }],
    ['unparsable timestamp', { start_timestamp: 'yesterday' }],
  ];

  for (const [label, input] of invalid) {
    it(`rejects ${label}`, () => {
      expect(() => createEventFilter(input)).toThrow(InvalidQueryError);
    });
  }

  it('attaches the zod issues to the error', () => {
    let caught: unknown;
    try {
      createEventFilter({ limit: 0 });
    } catch (err: unknown) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(InvalidQueryError);
    if (caught instanceof InvalidQueryError) {
      expect(caught.issues.map((issue) => issue.path)).toEqual([['limit']]);
    }
  });
});

// ─── matchesFilter ───────────────────────────────────────────

describe('matchesFilter', () => {
  const action = actionEvent({ agent_id: 'firm-1', turn_number: 2, timestamp: '2026-03-01T00:00:10.000Z' });
  const milestone = milestoneEvent({ turn_number: 2, timestamp: '2026-03-01T00:00:00.000Z' });

  it('matches everything with an empty filter', () => {
    const filter = createEventFilter();
    expect(matchesFilter(action, filter)).toBe(true);
    expect(matchesFilter(milestone, filter)).toBe(true);
  });

  it('treats empty arrays as no constraint', () => {
    const filter = createEventFilter({ event_types: [], agent_ids: [] });
    expect(matchesFilter(milestone, filter)).toBe(true);
  });

  it('filters by event type', () => {
    const filter = createEventFilter({ event_types: ['MILESTONE', 'STATE'] });
    expect(matchesFilter(milestone, filter)).toBe(true);
    expect(matchesFilter(action, filter)).toBe(false);
  });

  it('excludes events without an agent when agent_ids is set', () => {
    const filter = createEventFilter({ agent_ids: ['firm-1'] });
    expect(matchesFilter(action, filter)).toBe(true);
    expect(matchesFilter(milestone, filter)).toBe(false);
    expect(matchesFilter(stateEvent({ agent_id: 'firm-2' }), filter)).toBe(false);
  });

  it('uses inclusive turn bounds', () => {
    expect(matchesFilter(action, createEventFilter({ turn_start: 2, turn_end: 2 }))).toBe(true);
    expect(matchesFilter(action, createEventFilter({ turn_start: 3 }))).toBe(false);
    expect(matchesFilter(action, createEventFilter({ turn_end: 1 }))).toBe(false);
  });

  it('uses inclusive timestamp bounds', () => {
    const exact = createEventFilter({
      start_timestamp: '2026-03-01T00:00:10.000Z',
      end_timestamp: '2026-03-01T00:00:10.000Z',
    });
    expect(matchesFilter(action, exact)).toBe(true);
    expect(matchesFilter(milestone, exact)).toBe(false);

    const before = createEventFilter({ end_timestamp: '2026-03-01T00:00:05+00:00' });
    expect(matchesFilter(milestone, before)).toBe(true);
    expect(matchesFilter(action, before)).toBe(false);
  });

  it('applies timestamp bounds below the millisecond', () => {
    const early = actionEvent({ timestamp: '2026-03-01T00:00:00.000100+00:00' });
    const late = actionEvent({ timestamp: '2026-03-01T00:00:00.000900+00:00' });
    const bound = '2026-03-01T00:00:00.000500+00:00';

    expect(matchesFilter(early, createEventFilter({ start_timestamp: bound }))).toBe(false);
    expect(matchesFilter(late, createEventFilter({ start_timestamp: bound }))).toBe(true);
    expect(matchesFilter(early, createEventFilter({ end_timestamp: bound }))).toBe(true);
    expect(matchesFilter(late, createEventFilter({ end_timestamp: bound }))).toBe(false);
  });
});
