import { readdir } from 'node:fs/promises';
import type { Logger } from 'pino';
import {
  buildCausalityIndex,
  collectDownstream,
  collectUpstream,
  compareEvents,
  verifyCausality,
} from '../domain/index.js';
import type { CausalityReport, SimulationEvent } from '../domain/index.js';
import {
  listSegmentFiles,
  readSegmentLines,
  simulationDirectory,
} from '../infrastructure/events/segment-files.js';
import { InvalidQueryError } from './errors.js';
import { createEventFilter, matchesFilter } from './event-filter.js';
import type { EventFilterInput } from './event-filter.js';
import { parseEventLine } from './event-schema.js';

export const DEFAULT_CAUSALITY_DEPTH = 5;

export interface SimulationSummary {
  id: string;
  /** Id up to its first `-`. */
  name: string;
  start_time: string | null;
  event_count: number;
}

export interface EventPage {
  events: SimulationEvent[];
  /** Matches before pagination. */
  total: number;
  has_more: boolean;
}

export interface CausalityChain {
  event_id: string;
  event: SimulationEvent;
  upstream: SimulationEvent[];
  downstream: SimulationEvent[];
}

export interface EventServiceOptions {
  outputRoot: string;
  logger: Logger;
}

/**
 * Read side of the event log.
 *
 * Holds no cache: every call re-scans the simulation directory, so it sees
 * whatever the writer has flushed so far. Unreadable files and unparsable
 * lines are skipped; a missing simulation reads as empty.
 */
export class EventService {
  private readonly outputRoot: string;
  private readonly log: Logger;

  constructor(options: EventServiceOptions) {
    this.outputRoot = options.outputRoot;
    this.log = options.logger.child({ component: 'event-service' });
  }

  async listSimulations(): Promise<SimulationSummary[]> {
    let dirs: string[];
    try {
      const entries = await readdir(this.outputRoot, { withFileTypes: true });
      dirs = entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name);
    } catch (err: unknown) {
      this.log.debug({ err, outputRoot: this.outputRoot }, 'Output root not readable');
      return [];
    }

    const summaries: SimulationSummary[] = [];
    for (const id of dirs.sort()) {
      const summary = await this.summarize(id);
      if (summary !== null) summaries.push(summary);
    }
    return summaries;
  }

  /**
   * Matching events sorted by `(timestamp, event_id)`, sliced by
   * `offset`/`limit`.
   * @throws InvalidQueryError when the filter is invalid
   */
  async getFilteredEvents(simulationId: string, filterInput: EventFilterInput = {}): Promise<EventPage> {
    const filter = createEventFilter(filterInput);

    const matches: SimulationEvent[] = [];
    for await (const event of this.readEvents(simulationId)) {
      if (matchesFilter(event, filter)) matches.push(event);
    }
    matches.sort(compareEvents);

    const end = filter.offset + filter.limit;
    return {
      events: matches.slice(filter.offset, end),
      total: matches.length,
      has_more: end < matches.length,
    };
  }

  /** First event with `eventId`, scanning oldest segment first. */
  async getEventById(simulationId: string, eventId: string): Promise<SimulationEvent | null> {
    for await (const event of this.readEvents(simulationId)) {
      if (event.event_id === eventId) return event;
    }
    return null;
  }

  /**
   * The event plus its ancestors within `depth` hops and its direct
   * children. Null when the event does not exist.
   * @throws InvalidQueryError when depth is not a non-negative integer
   */
  async getCausalityChain(
    simulationId: string,
    eventId: string,
    depth: number = DEFAULT_CAUSALITY_DEPTH,
  ): Promise<CausalityChain | null> {
    if (!Number.isInteger(depth) || depth < 0) {
      throw new InvalidQueryError(`depth must be a non-negative integer, got ${depth}`);
    }

    const index = buildCausalityIndex(await this.loadEvents(simulationId));
    const event = index.events.get(eventId);
    if (event === undefined) return null;

    return {
      event_id: eventId,
      event,
      upstream: collectUpstream(index, eventId, depth),
      downstream: collectDownstream(index, eventId),
    };
  }

  async verifyCausality(simulationId: string): Promise<CausalityReport> {
    const report = verifyCausality(buildCausalityIndex(await this.loadEvents(simulationId)));
    if (!report.valid) {
      this.log.warn(
        {
          simulationId,
          missingParents: report.missing_parents.length,
          temporalViolations: report.temporal_violations.length,
          cyclicEvents: report.cyclic_events.length,
        },
        'Causality integrity check failed',
      );
    }
    return report;
  }

  // ─── Segment scanning ───────────────────────────────────────

  private async loadEvents(simulationId: string): Promise<SimulationEvent[]> {
    const events: SimulationEvent[] = [];
    for await (const event of this.readEvents(simulationId)) events.push(event);
    return events;
  }

  private async segmentsOf(simulationId: string): Promise<string[]> {
    const dir = simulationDirectory(this.outputRoot, simulationId);
    if (dir === null) {
      this.log.debug({ simulationId }, 'Rejected simulation id');
      return [];
    }
    return listSegmentFiles(dir);
  }

  /** Parsed events in file order, oldest segment first. */
  private async *readEvents(simulationId: string): AsyncGenerator<SimulationEvent> {
    for (const file of await this.segmentsOf(simulationId)) {
      let skipped = 0;
      try {
        for await (const line of readSegmentLines(file)) {
          if (line.trim().length === 0) continue;
          const event = parseEventLine(line);
          if (event === null) {
            skipped++;
            continue;
          }
          yield event;
        }
      } catch (err: unknown) {
        this.log.debug({ err, file }, 'Skipping unreadable segment');
        continue;
      }
      if (skipped > 0) {
        this.log.debug({ file, skipped }, 'Skipped malformed event lines');
      }
    }
  }

  private async summarize(id: string): Promise<SimulationSummary | null> {
    const segments = await this.segmentsOf(id);
    if (segments.length === 0) return null;

    let startTime: string | null = null;
    let eventCount = 0;

    for (const [position, file] of segments.entries()) {
      let firstLine = position === 0;
      try {
        for await (const line of readSegmentLines(file)) {
          if (firstLine) {
            startTime = parseEventLine(line)?.timestamp ?? null;
            firstLine = false;
          }
          if (line.trim().length > 0) eventCount++;
        }
      } catch (err: unknown) {
        this.log.debug({ err, file }, 'Skipping unreadable segment');
      }
    }

    return {
      id,
      name: id.split('-')[0] ?? id,
      start_time: startTime,
      event_count: eventCount,
    };
  }
}
