import { mkdirSync, statSync } from 'node:fs';
import { join } from 'node:path';
import { setTimeout as delay } from 'node:timers/promises';
import type { Logger } from 'pino';
import { shouldLogEvent } from '../../domain/index.js';
import type { SimulationEvent, VerbosityLevel } from '../../domain/index.js';
import { serializeEvent } from '../../application/event-schema.js';
import { BoundedQueue } from './bounded-queue.js';
import {
  CURRENT_SEGMENT,
  appendLine,
  appendLineSync,
  epochMicrosNow,
  rotateSegment,
  rotateSegmentSync,
} from './segment-files.js';

export type WriteMode = 'concurrent' | 'direct';

export const DEFAULT_MAX_FILE_SIZE = 500 * 1024 * 1024;
export const DEFAULT_MAX_QUEUE_SIZE = 10_000;
export const DEFAULT_STOP_TIMEOUT_MS = 10_000;
/** Longest delay a Node timer honours; larger ones fire after 1 ms. */
export const MAX_STOP_TIMEOUT_MS = 2_147_483_647;

// Overload drops are logged at info once per this many.
const DROP_LOG_INTERVAL = 100;

export interface EventWriterOptions {
  /** Directory holding this simulation's segments. Created when missing. */
  outputDir: string;
  simulationId: string;
  logger: Logger;
  verbosity?: VerbosityLevel;
  mode?: WriteMode;
  maxQueueSize?: number;
  /** Rotation threshold in bytes. */
  maxFileSize?: number;
}

type WriterState = 'created' | 'running' | 'stopped';

/**
 * Append-only sink for one simulation's events.
 *
 * Concurrent mode: `emit()` only enqueues; a single async consumer drains
 * the bounded queue into the current segment. A full queue drops the event
 * and counts it.
 *
 * Direct mode: `emit()` appends and fsyncs on the caller's turn, so the line
 * is on disk when it returns.
 *
 * Neither `emit()`, `start()` nor `stop()` throws. Failures are logged and
 * the writer keeps going.
 */
export class EventWriter {
  readonly outputDir: string;
  readonly simulationId: string;
  readonly verbosity: VerbosityLevel;
  readonly mode: WriteMode;
  readonly maxFileSize: number;
  readonly maxQueueSize: number;
  readonly currentFile: string;

  private readonly log: Logger;
  private readonly queue: BoundedQueue<SimulationEvent> | null;
  private state: WriterState = 'created';
  private consumer: Promise<void> | null = null;
  private size = 0;
  private dropped = 0;
  private lastRotationMicros = 0;

  constructor(options: EventWriterOptions) {
    this.outputDir = options.outputDir;
    this.simulationId = options.simulationId;
    this.verbosity = options.verbosity ?? 'ACTION';
    this.mode = options.mode ?? 'concurrent';
    this.maxFileSize = options.maxFileSize ?? DEFAULT_MAX_FILE_SIZE;
    this.maxQueueSize = options.maxQueueSize ?? DEFAULT_MAX_QUEUE_SIZE;
    this.currentFile = join(this.outputDir, CURRENT_SEGMENT);
    this.log = options.logger.child({ simulation_id: this.simulationId });

    if (!Number.isInteger(this.maxFileSize) || this.maxFileSize < 1) {
      throw new RangeError(`maxFileSize must be a positive integer, got ${this.maxFileSize}`);
    }

    this.queue = this.mode === 'concurrent' ? new BoundedQueue(this.maxQueueSize) : null;

    try {
      mkdirSync(this.outputDir, { recursive: true });
      const existing = statSync(this.currentFile, { throwIfNoEntry: false });
      this.size = existing?.isFile() === true ? existing.size : 0;
    } catch (err: unknown) {
      this.log.error({ err, outputDir: this.outputDir }, 'Failed to prepare event output directory');
    }

    this.log.info(
      {
        outputDir: this.outputDir,
        mode: this.mode,
        verbosity: this.verbosity,
        maxFileSize: this.maxFileSize,
        maxQueueSize: this.maxQueueSize,
      },
      'Event writer created',
    );
  }

  /** Bytes in the current segment as tracked by this writer. */
  get currentSize(): number {
    return this.size;
  }

  /** Events lost to a full or closed queue. Verbosity-filtered events are not counted. */
  get droppedCount(): number {
    return this.dropped;
  }

  get isRunning(): boolean {
    return this.state === 'running';
  }

  // ─── Lifecycle ──────────────────────────────────────────────

  start(): void {
    if (this.state !== 'created') {
      this.log.debug({ state: this.state }, 'Event writer start ignored');
      return;
    }
    this.state = 'running';

    if (this.queue === null) {
      this.log.info('Event writer started (direct mode)');
      return;
    }

    this.consumer = this.consume(this.queue).catch((err: unknown) => {
      this.log.error({ err }, 'Event consumer terminated unexpectedly');
    });
    this.log.info('Event writer started (concurrent mode)');
  }

  /**
   * Closes the queue and waits up to `timeoutMs` for it to drain. Events
   * still queued at the deadline are discarded and counted as dropped.
   * A non-finite timeout waits for the drain however long it takes.
   */
  async stop(timeoutMs: number = DEFAULT_STOP_TIMEOUT_MS): Promise<void> {
    if (this.state === 'stopped') return;
    const consumer = this.consumer;
    this.state = 'stopped';

    if (this.queue === null) {
      this.log.info({ droppedCount: this.dropped }, 'Event writer stopped');
      return;
    }

    this.queue.close();

    if (consumer !== null && !Number.isFinite(timeoutMs)) {
      await consumer;
    } else if (consumer !== null) {
      const deadline = new AbortController();
      const waitMs = Math.min(Math.max(0, timeoutMs), MAX_STOP_TIMEOUT_MS);
      // Aborting the timer rejects it; that rejection only means "drained first".
      const timedOut = delay(waitMs, undefined, { signal: deadline.signal }).catch(() => undefined);
      await Promise.race([consumer, timedOut]);
      deadline.abort();
    }

    const discarded = this.queue.clear();
    if (discarded > 0) {
      this.dropped += discarded;
      this.log.warn(
        { discarded, timeoutMs },
        'Event writer stopped with undelivered events',
      );
    }

    this.log.info({ droppedCount: this.dropped }, 'Event writer stopped');
  }

  // ─── Producer API ───────────────────────────────────────────

  emit(event: SimulationEvent): void {
    try {
      if (!shouldLogEvent(event.event_type, this.verbosity)) return;

      if (this.queue === null) {
        this.writeDirect(event);
        return;
      }

      if (!this.queue.offer(event)) {
        this.recordDrop(event);
      }
    } catch (err: unknown) {
      this.log.error({ err, event_id: event.event_id }, 'Failed to emit event');
    }
  }

  // ─── Internals ──────────────────────────────────────────────

  private recordDrop(event: SimulationEvent): void {
    this.dropped++;
    const context = {
      event_id: event.event_id,
      event_type: event.event_type,
      droppedCount: this.dropped,
      closed: this.queue?.isClosed ?? false,
    };
    if (this.dropped % DROP_LOG_INTERVAL === 0) {
      this.log.info(context, 'Event queue overloaded, dropping events');
    } else {
      this.log.debug(context, 'Event dropped');
    }
  }

  private async consume(queue: BoundedQueue<SimulationEvent>): Promise<void> {
    for (;;) {
      const event = await queue.take();
      if (event === undefined) return;
      await this.writeQueued(event);
    }
  }

  private writeDirect(event: SimulationEvent): void {
    try {
      this.size += appendLineSync(this.currentFile, `${serializeEvent(event)}\n`);
    } catch (err: unknown) {
      this.log.error({ err, event_id: event.event_id, file: this.currentFile }, 'Failed to write event');
      return;
    }
    if (this.size > this.maxFileSize) this.rotateSync();
  }

  private async writeQueued(event: SimulationEvent): Promise<void> {
    try {
      this.size += await appendLine(this.currentFile, `${serializeEvent(event)}\n`);
    } catch (err: unknown) {
      this.log.error({ err, event_id: event.event_id, file: this.currentFile }, 'Failed to write event');
      return;
    }
    if (this.size > this.maxFileSize) await this.rotate();
  }

  /** Microsecond stamp for the next rotated name, strictly after the last one. */
  private nextRotationMicros(): number {
    this.lastRotationMicros = Math.max(epochMicrosNow(), this.lastRotationMicros + 1);
    return this.lastRotationMicros;
  }

  private rotateSync(): void {
    const rotatedSize = this.size;
    try {
      const { rotatedPath, epochMicros } = rotateSegmentSync(this.outputDir, this.nextRotationMicros());
      this.lastRotationMicros = epochMicros;
      this.log.info({ rotatedPath, rotatedSize }, 'Rotated event segment');
    } catch (err: unknown) {
      this.log.error({ err, file: this.currentFile }, 'Failed to rotate event segment');
    }
    this.size = 0;
  }

  private async rotate(): Promise<void> {
    const rotatedSize = this.size;
    try {
      const { rotatedPath, epochMicros } = await rotateSegment(this.outputDir, this.nextRotationMicros());
      this.lastRotationMicros = epochMicros;
      this.log.info({ rotatedPath, rotatedSize }, 'Rotated event segment');
    } catch (err: unknown) {
      this.log.error({ err, file: this.currentFile }, 'Failed to rotate event segment');
    }
    this.size = 0;
  }
}
