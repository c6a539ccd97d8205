/**
 * On-disk layout of a simulation's event log.
 *
 *   <outputRoot>/<simulationId>/events.jsonl                              current segment
 *   <outputRoot>/<simulationId>/events_YYYY-MM-DD_HH-MM-SS-ffffff.jsonl   rotated, older
 *
 * Rotated names carry a UTC stamp with microsecond precision and fixed
 * widths, so lexicographic order of rotated names is chronological order.
 * The current segment is always the newest.
 *
 * Each append opens, writes and closes the current segment, so a rename
 * between two appends always lands the next line in the fresh file.
 */

import {
  closeSync,
  createReadStream,
  existsSync,
  fsyncSync,
  openSync,
  renameSync,
  writeFileSync,
  writeSync,
} from 'node:fs';
import { open, readdir, rename, stat, writeFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { createInterface } from 'node:readline';

export const CURRENT_SEGMENT = 'events.jsonl';

const SEGMENT_PATTERN = /^events(?:_\d{4}-\d{2}-\d{2}_\d{2}-\d{2}-\d{2}-\d{6})?\.jsonl$/;

export function isSegmentFile(name: string): boolean {
  return SEGMENT_PATTERN.test(name);
}

/**
 * Directory holding one simulation's segments.
 * Returns null when `simulationId` is not a single, plain path segment.
 */
export function simulationDirectory(outputRoot: string, simulationId: string): string | null {
  if (
    simulationId.length === 0 ||
    simulationId === '.' ||
    simulationId === '..' ||
    simulationId.includes('/') ||
    simulationId.includes('\\') ||
    basename(simulationId) !== simulationId
  ) {
    return null;
  }
  return join(outputRoot, simulationId);
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/** `events_<YYYY-MM-DD>_<HH-MM-SS>-<micro>.jsonl` for a microsecond epoch stamp. */
export function rotatedSegmentName(epochMicros: number): string {
  const at = new Date(Math.floor(epochMicros / 1000));
  const date = `${at.getUTCFullYear()}-${pad(at.getUTCMonth() + 1)}-${pad(at.getUTCDate())}`;
  const time = `${pad(at.getUTCHours())}-${pad(at.getUTCMinutes())}-${pad(at.getUTCSeconds())}`;
  return `events_${date}_${time}-${pad(epochMicros % 1_000_000, 6)}.jsonl`;
}

/** Wall clock in microseconds since the epoch. */
export function epochMicrosNow(): number {
  return Math.floor((performance.timeOrigin + performance.now()) * 1000);
}

/**
 * Orders segment names oldest first: rotated segments by name, then the
 * current segment. Names that are not segments are dropped.
 */
export function orderSegments(names: readonly string[]): string[] {
  const rotated = names
    .filter((name) => name !== CURRENT_SEGMENT && isSegmentFile(name))
    .sort();
  return names.includes(CURRENT_SEGMENT) ? [...rotated, CURRENT_SEGMENT] : rotated;
}

/**
 * Absolute paths of every segment in `dir`, oldest first.
 * Returns [] when the directory is missing or unreadable.
 */
export async function listSegmentFiles(dir: string): Promise<string[]> {
  let names: string[];
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    names = entries.filter((entry) => entry.isFile()).map((entry) => entry.name);
  } catch {
    return [];
  }
  return orderSegments(names).map((name) => join(dir, name));
}

/**
 * Streams the lines of a segment. A trailing partial line (writer mid-append)
 * is yielded as-is; callers skip what they cannot parse.
 */
export async function* readSegmentLines(filePath: string): AsyncGenerator<string> {
  const input = createReadStream(filePath, { encoding: 'utf-8' });
  const lines = createInterface({ input, crlfDelay: Infinity });
  try {
    for await (const line of lines) {
      yield line;
    }
  } finally {
    lines.close();
    input.destroy();
  }
}

// ─── Append ──────────────────────────────────────────────────

/**
 * Appends `data`, fsyncs, closes. Returns the number of bytes written.
 */
export function appendLineSync(filePath: string, data: string): number {
  const bytes = Buffer.from(data, 'utf-8');
  const fd = openSync(filePath, 'a');
  try {
    writeSync(fd, bytes);
    fsyncSync(fd);
  } finally {
    closeSync(fd);
  }
  return bytes.length;
}

/** Async counterpart of `appendLineSync`, without the fsync. */
export async function appendLine(filePath: string, data: string): Promise<number> {
  const bytes = Buffer.from(data, 'utf-8');
  const handle = await open(filePath, 'a');
  try {
    await handle.write(bytes);
  } finally {
    await handle.close();
  }
  return bytes.length;
}

// ─── Rotation ────────────────────────────────────────────────

export interface RotationResult {
  readonly rotatedPath: string;
  /** Stamp actually used (bumped past names already on disk). */
  readonly epochMicros: number;
}

/**
 * Renames the current segment to a timestamped name and recreates an
 * empty current segment.
 */
export function rotateSegmentSync(dir: string, epochMicros: number): RotationResult {
  let stamp = epochMicros;
  while (existsSync(join(dir, rotatedSegmentName(stamp)))) stamp++;

  const rotatedPath = join(dir, rotatedSegmentName(stamp));
  renameSync(join(dir, CURRENT_SEGMENT), rotatedPath);
  writeFileSync(join(dir, CURRENT_SEGMENT), '', { flag: 'a' });
  return { rotatedPath, epochMicros: stamp };
}

async function pathExists(path: string): Promise<boolean> {
  return stat(path).then(
    () => true,
    () => false,
  );
}

export async function rotateSegment(dir: string, epochMicros: number): Promise<RotationResult> {
  let stamp = epochMicros;
  while (await pathExists(join(dir, rotatedSegmentName(stamp)))) stamp++;

  const rotatedPath = join(dir, rotatedSegmentName(stamp));
  await rename(join(dir, CURRENT_SEGMENT), rotatedPath);
  await writeFile(join(dir, CURRENT_SEGMENT), '', { flag: 'a' });
  return { rotatedPath, epochMicros: stamp };
}
