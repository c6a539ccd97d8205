export {
  EventWriter,
  DEFAULT_MAX_FILE_SIZE,
  DEFAULT_MAX_QUEUE_SIZE,
  DEFAULT_STOP_TIMEOUT_MS,
  MAX_STOP_TIMEOUT_MS,
} from './event-writer.js';
export type { EventWriterOptions, WriteMode } from './event-writer.js';
export { BoundedQueue } from './bounded-queue.js';
export {
  CURRENT_SEGMENT,
  isSegmentFile,
  simulationDirectory,
  rotatedSegmentName,
  orderSegments,
  listSegmentFiles,
  readSegmentLines,
} from './segment-files.js';
