import { join } from 'node:path';
import { z } from 'zod';
import type { Logger } from 'pino';
import { VERBOSITY_LEVELS } from '../domain/index.js';
import {
  DEFAULT_MAX_FILE_SIZE,
  DEFAULT_MAX_QUEUE_SIZE,
  DEFAULT_STOP_TIMEOUT_MS,
  MAX_STOP_TIMEOUT_MS,
} from './events/index.js';
import type { EventWriterOptions } from './events/index.js';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

/**
 * Environment variables read at startup. Numeric values arrive as strings
 * and are coerced; anything out of range fails fast with a ZodError.
 */
export const configSchema = z.object({
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  EVENTS_OUTPUT_ROOT: z.string().min(1).default('output'),
  EVENT_VERBOSITY: z.enum(VERBOSITY_LEVELS).default('ACTION'),
  EVENT_WRITE_MODE: z.enum(['concurrent', 'direct']).default('concurrent'),
  EVENT_MAX_QUEUE_SIZE: z.coerce.number().int().positive().default(DEFAULT_MAX_QUEUE_SIZE),
  EVENT_MAX_FILE_SIZE: z.coerce.number().int().positive().default(DEFAULT_MAX_FILE_SIZE),
  EVENT_STOP_TIMEOUT_MS: z.coerce.number().int().min(0).max(MAX_STOP_TIMEOUT_MS).default(DEFAULT_STOP_TIMEOUT_MS),
});

export type AppConfig = z.output<typeof configSchema>;

/** @throws ZodError when a variable is present but invalid */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return configSchema.parse(env);
}

/** Writer options for `simulationId`, writing under the configured output root. */
export function writerOptionsFromConfig(
  config: AppConfig,
  simulationId: string,
  logger: Logger,
): EventWriterOptions {
  return {
    outputDir: join(config.EVENTS_OUTPUT_ROOT, simulationId),
    simulationId,
    logger,
    verbosity: config.EVENT_VERBOSITY,
    mode: config.EVENT_WRITE_MODE,
    maxQueueSize: config.EVENT_MAX_QUEUE_SIZE,
    maxFileSize: config.EVENT_MAX_FILE_SIZE,
  };
}
