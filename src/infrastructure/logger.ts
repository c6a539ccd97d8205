import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';

/** Root process logger; components receive children of it. */
export function createLogger(level: LoggerOptions['level'] = 'info'): Logger {
  return pino({ level, base: { service: 'turnlog' } });
}
