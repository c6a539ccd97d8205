import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { Logger } from 'pino';
import { EventService } from '../application/event-service.js';

export interface EventServicePluginOptions {
  outputRoot: string;
  logger: Logger;
}

/**
 * Decorates `fastify.eventService`, a reader over `outputRoot`.
 * The service holds no handles between requests, so there is nothing to close.
 */
async function eventServicePlugin(
  fastify: FastifyInstance,
  options: EventServicePluginOptions,
): Promise<void> {
  const service = new EventService({ outputRoot: options.outputRoot, logger: options.logger });

  fastify.decorate('eventService', service);
  fastify.log.info({ outputRoot: options.outputRoot }, 'Event service ready');
}

export default fp(eventServicePlugin, {
  name: 'event-service',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.eventService` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    eventService: EventService;
  }
}
