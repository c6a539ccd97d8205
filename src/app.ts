import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import type { Logger } from 'pino';
import { eventServicePlugin } from './infrastructure/index.js';
import type { AppConfig } from './infrastructure/index.js';
import { healthRoutes, simulationRoutes } from './interfaces/http/index.js';

/**
 * Assembles the query server without listening, so tests can drive it
 * through `inject()`. Plugins load on `ready()` / `listen()`.
 *
 * Order:
 * 1) Infrastructure plugins
 * 2) HTTP routes
 */
export function buildApp(config: AppConfig, logger: Logger): FastifyInstance {
  const fastify = Fastify({
    logger: { level: config.LOG_LEVEL },
  });

  fastify.register(eventServicePlugin, {
    outputRoot: config.EVENTS_OUTPUT_ROOT,
    logger,
  });

  fastify.register(healthRoutes);
  fastify.register(simulationRoutes);

  return fastify;
}
