import { buildApp } from './app.js';
import { createLogger, loadConfig } from './infrastructure/index.js';

/**
 * Bootstrap the query server.
 *
 * Order:
 * 1) Config + root logger
 * 2) Fastify app (plugins, routes)
 * 3) Shutdown hooks
 * 4) listen()
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const log = createLogger(config.LOG_LEVEL);

  const fastify = buildApp(config, log);

  const shutdown = (signal: NodeJS.Signals): void => {
    log.info({ signal }, 'Shutting down');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await fastify.listen({ host: config.HOST, port: config.PORT });
  log.info({ outputRoot: config.EVENTS_OUTPUT_ROOT }, 'Event query server listening');
}

main().catch((err: unknown) => {
  console.error('Fatal: failed to start server', err);
  process.exit(1);
});
