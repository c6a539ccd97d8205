export * from './events/index.js';
export { configSchema, loadConfig, writerOptionsFromConfig } from './config.js';
export type { AppConfig } from './config.js';
export { createLogger } from './logger.js';
export { default as eventServicePlugin } from './event-service-plugin.js';
export type { EventServicePluginOptions } from './event-service-plugin.js';
