/**
 * runmeta — metadata service for machine-learning runs and artifacts.
 *
 * Public exports for programmatic use. `main.ts` starts the HTTP server.
 */

export { createApp, createAppContext, createStoreFromConfig } from './server';
export type { AppContext } from './server';
export * from './config';
export * from './logger';
export * from './domain';
export * from './encoding';
export * from './listing/listing';
export * from './service/metadata-service';
export * from './storage';
