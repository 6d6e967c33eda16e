/**
 * Express server configuration.
 *
 * Assembles the API surface with middleware, routes, and dependency
 * injection. The store client is created once and handed to the service;
 * nothing else is shared between requests.
 */

import express from 'express';
import { ServiceConfig } from './config';
import { maskSecret } from './domain/errors';
import { MetadataService } from './service/metadata-service';
import { StoreClient } from './storage/store-client';
import { createMemoryStore } from './storage/memory-store';
import { V3ioStoreClient } from './storage/v3io-client';
import { createArtifactRoutes } from './api/artifacts';
import { createLogRoutes } from './api/logs';
import { createRunRoutes } from './api/runs';
import { errorHandler, requestContext } from './api/middleware';
import { logger } from './logger';

const startTime = Date.now();

/** Largest document accepted in a request body. */
const BODY_LIMIT = '10mb';

/** Application context containing all services. */
export interface AppContext {
  store: StoreClient;
  service: MetadataService;
  storeKind: string;
}

/** Create the application context; defaults to an in-memory store. */
export function createAppContext(store?: StoreClient, storeKind?: string): AppContext {
  const appStore = store ?? createMemoryStore();
  return {
    store: appStore,
    service: new MetadataService(appStore),
    storeKind: storeKind ?? (store ? 'custom' : 'memory'),
  };
}

/** Build the store client a configuration names. */
export function createStoreFromConfig(config: ServiceConfig): StoreClient {
  if (config.store === 'memory') {
    logger.warn('Using the in-memory store; documents are lost on restart');
    return createMemoryStore();
  }

  const endpoint = config.v3io.endpoint;
  if (!endpoint) {
    throw new Error('The v3io store needs an endpoint');
  }
  logger.info('Using the v3io store', {
    endpoint,
    container: config.v3io.container,
    accessKey: config.v3io.accessKey ? maskSecret(config.v3io.accessKey) : undefined,
  });
  return new V3ioStoreClient({
    endpoint,
    container: config.v3io.container,
    accessKey: config.v3io.accessKey,
  });
}

/** Create and configure the Express application. */
export function createApp(context?: AppContext): express.Application {
  const ctx = context ?? createAppContext();
  const app = express();

  // Documents are stored verbatim, so every body is read raw
  app.use(express.raw({ type: () => true, limit: BODY_LIMIT }));
  app.use(requestContext());

  app.get('/healthz', (_req, res) => {
    res.json({
      status: 'ok',
      uptimeMs: Date.now() - startTime,
      storage: ctx.storeKind,
    });
  });

  app.use(createLogRoutes(ctx.service));
  app.use(createRunRoutes(ctx.service));
  app.use(createArtifactRoutes(ctx.service));

  app.use(errorHandler);

  return app;
}
