/**
 * Express server configuration.
 *
 * Read-only inspection surface over one run's artifact store. There are no
 * mutation routes and no authentication.
 */

import express from 'express';
import { ArtifactStore } from './storage/artifact-store';
import { createArtifactRoutes } from './api/artifacts';
import { errorHandler } from './api/middleware';

const startTime = Date.now();

/** Application context: the store being inspected. */
export interface AppContext {
  store: ArtifactStore;
}

/** Create the application context. */
export function createAppContext(store?: ArtifactStore): AppContext {
  return { store: store ?? new ArtifactStore() };
}

/** Create and configure the Express application. */
export function createApp(context?: AppContext): express.Application {
  const ctx = context ?? createAppContext();
  const app = express();

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      version: '0.1.0',
      uptimeMs: Date.now() - startTime,
      artifacts: ctx.store.size,
    });
  });

  app.use('/', createArtifactRoutes(ctx.store));

  app.use(errorHandler);

  return app;
}
