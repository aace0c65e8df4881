/**
 * Express Application
 *
 * Builds the HTTP app around injected dependencies so it can be exercised
 * without a browser.
 */

import express from 'express';
import type { Express } from 'express';
import cors from 'cors';
import { createApiRouter } from './routes';
import type { ApiDependencies } from './routes';
import { errorHandler, notFoundHandler } from './middleware';

export function createApp(deps: ApiDependencies): Express {
  const app = express();

  app.use(express.json({ limit: '10kb' }));
  app.use(cors());

  app.use(createApiRouter(deps));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
