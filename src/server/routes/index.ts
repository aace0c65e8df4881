/**
 * Routes Index
 *
 * Aggregates all route modules and exports a configured router.
 */

import { Router } from 'express';
import type { BrowserStatusSource } from '../controllers/browser.controller';
import { getHealth } from '../controllers/health.controller';
import type { LoginWorkflow } from '../login';
import { asyncHandler } from '../middleware';
import { createBrowserRoutes } from './browser.routes';
import { createLoginRoutes } from './login.routes';

export interface ApiDependencies {
  loginWorkflow: LoginWorkflow;
  browser: BrowserStatusSource;
  loginRoute: string;
}

/**
 * Create and configure the main API router.
 */
export function createApiRouter(deps: ApiDependencies): Router {
  const router = Router();

  // GET /health - Liveness
  router.get('/health', asyncHandler(getHealth));

  router.use('/browser', createBrowserRoutes(deps.browser));
  router.use(createLoginRoutes(deps.loginWorkflow, deps.loginRoute));

  return router;
}

export { createBrowserRoutes, createLoginRoutes };
