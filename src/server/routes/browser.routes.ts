/**
 * Browser Routes
 *
 * Routes for browser status.
 */

import { Router } from 'express';
import { createBrowserController } from '../controllers/browser.controller';
import type { BrowserStatusSource } from '../controllers/browser.controller';
import { asyncHandler } from '../middleware';

export function createBrowserRoutes(browser: BrowserStatusSource): Router {
  const router = Router();
  const browserController = createBrowserController(browser);

  // GET /browser/status - Get browser status
  router.get('/status', asyncHandler(browserController.getStatus));

  return router;
}
