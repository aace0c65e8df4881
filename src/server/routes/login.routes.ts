/**
 * Login Routes
 *
 * Routes for the chayns login endpoint.
 */

import { Router } from 'express';
import { createLoginController } from '../controllers/login.controller';
import type { LoginWorkflow } from '../login';
import { asyncHandler } from '../middleware';

export function createLoginRoutes(workflow: LoginWorkflow, path: string): Router {
  const router = Router();
  const loginController = createLoginController(workflow);

  // POST /aichat/chayns/login (configurable) - Log in and return the token
  router.post(path, asyncHandler(loginController.login));

  return router;
}
