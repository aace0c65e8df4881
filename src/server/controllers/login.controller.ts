/**
 * Login Controller
 *
 * Handles the HTTP side of a chayns login: validates the body, runs the
 * workflow once and maps its result to a response.
 */

import type { Request, Response } from 'express';
import { AppError } from '../middleware';
import type { LoginCredential, LoginFailureReason, LoginWorkflow } from '../login';
import type { LoginResponse } from '../types';
import { isRecord } from '../utils';

/**
 * Client-side failures answer 4xx; problems with the page or the browser
 * answer 5xx.
 */
export const FAILURE_ERRORS: Record<LoginFailureReason, (message: string) => AppError> = {
  InvalidCredentials: AppError.unauthorized,
  ElementNotFound: AppError.badGateway,
  IncompleteResult: AppError.badGateway,
  Timeout: AppError.gatewayTimeout,
  AutomationToolError: AppError.internal
};

/**
 * Validate the request body. Throws a 400 before any browser work starts.
 */
export function parseCredential(body: unknown): LoginCredential {
  if (!isRecord(body)) {
    throw AppError.badRequest('Request body must be a JSON object');
  }

  const { username, password } = body;
  if (typeof username !== 'string' || username.trim() === '') {
    throw AppError.badRequest('username is required');
  }
  if (typeof password !== 'string' || password === '') {
    throw AppError.badRequest('password is required');
  }

  return { username: username.trim(), password };
}

export function createLoginController(workflow: LoginWorkflow) {
  /**
   * POST <login route>
   * Log into chayns and return the user's token.
   */
  async function login(req: Request, res: Response<LoginResponse>): Promise<void> {
    const credential = parseCredential(req.body);
    const result = await workflow.attemptLogin(credential);

    if (!result.success) {
      throw FAILURE_ERRORS[result.reason](result.error);
    }

    const { user } = result;
    res.json({
      email: user.email,
      userid: user.userId,
      personid: user.personId,
      token: user.token
    });
  }

  return { login };
}
