/**
 * Async Wrapper Middleware
 *
 * Wraps async route handlers to properly catch and forward errors.
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';

/**
 * Type for async request handlers.
 */
export type AsyncRequestHandler = (
  req: Request,
  res: Response,
  next: NextFunction
) => Promise<void>;

/**
 * Wraps an async route handler to catch errors and forward them to Express error handler.
 *
 * @example
 * router.post('/login', asyncHandler(async (req, res) => {
 *   const result = await workflow.attemptLogin(req.body);
 *   res.json(result);
 * }));
 */
export function asyncHandler(fn: AsyncRequestHandler): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
