/**
 * Error Handler Middleware
 *
 * Centralized error handling for the Express application.
 */

import type { Request, Response, NextFunction } from 'express';
import type { ErrorResponse } from '../types';

/**
 * Application error carrying the HTTP status it should be answered with.
 */
export class AppError extends Error {
  public readonly statusCode: number;

  constructor(statusCode: number, message: string) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }

  static badRequest(message: string): AppError {
    return new AppError(400, message);
  }

  static unauthorized(message: string): AppError {
    return new AppError(401, message);
  }

  static internal(message: string): AppError {
    return new AppError(500, message);
  }

  static badGateway(message: string): AppError {
    return new AppError(502, message);
  }

  static gatewayTimeout(message: string): AppError {
    return new AppError(504, message);
  }
}

/**
 * Errors raised by body-parser carry the status they should produce.
 */
function bodyParserStatus(err: Error): number | undefined {
  if (!('status' in err) || typeof err.status !== 'number') {
    return undefined;
  }
  return err.status >= 400 && err.status < 500 ? err.status : undefined;
}

/**
 * Express error handling middleware.
 * Should be registered after all routes.
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response<ErrorResponse>,
  _next: NextFunction
): void {
  const development = process.env['NODE_ENV'] === 'development';
  const route = `${req.method} ${req.path}`;

  // Parser messages quote the request body, which carries the password
  if (err.name === 'SyntaxError' && 'body' in err) {
    console.error(`[Error] ${route}: invalid JSON body`);
    res.status(400).json({
      error: 'Invalid JSON in request body'
    });
    return;
  }

  const status = bodyParserStatus(err);
  if (status !== undefined) {
    console.error(`[Error] ${route}: request body rejected (${status})`);
    res.status(status).json({ error: err.message });
    return;
  }

  console.error(`[Error] ${route}:`, err.message);

  if (err instanceof AppError) {
    res.status(err.statusCode).json({
      error: err.message,
      ...(development && { stack: err.stack })
    });
    return;
  }

  // Default to 500 for unknown errors
  console.error('[Error] Unhandled error:', err);
  res.status(500).json({
    error: 'Internal server error',
    ...(development && {
      details: err.message,
      stack: err.stack
    })
  });
}

/**
 * 404 handler for unmatched routes.
 */
export function notFoundHandler(req: Request, res: Response<ErrorResponse>): void {
  res.status(404).json({
    error: `Route not found: ${req.method} ${req.path}`
  });
}
