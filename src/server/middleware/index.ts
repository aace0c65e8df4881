/**
 * Middleware Index
 *
 * Re-exports all middleware for convenient importing.
 */

export { errorHandler, notFoundHandler, AppError } from './error-handler';
export { asyncHandler } from './async-wrapper';
export type { AsyncRequestHandler } from './async-wrapper';
