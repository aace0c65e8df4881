/**
 * Utils Index
 *
 * Re-exports all utility functions for convenient importing.
 */

export { delay, pollUntil } from './poll';
export type { PollOptions } from './poll';
export { isRecord, errorMessage } from './guards';
