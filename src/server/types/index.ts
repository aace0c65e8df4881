/**
 * Server Types Index
 *
 * Re-exports all server types for convenient importing.
 */

export type * from './api.types';
