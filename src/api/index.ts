/**
 * HTTP API layer.
 */

export * from './types.js';
export * from './handlers/index.js';
export * from './routes.js';
