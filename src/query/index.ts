/**
 * Query module.
 *
 * Name lookup, functional search, version listing and catalog browsing.
 */

export * from './types.js';
export * from './scoring.js';
export * from './resolution.js';
export * from './QueryEngine.js';
export * from './router.js';
