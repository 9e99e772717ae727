/**
 * Catalog module.
 *
 * Record types, key normalization and the in-memory tool index.
 */

export * from './types.js';
export * from './normalize.js';
export * from './CatalogIndex.js';
