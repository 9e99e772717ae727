/**
 * Handler exports for the API layer.
 */

export * from './CatalogHandlers.js';
