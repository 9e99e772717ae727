/**
 * Loader module.
 *
 * Reads the metadata catalog and container cache into validated records.
 */

export * from './errors.js';
export * from './schemas.js';
export * from './MetadataLoader.js';
export * from './ContainerCacheLoader.js';
