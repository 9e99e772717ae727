/**
 * biocontainer-finder — Find Singularity containers for bioinformatics tools.
 *
 * This is the main entry point for the library.
 */

// Version tags
export * from './version/index.js';

// Catalog records and index
export * from './catalog/index.js';

// Catalog file loading
export * from './loader/index.js';

// Queries
export * from './query/index.js';

// Text rendering
export * from './format/index.js';

// Configuration
export * from './config/types.js';
export * from './config/loader.js';

// HTTP API
export * from './api/index.js';

// MCP
export * from './mcp/index.js';

// Server
export { initializeApp, createServer, startServer } from './server.js';
export type { AppContext, InitializeOptions } from './server.js';
