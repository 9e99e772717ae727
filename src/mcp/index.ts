/**
 * Public exports for the MCP server layer.
 */

export { createMcpServer, MCP_SERVER_INFO } from './McpServerFactory.js';
export { mcpPlugin } from './fastifyPlugin.js';
export type { McpPluginOptions } from './fastifyPlugin.js';
export { textResult, jsonResult, errorResult, guardTool } from './helpers.js';
export { createCatalogToolHandlers } from './tools/catalogTools.js';
export type { CatalogToolHandlers } from './tools/catalogTools.js';
