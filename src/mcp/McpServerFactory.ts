/**
 * Builds the MCP server: catalog tools, catalog resources and the discovery prompt.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppContext } from '../server.js';
import { registerCatalogTools } from './tools/catalogTools.js';
import { registerCatalogResources } from './resources/catalogResources.js';
import { registerDiscoveryPrompts } from './prompts/discoveryPrompts.js';

/** Name and version reported to MCP clients. */
export const MCP_SERVER_INFO = { name: 'biocontainer-finder', version: '0.1.0' } as const;

/**
 * Create and configure an MCP server bound to the given AppContext.
 */
export function createMcpServer(ctx: AppContext): McpServer {
  const server = new McpServer(
    { ...MCP_SERVER_INFO },
    {
      capabilities: {
        tools: {},
        resources: {},
        prompts: {},
      },
    }
  );

  registerCatalogTools(server, ctx);
  registerCatalogResources(server, ctx);
  registerDiscoveryPrompts(server, ctx);

  return server;
}
