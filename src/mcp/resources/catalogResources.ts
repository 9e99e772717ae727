/**
 * MCP resources describing the loaded catalog.
 */

import { ResourceTemplate } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppContext } from '../../server.js';

/**
 * Cache header and index counts, as served by `catalog://cache-info`.
 */
export function describeCatalog(ctx: AppContext) {
  return {
    cache: ctx.cacheInfo,
    index: ctx.engine.stats(),
    sources: ctx.catalogPaths,
  };
}

/**
 * Percent-decode a tool name from a resource URI; undefined when the escape is malformed.
 */
export function decodeToolName(encoded: string): string | undefined {
  try {
    return decodeURIComponent(encoded);
  } catch (err) {
    if (err instanceof URIError) return undefined;
    throw err;
  }
}

export function registerCatalogResources(server: McpServer, ctx: AppContext): void {
  server.resource(
    'cache-info',
    'catalog://cache-info',
    {
      description: 'Container cache header (generation time, CVMFS root, entry counts) and index statistics',
      mimeType: 'application/json',
    },
    async (uri) => ({
      contents: [
        {
          uri: uri.href,
          mimeType: 'application/json',
          text: JSON.stringify(describeCatalog(ctx), null, 2),
        },
      ],
    })
  );

  server.resource(
    'tool-list',
    'catalog://tool-list',
    {
      description: 'Every tool id with metadata, one per line',
      mimeType: 'text/plain',
    },
    async (uri) => ({
      contents: [
        {
          uri: uri.href,
          mimeType: 'text/plain',
          text: ctx.engine.listAvailableTools(0).join('\n'),
        },
      ],
    })
  );

  server.resource(
    'tool',
    new ResourceTemplate('catalog://tool/{toolName}', { list: undefined }),
    { description: 'Lookup result for one tool: metadata and containers, newest first' },
    async (uri, variables) => {
      const toolName = decodeToolName(String(variables.toolName));
      const result = toolName === undefined ? undefined : ctx.engine.findTool(toolName);
      if (result === undefined || result.status === 'not-found') {
        return { contents: [] };
      }
      return {
        contents: [
          {
            uri: uri.href,
            mimeType: 'application/json',
            text: JSON.stringify(result, null, 2),
          },
        ],
      };
    }
  );
}
