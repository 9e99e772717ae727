/**
 * MCP tools for container lookup and functional search.
 *
 * Every tool answers in Markdown by default and with the structured result
 * when `raw` is set. A name that does not resolve is an ordinary answer,
 * not a tool error.
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { AppContext } from '../../server.js';
import { DEFAULT_LIST_LIMIT } from '../../query/QueryEngine.js';
import {
  renderContainerVersions,
  renderNotFound,
  renderSearchResults,
  renderToolList,
  renderToolResult,
} from '../../format/TextPresenter.js';
import { guardTool, jsonResult, textResult } from '../helpers.js';

export interface FindToolArgs {
  tool_name: string;
  raw?: boolean | undefined;
}

export interface SearchByFunctionArgs {
  description: string;
  limit?: number | undefined;
  raw?: boolean | undefined;
}

export interface ListToolsArgs {
  limit?: number | undefined;
  raw?: boolean | undefined;
}

/**
 * Tool bodies, separate from registration so they can be called directly.
 */
export function createCatalogToolHandlers(ctx: AppContext) {
  return {
    findTool(args: FindToolArgs): CallToolResult {
      const result = ctx.engine.findTool(args.tool_name);
      if (args.raw) return jsonResult(result);
      return textResult(result.status === 'found' ? renderToolResult(result) : renderNotFound(result));
    },

    searchByFunction(args: SearchByFunctionArgs): CallToolResult {
      const limit = args.limit ?? ctx.config.search.defaultLimit;
      const hits = ctx.engine.searchByFunction(args.description, { limit });
      if (args.raw) return jsonResult({ query: args.description, hits });
      return textResult(renderSearchResults(args.description, hits));
    },

    getContainerVersions(args: FindToolArgs): CallToolResult {
      const result = ctx.engine.getContainerVersions(args.tool_name);
      if (args.raw) return jsonResult(result);
      return textResult(result.status === 'found' ? renderContainerVersions(result) : renderNotFound(result));
    },

    listAvailableTools(args: ListToolsArgs): CallToolResult {
      const tools = ctx.engine.listAvailableTools(args.limit ?? DEFAULT_LIST_LIMIT);
      if (args.raw) return jsonResult({ tools, total: tools.length });
      return textResult(renderToolList(tools));
    },
  };
}

export type CatalogToolHandlers = ReturnType<typeof createCatalogToolHandlers>;

const raw = z.boolean().optional().describe('Return the structured result as JSON instead of Markdown');

export function registerCatalogTools(server: McpServer, ctx: AppContext): void {
  const handlers = createCatalogToolHandlers(ctx);

  // find_tool — Metadata and newest container for a named tool
  server.tool(
    'find_tool',
    'Find a bioinformatics tool by name and return its metadata, the newest Singularity container ' +
      'on CVMFS with usage examples, and the other available versions.',
    {
      tool_name: z.string().describe('Tool name, e.g. "fastqc" or "bwa-mem"; case and -/_ are ignored'),
      raw,
    },
    async (args) => guardTool(() => handlers.findTool(args))
  );

  // search_by_function — Rank tools by what they do
  server.tool(
    'search_by_function',
    'Search tools by what they do, e.g. "quality control" or "variant calling". Matches ids, names, ' +
      'descriptions, EDAM operations and topics.',
    {
      description: z.string().describe('Description of the task'),
      limit: z.number().int().optional().describe('Maximum number of results; 0 returns all'),
      raw,
    },
    async (args) => guardTool(() => handlers.searchByFunction(args))
  );

  // get_container_versions — Every container build of a tool
  server.tool(
    'get_container_versions',
    'List every available container version of a tool, newest first, with CVMFS paths, sizes and dates.',
    {
      tool_name: z.string().describe('Tool name'),
      raw,
    },
    async (args) => guardTool(() => handlers.getContainerVersions(args))
  );

  // list_available_tools — Browse tool ids
  server.tool(
    'list_available_tools',
    'List tool ids that have metadata, alphabetically.',
    {
      limit: z.number().int().optional().describe('Maximum number of ids (default 50); 0 returns all'),
      raw,
    },
    async (args) => guardTool(() => handlers.listAvailableTools(args))
  );
}
