/**
 * CatalogHandlers — HTTP handlers for the catalog queries.
 *
 * Thin adapters between Fastify and the QueryEngine. A lookup that does not
 * resolve is a 404 carrying the original query.
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import type { AppContext } from '../../server.js';
import { DEFAULT_LIST_LIMIT } from '../../query/QueryEngine.js';
import type { ContainerVersions, ToolResult } from '../../query/types.js';
import type {
  ApiError,
  HealthResponse,
  ListToolsQuery,
  ListToolsResponse,
  SearchQuery,
  SearchResponse,
  ToolParams,
} from '../types.js';

const INTEGER_PATTERN = /^-?\d+$/;

/**
 * Parse a `limit` query parameter. Absent means the fallback; anything
 * other than an integer is rejected.
 */
export function parseLimit(value: string | undefined, fallback: number): number | undefined {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const trimmed = value.trim();
  return INTEGER_PATTERN.test(trimmed) ? parseInt(trimmed, 10) : undefined;
}

function badLimit(reply: FastifyReply, value: string | undefined): ApiError {
  reply.status(400);
  return {
    error: 'BAD_REQUEST',
    message: `limit must be an integer, got '${value ?? ''}'`,
  };
}

function notFound(reply: FastifyReply, query: string): ApiError {
  reply.status(404);
  return {
    error: 'NOT_FOUND',
    message: `No tool found matching '${query}'`,
    query,
  };
}

/**
 * Create catalog handlers bound to an AppContext.
 */
export function createCatalogHandlers(ctx: AppContext) {
  return {
    /**
     * GET /health
     */
    async getHealth(
      _request: FastifyRequest,
      _reply: FastifyReply
    ): Promise<HealthResponse> {
      const catalog = ctx.engine.stats();
      return {
        status: catalog.tools > 0 && catalog.containers > 0 ? 'ok' : 'degraded',
        timestamp: new Date().toISOString(),
        components: {
          catalog,
          cache: ctx.cacheInfo,
        },
      };
    },

    /**
     * GET /tools?limit=
     * Tool ids alphabetically; limit 0 returns all.
     */
    async listTools(
      request: FastifyRequest<{ Querystring: ListToolsQuery }>,
      reply: FastifyReply
    ): Promise<ListToolsResponse | ApiError> {
      const limit = parseLimit(request.query.limit, DEFAULT_LIST_LIMIT);
      if (limit === undefined) {
        return badLimit(reply, request.query.limit);
      }

      const tools = ctx.engine.listAvailableTools(limit);
      return { tools, total: tools.length };
    },

    /**
     * GET /tools/:name
     */
    async getTool(
      request: FastifyRequest<{ Params: ToolParams }>,
      reply: FastifyReply
    ): Promise<ToolResult | ApiError> {
      const result = ctx.engine.findTool(request.params.name);
      if (result.status === 'not-found') {
        return notFound(reply, result.query);
      }
      return result;
    },

    /**
     * GET /tools/:name/versions
     */
    async getVersions(
      request: FastifyRequest<{ Params: ToolParams }>,
      reply: FastifyReply
    ): Promise<ContainerVersions | ApiError> {
      const result = ctx.engine.getContainerVersions(request.params.name);
      if (result.status === 'not-found') {
        return notFound(reply, result.query);
      }
      return result;
    },

    /**
     * GET /search?q=&limit=
     */
    async search(
      request: FastifyRequest<{ Querystring: SearchQuery }>,
      reply: FastifyReply
    ): Promise<SearchResponse | ApiError> {
      const { q } = request.query;
      if (q === undefined || q.trim() === '') {
        reply.status(400);
        return {
          error: 'BAD_REQUEST',
          message: 'Query parameter q is required',
        };
      }

      const limit = parseLimit(request.query.limit, ctx.config.search.defaultLimit);
      if (limit === undefined) {
        return badLimit(reply, request.query.limit);
      }

      const hits = ctx.engine.searchByFunction(q, { limit });
      return { query: q, hits, total: hits.length };
    },
  };
}

export type CatalogHandlers = ReturnType<typeof createCatalogHandlers>;
