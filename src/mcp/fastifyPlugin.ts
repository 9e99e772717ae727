/**
 * Fastify plugin that mounts the MCP server on a route prefix.
 *
 * Registers POST / for JSON-RPC requests (stateless Streamable HTTP).
 * Returns 405 for GET / and DELETE / (no SSE or session teardown in stateless mode).
 */

import type { FastifyInstance, FastifyPluginOptions } from 'fastify';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';

export interface McpPluginOptions extends FastifyPluginOptions {
  /** Builds a fresh server for each request; a server holds one transport at a time */
  serverFactory: () => McpServer;
}

export async function mcpPlugin(
  fastify: FastifyInstance,
  opts: McpPluginOptions
): Promise<void> {
  const { serverFactory } = opts;

  // The MCP transport takes the parsed JSON body; replace Fastify's parsers in this scope
  fastify.removeAllContentTypeParsers();
  fastify.addContentTypeParser('application/json', { parseAs: 'string' }, (_req, body, done) => {
    const text = typeof body === 'string' ? body : body.toString('utf-8');
    try {
      done(null, JSON.parse(text));
    } catch (err) {
      done(err instanceof Error ? err : new Error(String(err)), undefined);
    }
  });

  // POST / — handle MCP JSON-RPC requests
  fastify.post('/', async (request, reply) => {
    // Stateless mode: no session ID generator
    const transport = new StreamableHTTPServerTransport({});
    const mcpServer = serverFactory();
    reply.raw.on('close', () => {
      mcpServer.close().catch((err: unknown) => {
        request.log.warn({ err }, 'Failed to close MCP server');
      });
    });

    // Cast needed because SDK Transport type doesn't align with exactOptionalPropertyTypes
    await mcpServer.connect(transport as unknown as Transport);

    await transport.handleRequest(
      request.raw,
      reply.raw,
      request.body
    );

    // Hijack so Fastify doesn't try to send a second response
    reply.hijack();
  });

  // GET / and DELETE / — not supported in stateless mode
  fastify.get('/', async (_request, reply) => {
    return reply.code(405).send({ error: 'METHOD_NOT_ALLOWED', message: 'Stateless mode, no SSE stream' });
  });

  fastify.delete('/', async (_request, reply) => {
    return reply.code(405).send({ error: 'METHOD_NOT_ALLOWED', message: 'Stateless mode, no session to end' });
  });
}
