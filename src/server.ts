/**
 * Server entry point for the container finder API.
 *
 * This module:
 * - Loads configuration and both catalog sources
 * - Builds the tool index and query engine once
 * - Creates the Fastify server with REST routes and the MCP endpoint
 */

import Fastify from 'fastify';
import cors from '@fastify/cors';
import { resolve } from 'node:path';

import { buildCatalogIndex, getIndexStats } from './catalog/CatalogIndex.js';
import type { ContainerRecord, ToolIndex, ToolRecord } from './catalog/types.js';
import { applyDefaults, loadConfig, resolveCatalogPaths } from './config/loader.js';
import type { AppConfig, CatalogConfig } from './config/types.js';
import { CatalogLoadError } from './loader/errors.js';
import { loadToolMetadata } from './loader/MetadataLoader.js';
import { loadContainerCache, type CacheInfo } from './loader/ContainerCacheLoader.js';
import { QueryEngine, createQueryEngine } from './query/QueryEngine.js';
import { createCatalogHandlers } from './api/handlers/index.js';
import { registerRoutes } from './api/routes.js';
import type { ServerOptions } from './api/types.js';
import { createMcpServer, mcpPlugin } from './mcp/index.js';

/**
 * Application context holding all initialized components.
 */
export interface AppContext {
  config: AppConfig;
  /** Config file that was read, or would have been */
  configPath: string;
  /** Absolute catalog file locations */
  catalogPaths: CatalogConfig;
  index: ToolIndex;
  engine: QueryEngine;
  cacheInfo: CacheInfo;
}

/**
 * Options for initializeApp.
 */
export interface InitializeOptions {
  /** Config file (default: CONFIG_PATH or <basePath>/config.yaml) */
  configPath?: string;
}

async function loadTools(path: string): Promise<ToolRecord[]> {
  try {
    const { tools, dropped } = await loadToolMetadata(path);
    console.log(`Loaded ${tools.length} tools from ${path}${dropped > 0 ? ` (${dropped} dropped)` : ''}`);
    return tools;
  } catch (err) {
    if (!(err instanceof CatalogLoadError)) throw err;
    console.warn(`${err.message}; continuing without tool metadata`);
    return [];
  }
}

async function loadContainers(path: string): Promise<{ containers: ContainerRecord[]; info: CacheInfo }> {
  try {
    const { containers, info, dropped } = await loadContainerCache(path);
    console.log(`Loaded ${containers.length} containers from ${path}${dropped > 0 ? ` (${dropped} dropped)` : ''}`);
    return { containers, info };
  } catch (err) {
    if (!(err instanceof CatalogLoadError)) throw err;
    console.warn(`${err.message}; continuing without containers`);
    return { containers: [], info: { loadedCount: 0 } };
  }
}

/**
 * Initialize all application components.
 */
export async function initializeApp(
  basePath: string,
  options: InitializeOptions = {}
): Promise<AppContext> {
  console.log(`Initializing app with base path: ${basePath}`);

  const configPath = options.configPath ?? process.env.CONFIG_PATH ?? resolve(basePath, 'config.yaml');

  let config: AppConfig;
  try {
    config = await loadConfig({ configPath });
  } catch (err) {
    console.warn(`Error loading config, using defaults: ${err instanceof Error ? err.message : String(err)}`);
    config = applyDefaults({});
  }

  const catalogPaths = resolveCatalogPaths(config, basePath);
  const tools = await loadTools(catalogPaths.metadataPath);
  const { containers, info } = await loadContainers(catalogPaths.containerCachePath);

  const index = buildCatalogIndex(tools, containers);
  const stats = getIndexStats(index);
  console.log(
    `Index built: ${stats.tools} tools, ${stats.containerOnlyKeys} container-only keys, ` +
      `${stats.containers} containers, ${stats.aliases} aliases`
  );
  if (stats.collisions > 0) {
    console.warn(`${stats.collisions} identifier collisions were left unresolved`);
  }

  const engine = createQueryEngine(index, { weights: config.search.weights });

  console.log('App initialized');

  return {
    config,
    configPath,
    catalogPaths,
    index,
    engine,
    cacheInfo: info,
  };
}

/**
 * Create and configure a Fastify server.
 */
export async function createServer(
  ctx: AppContext,
  options: ServerOptions = {}
): Promise<ReturnType<typeof Fastify>> {
  const { server } = ctx.config;
  const corsEnabled = options.cors ?? server.cors.enabled;

  const fastify = Fastify({
    logger: {
      level: options.logLevel ?? server.logLevel,
    },
  });

  if (corsEnabled) {
    await fastify.register(cors, {
      origin: server.cors.origins.includes('*') ? true : server.cors.origins,
      methods: ['GET', 'HEAD', 'POST', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'Mcp-Session-Id'],
    });
  }

  // MCP over Streamable HTTP on /mcp
  await fastify.register(mcpPlugin, { prefix: '/mcp', serverFactory: () => createMcpServer(ctx) });

  // REST routes under /api
  const catalogHandlers = createCatalogHandlers(ctx);
  await fastify.register(async (instance) => {
    registerRoutes(instance, { catalogHandlers });
  }, { prefix: '/api' });

  return fastify;
}

/**
 * Start the server.
 */
export async function startServer(
  basePath: string,
  options: ServerOptions = {}
): Promise<void> {
  try {
    const ctx = await initializeApp(basePath);
    const fastify = await createServer(ctx, options);

    const port = options.port ?? ctx.config.server.port;
    const host = options.host ?? ctx.config.server.host;

    await fastify.listen({ port, host });

    const stats = ctx.engine.stats();
    console.log(`Server listening on http://${host}:${port}`);
    console.log(`Tools indexed: ${stats.tools}`);
    console.log(`Containers indexed: ${stats.containers}`);

    const shutdown = async () => {
      console.log('\nShutting down...');
      await fastify.close();
      process.exit(0);
    };

    process.on('SIGINT', () => void shutdown());
    process.on('SIGTERM', () => void shutdown());
  } catch (err) {
    console.error('Failed to start server:', err);
    process.exit(1);
  }
}

/**
 * CLI entry point.
 */
async function main() {
  const basePath = process.env.APP_BASE_PATH || process.cwd();

  await startServer(basePath, {
    ...(process.env.PORT ? { port: parseInt(process.env.PORT, 10) } : {}),
    ...(process.env.HOST ? { host: process.env.HOST } : {}),
  });
}

// Run if executed directly
// Note: ESM doesn't have require.main, use import.meta instead
const isMain = process.argv[1]?.endsWith('server.js') ||
               process.argv[1]?.endsWith('server.ts');

if (isMain) {
  main().catch(console.error);
}
