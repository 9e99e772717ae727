/**
 * Route configuration for the API.
 * 
 * This module registers all API routes on a Fastify instance.
 * Route handlers are thin wrappers around the query engine.
 */

import type { FastifyInstance } from 'fastify';
import type { CatalogHandlers } from './handlers/CatalogHandlers.js';

/**
 * Options for registering routes.
 */
export interface RouteOptions {
  catalogHandlers: CatalogHandlers;
}

/**
 * Register all API routes on a Fastify instance.
 */
export function registerRoutes(
  fastify: FastifyInstance,
  options: RouteOptions
): void {
  const { catalogHandlers } = options;

  // ============================================================================
  // Health Check
  // ============================================================================

  fastify.get('/health', catalogHandlers.getHealth);

  // ============================================================================
  // Tool Routes
  // ============================================================================

  // List tool ids
  fastify.get('/tools', catalogHandlers.listTools);

  // Look up a tool by name
  fastify.get('/tools/:name', catalogHandlers.getTool);

  // All container versions of a tool
  fastify.get('/tools/:name/versions', catalogHandlers.getVersions);

  // ============================================================================
  // Search Routes
  // ============================================================================

  // Functional search by description
  fastify.get('/search', catalogHandlers.search);
}
