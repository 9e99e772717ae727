/**
 * Types for the HTTP API layer.
 * 
 * These types define request/response structures for the REST API.
 */

import type { IndexStats } from '../catalog/types.js';
import type { CacheInfo } from '../loader/ContainerCacheLoader.js';
import type { SearchHit } from '../query/types.js';

// ============================================================================
// Error Response
// ============================================================================

/**
 * Standard error response.
 */
export interface ApiError {
  /** Error type/code */
  error: string;
  /** Human-readable message */
  message: string;
  /** The query that failed to resolve (optional) */
  query?: string;
}

// ============================================================================
// Catalog Endpoints
// ============================================================================

/**
 * Query parameters for listing tools.
 */
export interface ListToolsQuery {
  /** Maximum ids to return; 0 returns all */
  limit?: string;
}

/**
 * Response for listing tools.
 */
export interface ListToolsResponse {
  tools: string[];
  total: number;
}

/**
 * Query parameters for functional search.
 */
export interface SearchQuery {
  /** Free-text description of the task */
  q?: string;
  /** Maximum hits to return; 0 returns all */
  limit?: string;
}

/**
 * Response for functional search.
 */
export interface SearchResponse {
  query: string;
  hits: SearchHit[];
  total: number;
}

/**
 * Route parameters naming a tool.
 */
export interface ToolParams {
  name: string;
}

// ============================================================================
// Health Check
// ============================================================================

/**
 * Health check response.
 */
export interface HealthResponse {
  /** Status: degraded when tool metadata or containers are missing */
  status: 'ok' | 'degraded';
  /** Timestamp */
  timestamp: string;
  /** Component statuses */
  components: {
    catalog: IndexStats;
    cache: CacheInfo;
  };
}

// ============================================================================
// Server Configuration
// ============================================================================

/**
 * Server configuration overrides; unset fields come from config.yaml.
 */
export interface ServerOptions {
  /** HTTP port */
  port?: number;
  /** HTTP host */
  host?: string;
  /** Enable CORS */
  cors?: boolean;
  /** Log level */
  logLevel?: 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';
}
