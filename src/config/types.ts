/**
 * Configuration types for the container finder server.
 *
 * These types define the structure of config.yaml and provide
 * type-safe access to server configuration.
 */

/**
 * Top-level server configuration.
 */
export interface AppConfig {
  server: ServerConfig;
  catalog: CatalogConfig;
  search: SearchConfig;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Server settings.
 */
export interface ServerConfig {
  /** Port to listen on (default: 3001) */
  port: number;
  /** Host to bind to (default: '0.0.0.0') */
  host: string;
  /** Log level (default: 'info') */
  logLevel: LogLevel;
  /** CORS configuration */
  cors: CorsConfig;
}

/**
 * CORS configuration.
 */
export interface CorsConfig {
  /** Whether CORS is enabled (default: true) */
  enabled: boolean;
  /** Allowed origins (default: ['*']) */
  origins: string[];
}

/**
 * Catalog source files. Relative paths resolve against the base path.
 */
export interface CatalogConfig {
  /** Tool metadata YAML (default: 'data/toolfinder_meta.yaml') */
  metadataPath: string;
  /** Container cache, JSON or gzip-compressed JSON */
  containerCachePath: string;
}

/**
 * Functional search settings.
 */
export interface SearchConfig {
  /** Hits returned when a caller gives no limit (default: 10) */
  defaultLimit: number;
  /** Per-field score overrides */
  weights: Partial<SearchWeightsConfig>;
}

export interface SearchWeightsConfig {
  id: number;
  name: number;
  description: number;
  descriptionPhrase: number;
  operations: number;
  topics: number;
}

export const SEARCH_WEIGHT_KEYS: ReadonlyArray<keyof SearchWeightsConfig> = [
  'id',
  'name',
  'description',
  'descriptionPhrase',
  'operations',
  'topics',
];

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: AppConfig = {
  server: {
    port: 3001,
    host: '0.0.0.0',
    logLevel: 'info',
    cors: {
      enabled: true,
      origins: ['*'],
    },
  },
  catalog: {
    metadataPath: 'data/toolfinder_meta.yaml',
    containerCachePath: 'data/galaxy_singularity_cache.json.gz',
  },
  search: {
    defaultLimit: 10,
    weights: {},
  },
};
