/**
 * Configuration loader for the container finder server.
 * 
 * Loads config from YAML file with support for:
 * - Environment variable substitution (${VAR_NAME})
 * - Default values
 * - Validation
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type {
  AppConfig,
  CatalogConfig,
  CorsConfig,
  LogLevel,
  SearchConfig,
  SearchWeightsConfig,
  ServerConfig,
} from './types.js';
import { DEFAULT_CONFIG, SEARCH_WEIGHT_KEYS } from './types.js';

/**
 * Config loading options.
 */
export interface LoadConfigOptions {
  /** Path to config file (default: process.env.CONFIG_PATH or './config.yaml') */
  configPath?: string;
}

/**
 * Shape of config.yaml before defaults are applied.
 */
export interface PartialAppConfig {
  server?: Partial<Omit<ServerConfig, 'cors'>> & { cors?: Partial<CorsConfig> };
  catalog?: Partial<CatalogConfig>;
  search?: Partial<Omit<SearchConfig, 'weights'>> & { weights?: Partial<SearchWeightsConfig> };
}

/**
 * Config validation error.
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly value: unknown
  ) {
    super(`Config validation error at '${path}': ${message}`);
    this.name = 'ConfigValidationError';
  }
}

const LOG_LEVELS: ReadonlySet<string> = new Set<LogLevel>(['debug', 'info', 'warn', 'error']);

/**
 * Environment variable substitution pattern.
 * Matches ${VAR_NAME} and ${VAR_NAME:-default}
 */
const ENV_VAR_PATTERN = /\$\{([A-Z_][A-Z0-9_]*)(?::-([^}]*))?\}/gi;

/**
 * Substitute environment variables in a string.
 * 
 * Supports:
 * - ${VAR_NAME} - Replace with env var value
 * - ${VAR_NAME:-default} - Replace with env var or default
 */
export function substituteEnvVars(value: string): string {
  return value.replace(ENV_VAR_PATTERN, (_match: string, varName: string, defaultValue: string | undefined) => {
    const envValue = process.env[varName];
    if (envValue !== undefined) {
      return envValue;
    }
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    console.warn(`Environment variable ${varName} is not set and has no default`);
    return '';
  });
}

/**
 * Recursively substitute environment variables in an object.
 */
function substituteEnvVarsRecursive(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return substituteEnvVars(obj);
  }
  if (Array.isArray(obj)) {
    return obj.map(substituteEnvVarsRecursive);
  }
  if (isRecord(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVarsRecursive(value);
    }
    return result;
  }
  return obj;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value);
}

/**
 * Validate CORS configuration.
 */
function validateCorsConfig(config: unknown, path: string): asserts config is Partial<CorsConfig> {
  if (!isRecord(config)) {
    throw new ConfigValidationError('must be an object', path, config);
  }

  if (config.enabled !== undefined && typeof config.enabled !== 'boolean') {
    throw new ConfigValidationError('enabled must be a boolean', `${path}.enabled`, config.enabled);
  }

  if (
    config.origins !== undefined &&
    !(Array.isArray(config.origins) && config.origins.every((origin) => typeof origin === 'string'))
  ) {
    throw new ConfigValidationError('origins must be a list of strings', `${path}.origins`, config.origins);
  }
}

/**
 * Validate server configuration.
 */
function validateServerConfig(config: unknown, path = 'server'): asserts config is PartialAppConfig['server'] {
  if (!isRecord(config)) {
    throw new ConfigValidationError('must be an object', path, config);
  }
  
  if (config.port !== undefined && (!isInteger(config.port) || config.port < 1 || config.port > 65535)) {
    throw new ConfigValidationError('port must be a number between 1 and 65535', `${path}.port`, config.port);
  }
  
  if (config.host !== undefined && typeof config.host !== 'string') {
    throw new ConfigValidationError('host must be a string', `${path}.host`, config.host);
  }
  
  if (config.logLevel !== undefined && (typeof config.logLevel !== 'string' || !LOG_LEVELS.has(config.logLevel))) {
    throw new ConfigValidationError('logLevel must be one of: debug, info, warn, error', `${path}.logLevel`, config.logLevel);
  }

  if (config.cors !== undefined) {
    validateCorsConfig(config.cors, `${path}.cors`);
  }
}

/**
 * Validate catalog file locations.
 */
function validateCatalogConfig(config: unknown, path = 'catalog'): asserts config is Partial<CatalogConfig> {
  if (!isRecord(config)) {
    throw new ConfigValidationError('must be an object', path, config);
  }

  for (const key of ['metadataPath', 'containerCachePath'] as const) {
    const value = config[key];
    if (value !== undefined && (typeof value !== 'string' || value.trim() === '')) {
      throw new ConfigValidationError(`${key} must be a non-empty string`, `${path}.${key}`, value);
    }
  }
}

/**
 * Validate search settings.
 */
function validateSearchConfig(config: unknown, path = 'search'): asserts config is PartialAppConfig['search'] {
  if (!isRecord(config)) {
    throw new ConfigValidationError('must be an object', path, config);
  }

  if (config.defaultLimit !== undefined && (!isInteger(config.defaultLimit) || config.defaultLimit < 0)) {
    throw new ConfigValidationError('defaultLimit must be a non-negative integer', `${path}.defaultLimit`, config.defaultLimit);
  }

  const weights = config.weights;
  if (weights === undefined) {
    return;
  }
  if (!isRecord(weights)) {
    throw new ConfigValidationError('must be an object', `${path}.weights`, weights);
  }
  for (const [key, value] of Object.entries(weights)) {
    if (!SEARCH_WEIGHT_KEYS.some((known) => known === key)) {
      throw new ConfigValidationError(`unknown weight, expected one of: ${SEARCH_WEIGHT_KEYS.join(', ')}`, `${path}.weights.${key}`, value);
    }
    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
      throw new ConfigValidationError('weight must be a non-negative number', `${path}.weights.${key}`, value);
    }
  }
}

/**
 * Validate the entire configuration.
 */
export function validateConfig(config: unknown): asserts config is PartialAppConfig {
  if (!isRecord(config)) {
    throw new ConfigValidationError('must be an object', '', config);
  }

  if (config.server !== undefined) {
    validateServerConfig(config.server);
  }

  if (config.catalog !== undefined) {
    validateCatalogConfig(config.catalog);
  }

  if (config.search !== undefined) {
    validateSearchConfig(config.search);
  }
}

/**
 * Apply defaults to a validated partial config.
 */
export function applyDefaults(partial: PartialAppConfig): AppConfig {
  const server = partial.server ?? {};
  const search = partial.search ?? {};

  return {
    server: {
      ...DEFAULT_CONFIG.server,
      ...server,
      cors: { ...DEFAULT_CONFIG.server.cors, ...server.cors },
    },
    catalog: { ...DEFAULT_CONFIG.catalog, ...partial.catalog },
    search: {
      ...DEFAULT_CONFIG.search,
      ...search,
      weights: { ...DEFAULT_CONFIG.search.weights, ...search.weights },
    },
  };
}

/**
 * Load configuration from a YAML file.
 * 
 * @param options - Loading options
 * @returns Loaded and validated configuration
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const configPath = options.configPath 
    ?? process.env.CONFIG_PATH 
    ?? './config.yaml';
  
  const absolutePath = resolve(configPath);
  
  // If config file doesn't exist, return defaults
  if (!existsSync(absolutePath)) {
    console.warn(`Config file not found at ${absolutePath}, using defaults`);
    return applyDefaults({});
  }
  
  const content = await readFile(absolutePath, 'utf-8');
  let parsed: unknown;
  
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new Error(`Failed to parse config file: ${err instanceof Error ? err.message : String(err)}`);
  }

  // An empty file means all defaults
  const substituted = substituteEnvVarsRecursive(parsed ?? {});
  
  validateConfig(substituted);
  return applyDefaults(substituted);
}

/**
 * Resolve catalog file paths against the application base path.
 */
export function resolveCatalogPaths(config: AppConfig, basePath: string): CatalogConfig {
  return {
    metadataPath: resolve(basePath, config.catalog.metadataPath),
    containerCachePath: resolve(basePath, config.catalog.containerCachePath),
  };
}
