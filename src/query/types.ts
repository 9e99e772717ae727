/**
 * Result types for catalog queries.
 *
 * Lookups that can miss return a `NotFound` variant instead of throwing, so
 * every caller can render "no results" without a try/catch.
 */

import type { ContainerRecord, ToolRecord } from '../catalog/types.js';

/**
 * How a lookup resolved its key.
 */
export type MatchKind = 'exact' | 'alias' | 'fuzzy';

/**
 * Key resolution failed.
 */
export interface NotFound {
  status: 'not-found';
  /** The query as given */
  query: string;
  /** The query after key normalization */
  normalizedQuery: string;
}

/**
 * Result of `findTool`.
 */
export interface ToolResult {
  status: 'found';
  query: string;
  /** Resolved primary key */
  key: string;
  match: MatchKind;
  /** Metadata, absent for container-only keys */
  tool?: ToolRecord;
  /** All containers, newest first */
  versions: ContainerRecord[];
  /** The newest container */
  latest?: ContainerRecord;
}

/**
 * Result of `getContainerVersions`.
 */
export interface ContainerVersions {
  status: 'found';
  query: string;
  key: string;
  match: MatchKind;
  tool?: ToolRecord;
  /** All containers, newest first */
  versions: ContainerRecord[];
}

/**
 * Per-field contributions to a search score.
 */
export interface ScoreBreakdown {
  id: number;
  name: number;
  description: number;
  /** Whole-query phrase bonus on the description */
  phrase: number;
  operations: number;
  topics: number;
}

/**
 * One ranked functional-search result.
 */
export interface SearchHit {
  tool: ToolRecord;
  /** Normalized tool id */
  key: string;
  score: number;
  breakdown: ScoreBreakdown;
  /** Newest container, when the tool has any */
  latest?: ContainerRecord;
  containerCount: number;
}

/**
 * Options for functional search.
 */
export interface SearchOptions {
  /** Maximum hits to return; absent or below 1 returns all */
  limit?: number;
}

export function isNotFound<T extends { status: 'found' }>(result: T | NotFound): result is NotFound {
  return result.status === 'not-found';
}
