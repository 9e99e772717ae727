/**
 * QueryEngine — The four catalog queries.
 *
 * All operations are synchronous reads over an immutable ToolIndex, so one
 * engine can serve any number of concurrent callers.
 */

import { getIndexStats } from '../catalog/CatalogIndex.js';
import { normalizeKey } from '../catalog/normalize.js';
import type { CatalogEntry, ContainerRecord, IndexStats, ToolIndex } from '../catalog/types.js';
import { newestOf, sortNewestFirst } from '../version/ParsedVersion.js';
import { DEFAULT_WEIGHTS, normalizePhrase, scoreDocument, tokenize, type ScoringWeights } from './scoring.js';
import { preferMostContainers, resolveKey, type Resolution, type TieBreakRule } from './resolution.js';
import type {
  ContainerVersions,
  NotFound,
  SearchHit,
  SearchOptions,
  ToolResult,
} from './types.js';

/** Default number of ids returned by listAvailableTools. */
export const DEFAULT_LIST_LIMIT = 50;

/**
 * Configuration for QueryEngine.
 */
export interface QueryEngineOptions {
  /** Overrides for the default search weights */
  weights?: Partial<ScoringWeights>;
  /** Rule for choosing among several fuzzy name matches */
  tieBreak?: TieBreakRule;
}

function sortedVersions(entry: CatalogEntry): ContainerRecord[] {
  return sortNewestFirst(entry.containers, (c) => c.version).map((c) => c.record);
}

/** A limit below 1 keeps every item; fractional limits round down. */
function truncate<T>(items: T[], limit: number | undefined): T[] {
  return limit !== undefined && limit >= 1 ? items.slice(0, Math.floor(limit)) : items;
}

export class QueryEngine {
  private readonly index: ToolIndex;
  private readonly weights: ScoringWeights;
  private readonly tieBreak: TieBreakRule;

  constructor(index: ToolIndex, options: QueryEngineOptions = {}) {
    this.index = index;
    this.weights = { ...DEFAULT_WEIGHTS, ...options.weights };
    this.tieBreak = options.tieBreak ?? preferMostContainers;
  }

  /**
   * Look up a tool by name and return its containers, newest first.
   */
  findTool(name: string): ToolResult | NotFound {
    const resolved = this.resolve(name);
    if (resolved.status === 'not-found') {
      return resolved;
    }

    const { entry, match } = resolved.resolution;
    const versions = sortedVersions(entry);
    const latest = versions[0];

    return {
      status: 'found',
      query: name,
      key: entry.key,
      match,
      ...(entry.tool ? { tool: entry.tool } : {}),
      versions,
      ...(latest ? { latest } : {}),
    };
  }

  /**
   * Rank tools by keyword overlap with a free-text description.
   *
   * Empty or punctuation-only queries return no hits.
   */
  searchByFunction(queryText: string, options: SearchOptions = {}): SearchHit[] {
    const keywords = tokenize(queryText);
    if (keywords.length === 0) {
      return [];
    }

    const phrase = normalizePhrase(queryText);
    const hits: SearchHit[] = [];

    for (const doc of this.index.documents) {
      const { score, breakdown } = scoreDocument(doc, keywords, phrase, this.weights);
      if (score === 0) continue;

      const entry = this.index.entries.get(doc.key);
      if (!entry?.tool) continue;

      const latest = newestOf(entry.containers, (c) => c.version)?.record;
      hits.push({
        tool: entry.tool,
        key: doc.key,
        score,
        breakdown,
        ...(latest ? { latest } : {}),
        containerCount: entry.containers.length,
      });
    }

    hits.sort((a, b) => b.score - a.score || (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));

    return truncate(hits, options.limit);
  }

  /**
   * Every container for a tool, newest first.
   */
  getContainerVersions(name: string): ContainerVersions | NotFound {
    const resolved = this.resolve(name);
    if (resolved.status === 'not-found') {
      return resolved;
    }

    const { entry, match } = resolved.resolution;
    return {
      status: 'found',
      query: name,
      key: entry.key,
      match,
      ...(entry.tool ? { tool: entry.tool } : {}),
      versions: sortedVersions(entry),
    };
  }

  /**
   * Normalized ids of tools with metadata, alphabetically.
   * A limit below 1 returns every id.
   */
  listAvailableTools(limit: number = DEFAULT_LIST_LIMIT): string[] {
    const ids = this.index.documents.map((doc) => doc.key).sort();
    return truncate(ids, limit);
  }

  /**
   * Counts of what the underlying index holds.
   */
  stats(): IndexStats {
    return getIndexStats(this.index);
  }

  private resolve(name: string): { status: 'found'; resolution: Resolution } | NotFound {
    const normalizedQuery = normalizeKey(name);
    const resolution = resolveKey(this.index, normalizedQuery, this.tieBreak);
    if (!resolution) {
      return { status: 'not-found', query: name, normalizedQuery };
    }
    return { status: 'found', resolution };
  }
}

/**
 * Create a new QueryEngine instance.
 */
export function createQueryEngine(index: ToolIndex, options?: QueryEngineOptions): QueryEngine {
  return new QueryEngine(index, options);
}
