/**
 * Key resolution for name lookups.
 *
 * Exact and alias matches come from the index. When those miss, a fuzzy
 * pass collects every key that contains the query or is contained in it.
 * Choosing among several fuzzy candidates is delegated to a TieBreakRule so
 * the heuristic can be tested and replaced on its own.
 */

import { getEntry } from '../catalog/CatalogIndex.js';
import type { CatalogEntry, ToolIndex } from '../catalog/types.js';
import type { MatchKind } from './types.js';

/**
 * Picks one entry from two or more fuzzy candidates.
 */
export type TieBreakRule = (candidates: readonly CatalogEntry[]) => CatalogEntry | undefined;

export interface Resolution {
  entry: CatalogEntry;
  match: MatchKind;
}

/**
 * The entry with the most containers; equal counts go to the smaller key.
 */
export const preferMostContainers: TieBreakRule = (candidates) => {
  let best: CatalogEntry | undefined;
  for (const candidate of candidates) {
    if (
      best === undefined ||
      candidate.containers.length > best.containers.length ||
      (candidate.containers.length === best.containers.length && candidate.key < best.key)
    ) {
      best = candidate;
    }
  }
  return best;
};

function overlaps(query: string, key: string): boolean {
  return key.includes(query) || query.includes(key);
}

/**
 * Entries whose primary key or any alias overlaps the query, ordered by key.
 */
export function findFuzzyCandidates(index: ToolIndex, normalizedQuery: string): CatalogEntry[] {
  if (normalizedQuery.length === 0) {
    return [];
  }

  const found = new Map<string, CatalogEntry>();

  for (const [key, entry] of index.entries) {
    if (overlaps(normalizedQuery, key)) {
      found.set(key, entry);
    }
  }

  for (const [alias, primary] of index.aliases) {
    if (found.has(primary) || !overlaps(normalizedQuery, alias)) continue;
    const entry = index.entries.get(primary);
    if (entry) {
      found.set(primary, entry);
    }
  }

  return [...found.values()].sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
}

/**
 * Resolve a normalized query to one index entry.
 */
export function resolveKey(
  index: ToolIndex,
  normalizedQuery: string,
  tieBreak: TieBreakRule = preferMostContainers
): Resolution | undefined {
  if (normalizedQuery.length === 0) {
    return undefined;
  }

  const direct = getEntry(index, normalizedQuery);
  if (direct) {
    return { entry: direct.entry, match: direct.via };
  }

  const candidates = findFuzzyCandidates(index, normalizedQuery);
  const chosen = candidates.length === 1 ? candidates[0] : tieBreak(candidates);
  return chosen ? { entry: chosen, match: 'fuzzy' } : undefined;
}
