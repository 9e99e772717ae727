/**
 * CatalogIndex — Builds the normalized in-memory tool index.
 *
 * The index joins the metadata catalog and the container cache under
 * normalized keys. It is built once at startup and never mutated: entries,
 * container lists and the index object itself are frozen before return.
 */

import { parseVersion } from '../version/ParsedVersion.js';
import { normalizeKey } from './normalize.js';
import type {
  AliasCollision,
  AliasSource,
  CatalogEntry,
  ContainerRecord,
  IndexedContainer,
  IndexStats,
  SearchDocument,
  ToolIndex,
  ToolRecord,
} from './types.js';

interface MutableEntry {
  key: string;
  tool?: ToolRecord;
  containers: IndexedContainer[];
}

/**
 * Collapse runs of whitespace so phrase matching ignores line breaks.
 */
export function collapseWhitespace(text: string): string {
  return text.trim().replace(/\s+/g, ' ');
}

function toSearchDocument(key: string, tool: ToolRecord): SearchDocument {
  return Object.freeze({
    key,
    id: tool.id.toLowerCase(),
    name: tool.name.toLowerCase(),
    description: collapseWhitespace(tool.description ?? '').toLowerCase(),
    operations: Object.freeze(tool.operations.map((op) => op.toLowerCase())),
    topics: Object.freeze(tool.topics.map((topic) => topic.toLowerCase())),
  });
}

function aliasCandidates(tool: ToolRecord): Array<[string, AliasSource]> {
  return [
    [tool.name, 'name'],
    ...tool.externalIds.map((id): [string, AliasSource] => [id, 'external-id']),
  ];
}

/**
 * Build the index from the two source collections.
 *
 * Primary ids are registered before any alias, so a tool id always wins
 * over another tool's name or external id. Rejected identifiers are kept in
 * `collisions`; the first-seen holder of a key is never overwritten.
 */
export function buildCatalogIndex(
  tools: readonly ToolRecord[],
  containers: readonly ContainerRecord[]
): ToolIndex {
  const entries = new Map<string, MutableEntry>();
  const aliases = new Map<string, string>();
  const collisions: AliasCollision[] = [];
  const documents: SearchDocument[] = [];
  const registered: Array<{ key: string; tool: ToolRecord }> = [];

  for (const tool of tools) {
    const key = normalizeKey(tool.id);
    if (key.length === 0) {
      console.warn(`Skipping tool with blank id: ${JSON.stringify(tool.id)}`);
      continue;
    }

    const held = entries.get(key);
    if (held) {
      collisions.push({ key, source: 'id', toolId: tool.id, heldBy: held.key });
      continue;
    }

    entries.set(key, { key, tool, containers: [] });
    registered.push({ key, tool });
    documents.push(toSearchDocument(key, tool));
  }

  for (const { key, tool } of registered) {
    for (const [candidate, source] of aliasCandidates(tool)) {
      const aliasKey = normalizeKey(candidate);
      if (aliasKey.length === 0 || aliasKey === key) continue;

      const heldBy = entries.has(aliasKey) ? aliasKey : aliases.get(aliasKey);
      if (heldBy === undefined) {
        aliases.set(aliasKey, key);
      } else if (heldBy !== key) {
        collisions.push({ key: aliasKey, source, toolId: tool.id, heldBy });
      }
    }
  }

  let containerCount = 0;
  for (const record of containers) {
    const rawKey = normalizeKey(record.toolKey);
    if (rawKey.length === 0) {
      console.warn(`Skipping container with blank tool key: ${record.path}`);
      continue;
    }

    const key = aliases.get(rawKey) ?? rawKey;
    let entry = entries.get(key);
    if (!entry) {
      entry = { key, containers: [] };
      entries.set(key, entry);
    }
    entry.containers.push({ record, version: parseVersion(record.versionTag) });
    containerCount++;
  }

  const frozen = new Map<string, CatalogEntry>();
  for (const [key, entry] of entries) {
    Object.freeze(entry.containers);
    frozen.set(key, Object.freeze(entry));
  }

  return Object.freeze({
    entries: frozen,
    aliases,
    documents: Object.freeze(documents),
    collisions: Object.freeze(collisions),
    containerCount,
  });
}

/**
 * Look up a normalized key among primary keys, then aliases.
 */
export function getEntry(
  index: ToolIndex,
  key: string
): { entry: CatalogEntry; via: 'exact' | 'alias' } | undefined {
  const direct = index.entries.get(key);
  if (direct) {
    return { entry: direct, via: 'exact' };
  }

  const primary = index.aliases.get(key);
  const aliased = primary === undefined ? undefined : index.entries.get(primary);
  return aliased ? { entry: aliased, via: 'alias' } : undefined;
}

/**
 * Count what the index holds.
 */
export function getIndexStats(index: ToolIndex): IndexStats {
  let containerOnlyKeys = 0;
  for (const entry of index.entries.values()) {
    if (!entry.tool) containerOnlyKeys++;
  }

  return {
    tools: index.documents.length,
    containerOnlyKeys,
    containers: index.containerCount,
    aliases: index.aliases.size,
    collisions: index.collisions.length,
  };
}
