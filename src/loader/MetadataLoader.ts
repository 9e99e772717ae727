/**
 * MetadataLoader — Reads the tool metadata catalog (toolfinder_meta.yaml).
 */

import { readFile } from 'node:fs/promises';
import { parse as parseYaml } from 'yaml';
import type { ToolRecord } from '../catalog/types.js';
import { CatalogLoadError } from './errors.js';
import { ToolEntrySchema, describeIssue, type ToolEntry } from './schemas.js';

/**
 * Result of loading the metadata catalog.
 */
export interface MetadataLoadResult {
  tools: ToolRecord[];
  /** Entries rejected by validation */
  dropped: number;
}

function toToolRecord(entry: ToolEntry): ToolRecord {
  const externalIds = [entry.biotools, entry.biocontainers].filter((v): v is string => v !== undefined);

  return {
    id: entry.id,
    name: entry.name ?? entry.id,
    ...(entry.description !== undefined ? { description: entry.description } : {}),
    operations: entry['edam-operations'],
    topics: entry['edam-topics'],
    externalIds,
    ...(entry.homepage !== undefined ? { homepage: entry.homepage } : {}),
    ...(entry.license !== undefined ? { license: entry.license } : {}),
    inputs: entry['edam-inputs'],
    outputs: entry['edam-outputs'],
  };
}

/**
 * Parse metadata YAML text.
 *
 * @param content - YAML document; must be a sequence of tool entries
 * @param source - Path used in errors and warnings
 */
export function parseToolMetadata(content: string, source: string): MetadataLoadResult {
  let document: unknown;
  try {
    document = parseYaml(content);
  } catch (err) {
    throw new CatalogLoadError(
      `invalid YAML: ${err instanceof Error ? err.message : String(err)}`,
      source,
      { cause: err }
    );
  }

  // An empty file parses to null
  if (document === null || document === undefined) {
    return { tools: [], dropped: 0 };
  }

  if (!Array.isArray(document)) {
    throw new CatalogLoadError('expected a list of tool entries', source);
  }

  const tools: ToolRecord[] = [];
  let dropped = 0;

  document.forEach((raw: unknown, position) => {
    const parsed = ToolEntrySchema.safeParse(raw);
    if (!parsed.success) {
      dropped++;
      console.warn(`Dropping tool entry #${position} in ${source}: ${describeIssue(parsed.error)}`);
      return;
    }
    tools.push(toToolRecord(parsed.data));
  });

  return { tools, dropped };
}

/**
 * Load and validate the metadata catalog from disk.
 */
export async function loadToolMetadata(filePath: string): Promise<MetadataLoadResult> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (err) {
    throw new CatalogLoadError(
      err instanceof Error ? err.message : String(err),
      filePath,
      { cause: err }
    );
  }
  return parseToolMetadata(content, filePath);
}
