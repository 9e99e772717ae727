/**
 * ContainerCacheLoader — Reads the Singularity container cache.
 *
 * The cache is a JSON document, usually gzip-compressed, listing every
 * image under the CVMFS root:
 *
 * ```json
 * {
 *   "generated_at": "2024-05-01T03:00:00Z",
 *   "cvmfs_root": "/cvmfs/singularity.galaxyproject.org/all",
 *   "entry_count": 1,
 *   "entries": [
 *     { "tool_name": "fastqc", "tag": "0.12.1--hdfd78af_0",
 *       "path": "/cvmfs/.../fastqc:0.12.1--hdfd78af_0",
 *       "size_bytes": 287309824, "mtime": 1685577600 }
 *   ]
 * }
 * ```
 */

import { readFile } from 'node:fs/promises';
import { gunzipSync } from 'node:zlib';
import type { ContainerRecord } from '../catalog/types.js';
import { CatalogLoadError } from './errors.js';
import { ContainerCacheSchema, ContainerEntrySchema, describeIssue, type ContainerEntry } from './schemas.js';

/**
 * Descriptive header of the container cache.
 */
export interface CacheInfo {
  generatedAt?: string;
  cvmfsRoot?: string;
  /** Entry count declared by the cache file */
  entryCount?: number;
  /** Entries that passed validation */
  loadedCount: number;
}

/**
 * Result of loading the container cache.
 */
export interface ContainerCacheLoadResult {
  containers: ContainerRecord[];
  info: CacheInfo;
  /** Malformed or duplicate-path entries */
  dropped: number;
}

const GZIP_MAGIC = [0x1f, 0x8b] as const;

export function isGzip(data: Uint8Array): boolean {
  return data.length >= 2 && data[0] === GZIP_MAGIC[0] && data[1] === GZIP_MAGIC[1];
}

function toContainerRecord(entry: ContainerEntry): ContainerRecord {
  return {
    toolKey: entry.tool_name,
    versionTag: entry.tag,
    path: entry.path,
    ...(entry.size_bytes != null ? { sizeBytes: entry.size_bytes } : {}),
    ...(entry.mtime != null ? { modifiedAt: new Date(entry.mtime * 1000) } : {}),
  };
}

/**
 * Parse cache file contents, decompressing gzip data when present.
 *
 * @param data - Raw file bytes
 * @param source - Path used in errors and warnings
 */
export function parseContainerCache(data: Buffer, source: string): ContainerCacheLoadResult {
  let text: string;
  try {
    text = (isGzip(data) ? gunzipSync(data) : data).toString('utf-8');
  } catch (err) {
    throw new CatalogLoadError(
      `invalid gzip data: ${err instanceof Error ? err.message : String(err)}`,
      source,
      { cause: err }
    );
  }

  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (err) {
    throw new CatalogLoadError(
      `invalid JSON: ${err instanceof Error ? err.message : String(err)}`,
      source,
      { cause: err }
    );
  }

  const header = ContainerCacheSchema.safeParse(document);
  if (!header.success) {
    throw new CatalogLoadError(`unexpected cache layout (${describeIssue(header.error)})`, source);
  }

  const containers: ContainerRecord[] = [];
  const seenPaths = new Set<string>();
  let dropped = 0;

  header.data.entries.forEach((raw, position) => {
    const parsed = ContainerEntrySchema.safeParse(raw);
    if (!parsed.success) {
      dropped++;
      console.warn(`Dropping container entry #${position} in ${source}: ${describeIssue(parsed.error)}`);
      return;
    }
    if (seenPaths.has(parsed.data.path)) {
      dropped++;
      console.warn(`Dropping container entry #${position} in ${source}: duplicate path ${parsed.data.path}`);
      return;
    }
    seenPaths.add(parsed.data.path);
    containers.push(toContainerRecord(parsed.data));
  });

  const { generated_at, cvmfs_root, entry_count } = header.data;
  const info: CacheInfo = {
    ...(generated_at != null ? { generatedAt: generated_at } : {}),
    ...(cvmfs_root != null ? { cvmfsRoot: cvmfs_root } : {}),
    ...(entry_count != null ? { entryCount: entry_count } : {}),
    loadedCount: containers.length,
  };

  return { containers, info, dropped };
}

/**
 * Load and validate the container cache from disk.
 */
export async function loadContainerCache(filePath: string): Promise<ContainerCacheLoadResult> {
  let data: Buffer;
  try {
    data = await readFile(filePath);
  } catch (err) {
    throw new CatalogLoadError(
      err instanceof Error ? err.message : String(err),
      filePath,
      { cause: err }
    );
  }
  return parseContainerCache(data, filePath);
}
