/**
 * Types for the tool catalog.
 *
 * Records are built once by the loader and never mutated. Optional fields
 * are absent (not empty placeholders) when the source does not know them.
 */

import type { ParsedVersion } from '../version/ParsedVersion.js';

/**
 * One named bioinformatics tool, as described by the metadata catalog.
 */
export interface ToolRecord {
  /** Unique identifier */
  readonly id: string;
  /** Display name (defaults to id) */
  readonly name: string;
  /** Free-text description */
  readonly description?: string;
  /** EDAM operations (what the tool does) */
  readonly operations: readonly string[];
  /** EDAM topics (scientific domain) */
  readonly topics: readonly string[];
  /** Alternate registry identifiers (bio.tools, BioContainers) */
  readonly externalIds: readonly string[];
  /** Project homepage */
  readonly homepage?: string;
  /** License name */
  readonly license?: string;
  /** EDAM input data formats (display only) */
  readonly inputs: readonly string[];
  /** EDAM output data formats (display only) */
  readonly outputs: readonly string[];
}

/**
 * One container image build.
 */
export interface ContainerRecord {
  /** Tool identifier the image was built for (not normalized) */
  readonly toolKey: string;
  /** Raw version/build tag, e.g. "1.17--h00cdaf9_0" */
  readonly versionTag: string;
  /** Absolute image path, unique per record */
  readonly path: string;
  /** Image size in bytes */
  readonly sizeBytes?: number;
  /** Image modification time */
  readonly modifiedAt?: Date;
}

/**
 * Container plus its version parsed at build time.
 */
export interface IndexedContainer {
  readonly record: ContainerRecord;
  readonly version: ParsedVersion;
}

/**
 * Lowercased text of a tool, precomputed for functional search.
 */
export interface SearchDocument {
  readonly key: string;
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly operations: readonly string[];
  readonly topics: readonly string[];
}

/**
 * Everything the index knows under one normalized key.
 */
export interface CatalogEntry {
  /** Normalized key */
  readonly key: string;
  /** Metadata, absent for container-only keys */
  readonly tool?: ToolRecord;
  /** Containers in source order */
  readonly containers: readonly IndexedContainer[];
}

export type AliasSource = 'id' | 'name' | 'external-id';

/**
 * An identifier that could not be registered because its key was taken.
 */
export interface AliasCollision {
  /** Normalized key that was already taken */
  readonly key: string;
  /** Where the rejected identifier came from */
  readonly source: AliasSource;
  /** Id of the tool whose identifier was rejected */
  readonly toolId: string;
  /** Primary key of the entry that holds the key */
  readonly heldBy: string;
}

/**
 * The built catalog. Read-only after construction.
 */
export interface ToolIndex {
  /** Entries by normalized primary key */
  readonly entries: ReadonlyMap<string, CatalogEntry>;
  /** Alias key → primary key */
  readonly aliases: ReadonlyMap<string, string>;
  /** Search documents in metadata source order */
  readonly documents: readonly SearchDocument[];
  /** Identifiers rejected during the build */
  readonly collisions: readonly AliasCollision[];
  /** Total containers indexed */
  readonly containerCount: number;
}

/**
 * Summary counts for health checks and resources.
 */
export interface IndexStats {
  tools: number;
  containerOnlyKeys: number;
  containers: number;
  aliases: number;
  collisions: number;
}
