/**
 * ParsedVersion — Total ordering over free-text container version tags.
 *
 * Bioconda-style tags carry a dotted version and a build string
 * (`0.12.1--hdfd78af_0`). Tags are arbitrary text, so parsing never fails:
 * anything that is not a leading dotted number falls through to the suffix
 * and the raw tag, which still order deterministically.
 */

/**
 * Comparable form of a version tag.
 */
export interface ParsedVersion {
  /** Integer components of the leading dotted number (`1.17` → [1, 17]) */
  readonly components: readonly number[];
  /** Build/tag string after the numeric part, separators stripped */
  readonly suffix: string;
  /** The original tag */
  readonly raw: string;
}

export type VersionOrdering = -1 | 0 | 1;

const NUMERIC_PREFIX = /^[0-9.]*/;
const LEADING_SEPARATORS = /^[^A-Za-z0-9]+/;

/**
 * Parse a version tag. Never throws.
 */
export function parseVersion(tag: string): ParsedVersion {
  const numeric = NUMERIC_PREFIX.exec(tag)?.[0] ?? '';
  const suffix = tag.slice(numeric.length).replace(LEADING_SEPARATORS, '');

  const components = numeric.length === 0
    ? []
    : numeric.split('.').map((part) => (part.length === 0 ? 0 : Number(part)));

  return { components, suffix, raw: tag };
}

function compareStrings(a: string, b: string): VersionOrdering {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Compare two parsed versions.
 *
 * Numeric components compare first (shorter sequence padded with zeros),
 * then the suffix, then the raw tag, all in code-unit order.
 */
export function compareVersions(a: ParsedVersion, b: ParsedVersion): VersionOrdering {
  const length = Math.max(a.components.length, b.components.length);
  for (let i = 0; i < length; i++) {
    const left = a.components[i] ?? 0;
    const right = b.components[i] ?? 0;
    if (left !== right) {
      return left < right ? -1 : 1;
    }
  }

  return compareStrings(a.suffix, b.suffix) || compareStrings(a.raw, b.raw);
}

/**
 * Compare two raw tags.
 */
export function compareVersionTags(a: string, b: string): VersionOrdering {
  return compareVersions(parseVersion(a), parseVersion(b));
}

/**
 * Sort items newest first. Items with equal versions keep their input order.
 */
export function sortNewestFirst<T>(items: readonly T[], versionOf: (item: T) => ParsedVersion): T[] {
  return [...items].sort((a, b) => compareVersions(versionOf(b), versionOf(a)));
}

/**
 * The newest item, or undefined for an empty list. The first of several
 * equal versions wins.
 */
export function newestOf<T>(items: readonly T[], versionOf: (item: T) => ParsedVersion): T | undefined {
  let newest: T | undefined;
  for (const item of items) {
    if (newest === undefined || compareVersions(versionOf(item), versionOf(newest)) > 0) {
      newest = item;
    }
  }
  return newest;
}
