/**
 * Key normalization shared by indexing and lookup.
 */

const SEPARATORS = /[-_]/g;

/** Canonical separator that both `-` and `_` fold to. */
export const KEY_SEPARATOR = '-';

/**
 * Normalize an identifier: trim, lowercase, `_` → `-`.
 *
 * `bwa-mem`, `bwa_mem` and `BWA_MEM` all normalize to `bwa-mem`.
 */
export function normalizeKey(value: string): string {
  return value.trim().toLowerCase().replace(SEPARATORS, KEY_SEPARATOR);
}
