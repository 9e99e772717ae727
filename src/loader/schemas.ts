/**
 * zod schemas for raw catalog entries.
 *
 * Both source files are produced by external harvesting jobs, so every
 * entry is validated on its own and bad entries are dropped rather than
 * failing the whole load.
 */

import { z } from 'zod';

function blankToUndefined(value: string | number | null | undefined): string | undefined {
  if (value === null || value === undefined) return undefined;
  const text = String(value).trim();
  return text.length > 0 ? text : undefined;
}

/**
 * Collect every string leaf of a nested list/map structure.
 */
export function collectStrings(value: unknown): string[] {
  if (typeof value === 'string') {
    return value.trim().length > 0 ? [value] : [];
  }
  if (Array.isArray(value)) {
    return value.flatMap(collectStrings);
  }
  if (value !== null && typeof value === 'object') {
    return Object.values(value).flatMap(collectStrings);
  }
  return [];
}

const optionalText = z.union([z.string(), z.number()]).nullish().transform(blankToUndefined);

const stringList = z
  .array(z.unknown())
  .nullish()
  .transform((values) => (values ?? []).filter((v): v is string => typeof v === 'string' && v.trim().length > 0));

const nestedStrings = z.unknown().optional().transform(collectStrings);

/**
 * One entry of toolfinder_meta.yaml.
 */
export const ToolEntrySchema = z.object({
  id: z
    .union([z.string(), z.number()])
    .transform((v) => String(v).trim())
    .refine((v) => v.length > 0, { message: 'id must not be blank' }),
  name: optionalText,
  description: optionalText,
  homepage: optionalText,
  license: optionalText,
  biotools: optionalText,
  biocontainers: optionalText,
  'edam-operations': stringList,
  'edam-topics': stringList,
  'edam-inputs': nestedStrings,
  'edam-outputs': nestedStrings,
});

export type ToolEntry = z.infer<typeof ToolEntrySchema>;

/**
 * One entry of the container cache `entries` array.
 */
export const ContainerEntrySchema = z.object({
  tool_name: z.string().trim().min(1),
  tag: z.string(),
  path: z.string().trim().min(1),
  size_bytes: z.number().nonnegative().nullish(),
  mtime: z.number().nullish(),
});

export type ContainerEntry = z.infer<typeof ContainerEntrySchema>;

/**
 * Top-level shape of the container cache document.
 */
export const ContainerCacheSchema = z.object({
  generated_at: z.string().nullish(),
  cvmfs_root: z.string().nullish(),
  entry_count: z.number().int().nonnegative().nullish(),
  entries: z.array(z.unknown()),
});

/**
 * First issue of a failed parse, as `path: message`.
 */
export function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'invalid entry';
  const path = issue.path.map(String).join('.');
  return path ? `${path}: ${issue.message}` : issue.message;
}
