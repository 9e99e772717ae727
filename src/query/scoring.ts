/**
 * Weighted keyword-overlap scoring for functional search.
 *
 * The default weights are heuristic. They are kept for compatibility with
 * existing rankings and can be overridden through `search.weights` in
 * config.yaml.
 */

import { collapseWhitespace } from '../catalog/CatalogIndex.js';
import type { SearchDocument } from '../catalog/types.js';
import type { ScoreBreakdown } from './types.js';

/**
 * Points awarded per matching keyword, per field.
 */
export interface ScoringWeights {
  id: number;
  name: number;
  description: number;
  /** Awarded once when the whole query appears in the description */
  descriptionPhrase: number;
  operations: number;
  topics: number;
}

export const DEFAULT_WEIGHTS: Readonly<ScoringWeights> = Object.freeze({
  id: 4,
  name: 4,
  description: 2,
  descriptionPhrase: 5,
  operations: 3,
  topics: 2,
});

const TOKEN_SEPARATOR = /[^\p{L}\p{N}]+/u;

/**
 * Split text into distinct lowercase keywords, in order of first appearance.
 */
export function tokenize(text: string): string[] {
  const seen = new Set<string>();
  for (const token of text.toLowerCase().split(TOKEN_SEPARATOR)) {
    if (token.length > 0) {
      seen.add(token);
    }
  }
  return [...seen];
}

/**
 * Lowercase the query and collapse its whitespace for phrase matching.
 */
export function normalizePhrase(text: string): string {
  return collapseWhitespace(text).toLowerCase();
}

function anyContains(values: readonly string[], keyword: string): boolean {
  return values.some((value) => value.includes(keyword));
}

/**
 * Score one document. Every keyword is tested once against each field.
 */
export function scoreDocument(
  doc: SearchDocument,
  keywords: readonly string[],
  phrase: string,
  weights: ScoringWeights
): { score: number; breakdown: ScoreBreakdown } {
  const breakdown: ScoreBreakdown = {
    id: 0,
    name: 0,
    description: 0,
    phrase: 0,
    operations: 0,
    topics: 0,
  };

  for (const keyword of keywords) {
    if (doc.id.includes(keyword)) breakdown.id += weights.id;
    if (doc.name.includes(keyword)) breakdown.name += weights.name;
    if (doc.description.includes(keyword)) breakdown.description += weights.description;
    if (anyContains(doc.operations, keyword)) breakdown.operations += weights.operations;
    if (anyContains(doc.topics, keyword)) breakdown.topics += weights.topics;
  }

  if (phrase.length > 0 && doc.description.includes(phrase)) {
    breakdown.phrase = weights.descriptionPhrase;
  }

  const score =
    breakdown.id +
    breakdown.name +
    breakdown.description +
    breakdown.phrase +
    breakdown.operations +
    breakdown.topics;

  return { score, breakdown };
}
