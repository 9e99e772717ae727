/**
 * Question router for free-form requests.
 *
 * Sorts a question into the kind of lookup that answers it by matching
 * known phrasings. Groups are checked in a fixed order and the first group
 * with a phrase contained in the question wins.
 */

import { tokenize } from './scoring.js';

/**
 * What a question asks for.
 *
 * - `search`: where or whether a named tool is installed, or its versions
 * - `describe`: what a named tool does
 * - `recommend`: which tool performs a described task
 * - `none`: not a tool question
 */
export type QuestionRoute = 'search' | 'describe' | 'recommend' | 'none';

const SEARCH_PHRASES: readonly string[] = [
  'is installed',
  'is it installed',
  'installed?',
  'where can i use',
  'where do i use',
  'where can i run',
  'where is',
  'available version',
  'what versions are available',
  'latest version',
  'latest',
  'are available?',
];

const DESCRIBE_PHRASES: readonly string[] = ['what does', 'what is', 'purpose of', 'describe'];

const RECOMMEND_PHRASES: readonly string[] = [
  'what tool can be used',
  'what tool should i use',
  'what can i use to',
  'can be used to',
  'can be used for',
  'tool for',
  'used to generate',
  'used to build',
];

const ROUTES: ReadonlyArray<[Exclude<QuestionRoute, 'none'>, readonly string[]]> = [
  ['search', SEARCH_PHRASES],
  ['describe', DESCRIBE_PHRASES],
  ['recommend', RECOMMEND_PHRASES],
];

const COMMON_WORDS: ReadonlySet<string> = new Set([
  'a', 'an', 'the', 'is', 'it', 'i', 'me', 'you', 'can', 'do', 'does', 'what', 'where', 'which',
  'to', 'of', 'for', 'are', 'be', 'used', 'use', 'tool', 'generating', 'generate', 'from',
  'installed', 'available', 'latest', 'version', 'versions', 'purpose', 'explain', 'describe',
]);

export function routeQuestion(question: string): QuestionRoute {
  const text = question.toLowerCase();
  for (const [route, phrases] of ROUTES) {
    if (phrases.some((phrase) => text.includes(phrase))) {
      return route;
    }
  }
  return 'none';
}

/**
 * Keywords of a question with common words removed, in order.
 */
export function extractKeywords(question: string): string[] {
  return tokenize(question).filter((word) => !COMMON_WORDS.has(word));
}
