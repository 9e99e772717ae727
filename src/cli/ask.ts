/**
 * Answers free-form questions by routing them to a catalog query.
 */

import type { QueryEngine } from '../query/QueryEngine.js';
import { extractKeywords, routeQuestion, type QuestionRoute } from '../query/router.js';
import type { SearchHit, ToolResult } from '../query/types.js';
import { renderSearchResults, renderToolResult } from '../format/TextPresenter.js';

export type Answer =
  | { route: QuestionRoute; kind: 'tool'; result: ToolResult }
  | { route: QuestionRoute; kind: 'search'; query: string; hits: SearchHit[] }
  | { route: QuestionRoute; kind: 'guidance' };

export const GUIDANCE = [
  'Ask about a tool or a task, for example:',
  '  Where can I use the latest version of fastqc?',
  '  What does samtools do?',
  '  What tool can be used for variant calling?',
].join('\n');

/**
 * Route a question and run the query that answers it.
 *
 * Name questions try each keyword as a tool name and fall back to
 * functional search; task questions go straight to functional search.
 */
export function answerQuestion(engine: QueryEngine, question: string, limit?: number): Answer {
  const route = routeQuestion(question);
  const keywords = extractKeywords(question);

  if (route === 'none' || keywords.length === 0) {
    return { route, kind: 'guidance' };
  }

  if (route === 'search' || route === 'describe') {
    for (const keyword of keywords) {
      const result = engine.findTool(keyword);
      if (result.status === 'found') {
        return { route, kind: 'tool', result };
      }
    }
  }

  const query = keywords.join(' ');
  return {
    route,
    kind: 'search',
    query,
    hits: engine.searchByFunction(query, limit !== undefined ? { limit } : {}),
  };
}

export function renderAnswer(answer: Answer): string {
  switch (answer.kind) {
    case 'tool':
      return renderToolResult(answer.result);
    case 'search':
      return renderSearchResults(answer.query, answer.hits);
    case 'guidance':
      return GUIDANCE;
  }
}
