/**
 * MCP prompts for finding a container that answers a question.
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppContext } from '../../server.js';
import { extractKeywords, routeQuestion } from '../../query/router.js';

/**
 * Prompt text guiding an agent from a question to a container.
 */
export function buildFindContainerPrompt(ctx: AppContext, question: string): string {
  const route = routeQuestion(question);
  const keywords = extractKeywords(question);
  const stats = ctx.engine.stats();

  const steps: string[] = [];
  switch (route) {
    case 'search':
    case 'describe':
      steps.push(
        `1. Call \`find_tool\` with the tool name from the question${keywords.length > 0 ? ` (candidates: ${keywords.join(', ')})` : ''}`,
        '2. If no tool is found, call `search_by_function` with the rest of the question',
        route === 'search'
          ? '3. Answer with the newest container path and the `singularity exec` example'
          : '3. Answer with the description and operations, then the newest container path'
      );
      break;
    case 'recommend':
      steps.push(
        `1. Call \`search_by_function\` with: ${keywords.join(' ')}`,
        '2. Call `find_tool` on the best one or two hits to get their containers',
        '3. Recommend a tool, saying why it fits, with its newest container path'
      );
      break;
    case 'none':
      steps.push(
        '1. The question does not name a tool or a task; ask what the user wants to run',
        '2. `list_available_tools` can show what the catalog holds'
      );
      break;
  }

  return [
    '# Find a container',
    '',
    `Question: ${question}`,
    `Question type: ${route}`,
    '',
    `The catalog holds ${stats.tools} tools and ${stats.containers} Singularity containers on CVMFS.`,
    '',
    '## Steps:',
    ...steps,
  ].join('\n');
}

export function registerDiscoveryPrompts(server: McpServer, ctx: AppContext): void {
  // find_container — Guided container discovery
  server.prompt(
    'find_container',
    'Get a plan for answering a question about which container to use, where a tool is installed, or what it does.',
    { question: z.string().describe('The question to answer') },
    async (args) => ({
      messages: [
        {
          role: 'user',
          content: {
            type: 'text',
            text: buildFindContainerPrompt(ctx, args.question),
          },
        },
      ],
    })
  );
}
