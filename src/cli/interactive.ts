/**
 * Interactive prompt: one catalog command per line.
 */

import * as readline from 'node:readline';
import type { QueryEngine } from '../query/QueryEngine.js';
import { DEFAULT_LIST_LIMIT } from '../query/QueryEngine.js';
import {
  renderContainerVersions,
  renderNotFound,
  renderSearchResults,
  renderToolList,
  renderToolResult,
} from '../format/TextPresenter.js';
import { answerQuestion, renderAnswer } from './ask.js';

export const INTERACTIVE_HELP = [
  'Commands:',
  '  find <name>            Newest container and metadata for a tool',
  '  search <description>   Tools that perform a task',
  '  versions <name>        Every container of a tool',
  '  list [limit]           Tool ids (0 lists all)',
  '  help                   Show this help',
  '  quit | exit            Leave',
  'Anything else is answered as a question.',
].join('\n');

/**
 * Outcome of one line of input.
 */
export type LineResult = { output: string } | { quit: true };

/**
 * Run one line of interactive input against the engine.
 */
export function executeLine(engine: QueryEngine, line: string, searchLimit: number): LineResult {
  const trimmed = line.trim();
  if (trimmed === '') {
    return { output: '' };
  }

  const [command = '', ...rest] = trimmed.split(/\s+/);
  const argument = rest.join(' ');

  switch (command.toLowerCase()) {
    case 'quit':
    case 'exit':
      return { quit: true };
    case 'help':
      return { output: INTERACTIVE_HELP };
    case 'find': {
      if (!argument) return { output: 'Usage: find <name>' };
      const result = engine.findTool(argument);
      return { output: result.status === 'found' ? renderToolResult(result) : renderNotFound(result) };
    }
    case 'versions': {
      if (!argument) return { output: 'Usage: versions <name>' };
      const result = engine.getContainerVersions(argument);
      return { output: result.status === 'found' ? renderContainerVersions(result) : renderNotFound(result) };
    }
    case 'search': {
      if (!argument) return { output: 'Usage: search <description>' };
      return { output: renderSearchResults(argument, engine.searchByFunction(argument, { limit: searchLimit })) };
    }
    case 'list': {
      const limit = argument === '' ? DEFAULT_LIST_LIMIT : Number(argument);
      if (!Number.isInteger(limit)) return { output: 'Usage: list [limit]' };
      return { output: renderToolList(engine.listAvailableTools(limit)) };
    }
    default:
      return { output: renderAnswer(answerQuestion(engine, trimmed, searchLimit)) };
  }
}

/**
 * Read commands until `quit`, `exit` or end of input.
 */
export async function runInteractive(
  engine: QueryEngine,
  searchLimit: number,
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Promise<void> {
  const rl = readline.createInterface({ input, output, terminal: false });

  output.write('Container finder. Type "help" for commands, "quit" to leave.\n');

  for await (const line of rl) {
    const result = executeLine(engine, line, searchLimit);
    if ('quit' in result) {
      break;
    }
    if (result.output) {
      output.write(`${result.output}\n`);
    }
  }

  rl.close();
}
