/**
 * Command definitions for the `biofinder` CLI.
 */

import { Command, InvalidArgumentError } from 'commander';
import type { AppContext } from '../server.js';
import { DEFAULT_LIST_LIMIT } from '../query/QueryEngine.js';
import {
  renderContainerVersions,
  renderNotFound,
  renderSearchResults,
  renderToolList,
  renderToolResult,
} from '../format/TextPresenter.js';
import { answerQuestion, renderAnswer } from './ask.js';
import { runInteractive } from './interactive.js';

const VERSION = '0.1.0';

type GlobalOptions = {
  base: string;
  json?: boolean;
};

/**
 * What the commands need from their surroundings.
 */
export interface CliDependencies {
  /** Build the application context for a base path */
  loadContext: (basePath: string) => Promise<AppContext>;
  /** Write one block of output */
  write: (text: string) => void;
}

export function parseInteger(value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parseInt(value, 10);
}

/**
 * Create and configure the CLI program.
 */
export function createProgram(deps: CliDependencies): Command {
  const program = new Command();

  program
    .name('biofinder')
    .description('Find Singularity containers for bioinformatics tools on CVMFS')
    .version(VERSION, '-V, --version', 'Output the version number')
    .option('-b, --base <dir>', 'Directory holding config.yaml and data/', process.env.APP_BASE_PATH || process.cwd())
    .option('-j, --json', 'Output structured results as JSON')
    .addHelpText(
      'after',
      `
Examples:
  $ biofinder find fastqc
  $ biofinder search quality control --limit 5
  $ biofinder versions bwa-mem
  $ biofinder ask "Where can I use the latest version of samtools?"
`
    );

  const withContext = async <T>(run: (ctx: AppContext, opts: GlobalOptions) => T): Promise<T> => {
    const opts = program.opts<GlobalOptions>();
    const ctx = await deps.loadContext(opts.base);
    return run(ctx, opts);
  };

  const emit = (opts: GlobalOptions, data: unknown, text: string) => {
    deps.write(opts.json ? JSON.stringify(data, null, 2) : text);
  };

  program
    .command('find')
    .description('Show metadata and the newest container of a tool')
    .argument('<name>', 'Tool name')
    .action(async (name: string) => {
      await withContext((ctx, opts) => {
        const result = ctx.engine.findTool(name);
        emit(opts, result, result.status === 'found' ? renderToolResult(result) : renderNotFound(result));
      });
    });

  program
    .command('search')
    .description('Find tools by what they do')
    .argument('<description...>', 'Task description')
    .option('-l, --limit <n>', 'Maximum number of results; 0 returns all', parseInteger)
    .action(async (words: string[], cmdOpts: { limit?: number }) => {
      await withContext((ctx, opts) => {
        const query = words.join(' ');
        const hits = ctx.engine.searchByFunction(query, { limit: cmdOpts.limit ?? ctx.config.search.defaultLimit });
        emit(opts, { query, hits }, renderSearchResults(query, hits));
      });
    });

  program
    .command('versions')
    .description('List every container of a tool, newest first')
    .argument('<name>', 'Tool name')
    .action(async (name: string) => {
      await withContext((ctx, opts) => {
        const result = ctx.engine.getContainerVersions(name);
        emit(opts, result, result.status === 'found' ? renderContainerVersions(result) : renderNotFound(result));
      });
    });

  program
    .command('list')
    .description('List tool ids alphabetically')
    .argument('[limit]', 'Maximum number of ids; 0 lists all', parseInteger, DEFAULT_LIST_LIMIT)
    .action(async (limit: number) => {
      await withContext((ctx, opts) => {
        const tools = ctx.engine.listAvailableTools(limit);
        emit(opts, { tools, total: tools.length }, renderToolList(tools));
      });
    });

  program
    .command('ask')
    .description('Answer a question such as "Is bcftools installed?"')
    .argument('<question...>', 'The question')
    .action(async (words: string[]) => {
      await withContext((ctx, opts) => {
        const answer = answerQuestion(ctx.engine, words.join(' '), ctx.config.search.defaultLimit);
        emit(opts, answer, renderAnswer(answer));
      });
    });

  program
    .command('interactive')
    .description('Run commands at a prompt')
    .action(async () => {
      await withContext((ctx) => runInteractive(ctx.engine, ctx.config.search.defaultLimit));
    });

  return program;
}
