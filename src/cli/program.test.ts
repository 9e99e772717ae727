/**
 * Tests for the CLI commands, run against a catalog written to a temp dir.
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { initializeApp } from '../server.js';
import { writeCatalogFixture } from '../testing/fixtures.js';
import { createProgram, parseInteger } from './program.js';

describe('CLI program', () => {
  let baseDir: string;
  let written: string[];

  const run = (...args: string[]) => {
    const program = createProgram({
      loadContext: (basePath) => initializeApp(basePath, { configPath: join(basePath, 'config.yaml') }),
      write: (text) => written.push(text),
    });
    for (const command of [program, ...program.commands]) {
      command.exitOverride().configureOutput({ writeOut: () => {}, writeErr: () => {} });
    }
    return program.parseAsync(['--base', baseDir, ...args], { from: 'user' });
  };

  beforeAll(async () => {
    baseDir = await mkdtemp(join(tmpdir(), 'biofinder-cli-'));
    await writeCatalogFixture(baseDir);
  });

  afterAll(async () => {
    await rm(baseDir, { recursive: true, force: true });
  });

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    written = [];
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('finds a tool and shows its newest container', async () => {
    await run('find', 'fastqc');

    expect(written).toHaveLength(1);
    const lines = (written[0] ?? '').split('\n');
    expect(lines[0]).toBe('# FastQC');
    expect(lines).toContain('### Most Recent Version: 0.12.1--hdfd78af_0');
  });

  it('writes JSON with --json', async () => {
    await run('--json', 'find', 'fastqc');

    const parsed: unknown = JSON.parse(written[0] ?? '');
    expect(parsed).toMatchObject({
      status: 'found',
      key: 'fastqc',
      match: 'exact',
      latest: {
        versionTag: '0.12.1--hdfd78af_0',
        path: '/cvmfs/singularity.galaxyproject.org/all/fastqc:0.12.1--hdfd78af_0',
        sizeBytes: 287309824,
      },
    });
  });

  it('reports unknown tools', async () => {
    await run('find', 'bowtie');

    expect(written).toEqual([
      "No tool found matching 'bowtie'. Try a functional search to find tools by what they do.",
    ]);
  });

  it('searches by function with a limit', async () => {
    await run('search', 'quality', 'control', '--limit', '1');

    expect((written[0] ?? '').split('\n').slice(0, 5)).toEqual([
      '# Tools for: quality control',
      '',
      'Found 1 matching tools:',
      '',
      '## 1. FastQC',
    ]);
  });

  it('lists versions through an alias', async () => {
    await run('versions', 'trinityrnaseq');

    expect((written[0] ?? '').split('\n').slice(0, 3)).toEqual([
      '# Container Versions for Trinity',
      '',
      'Total versions: 1',
    ]);
  });

  it('lists tool ids', async () => {
    await run('list');
    await run('list', '2');

    expect(written).toEqual([
      '# Available Bioinformatics Tools (4 shown)\n\n- bcftools\n- fastqc\n- multiqc\n- trinity',
      '# Available Bioinformatics Tools (2 shown)\n\n- bcftools\n- fastqc',
    ]);
  });

  it('answers questions', async () => {
    await run('ask', 'What', 'is', 'the', 'purpose', 'of', 'bcftools?');

    expect((written[0] ?? '').split('\n')[0]).toBe('# BCFtools');
  });

  it('rejects a non-integer limit', async () => {
    await expect(run('list', 'many')).rejects.toMatchObject({ code: 'commander.invalidArgument' });
    expect(written).toEqual([]);
  });
});

describe('parseInteger', () => {
  it('parses integers', () => {
    expect(parseInteger('12')).toBe(12);
    expect(parseInteger(' -1 ')).toBe(-1);
  });

  it('rejects anything else', () => {
    expect(() => parseInteger('1.5')).toThrow('Not an integer.');
    expect(() => parseInteger('')).toThrow('Not an integer.');
  });
});
