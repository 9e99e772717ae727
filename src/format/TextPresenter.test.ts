/**
 * Tests for TextPresenter.
 */

import { describe, it, expect } from 'vitest';
import { buildCatalogIndex } from '../catalog/CatalogIndex.js';
import type { ContainerRecord, ToolRecord } from '../catalog/types.js';
import { createQueryEngine } from '../query/QueryEngine.js';
import type { ContainerVersions, ToolResult } from '../query/types.js';
import {
  formatDate,
  formatSize,
  renderContainerVersions,
  renderNotFound,
  renderSearchResults,
  renderToolList,
  renderToolResult,
} from './TextPresenter.js';

const ROOT = '/cvmfs/singularity.galaxyproject.org/all';

const FASTQC: ToolRecord = {
  id: 'fastqc',
  name: 'FastQC',
  description: 'A quality control tool for high throughput sequence data.',
  operations: ['Sequencing quality control'],
  topics: ['Sequencing'],
  externalIds: [],
  homepage: 'https://example.org/fastqc',
  license: 'GPL-3.0',
  inputs: [],
  outputs: [],
};

function container(toolKey: string, versionTag: string, extra: Partial<ContainerRecord> = {}): ContainerRecord {
  return { toolKey, versionTag, path: `${ROOT}/${toolKey}:${versionTag}`, ...extra };
}

function found(result: ToolResult | { status: 'not-found' }): ToolResult {
  if (result.status !== 'found') throw new Error('expected a result');
  return result;
}

function foundVersions(result: ContainerVersions | { status: 'not-found' }): ContainerVersions {
  if (result.status !== 'found') throw new Error('expected a result');
  return result;
}

describe('formatSize / formatDate', () => {
  it('renders megabytes with one decimal', () => {
    expect(formatSize(287309824)).toBe('274.0 MB');
    expect(formatSize(1572864)).toBe('1.5 MB');
    expect(formatSize(0)).toBe('0.0 MB');
  });

  it('renders UTC calendar dates', () => {
    expect(formatDate(new Date(1685577600 * 1000))).toBe('2023-06-01');
  });
});

describe('renderToolResult', () => {
  it('renders metadata, the newest container and other versions', () => {
    const engine = createQueryEngine(
      buildCatalogIndex(
        [FASTQC],
        [
          container('fastqc', '0.11.9--0'),
          container('fastqc', '0.12.1--hdfd78af_0', { sizeBytes: 287309824, modifiedAt: new Date(1685577600 * 1000) }),
        ]
      )
    );

    expect(renderToolResult(found(engine.findTool('FastQC')))).toBe(
      [
        '# FastQC',
        '',
        '**Description:** A quality control tool for high throughput sequence data.',
        '**Homepage:** https://example.org/fastqc',
        '**License:** GPL-3.0',
        '**Operations:** Sequencing quality control',
        '**Topics:** Sequencing',
        '',
        '## Available Containers (2 versions)',
        '',
        '### Most Recent Version: 0.12.1--hdfd78af_0',
        `**Path:** \`${ROOT}/fastqc:0.12.1--hdfd78af_0\``,
        '**Size:** 274.0 MB',
        '**Modified:** 2023-06-01',
        '',
        '### Usage Example:',
        '```bash',
        '# Execute a command in the container',
        `singularity exec ${ROOT}/fastqc:0.12.1--hdfd78af_0 fastqc --help`,
        '',
        '# Run interactively',
        `singularity shell ${ROOT}/fastqc:0.12.1--hdfd78af_0`,
        '```',
        '',
        '### All Available Versions:',
        `- **0.12.1--hdfd78af_0** - \`${ROOT}/fastqc:0.12.1--hdfd78af_0\``,
        `- **0.11.9--0** - \`${ROOT}/fastqc:0.11.9--0\``,
      ].join('\n')
    );
  });

  it('lists at most ten versions', () => {
    const containers = Array.from({ length: 13 }, (_, i) => container('bedtools', `2.${i}.0--0`));
    const text = renderToolResult(found(createQueryEngine(buildCatalogIndex([], containers)).findTool('bedtools')));
    const lines = text.split('\n');

    expect(lines.filter((line) => line.startsWith('- **'))).toHaveLength(10);
    expect(lines.at(-1)).toBe('... and 3 more versions');
    expect(lines.slice(0, 3)).toEqual(['# bedtools', '', '(No metadata available for this tool)']);
  });

  it('explains when no container exists', () => {
    const text = renderToolResult(found(createQueryEngine(buildCatalogIndex([FASTQC], [])).findTool('fastqc')));
    expect(text.split('\n').slice(-2)).toEqual([
      '**No containers found in CVMFS for this tool.**',
      'The tool may be available through other means or under a different name.',
    ]);
  });
});

describe('renderSearchResults', () => {
  it('renders ranked hits', () => {
    const engine = createQueryEngine(
      buildCatalogIndex([FASTQC], [container('fastqc', '0.12.1--hdfd78af_0')])
    );

    expect(renderSearchResults('quality control', engine.searchByFunction('quality control'))).toBe(
      [
        '# Tools for: quality control',
        '',
        'Found 1 matching tools:',
        '',
        '## 1. FastQC',
        '**ID:** fastqc',
        '**Score:** 15',
        '**Description:** A quality control tool for high throughput sequence data.',
        '**Operations:** Sequencing quality control',
        '**Latest Container:** `0.12.1--hdfd78af_0` (1 total)',
        `**Quick Start:** \`singularity exec ${ROOT}/fastqc:0.12.1--hdfd78af_0 fastqc --help\``,
      ].join('\n')
    );
  });

  it('suggests other keywords when nothing matches', () => {
    expect(renderSearchResults('phylogeny', [])).toBe(
      "No tools found matching 'phylogeny'. Try different keywords or browse available tools."
    );
  });
});

describe('renderContainerVersions', () => {
  it('renders every version with size and date when known', () => {
    const engine = createQueryEngine(
      buildCatalogIndex(
        [],
        [
          container('cellranger', '7.1.0--0', { sizeBytes: 1572864 }),
          container('cellranger', '7.2.0--0', { modifiedAt: new Date(Date.UTC(2024, 0, 15)) }),
        ]
      )
    );

    expect(renderContainerVersions(foundVersions(engine.getContainerVersions('cellranger')))).toBe(
      [
        '# Container Versions for cellranger',
        '',
        'Total versions: 2',
        '',
        '## Version 7.2.0--0',
        `- **Path:** \`${ROOT}/cellranger:7.2.0--0\``,
        '- **Modified:** 2024-01-15',
        '',
        '## Version 7.1.0--0',
        `- **Path:** \`${ROOT}/cellranger:7.1.0--0\``,
        '- **Size:** 1.5 MB',
      ].join('\n')
    );
  });

  it('reports a tool without containers', () => {
    const engine = createQueryEngine(buildCatalogIndex([FASTQC], []));
    expect(renderContainerVersions(foundVersions(engine.getContainerVersions('FastQC')))).toBe(
      "No containers found for 'FastQC'"
    );
  });
});

describe('renderToolList / renderNotFound', () => {
  it('renders a bulleted list', () => {
    expect(renderToolList(['bwa', 'fastqc'])).toBe('# Available Bioinformatics Tools (2 shown)\n\n- bwa\n- fastqc');
    expect(renderToolList([])).toBe('# Available Bioinformatics Tools (0 shown)');
  });

  it('echoes the original query', () => {
    expect(renderNotFound({ status: 'not-found', query: 'geneforge', normalizedQuery: 'geneforge' })).toBe(
      "No tool found matching 'geneforge'. Try a functional search to find tools by what they do."
    );
  });
});
