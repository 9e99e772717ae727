/**
 * Tests for index construction and key normalization.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { buildCatalogIndex, getEntry, getIndexStats, collapseWhitespace } from './CatalogIndex.js';
import { normalizeKey } from './normalize.js';
import type { ContainerRecord, ToolRecord } from './types.js';

function tool(id: string, overrides: Partial<ToolRecord> = {}): ToolRecord {
  return {
    id,
    name: id,
    operations: [],
    topics: [],
    externalIds: [],
    inputs: [],
    outputs: [],
    ...overrides,
  };
}

function container(toolKey: string, versionTag: string, path = `/cvmfs/images/${toolKey}:${versionTag}`): ContainerRecord {
  return { toolKey, versionTag, path };
}

describe('normalizeKey', () => {
  it('folds case and separators', () => {
    expect(normalizeKey('bwa-mem')).toBe('bwa-mem');
    expect(normalizeKey('bwa_mem')).toBe('bwa-mem');
    expect(normalizeKey('BWA_MEM')).toBe('bwa-mem');
  });

  it('trims surrounding whitespace', () => {
    expect(normalizeKey('  FastQC \n')).toBe('fastqc');
  });
});

describe('collapseWhitespace', () => {
  it('joins lines with single spaces', () => {
    expect(collapseWhitespace('  quality\n  control\tfor reads ')).toBe('quality control for reads');
  });
});

describe('buildCatalogIndex', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('indexes tools by normalized id', () => {
    const index = buildCatalogIndex([tool('Trim_Galore')], []);
    expect([...index.entries.keys()]).toEqual(['trim-galore']);
    expect(index.entries.get('trim-galore')?.tool?.id).toBe('Trim_Galore');
  });

  it('attaches containers to their tool', () => {
    const index = buildCatalogIndex(
      [tool('samtools')],
      [container('samtools', '1.17--h00cdaf9_0'), container('SAMTOOLS', '1.9--h91753b0_8')]
    );
    const entry = index.entries.get('samtools');
    expect(entry?.containers.map((c) => c.record.versionTag)).toEqual(['1.17--h00cdaf9_0', '1.9--h91753b0_8']);
    expect(entry?.containers[0]?.version.components).toEqual([1, 17]);
    expect(index.containerCount).toBe(2);
  });

  it('keeps containers without metadata under their own key', () => {
    const index = buildCatalogIndex([], [container('cellranger', '7.1.0--0')]);
    const entry = index.entries.get('cellranger');
    expect(entry?.tool).toBeUndefined();
    expect(entry?.containers).toHaveLength(1);
  });

  it('keeps metadata without containers', () => {
    const index = buildCatalogIndex([tool('geneforge')], []);
    expect(index.entries.get('geneforge')?.containers).toEqual([]);
  });

  it('registers names and external ids as aliases', () => {
    const index = buildCatalogIndex(
      [tool('bwa-mem2', { name: 'BWA-MEM2 aligner', externalIds: ['bwa_mem2_bc'] })],
      []
    );
    expect(index.aliases.get('bwa-mem2 aligner')).toBe('bwa-mem2');
    expect(index.aliases.get('bwa-mem2-bc')).toBe('bwa-mem2');
  });

  it('routes containers filed under an alias to the aliased tool', () => {
    const index = buildCatalogIndex(
      [tool('multiqc-suite', { externalIds: ['multiqc'] })],
      [container('multiqc', '1.21--pyhdfd78af_0')]
    );
    expect(index.entries.has('multiqc')).toBe(false);
    expect(index.entries.get('multiqc-suite')?.containers).toHaveLength(1);
  });

  it('keeps the first tool when two ids normalize to the same key', () => {
    const index = buildCatalogIndex(
      [tool('bwa_mem', { description: 'first' }), tool('BWA-MEM', { description: 'second' })],
      []
    );
    expect(index.entries.get('bwa-mem')?.tool?.description).toBe('first');
    expect(index.documents).toHaveLength(1);
    expect(index.collisions).toEqual([
      { key: 'bwa-mem', source: 'id', toolId: 'BWA-MEM', heldBy: 'bwa-mem' },
    ]);
  });

  it('lets a primary id win over an earlier tool alias', () => {
    const index = buildCatalogIndex([tool('bowtie2', { name: 'bwa' }), tool('bwa')], []);
    expect(index.aliases.has('bwa')).toBe(false);
    expect(index.entries.get('bwa')?.tool?.id).toBe('bwa');
    expect(index.collisions).toEqual([
      { key: 'bwa', source: 'name', toolId: 'bowtie2', heldBy: 'bwa' },
    ]);
  });

  it('keeps the first claim on a shared alias', () => {
    const index = buildCatalogIndex(
      [tool('spades', { externalIds: ['assembler'] }), tool('megahit', { externalIds: ['assembler'] })],
      []
    );
    expect(index.aliases.get('assembler')).toBe('spades');
    expect(index.collisions).toEqual([
      { key: 'assembler', source: 'external-id', toolId: 'megahit', heldBy: 'spades' },
    ]);
  });

  it('skips blank identifiers with a warning', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const index = buildCatalogIndex([tool('  ')], [container('', '1.0', '/cvmfs/images/blank')]);
    expect(index.entries.size).toBe(0);
    expect(warn).toHaveBeenCalledTimes(2);
  });

  it('precomputes lowercased search documents', () => {
    const index = buildCatalogIndex(
      [tool('FastQC', { name: 'FastQC', description: 'Quality\n control', operations: ['Sequencing QC'], topics: ['Sequencing'] })],
      []
    );
    expect(index.documents).toEqual([
      {
        key: 'fastqc',
        id: 'fastqc',
        name: 'fastqc',
        description: 'quality control',
        operations: ['sequencing qc'],
        topics: ['sequencing'],
      },
    ]);
  });

  it('freezes the built structure', () => {
    const index = buildCatalogIndex([tool('fastqc')], [container('fastqc', '0.12.1--hdfd78af_0')]);
    expect(Object.isFrozen(index)).toBe(true);
    expect(Object.isFrozen(index.entries.get('fastqc'))).toBe(true);
    expect(Object.isFrozen(index.entries.get('fastqc')?.containers)).toBe(true);
  });

  it('builds an empty index from empty inputs', () => {
    const index = buildCatalogIndex([], []);
    expect(index.entries.size).toBe(0);
    expect(getIndexStats(index)).toEqual({ tools: 0, containerOnlyKeys: 0, containers: 0, aliases: 0, collisions: 0 });
  });
});

describe('getEntry', () => {
  const index = buildCatalogIndex(
    [tool('fastqc', { name: 'FastQC', externalIds: ['fastqc-bio'] })],
    [container('cellranger', '7.1.0--0')]
  );

  it('resolves primary keys as exact matches', () => {
    expect(getEntry(index, 'fastqc')?.via).toBe('exact');
  });

  it('resolves aliases', () => {
    const hit = getEntry(index, 'fastqc-bio');
    expect(hit?.via).toBe('alias');
    expect(hit?.entry.key).toBe('fastqc');
  });

  it('returns undefined for unknown keys', () => {
    expect(getEntry(index, 'kraken2')).toBeUndefined();
  });

  it('counts tools and container-only keys', () => {
    expect(getIndexStats(index)).toEqual({ tools: 1, containerOnlyKeys: 1, containers: 1, aliases: 1, collisions: 0 });
  });
});
