/**
 * Catalog fixtures shared by the integration tests.
 *
 * Writes a small metadata catalog and container cache into a directory laid
 * out the way the default config expects (`data/...`).
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { gzipSync } from 'node:zlib';
import { stringify } from 'yaml';

export const CVMFS_ROOT = '/cvmfs/singularity.galaxyproject.org/all';

export const FIXTURE_TOOLS = [
  {
    id: 'fastqc',
    name: 'FastQC',
    description: 'A quality control tool for high throughput sequence data.',
    homepage: 'https://example.org/fastqc',
    biotools: 'fastqc',
    'edam-operations': ['Sequencing quality control'],
    'edam-topics': ['Sequencing'],
  },
  {
    id: 'bcftools',
    name: 'BCFtools',
    description: 'Utilities for variant calling and manipulating VCF and BCF files.',
    'edam-operations': ['Variant calling'],
    'edam-topics': ['Genetic variation'],
  },
  {
    id: 'trinity',
    name: 'Trinity',
    description: 'De novo transcriptome assembly from RNA-seq reads.',
    biocontainers: 'trinityrnaseq',
    'edam-operations': ['De-novo assembly'],
    'edam-topics': ['Transcriptomics'],
  },
  {
    id: 'multiqc',
    name: 'MultiQC',
    description: 'Aggregate results from bioinformatics analyses into a single quality control report.',
    'edam-operations': ['Sequencing quality control'],
  },
];

function entry(tool: string, tag: string, sizeBytes?: number, mtime?: number) {
  return {
    tool_name: tool,
    tag,
    path: `${CVMFS_ROOT}/${tool}:${tag}`,
    ...(sizeBytes !== undefined ? { size_bytes: sizeBytes } : {}),
    ...(mtime !== undefined ? { mtime } : {}),
  };
}

export const FIXTURE_CACHE = {
  generated_at: '2024-05-01T03:00:00Z',
  cvmfs_root: CVMFS_ROOT,
  entry_count: 6,
  entries: [
    entry('fastqc', '0.11.9--0', 209715200, 1600000000),
    entry('fastqc', '0.12.1--hdfd78af_0', 287309824, 1685577600),
    entry('fastqc', '0.11.9--hdfd78af_1', 220200960, 1640995200),
    entry('bcftools', '1.17--h3cc50cf_1'),
    entry('trinityrnaseq', '2.15.1--pl5321h146fbdb_3'),
    entry('cellranger', '7.1.0--h9ee0642_0'),
  ],
};

/**
 * Write `data/toolfinder_meta.yaml` and `data/galaxy_singularity_cache.json.gz`
 * under `baseDir`.
 */
export async function writeCatalogFixture(baseDir: string): Promise<void> {
  const dataDir = join(baseDir, 'data');
  await mkdir(dataDir, { recursive: true });
  await writeFile(join(dataDir, 'toolfinder_meta.yaml'), stringify(FIXTURE_TOOLS), 'utf-8');
  await writeFile(
    join(dataDir, 'galaxy_singularity_cache.json.gz'),
    gzipSync(Buffer.from(JSON.stringify(FIXTURE_CACHE)))
  );
}
