/**
 * TextPresenter — Markdown renderings of query results.
 *
 * Shared by the MCP tools and the CLI. Every function is pure and returns
 * the complete text block.
 */

import type { ContainerRecord, ToolRecord } from '../catalog/types.js';
import type { ContainerVersions, NotFound, SearchHit, ToolResult } from '../query/types.js';

/** Versions listed by renderToolResult before the "... and N more" trailer. */
export const MAX_LISTED_VERSIONS = 10;

const BYTES_PER_MB = 1024 * 1024;

/**
 * Size in megabytes with one decimal, e.g. `274.0 MB`.
 */
export function formatSize(sizeBytes: number): string {
  return `${(sizeBytes / BYTES_PER_MB).toFixed(1)} MB`;
}

/**
 * Calendar date in UTC, e.g. `2023-06-01`.
 */
export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function metadataLines(tool: ToolRecord): string[] {
  const lines = [`# ${tool.name}`, ''];
  if (tool.description) lines.push(`**Description:** ${tool.description}`);
  if (tool.homepage) lines.push(`**Homepage:** ${tool.homepage}`);
  if (tool.license) lines.push(`**License:** ${tool.license}`);
  if (tool.operations.length > 0) lines.push(`**Operations:** ${tool.operations.join(', ')}`);
  if (tool.topics.length > 0) lines.push(`**Topics:** ${tool.topics.join(', ')}`);
  return lines;
}

function usageLines(container: ContainerRecord, command: string): string[] {
  return [
    '```bash',
    '# Execute a command in the container',
    `singularity exec ${container.path} ${command} --help`,
    '',
    '# Run interactively',
    `singularity shell ${container.path}`,
    '```',
  ];
}

/**
 * Full answer to a name lookup: metadata, newest container, usage and
 * the other versions.
 */
export function renderToolResult(result: ToolResult): string {
  const lines = result.tool
    ? metadataLines(result.tool)
    : [`# ${result.key}`, '', '(No metadata available for this tool)'];

  const { latest, versions } = result;
  if (!latest) {
    lines.push(
      '',
      '**No containers found in CVMFS for this tool.**',
      'The tool may be available through other means or under a different name.'
    );
    return lines.join('\n');
  }

  lines.push('', `## Available Containers (${versions.length} versions)`, '');
  lines.push(`### Most Recent Version: ${latest.versionTag}`);
  lines.push(`**Path:** \`${latest.path}\``);
  if (latest.sizeBytes !== undefined) lines.push(`**Size:** ${formatSize(latest.sizeBytes)}`);
  if (latest.modifiedAt) lines.push(`**Modified:** ${formatDate(latest.modifiedAt)}`);

  lines.push('', '### Usage Example:', ...usageLines(latest, result.tool?.id ?? result.key));

  if (versions.length > 1) {
    lines.push('', '### All Available Versions:');
    for (const container of versions.slice(0, MAX_LISTED_VERSIONS)) {
      lines.push(`- **${container.versionTag}** - \`${container.path}\``);
    }
    if (versions.length > MAX_LISTED_VERSIONS) {
      lines.push('', `... and ${versions.length - MAX_LISTED_VERSIONS} more versions`);
    }
  }

  return lines.join('\n');
}

/**
 * Ranked functional-search hits.
 */
export function renderSearchResults(query: string, hits: readonly SearchHit[]): string {
  if (hits.length === 0) {
    return `No tools found matching '${query}'. Try different keywords or browse available tools.`;
  }

  const lines = [`# Tools for: ${query}`, '', `Found ${hits.length} matching tools:`];

  hits.forEach((hit, i) => {
    lines.push('', `## ${i + 1}. ${hit.tool.name}`);
    lines.push(`**ID:** ${hit.tool.id}`);
    lines.push(`**Score:** ${hit.score}`);
    if (hit.tool.description) lines.push(`**Description:** ${hit.tool.description}`);
    if (hit.tool.operations.length > 0) lines.push(`**Operations:** ${hit.tool.operations.join(', ')}`);
    if (hit.latest) {
      lines.push(`**Latest Container:** \`${hit.latest.versionTag}\` (${hit.containerCount} total)`);
      lines.push(`**Quick Start:** \`singularity exec ${hit.latest.path} ${hit.tool.id} --help\``);
    }
  });

  return lines.join('\n');
}

/**
 * Every container of a tool with path, size and date.
 */
export function renderContainerVersions(result: ContainerVersions): string {
  if (result.versions.length === 0) {
    return `No containers found for '${result.query}'`;
  }

  const lines = [`# Container Versions for ${result.tool?.name ?? result.key}`, '', `Total versions: ${result.versions.length}`];

  for (const container of result.versions) {
    lines.push('', `## Version ${container.versionTag}`);
    lines.push(`- **Path:** \`${container.path}\``);
    if (container.sizeBytes !== undefined) lines.push(`- **Size:** ${formatSize(container.sizeBytes)}`);
    if (container.modifiedAt) lines.push(`- **Modified:** ${formatDate(container.modifiedAt)}`);
  }

  return lines.join('\n');
}

/**
 * Bulleted tool ids.
 */
export function renderToolList(ids: readonly string[]): string {
  const header = `# Available Bioinformatics Tools (${ids.length} shown)`;
  if (ids.length === 0) return header;
  return [header, '', ...ids.map((id) => `- ${id}`)].join('\n');
}

export function renderNotFound(result: NotFound): string {
  return `No tool found matching '${result.query}'. Try a functional search to find tools by what they do.`;
}
