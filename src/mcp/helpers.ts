/**
 * MCP response helpers.
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';

/**
 * Create a text content result.
 */
export function textResult(text: string): CallToolResult {
  return { content: [{ type: 'text', text }] };
}

/**
 * Create a JSON content result. Dates serialize as ISO strings.
 */
export function jsonResult(data: unknown): CallToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(data, null, 2) }] };
}

/**
 * Create an error result.
 */
export function errorResult(message: string): CallToolResult {
  return { content: [{ type: 'text', text: message }], isError: true };
}

/**
 * Run a tool body, turning a thrown error into an error result.
 */
export function guardTool(run: () => CallToolResult): CallToolResult {
  try {
    return run();
  } catch (err) {
    return errorResult(`Tool error: ${err instanceof Error ? err.message : String(err)}`);
  }
}
