/**
 * MCP stdio transport entry point.
 *
 * Lets a local agent talk to the finder over stdio (no HTTP server needed).
 * Usage: npx tsx src/mcp-stdio.ts [basePath]
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { initializeApp } from './server.js';
import { createMcpServer } from './mcp/index.js';

/**
 * Send console output to stderr so stdout carries only MCP JSON-RPC.
 */
function redirectConsoleToStderr(): void {
  const write = (...args: unknown[]) => {
    process.stderr.write(args.map(String).join(' ') + '\n');
  };
  console.log = write;
  console.info = write;
  console.warn = write;
  console.error = write;
}

async function main() {
  const basePath = process.argv[2] || process.env.APP_BASE_PATH || process.cwd();

  redirectConsoleToStderr();

  console.log(`Initializing container finder MCP server (base: ${basePath})`);

  const ctx = await initializeApp(basePath);
  const mcpServer = createMcpServer(ctx);

  const transport = new StdioServerTransport();
  await mcpServer.connect(transport);

  console.log('MCP server connected via stdio');
}

main().catch((err) => {
  process.stderr.write(`Fatal: ${err instanceof Error ? err.stack ?? err.message : String(err)}\n`);
  process.exit(1);
});
