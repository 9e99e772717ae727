#!/usr/bin/env node
/**
 * biofinder CLI
 *
 * Looks up Singularity containers for bioinformatics tools from the
 * terminal, using the same catalog and queries as the server.
 *
 * @example
 * ```bash
 * biofinder find fastqc
 * biofinder search variant calling
 * biofinder --json versions samtools
 * biofinder interactive
 * ```
 */

import { createProgram } from './cli/program.js';
import { initializeApp } from './server.js';

async function main(): Promise<void> {
  // Startup progress goes to stderr; stdout carries only results
  const log = console.log;
  console.log = (...args: unknown[]) => console.error(...args);

  const program = createProgram({
    loadContext: (basePath) => initializeApp(basePath),
    write: (text) => log(text),
  });

  await program.parseAsync(process.argv);
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
