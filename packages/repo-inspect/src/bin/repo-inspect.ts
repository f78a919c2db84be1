#!/usr/bin/env node
/**
 * repo-inspect CLI entry point
 *
 * Usage:
 *   repo-inspect [owner/repo] [--format json|yaml|table] [--sections a,b] [--verbose]
 */

import { createProgram } from '../cli.js';

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (error instanceof Error) {
      console.error(`Error: ${error.message}`);
      if (process.env['DEBUG']) {
        console.error(error.stack);
      }
    } else {
      console.error('An unexpected error occurred');
    }
    process.exit(1);
  }
}

// Run the CLI
void main();
