#!/usr/bin/env node

/**
 * Entry point for the linesift command
 */

import { runCLI } from './cli.js';

async function main(): Promise<number> {
  return runCLI(process.argv, { stdin: process.stdin, stdout: process.stdout });
}

main()
  .then((code) => {
    process.exit(code);
  })
  .catch((error: unknown) => {
    console.error('Fatal error:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
