#!/usr/bin/env node
/**
 * gps-bridge CLI Entry Point
 *
 * @module gps-bridge-cli
 */

import { createProgram } from '../src/cli/index.js';

async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
