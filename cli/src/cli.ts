#!/usr/bin/env node
/**
 * workrun CLI
 *
 * Usage:
 *   workrun [run] [options]   Dispatch every workload to the worker
 *   workrun list [options]    List the tasks a run would dispatch
 *   workrun --version         Show version
 */

import { ExitCodes } from '../../engine/src/index.js';
import { createProgram } from './program.js';

async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error('Fatal error:', message);
  if (process.env.DEBUG && error instanceof Error) {
    console.error(error.stack);
  }
  process.exit(ExitCodes.INTERNAL_ERROR);
});
