#!/usr/bin/env node

/**
 * CLI entry point for vv.
 */

import { createProgram } from './commands.js';
import { formatError } from './format.js';
import { VaultError } from './types.js';

export async function main(): Promise<void> {
  const program = createProgram();
  await program.parseAsync(process.argv);
}

main().catch((err: unknown) => {
  if (err instanceof VaultError) {
    console.error(formatError(err));
    process.exitCode = err.exitCode;
  } else {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  }
});
