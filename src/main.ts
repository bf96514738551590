#!/usr/bin/env node

import { runCli } from './cli/run-cli';
import { ExitCode } from './types/exit-codes';

// Main CLI entry point
async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv);
}

main().catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : String(error));
  process.exitCode = ExitCode.UNEXPECTED_ERROR;
});
