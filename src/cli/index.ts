/**
 * CLI Module
 *
 * Exports for argument parsing and the runner
 */

export { parseArgs } from './arg-parser';
export { getUsageText } from './help';
export { runCli } from './run-cli';
export type { RunCliDependencies } from './run-cli';
export type { ParsedArgs, ParseResult } from './types';
export { DEFAULT_ARGS, MAX_INDENT } from './types';
export { VERSION } from './version';
