/**
 * CLI Argument Parser
 *
 * Parses command line arguments into structured ParsedArgs.
 * Only exact flag names are options; every other argument is content.
 */

import { z } from 'zod';
import { ParsedArgs, ParseResult, DEFAULT_ARGS, MAX_INDENT } from './types';

const indentSchema = z
  .string()
  .regex(/^\d+$/)
  .transform(Number)
  .pipe(z.number().int().max(MAX_INDENT));

/**
 * Get the value for an argument, handling both --arg value and --arg=value formats
 */
function getArgValue(args: string[], index: number, argName: string): { value?: string; skip: number; error?: string } {
  const arg = args[index];

  // Check for --arg=value format
  if (arg.startsWith(`${argName}=`)) {
    const value = arg.slice(argName.length + 1);
    if (!value) {
      return { error: `${argName}= requires a value`, skip: 0 };
    }
    return { value, skip: 0 };
  }

  // Check for --arg value format
  const nextArg = args[index + 1];
  if (nextArg === undefined || nextArg.startsWith('--')) {
    return { error: `${argName} requires a value`, skip: 0 };
  }
  return { value: nextArg, skip: 1 };
}

/**
 * The first positional is the input string; later ones are ignored
 */
function addPositional(result: ParsedArgs, arg: string): void {
  if (result.input === null) {
    result.input = arg;
  } else {
    result.ignored.push(arg);
  }
}

/**
 * Parse command line arguments
 */
export function parseArgs(argv: string[]): ParseResult {
  const args = argv.slice(2); // Remove node and script path
  const result: ParsedArgs = { ...DEFAULT_ARGS, ignored: [] };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    // Everything after a bare -- is positional
    if (arg === '--') {
      for (const rest of args.slice(i + 1)) {
        addPositional(result, rest);
      }
      break;
    }

    const argBase = arg.startsWith('--indent=') ? '--indent' : arg;

    switch (argBase) {
      case '--help': {
        result.help = true;
        break;
      }

      case '--version': {
        result.version = true;
        break;
      }

      case '--indent': {
        const { value, skip, error } = getArgValue(args, i, '--indent');
        if (error !== undefined || value === undefined) {
          return { success: false, error: `Error: ${error ?? '--indent requires a value'}` };
        }
        const parsed = indentSchema.safeParse(value);
        if (!parsed.success) {
          return { success: false, error: `Error: --indent must be an integer between 0 and ${MAX_INDENT}` };
        }
        result.indent = parsed.data;
        i += skip;
        break;
      }

      case '--json': {
        result.jsonOutput = true;
        break;
      }

      case '--no-interactive': {
        result.noInteractive = true;
        break;
      }

      case '--verbose': {
        result.verbose = true;
        break;
      }

      case '--debug': {
        result.debug = true;
        break;
      }

      default: {
        addPositional(result, arg);
      }
    }
  }

  return { success: true, args: result };
}
