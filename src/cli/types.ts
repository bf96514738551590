/**
 * CLI Types
 *
 * Type definitions for CLI argument parsing
 */

/** Widest --indent accepted */
export const MAX_INDENT = 16;

/** Parsed CLI arguments */
export interface ParsedArgs {
  /** First positional argument; null when none was given */
  input: string | null;

  /** Positional arguments after the first, which are not rendered */
  ignored: string[];

  /** Number of spaces to prefix each emitted line with */
  indent: number;

  /** Emit rendered pairs as JSON */
  jsonOutput: boolean;

  /** Disable interactive prompts */
  noInteractive: boolean;

  /** Log progress at info level */
  verbose: boolean;

  /** Log every rendered token */
  debug: boolean;

  /** Show help and exit */
  help: boolean;

  /** Show version and exit */
  version: boolean;
}

/** Default values for parsed arguments */
export const DEFAULT_ARGS: ParsedArgs = {
  input: null,
  ignored: [],
  indent: 0,
  jsonOutput: false,
  noInteractive: false,
  verbose: false,
  debug: false,
  help: false,
  version: false,
};

/** Result of parsing arguments */
export interface ParseResult {
  success: boolean;
  args?: ParsedArgs;
  error?: string;
}
