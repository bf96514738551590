/**
 * CLI Help Text
 *
 * Help and usage text for the CLI
 */

import { MAX_INDENT } from './types';

/** Get the usage text */
export function getUsageText(): string {
  return `Usage: renum [options] <comma_separated_tokens>

Prints a serde rename attribute and a PascalCase enum variant for every
comma-separated token. Only the first argument is read; quote the list.

Options:
  --indent <number>    Prefix every emitted line with <number> spaces (0-${MAX_INDENT})
  --json               Print the rendered pairs as a JSON array
  --no-interactive     Never prompt for a missing input string
  --verbose            Log progress to stderr
  --debug              Log every rendered token to stderr
  --help               Show this help message
  --version            Show version number
  --                   Read the next argument as the input even if it is an option

Examples:
  renum "foo_bar, baz_qux"
  renum "foo_bar, baz_qux" --indent 4
  renum --json "active, on_hold"`;
}
