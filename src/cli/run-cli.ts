/**
 * CLI runner
 *
 * Parses arguments and runs the render command.
 * Never throws and never exits the process; the exit code is returned.
 */

import { parseArgs } from './arg-parser';
import { getUsageText } from './help';
import { ParsedArgs } from './types';
import { VERSION } from './version';
import { executeRender } from '../commands/render';
import { ConsoleLogger } from '../logging/console-logger';
import { createStdoutWriter, createStderrWriter } from '../io/stream-output-writer';
import { InquirerPrompter } from '../ui/inquirer-prompter';
import { ExitCode, describeExitCode } from '../types/exit-codes';
import { Logger, LogLevel } from '../types/logger';
import { OutputWriter } from '../types/output-writer';
import { InputPrompter } from '../types/prompter';

/**
 * Injectable collaborators; anything omitted uses the process defaults
 */
export interface RunCliDependencies {
  stdout?: OutputWriter;
  stderr?: OutputWriter;
  logger?: Logger;
  prompter?: InputPrompter;
}

function getLogLevel(args: ParsedArgs): LogLevel {
  if (args.debug) return 'debug';
  if (args.verbose) return 'info';
  return 'warn';
}

/**
 * Run the CLI for the given argv (node and script path included)
 */
export async function runCli(argv: string[], deps: RunCliDependencies = {}): Promise<ExitCode> {
  const stdout = deps.stdout ?? createStdoutWriter();
  const stderr = deps.stderr ?? createStderrWriter();
  const logger = deps.logger ?? new ConsoleLogger();
  const parsed = parseArgs(argv);

  if (!parsed.success || !parsed.args) {
    logger.log('error', parsed.error ?? 'Error: Invalid arguments');
    stderr.writeLine(getUsageText());
    return ExitCode.USAGE_ERROR;
  }

  const args = parsed.args;

  if (args.help) {
    stderr.writeLine(getUsageText());
    return ExitCode.SUCCESS;
  }

  if (args.version) {
    stdout.writeLine(VERSION);
    return ExitCode.SUCCESS;
  }

  logger.setLevel(getLogLevel(args));
  if (args.ignored.length > 0) {
    logger.event('arguments_ignored', 'Only the first argument is read; quote the token list', {
      args: args.ignored,
    });
  }
  logger.event('run_started', 'Rendering enum values');

  const prompter = deps.prompter ?? new InquirerPrompter({ enabled: !args.noInteractive });

  let code: ExitCode;
  try {
    code = await executeRender(
      {
        input: args.input,
        indent: args.indent,
        jsonOutput: args.jsonOutput,
        interactive: !args.noInteractive,
      },
      { stdout, stderr, logger, prompter }
    );
  } catch (error) {
    logger.event('run_failed', error instanceof Error ? error.message : String(error), {
      exitCode: ExitCode.UNEXPECTED_ERROR,
    });
    return ExitCode.UNEXPECTED_ERROR;
  }

  if (code === ExitCode.SUCCESS) {
    logger.event('run_completed', 'Done');
  } else {
    logger.event('run_failed', describeExitCode(code), { exitCode: code });
  }
  return code;
}
