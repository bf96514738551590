/**
 * Render command
 *
 * Acquires the input string and prints the enum values for it.
 */

import { ExitCode } from '../types/exit-codes';
import { Logger } from '../types/logger';
import { OutputWriter } from '../types/output-writer';
import { InputPrompter } from '../types/prompter';
import { RenderedPair, renderPairs, rustEnumValues } from '../core/token-formatter';

/** Printed when no input string was given */
export const MISSING_INPUT_ADVISORY = 'you need to specify the input string';

/** Question shown when asking for the input string */
export const INPUT_PROMPT_MESSAGE = 'Comma-separated tokens:';

export interface RenderSettings {
  input: string | null;
  indent: number;
  jsonOutput: boolean;
  interactive: boolean;
}

export interface RenderDependencies {
  stdout: OutputWriter;
  stderr: OutputWriter;
  logger: Logger;
  prompter: InputPrompter;
}

/**
 * Ask for the input string; null when no prompt could be answered
 */
async function acquireInput(settings: RenderSettings, deps: RenderDependencies): Promise<string | null> {
  const { logger, prompter } = deps;

  if (!settings.interactive || !prompter.canPrompt()) {
    logger.event('input_missing', 'No input string was given');
    return null;
  }

  logger.event('prompt_shown', INPUT_PROMPT_MESSAGE);
  const answer = await prompter.ask(INPUT_PROMPT_MESSAGE);
  if (!answer.ok) {
    logger.log('error', answer.error.message, { reason: answer.error.reason });
    return null;
  }
  logger.event('prompt_answered', 'Input string received', { length: answer.value.length });
  return answer.value;
}

/**
 * Render the input, prompting for it when it is missing.
 * The advisory comes first; under --json it goes to stderr so stdout stays valid JSON.
 */
export async function executeRender(settings: RenderSettings, deps: RenderDependencies): Promise<ExitCode> {
  const { stdout, stderr, logger } = deps;

  let input = settings.input;
  if (input === null) {
    (settings.jsonOutput ? stderr : stdout).writeLine(MISSING_INPUT_ADVISORY);
    input = await acquireInput(settings, deps);
    if (input === null) {
      return ExitCode.USAGE_ERROR;
    }
  }

  let pairs: RenderedPair[];
  if (settings.jsonOutput) {
    pairs = renderPairs(input);
    stdout.writeLine(JSON.stringify(pairs, null, 2));
  } else {
    pairs = rustEnumValues(input, stdout, { indent: ' '.repeat(settings.indent) });
  }

  pairs.forEach((pair, index) => {
    logger.event('token_rendered', `"${pair.raw}" -> ${pair.identifier}`, { tokenIndex: index });
  });
  logger.log('info', `Rendered ${pairs.length} token(s)`);

  return ExitCode.SUCCESS;
}
