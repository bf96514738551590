/**
 * Asks for the token list on a terminal with inquirer
 */

import inquirer from 'inquirer';
import { InputPrompter, PromptError, promptError } from '../types/prompter';
import { Result, ok, err } from '../types/result';

export interface InquirerPrompterOptions {
  /** False when --no-interactive was given */
  enabled?: boolean;
  /** Overrides process.stdout.isTTY */
  isTTY?: boolean;
}

export class InquirerPrompter implements InputPrompter {
  private readonly enabled: boolean;
  private readonly isTTY: boolean;

  constructor(options: InquirerPrompterOptions = {}) {
    this.enabled = options.enabled ?? true;
    this.isTTY = options.isTTY ?? process.stdout.isTTY ?? false;
  }

  canPrompt(): boolean {
    return this.enabled && this.isTTY;
  }

  async ask(question: string): Promise<Result<string, PromptError>> {
    if (!this.canPrompt()) {
      return err(promptError('non_interactive', 'No terminal to prompt on'));
    }

    try {
      const answers = await inquirer.prompt<{ tokens: string }>([
        { type: 'input', name: 'tokens', message: question },
      ]);
      return ok(answers.tokens);
    } catch (error) {
      return err(toPromptError(error));
    }
  }
}

/**
 * Ctrl+C surfaces as a force-close error from inquirer
 */
function toPromptError(error: unknown): PromptError {
  if (error instanceof Error) {
    if (error.name === 'ExitPromptError' || error.message.includes('User force closed')) {
      return promptError('cancelled', 'Prompt cancelled');
    }
    return promptError('io_error', `Prompt failed: ${error.message}`);
  }
  return promptError('io_error', `Prompt failed: ${String(error)}`);
}
