/**
 * Asking the user for the input string when it was not passed as an argument
 */

import { Result } from './result';

export type PromptFailure = 'cancelled' | 'non_interactive' | 'io_error';

export interface PromptError {
  reason: PromptFailure;
  message: string;
}

export interface InputPrompter {
  /** True when a terminal is attached and prompting is allowed */
  canPrompt(): boolean;

  /** Ask a single free-text question */
  ask(question: string): Promise<Result<string, PromptError>>;
}

export function promptError(reason: PromptFailure, message: string): PromptError {
  return { reason, message };
}
