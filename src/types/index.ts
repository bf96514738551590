/**
 * Shared types: results, exit codes, and the injectable writer, prompter and logger
 */

export { ok, err } from './result';
export type { Result } from './result';
export { ExitCode, describeExitCode } from './exit-codes';
export type { OutputWriter } from './output-writer';
export { promptError } from './prompter';
export type { InputPrompter, PromptError, PromptFailure } from './prompter';
export { EVENT_LEVELS, isAtLeast } from './logger';
export type { Logger, LogLevel, LogEntry, LogFields, RunEvent } from './logger';
