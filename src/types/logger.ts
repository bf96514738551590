/**
 * Diagnostics for a renum run. Entries never go to stdout.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Named milestones of a run */
export type RunEvent =
  | 'run_started'
  | 'run_completed'
  | 'run_failed'
  | 'arguments_ignored'
  | 'input_missing'
  | 'prompt_shown'
  | 'prompt_answered'
  | 'token_rendered';

export type LogFields = Record<string, unknown>;

export interface LogEntry {
  level: LogLevel;
  /** Set when the entry records a run milestone */
  event?: RunEvent;
  message: string;
  fields: LogFields;
}

export interface Logger {
  log(level: LogLevel, message: string, fields?: LogFields): void;
  event(event: RunEvent, message: string, fields?: LogFields): void;
  setLevel(level: LogLevel): void;
}

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

/** Level each milestone is logged at */
export const EVENT_LEVELS: Record<RunEvent, LogLevel> = {
  run_started: 'info',
  run_completed: 'info',
  run_failed: 'error',
  arguments_ignored: 'warn',
  input_missing: 'warn',
  prompt_shown: 'info',
  prompt_answered: 'info',
  token_rendered: 'debug',
};

export function isAtLeast(level: LogLevel, threshold: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[threshold];
}
