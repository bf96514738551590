/**
 * Logger for the real CLI. Writes one line per entry to stderr so that
 * stdout carries nothing but generated code.
 */

import { LogEntry, LogLevel } from '../types/logger';
import { LeveledLogger } from './leveled-logger';

const LEVEL_MARKS: Record<LogLevel, string> = {
  debug: '🔍',
  info: 'ℹ️',
  warn: '⚠️',
  error: '❌',
};

/**
 * e.g. `🔍 (token_rendered) "foo_bar" -> FooBar {tokenIndex=0}`
 */
export function formatEntry(entry: LogEntry): string {
  const parts = [LEVEL_MARKS[entry.level]];
  if (entry.event) {
    parts.push(`(${entry.event})`);
  }
  parts.push(entry.message);

  const fields = Object.entries(entry.fields).map(
    ([key, value]) => `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`
  );
  if (fields.length > 0) {
    parts.push(`{${fields.join(', ')}}`);
  }
  return parts.join(' ');
}

export class ConsoleLogger extends LeveledLogger {
  constructor(level: LogLevel = 'warn') {
    super(level);
  }

  protected write(entry: LogEntry): void {
    console.error(formatEntry(entry));
  }
}
