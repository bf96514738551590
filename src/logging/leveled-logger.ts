/**
 * Level filtering shared by every logger; subclasses decide where entries go
 */

import { Logger, LogLevel, LogEntry, LogFields, RunEvent, EVENT_LEVELS, isAtLeast } from '../types/logger';

export abstract class LeveledLogger implements Logger {
  private level: LogLevel;

  constructor(level: LogLevel) {
    this.level = level;
  }

  log(level: LogLevel, message: string, fields: LogFields = {}): void {
    this.accept({ level, message, fields });
  }

  event(event: RunEvent, message: string, fields: LogFields = {}): void {
    this.accept({ level: EVENT_LEVELS[event], event, message, fields });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  protected abstract write(entry: LogEntry): void;

  private accept(entry: LogEntry): void {
    if (isAtLeast(entry.level, this.level)) {
      this.write(entry);
    }
  }
}
