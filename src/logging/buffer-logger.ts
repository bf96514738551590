/**
 * Logger that keeps entries in memory, for tests
 */

import { LogEntry, LogLevel, RunEvent } from '../types/logger';
import { LeveledLogger } from './leveled-logger';

export class BufferLogger extends LeveledLogger {
  private readonly entries: LogEntry[] = [];

  // Capture everything unless a run lowers the verbosity
  constructor(level: LogLevel = 'debug') {
    super(level);
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  withEvent(event: RunEvent): LogEntry[] {
    return this.entries.filter((entry) => entry.event === event);
  }

  hasEvent(event: RunEvent): boolean {
    return this.entries.some((entry) => entry.event === event);
  }

  last(): LogEntry | undefined {
    return this.entries[this.entries.length - 1];
  }

  protected write(entry: LogEntry): void {
    this.entries.push(entry);
  }
}
