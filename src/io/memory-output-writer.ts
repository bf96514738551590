/**
 * In-memory OutputWriter implementation
 * For testing - keeps every written line
 */

import { OutputWriter } from '../types/output-writer';

export class MemoryOutputWriter implements OutputWriter {
  private lines: string[] = [];

  writeLine(line: string): void {
    this.lines.push(line);
  }

  /**
   * Get all written lines
   */
  getLines(): string[] {
    return [...this.lines];
  }

  /**
   * Get the output exactly as a stream would have received it
   */
  getOutput(): string {
    return this.lines.map((line) => `${line}\n`).join('');
  }
}
