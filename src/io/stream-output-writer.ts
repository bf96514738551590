/**
 * Stream-backed OutputWriter
 * Writes generated lines to a Node.js writable stream (stdout by default)
 */

import { OutputWriter } from '../types/output-writer';

export class StreamOutputWriter implements OutputWriter {
  private readonly stream: NodeJS.WritableStream;

  constructor(stream: NodeJS.WritableStream = process.stdout) {
    this.stream = stream;
  }

  writeLine(line: string): void {
    this.stream.write(`${line}\n`);
  }
}

/**
 * Create a writer for standard output
 */
export function createStdoutWriter(): OutputWriter {
  return new StreamOutputWriter(process.stdout);
}

/**
 * Create a writer for standard error
 */
export function createStderrWriter(): OutputWriter {
  return new StreamOutputWriter(process.stderr);
}
