/**
 * OutputWriter interface
 * Abstracts line-oriented standard output so generated code can be captured in tests
 */

/**
 * Destination for generated lines
 * Implementations can write to a stream (stdout) or keep lines in memory
 */
export interface OutputWriter {
  /**
   * Write a single line; the implementation appends the line terminator
   */
  writeLine(line: string): void;
}
