/**
 * IO module - output writer implementations
 */

export { StreamOutputWriter, createStdoutWriter, createStderrWriter } from './stream-output-writer';
export { MemoryOutputWriter } from './memory-output-writer';
