/**
 * Logging module
 */

export { LeveledLogger } from './leveled-logger';
export { ConsoleLogger, formatEntry } from './console-logger';
export { BufferLogger } from './buffer-logger';
