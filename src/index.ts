/**
 * Public API: token formatting plus the pieces the CLI is built from
 */

export {
  splitTokens,
  capitalizeWord,
  toIdentifierForm,
  renderPair,
  renderPairs,
  formatAttributeLine,
  formatVariantLine,
  pairLines,
  renderLines,
  rustEnumValues,
} from './core';
export type { RenderedPair, RenderOptions } from './core';

export { runCli, parseArgs, getUsageText, VERSION } from './cli';
export type { RunCliDependencies, ParsedArgs, ParseResult } from './cli';

export { StreamOutputWriter, MemoryOutputWriter, createStdoutWriter, createStderrWriter } from './io';
export { ConsoleLogger, BufferLogger } from './logging';
export { InquirerPrompter } from './ui';

export { ExitCode, ok, err } from './types';
export type { Result, OutputWriter, InputPrompter, PromptError, Logger, LogEntry, RunEvent } from './types';
