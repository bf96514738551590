/**
 * Token Formatter
 *
 * Turns a comma-separated list of snake_case tokens into serde-annotated
 * Rust enum variants: an attribute line carrying the raw token followed by
 * a PascalCase variant line.
 */

import { OutputWriter } from '../types/output-writer';

/**
 * The two strings derived from a single token
 */
export interface RenderedPair {
  /** Trimmed token, verbatim */
  raw: string;
  /** PascalCase identifier derived from the token */
  identifier: string;
}

/**
 * Options for rendering lines
 */
export interface RenderOptions {
  /** Prefix for every emitted line */
  indent?: string;
}

/**
 * Split the input on commas and trim each part.
 * Always yields (number of commas + 1) tokens, empty ones included.
 */
export function splitTokens(input: string): string[] {
  return input.split(',').map((part) => part.trim());
}

/**
 * Upper-case the first character of a word when it is an ASCII lower-case
 * letter. The remainder keeps its case; a leading digit or symbol leaves the
 * word untouched.
 */
export function capitalizeWord(word: string): string {
  const first = word.charAt(0);
  if (first >= 'a' && first <= 'z') {
    return first.toUpperCase() + word.slice(1);
  }
  return word;
}

/**
 * Convert a token to its identifier form, e.g. `foo_bar` -> `FooBar`
 */
export function toIdentifierForm(token: string): string {
  return token
    .replace(/_/g, ' ')
    .split(/(\s+)/)
    .map(capitalizeWord)
    .join('')
    .replace(/ /g, '');
}

export function renderPair(token: string): RenderedPair {
  return { raw: token, identifier: toIdentifierForm(token) };
}

/**
 * Attribute line for a raw token. Quotes and backslashes are not escaped.
 */
export function formatAttributeLine(raw: string): string {
  return `#[serde(rename = "${raw}")]`;
}

export function formatVariantLine(identifier: string): string {
  return `${identifier},`;
}

/**
 * Render every token of the input as a rendered pair, in input order
 */
export function renderPairs(input: string): RenderedPair[] {
  return splitTokens(input).map(renderPair);
}

/**
 * Lines for already rendered pairs: attribute then variant, per pair
 */
export function pairLines(pairs: RenderedPair[], options: RenderOptions = {}): string[] {
  const indent = options.indent ?? '';
  return pairs.flatMap((pair) => [
    indent + formatAttributeLine(pair.raw),
    indent + formatVariantLine(pair.identifier),
  ]);
}

/**
 * Render the attribute and variant lines for every token of the input
 */
export function renderLines(input: string, options: RenderOptions = {}): string[] {
  return pairLines(renderPairs(input), options);
}

/**
 * Print the enum values for the input, one line per write.
 * Returns the rendered pairs in the order they were printed.
 */
export function rustEnumValues(
  input: string,
  writer: OutputWriter,
  options: RenderOptions = {}
): RenderedPair[] {
  const pairs = renderPairs(input);
  for (const line of pairLines(pairs, options)) {
    writer.writeLine(line);
  }
  return pairs;
}
