/**
 * Core module - token formatting
 */

export type { RenderedPair, RenderOptions } from './token-formatter';
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
} from './token-formatter';
