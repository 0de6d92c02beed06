/**
 * @pseudotext/core — bitmap-glyph banner text for character-grid surfaces.
 */

export {
  DisplayError,
  PseudoTextError,
  ResourceError,
  UnsupportedCharacterError,
  ValidationError,
  describeThrown,
  type PseudoTextErrorCode,
} from "./errors.js";
export {
  COLOR_NAMES,
  Color,
  DEFAULT_COLOR_ATTRIBUTE,
  backgroundOf,
  colorAttribute,
  colorName,
  foregroundOf,
  isColor,
  isColorAttribute,
  parseColor,
} from "./palette.js";
export * from "./glyphs/index.js";
export { RenderBuffer, type RenderBufferInit } from "./compose/renderBuffer.js";
export { composeText } from "./compose/textComposer.js";
export type { DisplaySurface, SurfaceOrigin } from "./surface/types.js";
export { createSurfaceWriter, type SurfaceWriter } from "./surface/surfaceWriter.js";
export {
  makeLogSink,
  type PseudoTextLogEvent,
  type PseudoTextLogFields,
  type PseudoTextLogLevel,
  type PseudoTextLogSink,
} from "./log.js";
export {
  DEFAULT_FILL_CHAR,
  DEFAULT_GLYPH_SIZE,
  DEFAULT_INK_CHAR,
  DEFAULT_TEXT_COLOR,
  PseudoText,
  type PseudoTextConfig,
  type PseudoTextInit,
  type PseudoTextServices,
} from "./pseudoText.js";
