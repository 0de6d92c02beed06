export {
  GLYPH_COUNT,
  SUPPORTED_CHARACTERS,
  findUnsupportedCharacter,
  glyphIndexOf,
  isSupportedCharacter,
  type UnsupportedCharacter,
} from "./alphabet.js";
export { GLYPH_SIZES, Glyph, GlyphSize, isGlyphSize } from "./glyph.js";
export { GlyphTable } from "./glyphTable.js";
export {
  createGlyphTableCache,
  createGlyphTableLoader,
  createInMemoryGlyphSource,
  glyphResourceName,
  loadGlyphTable,
  type GlyphSource,
  type GlyphTableCache,
  type GlyphTableProvider,
  type GlyphTableProviderOptions,
} from "./glyphSource.js";
