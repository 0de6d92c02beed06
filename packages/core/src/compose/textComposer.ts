/**
 * packages/core/src/compose/textComposer.ts — Glyph lookup and cell substitution.
 */

import type { Glyph } from "../glyphs/glyph.js";
import type { GlyphTable } from "../glyphs/glyphTable.js";
import { assertCellChar } from "../validate.js";
import { RenderBuffer } from "./renderBuffer.js";

/**
 * Lay out `content` as one block: glyphs side by side with no gap, ink marks
 * replaced by `inkChar` and blank marks by `fillChar`.
 *
 * Every character is looked up before any cell is produced, so an
 * unsupported character fails the whole call.
 *
 * @throws UnsupportedCharacterError when `content` has a character the table
 *   lacks.
 */
export function composeText(
  content: string,
  table: GlyphTable,
  inkChar: string,
  fillChar: string,
): RenderBuffer {
  assertCellChar(inkChar, "ink character");
  assertCellChar(fillChar, "fill character");

  const glyphs: Glyph[] = [];
  for (let i = 0; i < content.length; i++) {
    glyphs.push(table.lookup(content.charAt(i)));
  }

  const size = table.size;
  const cells: string[] = [];
  for (let row = 0; row < size; row++) {
    for (const glyph of glyphs) {
      for (let column = 0; column < size; column++) {
        cells.push(glyph.isInk(row, column) ? inkChar : fillChar);
      }
    }
  }

  return new RenderBuffer({
    glyphSize: size,
    glyphCount: glyphs.length,
    fillChar,
    cells,
  });
}
