/**
 * packages/core/src/compose/renderBuffer.ts — Composed character block.
 *
 * Cells are stored row-major. Height is the glyph size; width is glyph count
 * times glyph size. Inter-character spacing is not part of the buffer.
 */

import type { GlyphSize } from "../glyphs/glyph.js";

export type RenderBufferInit = Readonly<{
  glyphSize: GlyphSize;
  glyphCount: number;
  fillChar: string;
  cells: readonly string[];
}>;

export class RenderBuffer {
  readonly glyphSize: GlyphSize;
  readonly glyphCount: number;
  /** Fill character the block was composed with; surfaces reuse it as spacing. */
  readonly fillChar: string;
  readonly width: number;
  readonly height: number;
  private readonly cells: readonly string[];

  constructor(init: RenderBufferInit) {
    if (!Number.isInteger(init.glyphCount) || init.glyphCount < 0) {
      throw new RangeError(
        `RenderBuffer: glyph count must be a non-negative integer, got ${String(init.glyphCount)}`,
      );
    }
    const width = init.glyphCount * init.glyphSize;
    const height = init.glyphSize;
    if (init.cells.length !== width * height) {
      throw new RangeError(
        `RenderBuffer: expected ${String(width * height)} cells for ${String(width)}x${String(height)}, got ${String(init.cells.length)}`,
      );
    }
    this.glyphSize = init.glyphSize;
    this.glyphCount = init.glyphCount;
    this.fillChar = init.fillChar;
    this.width = width;
    this.height = height;
    this.cells = Object.freeze(init.cells.slice());
    Object.freeze(this);
  }

  cellAt(row: number, column: number): string {
    const inside =
      Number.isInteger(row) &&
      Number.isInteger(column) &&
      row >= 0 &&
      column >= 0 &&
      row < this.height &&
      column < this.width;
    const cell = inside ? this.cells[row * this.width + column] : undefined;
    if (cell === undefined) {
      throw new RangeError(
        `RenderBuffer: cell (${String(row)}, ${String(column)}) is outside ${String(this.width)}x${String(this.height)}`,
      );
    }
    return cell;
  }

  row(index: number): string {
    if (!Number.isInteger(index) || index < 0 || index >= this.height) {
      throw new RangeError(
        `RenderBuffer: row ${String(index)} is outside 0..${String(this.height - 1)}`,
      );
    }
    const start = index * this.width;
    return this.cells.slice(start, start + this.width).join("");
  }

  rows(): readonly string[] {
    const out: string[] = [];
    for (let i = 0; i < this.height; i++) out.push(this.row(i));
    return Object.freeze(out);
  }

  equals(other: RenderBuffer): boolean {
    if (
      other.width !== this.width ||
      other.height !== this.height ||
      other.fillChar !== this.fillChar
    ) {
      return false;
    }
    for (let i = 0; i < this.cells.length; i++) {
      if (this.cells[i] !== other.cells[i]) return false;
    }
    return true;
  }

  toString(): string {
    return this.rows().join("\n");
  }
}
