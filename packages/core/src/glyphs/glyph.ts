/**
 * packages/core/src/glyphs/glyph.ts — A single square bitmap glyph.
 */

export type GlyphSize = 5 | 7;

export const GlyphSize = Object.freeze({
  Small: 5,
  Big: 7,
} as const);

export const GLYPH_SIZES: readonly GlyphSize[] = Object.freeze([GlyphSize.Small, GlyphSize.Big]);

export function isGlyphSize(value: unknown): value is GlyphSize {
  return value === GlyphSize.Small || value === GlyphSize.Big;
}

/**
 * Square grid of ink/blank marks for one character.
 *
 * Marks are stored row-major in a frozen array; instances are frozen on
 * construction, so a glyph shared through a cache cannot change under a
 * later render.
 */
export class Glyph {
  readonly char: string;
  readonly size: GlyphSize;
  private readonly marks: readonly boolean[];

  constructor(char: string, size: GlyphSize, marks: readonly boolean[]) {
    if (marks.length !== size * size) {
      throw new RangeError(
        `Glyph ${JSON.stringify(char)}: expected ${String(size * size)} marks, got ${String(marks.length)}`,
      );
    }
    this.char = char;
    this.size = size;
    this.marks = Object.freeze(marks.slice());
    Object.freeze(this);
  }

  isInk(row: number, column: number): boolean {
    if (
      !Number.isInteger(row) ||
      !Number.isInteger(column) ||
      row < 0 ||
      column < 0 ||
      row >= this.size ||
      column >= this.size
    ) {
      throw new RangeError(
        `Glyph ${JSON.stringify(this.char)}: cell (${String(row)}, ${String(column)}) is outside ${String(this.size)}x${String(this.size)}`,
      );
    }
    return this.marks[row * this.size + column] === true;
  }

  /** Rows as `1`/`0` strings, the way the resource spells them. */
  rows(): readonly string[] {
    const out: string[] = [];
    for (let row = 0; row < this.size; row++) {
      let line = "";
      for (let column = 0; column < this.size; column++) {
        line += this.marks[row * this.size + column] === true ? "1" : "0";
      }
      out.push(line);
    }
    return Object.freeze(out);
  }
}
