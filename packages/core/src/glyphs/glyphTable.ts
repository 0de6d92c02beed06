/**
 * packages/core/src/glyphs/glyphTable.ts — Parsed glyph font for one size.
 *
 * Why: Resources store the font row-major across all glyphs (row 0 of every
 * glyph, then row 1 of every glyph, ...). The table rebuilds one square grid
 * per character from that interleaved stream and validates it completely
 * before any glyph is handed out.
 *
 * Resource grammar: whitespace-separated single-character marks, `1` = ink,
 * `0` = blank, exactly GLYPH_COUNT × size × size of them. Line breaks carry
 * no meaning.
 */

import { ResourceError, UnsupportedCharacterError } from "../errors.js";
import { GLYPH_COUNT, SUPPORTED_CHARACTERS, glyphIndexOf } from "./alphabet.js";
import { Glyph, type GlyphSize } from "./glyph.js";

type MarkPosition = Readonly<{ row: number; glyph: number; column: number }>;

function positionOfMark(ordinal: number, size: GlyphSize): MarkPosition {
  const marksPerRow = GLYPH_COUNT * size;
  const withinRow = ordinal % marksPerRow;
  return {
    row: Math.floor(ordinal / marksPerRow),
    glyph: Math.floor(withinRow / size),
    column: withinRow % size,
  };
}

function describePosition(ordinal: number, size: GlyphSize): string {
  const pos = positionOfMark(ordinal, size);
  const char = SUPPORTED_CHARACTERS.charAt(pos.glyph);
  return `mark #${String(ordinal)} (row ${String(pos.row)}, character ${JSON.stringify(char)}, column ${String(pos.column)})`;
}

function tokenize(text: string): string[] {
  return text.split(/\s+/u).filter((token) => token.length > 0);
}

export class GlyphTable {
  readonly size: GlyphSize;
  readonly resourceName: string;
  private readonly glyphs: readonly Glyph[];

  private constructor(size: GlyphSize, resourceName: string, glyphs: readonly Glyph[]) {
    this.size = size;
    this.resourceName = resourceName;
    this.glyphs = Object.freeze(glyphs.slice());
    Object.freeze(this);
  }

  /**
   * Parse resource text into a table.
   *
   * @throws ResourceError when the mark count is wrong or a token is not a
   *   single `0`/`1`.
   */
  static parse(text: string, size: GlyphSize, resourceName: string): GlyphTable {
    const tokens = tokenize(text);
    const expected = GLYPH_COUNT * size * size;

    for (let ordinal = 0; ordinal < tokens.length && ordinal < expected; ordinal++) {
      const token = tokens[ordinal] ?? "";
      if (token !== "0" && token !== "1") {
        throw new ResourceError(
          resourceName,
          size,
          `invalid mark ${JSON.stringify(token)} at ${describePosition(ordinal, size)}; expected "0" or "1"`,
        );
      }
    }
    if (tokens.length !== expected) {
      throw new ResourceError(
        resourceName,
        size,
        `expected ${String(expected)} marks (${String(GLYPH_COUNT)} glyphs of ${String(size)}x${String(size)}), found ${String(tokens.length)}`,
      );
    }

    const marks: boolean[][] = Array.from({ length: GLYPH_COUNT }, () =>
      new Array<boolean>(size * size).fill(false),
    );
    for (let ordinal = 0; ordinal < expected; ordinal++) {
      const pos = positionOfMark(ordinal, size);
      const grid = marks[pos.glyph];
      if (grid) grid[pos.row * size + pos.column] = tokens[ordinal] === "1";
    }

    const glyphs = marks.map(
      (grid, index) => new Glyph(SUPPORTED_CHARACTERS.charAt(index), size, grid),
    );
    return new GlyphTable(size, resourceName, glyphs);
  }

  get characters(): string {
    return SUPPORTED_CHARACTERS;
  }

  has(char: string): boolean {
    return glyphIndexOf(char) !== null;
  }

  /** @throws UnsupportedCharacterError for characters outside the alphabet. */
  lookup(char: string): Glyph {
    const index = glyphIndexOf(char);
    const glyph = index === null ? undefined : this.glyphs[index];
    if (!glyph) throw new UnsupportedCharacterError(char);
    return glyph;
  }
}
