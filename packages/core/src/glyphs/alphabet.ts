/**
 * packages/core/src/glyphs/alphabet.ts — Supported characters in table order.
 *
 * The order is part of the glyph resource format: the n-th glyph of every
 * resource row belongs to the n-th character here.
 */

export const SUPPORTED_CHARACTERS = "ABCDEFGHIJKLMNOPQRSTUVWXYZ .,!?0123456789";

export const GLYPH_COUNT = SUPPORTED_CHARACTERS.length;

const INDEX_BY_CHAR: ReadonlyMap<string, number> = new Map(
  Array.from(SUPPORTED_CHARACTERS, (char, index): [string, number] => [char, index]),
);

/** Table index of `char`, or null when the character has no glyph. */
export function glyphIndexOf(char: string): number | null {
  return INDEX_BY_CHAR.get(char) ?? null;
}

export function isSupportedCharacter(char: string): boolean {
  return INDEX_BY_CHAR.has(char);
}

export type UnsupportedCharacter = Readonly<{ char: string; index: number }>;

/** First character of `content` outside the alphabet, scanning left to right. */
export function findUnsupportedCharacter(content: string): UnsupportedCharacter | null {
  for (let index = 0; index < content.length; index++) {
    const char = content.charAt(index);
    if (!INDEX_BY_CHAR.has(char)) return Object.freeze({ char, index });
  }
  return null;
}
