/**
 * packages/core/src/palette.ts — 16-entry console palette and color attributes.
 *
 * A color attribute packs two palette entries into one byte: the low nibble
 * selects the foreground, the high nibble the background. Palette order is the
 * console order (blue before red), not the ANSI SGR order; surfaces that speak
 * ANSI translate at the edge.
 */

export enum Color {
  Black = 0,
  Blue = 1,
  Green = 2,
  Cyan = 3,
  Red = 4,
  Magenta = 5,
  Yellow = 6,
  White = 7,
  BrightBlack = 8,
  BrightBlue = 9,
  BrightGreen = 10,
  BrightCyan = 11,
  BrightRed = 12,
  BrightMagenta = 13,
  BrightYellow = 14,
  BrightWhite = 15,
}

export const COLOR_NAMES: readonly string[] = Object.freeze([
  "Black",
  "Blue",
  "Green",
  "Cyan",
  "Red",
  "Magenta",
  "Yellow",
  "White",
  "BrightBlack",
  "BrightBlue",
  "BrightGreen",
  "BrightCyan",
  "BrightRed",
  "BrightMagenta",
  "BrightYellow",
  "BrightWhite",
]);

export function isColor(value: unknown): value is Color {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= 15;
}

export function colorName(color: Color): string {
  return COLOR_NAMES[color] ?? `Color(${String(color)})`;
}

export function colorAttribute(foreground: Color, background: Color = Color.Black): number {
  return ((background & 0x0f) << 4) | (foreground & 0x0f);
}

export function foregroundOf(attribute: number): Color {
  return attribute & 0x0f;
}

export function backgroundOf(attribute: number): Color {
  return (attribute >> 4) & 0x0f;
}

export function isColorAttribute(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= 0xff;
}

/** Bright-white text on a black background. */
export const DEFAULT_COLOR_ATTRIBUTE = colorAttribute(Color.BrightWhite, Color.Black);

const COLOR_BY_KEY: ReadonlyMap<string, Color> = new Map(
  COLOR_NAMES.map((name, index): [string, Color] => [name.toLowerCase(), index]),
);

/**
 * Parse a palette entry from configuration text.
 *
 * Accepts a palette name in any case, with or without `-`/`_` separators
 * (`BrightGreen`, `bright-green`, `BRIGHT_GREEN`), or an integer 0..15.
 */
export function parseColor(text: string): Color | null {
  const trimmed = text.trim();
  if (trimmed.length === 0) return null;
  if (/^\d+$/u.test(trimmed)) {
    const value = Number.parseInt(trimmed, 10);
    return isColor(value) ? value : null;
  }
  const key = trimmed.replace(/[-_\s]/gu, "").toLowerCase();
  return COLOR_BY_KEY.get(key) ?? null;
}
