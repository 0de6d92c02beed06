/**
 * packages/core/src/validate.ts — Argument checks shared by the public API.
 */

import { ValidationError } from "./errors.js";
import { type GlyphSize, isGlyphSize } from "./glyphs/glyph.js";
import { type Color, isColor, isColorAttribute } from "./palette.js";

function formatValue(value: unknown): string {
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "number" || typeof value === "boolean" || value == null) {
    return String(value);
  }
  if (Array.isArray(value)) return "[array]";
  return `[${typeof value}]`;
}

/** Ink and fill must each occupy exactly one cell. */
export function assertCellChar(value: unknown, label: string): string {
  if (typeof value !== "string" || value.length !== 1) {
    throw new ValidationError(
      `${label} must be a single character (received ${formatValue(value)})`,
    );
  }
  return value;
}

export function assertGlyphSize(value: unknown): GlyphSize {
  if (!isGlyphSize(value)) {
    throw new ValidationError(`glyph size must be 5 or 7 (received ${formatValue(value)})`);
  }
  return value;
}

export function assertColor(value: unknown): Color {
  if (!isColor(value)) {
    throw new ValidationError(
      `color must be a palette entry 0..15 (received ${formatValue(value)})`,
    );
  }
  return value;
}

export function assertColorAttribute(value: unknown): number {
  if (!isColorAttribute(value)) {
    throw new ValidationError(
      `color attribute must be an integer 0..255 (received ${formatValue(value)})`,
    );
  }
  return value;
}

export function assertCoordinate(value: unknown, label: string): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw new ValidationError(
      `${label} must be a non-negative integer (received ${formatValue(value)})`,
    );
  }
  return value;
}
