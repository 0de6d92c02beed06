/**
 * packages/core/src/errors.ts — Error types for glyph rendering.
 *
 * Every failure raised by this package is a PseudoTextError. The `code`
 * property identifies the failure kind; subclasses carry the details a caller
 * needs to report it (offending character, resource name, underlying cause).
 */

import type { GlyphSize } from "./glyphs/glyph.js";

export type PseudoTextErrorCode =
  | "PT_VALIDATION"
  | "PT_RESOURCE"
  | "PT_UNSUPPORTED_CHARACTER"
  | "PT_DISPLAY";

export class PseudoTextError extends Error {
  override readonly name: string = "PseudoTextError";
  readonly code: PseudoTextErrorCode;

  constructor(code: PseudoTextErrorCode, message?: string, options?: ErrorOptions) {
    super(message ?? code, options);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Rejected input: content with a character outside the alphabet, a setter
 * argument of the wrong shape, or an invalid origin.
 */
export class ValidationError extends PseudoTextError {
  override readonly name = "ValidationError";
  /** Offending character, when the rejection is about one. */
  readonly char: string | null;
  /** Position of `char` in the rejected content. */
  readonly index: number | null;

  constructor(message: string, details?: Readonly<{ char: string; index: number }>) {
    super("PT_VALIDATION", message);
    this.char = details?.char ?? null;
    this.index = details?.index ?? null;
  }
}

/** Glyph resource missing, unreadable or malformed. */
export class ResourceError extends PseudoTextError {
  override readonly name = "ResourceError";
  readonly resourceName: string;
  readonly glyphSize: GlyphSize;

  constructor(
    resourceName: string,
    glyphSize: GlyphSize,
    detail: string,
    options?: ErrorOptions,
  ) {
    super(
      "PT_RESOURCE",
      `Glyph resource "${resourceName}" (size ${String(glyphSize)}): ${detail}`,
      options,
    );
    this.resourceName = resourceName;
    this.glyphSize = glyphSize;
  }
}

export class UnsupportedCharacterError extends PseudoTextError {
  override readonly name = "UnsupportedCharacterError";
  readonly char: string;

  constructor(char: string) {
    super("PT_UNSUPPORTED_CHARACTER", `Character ${JSON.stringify(char)} has no glyph`);
    this.char = char;
  }
}

/** A display surface call failed. The surface may hold a partially drawn block. */
export class DisplayError extends PseudoTextError {
  override readonly name = "DisplayError";

  constructor(detail: string, options?: ErrorOptions) {
    super("PT_DISPLAY", `Display surface write failed: ${detail}`, options);
  }
}

/** Format thrown value for error message. */
export function describeThrown(v: unknown): string {
  if (v instanceof Error) return `${v.name}: ${v.message}`;
  return String(v);
}
