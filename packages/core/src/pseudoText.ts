/**
 * packages/core/src/pseudoText.ts — Banner text orchestrator.
 *
 * Why: Owns one banner's configuration and runs the render pipeline for it:
 * glyph table for the current size -> composed RenderBuffer -> surface write.
 * Content is validated on every change, so a render never starts from text
 * the alphabet cannot draw.
 *
 * Errors from the pipeline propagate unchanged after being logged. A render
 * is not atomic on the surface: a DisplayError can leave a partial block.
 */

import { composeText } from "./compose/textComposer.js";
import type { RenderBuffer } from "./compose/renderBuffer.js";
import { PseudoTextError, ValidationError } from "./errors.js";
import { findUnsupportedCharacter } from "./glyphs/alphabet.js";
import { GlyphSize } from "./glyphs/glyph.js";
import type { GlyphTableProvider } from "./glyphs/glyphSource.js";
import { type PseudoTextLogSink, makeLogSink, nowMs } from "./log.js";
import { Color, colorAttribute, colorName } from "./palette.js";
import { type SurfaceWriter, createSurfaceWriter } from "./surface/surfaceWriter.js";
import type { DisplaySurface, SurfaceOrigin } from "./surface/types.js";
import { assertCellChar, assertColor, assertGlyphSize } from "./validate.js";

export const DEFAULT_INK_CHAR = "#";
export const DEFAULT_FILL_CHAR = " ";
export const DEFAULT_GLYPH_SIZE: GlyphSize = GlyphSize.Small;
export const DEFAULT_TEXT_COLOR: Color = Color.BrightWhite;

export type PseudoTextConfig = Readonly<{
  content: string;
  inkChar: string;
  fillChar: string;
  glyphSize: GlyphSize;
  color: Color;
}>;

export type PseudoTextInit = Readonly<Partial<PseudoTextConfig>>;

export type PseudoTextServices = Readonly<{
  glyphs: GlyphTableProvider;
  surface: DisplaySurface;
  log?: PseudoTextLogSink;
}>;

export class PseudoText {
  private content = "";
  private inkChar = DEFAULT_INK_CHAR;
  private fillChar = DEFAULT_FILL_CHAR;
  private glyphSize: GlyphSize = DEFAULT_GLYPH_SIZE;
  private color: Color = DEFAULT_TEXT_COLOR;
  private renderSeq = 0;
  private readonly glyphs: GlyphTableProvider;
  private readonly writer: SurfaceWriter;
  private readonly log: PseudoTextLogSink;

  constructor(services: PseudoTextServices, init: PseudoTextInit = {}) {
    this.glyphs = services.glyphs;
    this.writer = createSurfaceWriter(services.surface);
    this.log = makeLogSink(services.log);

    if (init.content !== undefined) this.setContent(init.content);
    if (init.inkChar !== undefined) this.setInkChar(init.inkChar);
    if (init.fillChar !== undefined) this.setFillChar(init.fillChar);
    if (init.glyphSize !== undefined) this.setGlyphSize(init.glyphSize);
    if (init.color !== undefined) this.setColor(init.color);
  }

  /**
   * Compose and draw `content` once with a throwaway instance.
   * Invalid content fails before the surface is touched.
   */
  static renderOnce(
    content: string,
    inkChar: string,
    fillChar: string,
    glyphSize: GlyphSize,
    color: Color,
    origin: SurfaceOrigin,
    services: PseudoTextServices,
  ): void {
    const text = new PseudoText(services, { content, inkChar, fillChar, glyphSize, color });
    text.render(origin);
  }

  /**
   * Replace the content. On the first unsupported character the call throws
   * a ValidationError naming it, and the previous content stays.
   */
  setContent(content: string): void {
    const bad = findUnsupportedCharacter(content);
    if (bad !== null) {
      this.log({
        level: "warn",
        message: "content rejected",
        fields: { char: bad.char, index: bad.index },
      });
      throw new ValidationError(
        `character ${JSON.stringify(bad.char)} at index ${String(bad.index)} is not supported`,
        bad,
      );
    }
    this.content = content;
  }

  setInkChar(char: string): void {
    this.inkChar = assertCellChar(char, "ink character");
  }

  setFillChar(char: string): void {
    this.fillChar = assertCellChar(char, "fill character");
  }

  setGlyphSize(size: GlyphSize): void {
    this.glyphSize = assertGlyphSize(size);
  }

  setColor(color: Color): void {
    this.color = assertColor(color);
  }

  config(): PseudoTextConfig {
    return Object.freeze({
      content: this.content,
      inkChar: this.inkChar,
      fillChar: this.fillChar,
      glyphSize: this.glyphSize,
      color: this.color,
    });
  }

  describe(): string {
    const parts = [
      `content=${JSON.stringify(this.content)}`,
      `ink=${JSON.stringify(this.inkChar)}`,
      `fill=${JSON.stringify(this.fillChar)}`,
      `glyphSize=${String(this.glyphSize)}`,
      `color=${colorName(this.color)}(${String(this.color)})`,
    ];
    return `PseudoText(${parts.join(", ")})`;
  }

  /** Build the block for the current configuration without drawing it. */
  compose(): RenderBuffer {
    const table = this.glyphs.load(this.glyphSize);
    return composeText(this.content, table, this.inkChar, this.fillChar);
  }

  render(origin: SurfaceOrigin): void {
    const renderId = ++this.renderSeq;
    const startedAt = nowMs();
    try {
      const table = this.glyphs.load(this.glyphSize);
      const loadedAt = nowMs();
      const buffer = composeText(this.content, table, this.inkChar, this.fillChar);
      const composedAt = nowMs();
      this.writer.write(buffer, origin, colorAttribute(this.color));
      const writtenAt = nowMs();

      this.log({
        level: "info",
        message: "render complete",
        fields: {
          renderId,
          glyphSize: this.glyphSize,
          glyphs: buffer.glyphCount,
          row: origin.row,
          column: origin.column,
          color: colorName(this.color),
          loadMs: loadedAt - startedAt,
          composeMs: composedAt - loadedAt,
          writeMs: writtenAt - composedAt,
          totalMs: writtenAt - startedAt,
        },
      });
    } catch (error) {
      this.log({
        level: "error",
        message: "render failed",
        fields: {
          renderId,
          glyphSize: this.glyphSize,
          code: error instanceof PseudoTextError ? error.code : "UNKNOWN",
          error: error instanceof Error ? error.message : String(error),
        },
      });
      throw error;
    }
  }
}
