/**
 * packages/core/src/surface/surfaceWriter.ts — Places a RenderBuffer on a surface.
 *
 * Why: Keeps the display protocol in one place: color first, one cursor move
 * per row, a fill character after each glyph as spacing, and the default
 * attribute restored once the block is complete.
 *
 * A surface call that throws aborts the write with a DisplayError. Nothing is
 * retried or undone, and the color is not reset in that case; the surface may
 * show a partial block.
 */

import type { RenderBuffer } from "../compose/renderBuffer.js";
import { DisplayError, describeThrown } from "../errors.js";
import { DEFAULT_COLOR_ATTRIBUTE } from "../palette.js";
import { assertColorAttribute, assertCoordinate } from "../validate.js";
import type { DisplaySurface, SurfaceOrigin } from "./types.js";

export type SurfaceWriter = Readonly<{
  write: (buffer: RenderBuffer, origin: SurfaceOrigin, attribute: number) => void;
}>;

function guarded(step: string, call: () => void): void {
  try {
    call();
  } catch (error) {
    if (error instanceof DisplayError) throw error;
    throw new DisplayError(`${step} (${describeThrown(error)})`, { cause: error });
  }
}

export function createSurfaceWriter(surface: DisplaySurface): SurfaceWriter {
  return Object.freeze({
    write: (buffer: RenderBuffer, origin: SurfaceOrigin, attribute: number) => {
      const row0 = assertCoordinate(origin.row, "origin row");
      const column0 = assertCoordinate(origin.column, "origin column");
      const color = assertColorAttribute(attribute);
      const { glyphSize, fillChar } = buffer;

      guarded("setColor", () => surface.setColor(color));
      for (let row = 0; row < buffer.height; row++) {
        guarded("setCursor", () => surface.setCursor(row0 + row, column0));
        for (let column = 0; column < buffer.width; column++) {
          const cell = buffer.cellAt(row, column);
          guarded("writeChar", () => surface.writeChar(cell));
          if ((column + 1) % glyphSize === 0) {
            guarded("writeChar", () => surface.writeChar(fillChar));
          }
        }
        guarded("writeNewline", () => surface.writeNewline());
      }
      guarded("setColor", () => surface.setColor(DEFAULT_COLOR_ATTRIBUTE));
    },
  });
}
