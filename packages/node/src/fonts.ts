/**
 * packages/node/src/fonts.ts — Glyph resources on disk.
 *
 * The package ships `fonts/font_size_5.txt` and `fonts/font_size_7.txt`.
 * A directory override (option or PSEUDOTEXT_FONT_DIR) must hold files with
 * the same names.
 */

import { readFileSync } from "node:fs";
import { join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import {
  type GlyphSize,
  type GlyphSource,
  ResourceError,
  describeThrown,
  glyphResourceName,
} from "@pseudotext/core";

export const BUNDLED_FONT_DIR = fileURLToPath(new URL("../fonts/", import.meta.url));

/** Reads `<directory>/font_size_<S>.txt` synchronously on each `read`. */
export function createFileGlyphSource(directory: string = BUNDLED_FONT_DIR): GlyphSource {
  const root = resolve(directory);
  const pathFor = (size: GlyphSize): string => join(root, glyphResourceName(size));
  return Object.freeze({
    resourceName: pathFor,
    read: (size: GlyphSize) => {
      try {
        return readFileSync(pathFor(size), "utf8");
      } catch (error) {
        throw new ResourceError(pathFor(size), size, `cannot be read (${describeThrown(error)})`, {
          cause: error,
        });
      }
    },
  });
}
