/**
 * packages/core/src/surface/types.ts — Display surface capability.
 *
 * A surface owns a cursor position and an active color attribute; both are
 * shared mutable state. Callers that render from several places must
 * serialize access themselves.
 */

export type DisplaySurface = Readonly<{
  /** Make `attribute` (see palette.ts) the color of subsequent writes. */
  setColor: (attribute: number) => void;
  /** Move the cursor to a zero-based cell position. */
  setCursor: (row: number, column: number) => void;
  /** Write one character at the cursor and advance it by one column. */
  writeChar: (char: string) => void;
  writeNewline: () => void;
}>;

export type SurfaceOrigin = Readonly<{
  row: number;
  column: number;
}>;
