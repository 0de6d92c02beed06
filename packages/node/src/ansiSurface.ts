/**
 * packages/node/src/ansiSurface.ts — DisplaySurface that emits ANSI sequences.
 *
 * Characters are collected per row and handed to the synchronous sink on
 * `writeNewline`, or ahead of the next color or cursor sequence. A failing
 * write therefore throws before the following row is positioned.
 */

import { writeSync } from "node:fs";
import { type DisplaySurface, backgroundOf, foregroundOf } from "@pseudotext/core";

const ESC = "\u001b[";

/** Palette order (blue before red) to SGR order (red before blue). */
const ANSI_BASE: readonly number[] = Object.freeze([0, 4, 2, 6, 1, 5, 3, 7]);

export type AnsiSink = (text: string) => void;

export type AnsiSurfaceOptions = Readonly<{
  /** Defaults to stdout. */
  sink?: AnsiSink;
  /** When false `setColor` writes nothing. */
  colorEnabled?: boolean;
}>;

export function createFdSink(fd = 1): AnsiSink {
  return (text: string) => {
    let buf = Buffer.from(text, "utf8");
    while (buf.byteLength > 0) {
      const written = writeSync(fd, buf);
      buf = buf.subarray(written);
    }
  };
}

function sgrColor(color: number, base: number, brightBase: number): number {
  const ansi = ANSI_BASE[color & 7] ?? 7;
  return (color & 8) === 0 ? base + ansi : brightBase + ansi;
}

/** SGR sequence for a palette attribute (`bg << 4 | fg`). */
export function ansiColorSequence(attribute: number): string {
  const fg = sgrColor(foregroundOf(attribute), 30, 90);
  const bg = sgrColor(backgroundOf(attribute), 40, 100);
  return `${ESC}0;${String(fg)};${String(bg)}m`;
}

export function ansiCursorSequence(row: number, column: number): string {
  return `${ESC}${String(row + 1)};${String(column + 1)}H`;
}

export type AnsiSurface = DisplaySurface &
  Readonly<{
    /** Hand any characters written since the last sequence to the sink. */
    flush: () => void;
  }>;

export function createAnsiSurface(opts: AnsiSurfaceOptions = {}): AnsiSurface {
  const sink = opts.sink ?? createFdSink(1);
  const colorEnabled = opts.colorEnabled ?? true;
  let pending = "";

  const emit = (sequence: string): void => {
    const text = pending + sequence;
    pending = "";
    if (text.length > 0) sink(text);
  };

  return Object.freeze({
    setColor: (attribute: number) => {
      emit(colorEnabled ? ansiColorSequence(attribute) : "");
    },
    setCursor: (row: number, column: number) => {
      emit(ansiCursorSequence(row, column));
    },
    writeChar: (char: string) => {
      pending += char;
    },
    writeNewline: () => {
      emit("\n");
    },
    flush: () => {
      emit("");
    },
  });
}
