import { closeSync, mkdtempSync, openSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  Color,
  DisplayError,
  PseudoText,
  colorAttribute,
  createGlyphTableCache,
  createInMemoryGlyphSource,
} from "@pseudotext/core";
import { buildGlyphResource } from "@pseudotext/core/testing";
import { assert, describe, test } from "@pseudotext/testkit";
import {
  ansiColorSequence,
  ansiCursorSequence,
  createAnsiSurface,
  createFdSink,
} from "../ansiSurface.js";

const I5 = ["#####", "..#..", "..#..", "..#..", "#####"];

function recordSink(): { sink: (text: string) => void; chunks: string[] } {
  const chunks: string[] = [];
  return { sink: (text) => chunks.push(text), chunks };
}

describe("ANSI sequences", () => {
  test("default attribute is bright white on black", () => {
    assert.equal(ansiColorSequence(15), "\u001b[0;97;40m");
  });

  test("palette order maps to SGR order", () => {
    assert.equal(ansiColorSequence(colorAttribute(Color.Cyan)), "\u001b[0;36;40m");
    assert.equal(ansiColorSequence(colorAttribute(Color.Blue, Color.Red)), "\u001b[0;34;41m");
    assert.equal(ansiColorSequence(colorAttribute(Color.Yellow, Color.Magenta)), "\u001b[0;33;45m");
  });

  test("bright colors use the 90 and 100 ranges", () => {
    assert.equal(
      ansiColorSequence(colorAttribute(Color.BrightYellow, Color.BrightBlue)),
      "\u001b[0;93;104m",
    );
    assert.equal(ansiColorSequence(colorAttribute(Color.BrightBlack)), "\u001b[0;90;40m");
  });

  test("cursor positions are one-based", () => {
    assert.equal(ansiCursorSequence(0, 0), "\u001b[1;1H");
    assert.equal(ansiCursorSequence(9, 19), "\u001b[10;20H");
  });
});

describe("createAnsiSurface", () => {
  test("characters of a row reach the sink in one write", () => {
    const { sink, chunks } = recordSink();
    const surface = createAnsiSurface({ sink });
    surface.setColor(colorAttribute(Color.Green));
    surface.setCursor(2, 3);
    surface.writeChar("#");
    surface.writeChar(".");
    surface.writeChar("#");
    assert.deepEqual(chunks, ["\u001b[0;32;40m", "\u001b[3;4H"]);
    surface.writeNewline();
    assert.deepEqual(chunks, ["\u001b[0;32;40m", "\u001b[3;4H", "#.#\n"]);
  });

  test("pending characters go out ahead of the next sequence", () => {
    const { sink, chunks } = recordSink();
    const surface = createAnsiSurface({ sink });
    surface.writeChar("a");
    surface.setCursor(0, 0);
    surface.writeChar("b");
    surface.setColor(15);
    surface.writeChar("c");
    surface.flush();
    surface.flush();
    assert.deepEqual(chunks, ["a\u001b[1;1H", "b\u001b[0;97;40m", "c"]);
  });

  test("color can be turned off", () => {
    const { sink, chunks } = recordSink();
    const surface = createAnsiSurface({ sink, colorEnabled: false });
    surface.setColor(colorAttribute(Color.Red));
    surface.writeChar("x");
    surface.setColor(colorAttribute(Color.Red));
    assert.deepEqual(chunks, ["x"]);
  });

  test("a banner costs one sink write per row plus the color changes", () => {
    const { sink, chunks } = recordSink();
    const text = new PseudoText(
      {
        glyphs: createGlyphTableCache(createInMemoryGlyphSource({ 5: buildGlyphResource(5) })),
        surface: createAnsiSurface({ sink }),
      },
      { content: "HELLO" },
    );
    text.render({ row: 0, column: 0 });
    assert.equal(chunks.length, 2 + 5 * 2);
    assert.equal(chunks[2], `${" ".repeat(30)}\n`);
  });

  test("a write failure surfaces before the next row is positioned", () => {
    const chunks: string[] = [];
    const surface = createAnsiSurface({
      sink: (text) => {
        if (text.endsWith("\n")) throw new Error("EIO");
        chunks.push(text);
      },
    });
    const text = new PseudoText(
      {
        glyphs: createGlyphTableCache(createInMemoryGlyphSource({ 5: buildGlyphResource(5) })),
        surface,
      },
      { content: "A" },
    );
    assert.throws(() => text.render({ row: 4, column: 0 }), DisplayError);
    assert.deepEqual(chunks, ["\u001b[0;97;40m", "\u001b[5;1H"]);
  });

  test("a banner render produces the full byte stream", () => {
    const { sink, chunks } = recordSink();
    const text = new PseudoText(
      {
        glyphs: createGlyphTableCache(
          createInMemoryGlyphSource({ 5: buildGlyphResource(5, { I: I5 }) }),
        ),
        surface: createAnsiSurface({ sink }),
      },
      { content: "I", fillChar: ".", color: Color.Cyan },
    );
    text.render({ row: 0, column: 0 });

    const expected =
      "\u001b[0;36;40m" +
      I5.map((row, i) => `\u001b[${String(i + 1)};1H${row}.\n`).join("") +
      "\u001b[0;97;40m";
    assert.equal(chunks.join(""), expected);
  });

  test("a failing sink surfaces as DisplayError", () => {
    const surface = createAnsiSurface({
      sink: () => {
        throw new Error("EPIPE");
      },
    });
    const text = new PseudoText(
      {
        glyphs: createGlyphTableCache(createInMemoryGlyphSource({ 5: buildGlyphResource(5) })),
        surface,
      },
      { content: "A" },
    );
    assert.throws(
      () => text.render({ row: 0, column: 0 }),
      (error: unknown) =>
        error instanceof DisplayError &&
        error.cause instanceof Error &&
        error.cause.message === "EPIPE",
    );
  });
});

describe("createFdSink", () => {
  test("writes synchronously to the descriptor", () => {
    const dir = mkdtempSync(join(tmpdir(), "pseudotext-ansi-"));
    const file = join(dir, "out.txt");
    const fd = openSync(file, "w");
    try {
      const sink = createFdSink(fd);
      sink("\u001b[1;1H");
      sink("## é\n");
      assert.equal(readFileSync(file, "utf8"), "\u001b[1;1H## é\n");
    } finally {
      closeSync(fd);
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
