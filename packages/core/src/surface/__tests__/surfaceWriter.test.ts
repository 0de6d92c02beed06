import { assert, describe, test } from "@pseudotext/testkit";
import { composeText } from "../../compose/textComposer.js";
import { DisplayError, ValidationError } from "../../errors.js";
import { GlyphTable } from "../../glyphs/glyphTable.js";
import { Color, DEFAULT_COLOR_ATTRIBUTE, colorAttribute } from "../../palette.js";
import { buildGlyphResource } from "../../testing/glyphResource.js";
import { createRecordingSurface } from "../../testing/recordingSurface.js";
import { createSurfaceWriter } from "../surfaceWriter.js";
import type { DisplaySurface } from "../types.js";

const H5 = ["#...#", "#...#", "#####", "#...#", "#...#"];
const I5 = ["#####", "..#..", "..#..", "..#..", "#####"];
const table = GlyphTable.parse(buildGlyphResource(5, { H: H5, I: I5 }), 5, "hi");
const hi = composeText("HI", table, "#", ".");

describe("SurfaceWriter.write", () => {
  test("draws rows at the origin with one fill after each glyph", () => {
    const surface = createRecordingSurface({ rows: 10, cols: 20 });
    createSurfaceWriter(surface).write(hi, { row: 2, column: 3 }, Color.BrightGreen);

    const screen = surface.screen();
    assert.equal(screen[1], " ".repeat(20));
    assert.equal(screen[2], `   #...#.#####.${" ".repeat(5)}`);
    assert.equal(screen[3], `   #...#...#...${" ".repeat(5)}`);
    assert.equal(screen[4], `   #####...#...${" ".repeat(5)}`);
    assert.equal(screen[5], `   #...#...#...${" ".repeat(5)}`);
    assert.equal(screen[6], `   #...#.#####.${" ".repeat(5)}`);
    assert.equal(screen[7], " ".repeat(20));
  });

  test("follows the set-color, per-row cursor, reset protocol", () => {
    const surface = createRecordingSurface();
    createSurfaceWriter(surface).write(hi, { row: 0, column: 0 }, Color.Red);
    const ops = surface.ops();

    assert.deepEqual(ops[0], { kind: "setColor", attribute: Color.Red });
    assert.deepEqual(ops[1], { kind: "setCursor", row: 0, column: 0 });
    assert.deepEqual(ops[ops.length - 1], { kind: "setColor", attribute: DEFAULT_COLOR_ATTRIBUTE });
    assert.deepEqual(surface.opCounts(), {
      setColor: 2,
      setCursor: 5,
      writeChar: 60,
      writeNewline: 5,
    });

    const cursorRows = ops.flatMap((op) => (op.kind === "setCursor" ? [op.row] : []));
    assert.deepEqual(cursorRows, [0, 1, 2, 3, 4]);
  });

  test("the whole block carries the render color and the default is restored", () => {
    const surface = createRecordingSurface({ rows: 8, cols: 16 });
    const attribute = colorAttribute(Color.Yellow, Color.Blue);
    createSurfaceWriter(surface).write(hi, { row: 1, column: 1 }, attribute);

    for (let row = 1; row <= 5; row++) {
      for (let column = 1; column <= 12; column++) {
        assert.equal(surface.colorAt(row, column), attribute, `cell ${row},${column}`);
      }
    }
    assert.equal(surface.colorAt(0, 0), null);
    assert.equal(surface.activeColor(), DEFAULT_COLOR_ATTRIBUTE);
  });

  test("an empty buffer still positions every row and resets the color", () => {
    const surface = createRecordingSurface();
    createSurfaceWriter(surface).write(composeText("", table, "#", " "), { row: 4, column: 2 }, 9);
    assert.deepEqual(surface.opCounts(), {
      setColor: 2,
      setCursor: 5,
      writeChar: 0,
      writeNewline: 5,
    });
  });

  test("a failing surface call raises DisplayError and skips the reset", () => {
    const surface = createRecordingSurface({ failAtOp: 5 });
    assert.throws(
      () => createSurfaceWriter(surface).write(hi, { row: 0, column: 0 }, Color.Cyan),
      (error: unknown) =>
        error instanceof DisplayError &&
        error.code === "PT_DISPLAY" &&
        error.cause instanceof Error &&
        error.message.startsWith("Display surface write failed: writeChar (Error: recording surface"),
    );
    assert.equal(surface.ops().length, 5);
    assert.equal(surface.activeColor(), Color.Cyan);
    assert.equal(surface.screen()[0]?.slice(0, 4), "#.. ");
  });

  test("a DisplayError from the surface is rethrown as is", () => {
    const original = new DisplayError("terminal closed");
    const surface: DisplaySurface = {
      setColor: () => {
        throw original;
      },
      setCursor: () => {},
      writeChar: () => {},
      writeNewline: () => {},
    };
    assert.throws(
      () => createSurfaceWriter(surface).write(hi, { row: 0, column: 0 }, 1),
      (error: unknown) => error === original,
    );
  });

  test("invalid origin or attribute is rejected before any surface call", () => {
    const surface = createRecordingSurface();
    const writer = createSurfaceWriter(surface);
    assert.throws(() => writer.write(hi, { row: -1, column: 0 }, 1), ValidationError);
    assert.throws(() => writer.write(hi, { row: 0, column: 2.5 }, 1), ValidationError);
    assert.throws(() => writer.write(hi, { row: 0, column: 0 }, 256), ValidationError);
    assert.equal(surface.ops().length, 0);
  });
});
