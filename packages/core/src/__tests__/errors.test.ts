import { assert, describe, test } from "@pseudotext/testkit";
import {
  DisplayError,
  PseudoTextError,
  ResourceError,
  UnsupportedCharacterError,
  ValidationError,
  describeThrown,
} from "../errors.js";

describe("errors", () => {
  test("each kind has its own name and code", () => {
    const cases: ReadonlyArray<readonly [PseudoTextError, string, string]> = [
      [new ValidationError("bad"), "ValidationError", "PT_VALIDATION"],
      [new ResourceError("font_size_5.txt", 5, "gone"), "ResourceError", "PT_RESOURCE"],
      [new UnsupportedCharacterError("@"), "UnsupportedCharacterError", "PT_UNSUPPORTED_CHARACTER"],
      [new DisplayError("closed"), "DisplayError", "PT_DISPLAY"],
    ];
    for (const [error, name, code] of cases) {
      assert.ok(error instanceof PseudoTextError);
      assert.ok(error instanceof Error);
      assert.equal(error.name, name);
      assert.equal(error.code, code);
    }
  });

  test("validation errors carry the offending character when given", () => {
    const error = new ValidationError("nope", { char: "@", index: 3 });
    assert.equal(error.char, "@");
    assert.equal(error.index, 3);
    const bare = new ValidationError("nope");
    assert.equal(bare.char, null);
    assert.equal(bare.index, null);
  });

  test("messages name the resource and keep the cause", () => {
    const cause = new Error("ENOENT");
    const error = new ResourceError("font_size_7.txt", 7, "cannot be read", { cause });
    assert.equal(error.message, 'Glyph resource "font_size_7.txt" (size 7): cannot be read');
    assert.equal(error.cause, cause);
    assert.equal(new UnsupportedCharacterError("a").message, 'Character "a" has no glyph');
    assert.equal(new DisplayError("closed").message, "Display surface write failed: closed");
  });

  test("describeThrown formats errors and other values", () => {
    assert.equal(describeThrown(new TypeError("x")), "TypeError: x");
    assert.equal(describeThrown("plain"), "plain");
    assert.equal(describeThrown(new ValidationError("bad")), "ValidationError: bad");
  });
});
