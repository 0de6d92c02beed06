export { fixturePath, readFixture, readLinesFixture } from "./fixtures.js";
export { assertLinesEqual, describeLineMismatch } from "./lines.js";
export { assert, describe, test } from "./nodeTest.js";
