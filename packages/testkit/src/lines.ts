/**
 * packages/testkit/src/lines.ts — Line-oriented golden comparison.
 *
 * Why: Rendered glyph blocks are easier to review as a grid than as one long
 * string. On mismatch the message shows the first differing row and column
 * with both rows quoted, so trailing fill characters stay visible.
 */

import { AssertionError } from "node:assert";

function quote(line: string | undefined): string {
  return line === undefined ? "<missing>" : JSON.stringify(line);
}

function firstDifferentColumn(a: string, b: string): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    if (a[i] !== b[i]) return i;
  }
  return n;
}

export function describeLineMismatch(
  actual: readonly string[],
  expected: readonly string[],
): string | null {
  const rows = Math.max(actual.length, expected.length);
  for (let row = 0; row < rows; row++) {
    const a = actual[row];
    const e = expected[row];
    if (a === e) continue;
    const column = a !== undefined && e !== undefined ? firstDifferentColumn(a, e) : 0;
    return [
      `row ${String(row)}, column ${String(column)}:`,
      `  actual:   ${quote(a)}`,
      `  expected: ${quote(e)}`,
    ].join("\n");
  }
  return null;
}

export function assertLinesEqual(
  actual: readonly string[],
  expected: readonly string[],
  label = "lines",
): void {
  const mismatch = describeLineMismatch(actual, expected);
  if (mismatch === null) return;
  const shape = `${String(actual.length)} vs ${String(expected.length)} rows`;
  throw new AssertionError({
    message: `${label} differ (${shape}) at ${mismatch}`,
    actual,
    expected,
    operator: "linesEqual",
  });
}
