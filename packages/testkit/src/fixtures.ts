import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";

const FIXTURES_ROOT = new URL("../fixtures/", import.meta.url);

function resolveFixture(rel: string): URL {
  if (rel.startsWith("/") || rel.split("/").includes("..")) {
    throw new Error(`readFixture: fixture path must stay inside the fixtures root (got "${rel}")`);
  }
  return new URL(rel, FIXTURES_ROOT);
}

export function fixturePath(rel: string): string {
  return fileURLToPath(resolveFixture(rel));
}

export async function readFixture(rel: string): Promise<Uint8Array> {
  const buf = await readFile(resolveFixture(rel));
  return new Uint8Array(buf.buffer, buf.byteOffset, buf.byteLength);
}

/** Reads a text fixture and splits it into lines, dropping the final newline. */
export async function readLinesFixture(rel: string): Promise<string[]> {
  const text = await readFile(resolveFixture(rel), "utf8");
  const normalized = text.replace(/\r\n/g, "\n").replace(/\n$/u, "");
  return normalized.length === 0 ? [] : normalized.split("\n");
}
