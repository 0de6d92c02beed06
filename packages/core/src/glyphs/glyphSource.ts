/**
 * packages/core/src/glyphs/glyphSource.ts — Where glyph resources come from.
 *
 * Why: Core stays free of file-system access. A GlyphSource hands over the
 * raw resource text for a size; providers turn it into tables, either fresh
 * on every request or once per size.
 */

import { ResourceError, describeThrown } from "../errors.js";
import { type PseudoTextLogSink, makeLogSink, nowMs } from "../log.js";
import { GLYPH_SIZES, type GlyphSize } from "./glyph.js";
import { GlyphTable } from "./glyphTable.js";

export type GlyphSource = Readonly<{
  /** Stable identifier of the resource for `size`, used in errors and logs. */
  resourceName: (size: GlyphSize) => string;
  /** Raw resource text. Throws when the resource cannot be obtained. */
  read: (size: GlyphSize) => string;
}>;

export type GlyphTableProvider = Readonly<{
  load: (size: GlyphSize) => GlyphTable;
}>;

export type GlyphTableCache = GlyphTableProvider &
  Readonly<{
    cachedSizes: () => readonly GlyphSize[];
    clear: () => void;
  }>;

export type GlyphTableProviderOptions = Readonly<{
  log?: PseudoTextLogSink;
}>;

export function glyphResourceName(size: GlyphSize): string {
  return `font_size_${String(size)}.txt`;
}

/**
 * Read and parse the resource for `size`.
 *
 * @throws ResourceError when the source fails or the text is malformed.
 */
export function loadGlyphTable(source: GlyphSource, size: GlyphSize): GlyphTable {
  const resourceName = source.resourceName(size);
  let text: string;
  try {
    text = source.read(size);
  } catch (error) {
    if (error instanceof ResourceError) throw error;
    throw new ResourceError(resourceName, size, `cannot be read (${describeThrown(error)})`, {
      cause: error,
    });
  }
  return GlyphTable.parse(text, size, resourceName);
}

function logLoaded(log: PseudoTextLogSink, table: GlyphTable, startedAt: number): void {
  log({
    level: "info",
    message: "glyph table loaded",
    fields: {
      glyphSize: table.size,
      resource: table.resourceName,
      durationMs: nowMs() - startedAt,
    },
  });
}

/** Reads the resource again on every `load`. */
export function createGlyphTableLoader(
  source: GlyphSource,
  opts: GlyphTableProviderOptions = {},
): GlyphTableProvider {
  const log = makeLogSink(opts.log);
  return Object.freeze({
    load: (size: GlyphSize) => {
      const startedAt = nowMs();
      const table = loadGlyphTable(source, size);
      logLoaded(log, table, startedAt);
      return table;
    },
  });
}

/**
 * Loads each size at most once and shares the (immutable) table afterwards.
 * Failed loads are not remembered, so a fixed resource is picked up by the
 * next request.
 */
export function createGlyphTableCache(
  source: GlyphSource,
  opts: GlyphTableProviderOptions = {},
): GlyphTableCache {
  const log = makeLogSink(opts.log);
  const tables = new Map<GlyphSize, GlyphTable>();

  return Object.freeze({
    load: (size: GlyphSize) => {
      const cached = tables.get(size);
      if (cached) return cached;
      const startedAt = nowMs();
      const table = loadGlyphTable(source, size);
      tables.set(size, table);
      logLoaded(log, table, startedAt);
      return table;
    },
    cachedSizes: () => Object.freeze(GLYPH_SIZES.filter((size) => tables.has(size))),
    clear: () => {
      tables.clear();
    },
  });
}

/** Source over resource text held in memory, keyed by glyph size. */
export function createInMemoryGlyphSource(
  resources: Readonly<Partial<Record<GlyphSize, string>>>,
): GlyphSource {
  return Object.freeze({
    resourceName: (size: GlyphSize) => `memory:${glyphResourceName(size)}`,
    read: (size: GlyphSize) => {
      const text = resources[size];
      if (text === undefined) {
        throw new Error(`no in-memory resource for glyph size ${String(size)}`);
      }
      return text;
    },
  });
}
