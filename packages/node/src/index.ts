/**
 * @pseudotext/node — draw banner text on a terminal from Node.js.
 */

import {
  type Color,
  type DisplaySurface,
  type GlyphSize,
  type GlyphTableProvider,
  PseudoText,
  type PseudoTextLogSink,
  type PseudoTextServices,
  type SurfaceOrigin,
  createGlyphTableCache,
} from "@pseudotext/core";
import { type AnsiSink, createAnsiSurface } from "./ansiSurface.js";
import {
  type EnvMap,
  type NodePseudoTextSettingsOverrides,
  resolveNodePseudoTextSettings,
} from "./config.js";
import { createFileGlyphSource } from "./fonts.js";
import { combineLogSinks, createRenderAudit } from "./renderAudit.js";

export {
  ansiColorSequence,
  ansiCursorSequence,
  createAnsiSurface,
  createFdSink,
  type AnsiSink,
  type AnsiSurface,
  type AnsiSurfaceOptions,
} from "./ansiSurface.js";
export {
  DEFAULT_AUDIT_LOG_NAME,
  resolveNodePseudoTextSettings,
  type EnvMap,
  type NodePseudoTextSettings,
  type NodePseudoTextSettingsOverrides,
} from "./config.js";
export { BUNDLED_FONT_DIR, createFileGlyphSource } from "./fonts.js";
export {
  combineLogSinks,
  createRenderAudit,
  renderAuditRecord,
  type RenderAudit,
  type RenderAuditOptions,
} from "./renderAudit.js";

export type CreateNodePseudoTextOptions = NodePseudoTextSettingsOverrides &
  Readonly<{
    content?: string;
    /** Replaces the ANSI terminal surface. */
    surface?: DisplaySurface;
    /** Output of the default ANSI surface; stdout when omitted. */
    sink?: AnsiSink;
    /** Share one glyph provider between instances. */
    glyphs?: GlyphTableProvider;
    log?: PseudoTextLogSink;
    env?: EnvMap;
  }>;

/**
 * Build a PseudoText bound to the bundled fonts (or PSEUDOTEXT_FONT_DIR) and
 * an ANSI surface on stdout. Each instance caches its own glyph tables.
 */
export function createNodePseudoText(opts: CreateNodePseudoTextOptions = {}): PseudoText {
  const settings = resolveNodePseudoTextSettings(opts, opts.env ?? process.env);
  const audit = createRenderAudit({
    enabled: settings.auditEnabled,
    logPath: settings.auditLogPath,
  });
  const log = combineLogSinks(opts.log, audit.enabled ? audit.sink : undefined);

  const glyphs =
    opts.glyphs ??
    createGlyphTableCache(createFileGlyphSource(settings.fontDir), log ? { log } : {});
  const surface =
    opts.surface ??
    createAnsiSurface({
      colorEnabled: settings.colorEnabled,
      ...(opts.sink === undefined ? {} : { sink: opts.sink }),
    });
  const services: PseudoTextServices = { glyphs, surface, ...(log ? { log } : {}) };

  return new PseudoText(services, {
    content: opts.content ?? "",
    inkChar: settings.inkChar,
    fillChar: settings.fillChar,
    glyphSize: settings.glyphSize,
    color: settings.color,
  });
}

/** One-shot render on the terminal, mirroring `PseudoText.renderOnce`. */
export function renderPseudoText(
  content: string,
  inkChar: string,
  fillChar: string,
  glyphSize: GlyphSize,
  color: Color,
  origin: SurfaceOrigin,
  opts: Omit<CreateNodePseudoTextOptions, "content"> = {},
): void {
  createNodePseudoText({ ...opts, content, inkChar, fillChar, glyphSize, color }).render(origin);
}
