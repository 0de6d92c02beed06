/**
 * packages/node/src/config.ts — Environment-driven defaults for Node banners.
 *
 * Precedence: explicit option, then environment, then built-in default.
 * Values that do not parse are ignored.
 */

import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  type Color,
  DEFAULT_FILL_CHAR,
  DEFAULT_GLYPH_SIZE,
  DEFAULT_INK_CHAR,
  DEFAULT_TEXT_COLOR,
  GlyphSize,
  parseColor,
} from "@pseudotext/core";
import { BUNDLED_FONT_DIR } from "./fonts.js";

export type EnvMap = Readonly<Record<string, string | undefined>>;

export type NodePseudoTextSettings = Readonly<{
  fontDir: string;
  colorEnabled: boolean;
  inkChar: string;
  fillChar: string;
  glyphSize: GlyphSize;
  color: Color;
  auditEnabled: boolean;
  auditLogPath: string;
}>;

export type NodePseudoTextSettingsOverrides = Readonly<Partial<NodePseudoTextSettings>>;

export const DEFAULT_AUDIT_LOG_NAME = "pseudotext-render-audit.ndjson";

function envText(env: EnvMap, key: string): string | undefined {
  const value = env[key];
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function envLower(env: EnvMap, key: string): string | undefined {
  return envText(env, key)?.toLowerCase();
}

function envBool(env: EnvMap, key: string): boolean | undefined {
  const raw = envLower(env, key);
  if (!raw) return undefined;
  if (raw === "1" || raw === "true" || raw === "yes" || raw === "on") return true;
  if (raw === "0" || raw === "false" || raw === "no" || raw === "off") return false;
  return undefined;
}

/** Single-cell characters are taken as-is, so a space survives here. */
function envCellChar(env: EnvMap, key: string): string | undefined {
  const value = env[key];
  return typeof value === "string" && value.length === 1 ? value : undefined;
}

function envGlyphSize(env: EnvMap, key: string): GlyphSize | undefined {
  switch (envLower(env, key)) {
    case "5":
    case "small":
      return GlyphSize.Small;
    case "7":
    case "big":
      return GlyphSize.Big;
    default:
      return undefined;
  }
}

function envColor(env: EnvMap, key: string): Color | undefined {
  const raw = envText(env, key);
  if (raw === undefined) return undefined;
  return parseColor(raw) ?? undefined;
}

/**
 * NO_COLOR (any non-empty value) turns color off; FORCE_COLOR=0 does too,
 * and any other FORCE_COLOR value turns it back on.
 */
function envColorEnabled(env: EnvMap): boolean | undefined {
  const force = envText(env, "FORCE_COLOR");
  if (force !== undefined) return envBool(env, "FORCE_COLOR") !== false;
  if (envText(env, "NO_COLOR") !== undefined) return false;
  return undefined;
}

export function resolveNodePseudoTextSettings(
  overrides: NodePseudoTextSettingsOverrides = {},
  env: EnvMap = process.env,
): NodePseudoTextSettings {
  const auditEnabled = overrides.auditEnabled ?? envBool(env, "PSEUDOTEXT_RENDER_AUDIT") ?? false;
  return Object.freeze({
    fontDir: overrides.fontDir ?? envText(env, "PSEUDOTEXT_FONT_DIR") ?? BUNDLED_FONT_DIR,
    colorEnabled: overrides.colorEnabled ?? envColorEnabled(env) ?? true,
    inkChar: overrides.inkChar ?? envCellChar(env, "PSEUDOTEXT_INK") ?? DEFAULT_INK_CHAR,
    fillChar: overrides.fillChar ?? envCellChar(env, "PSEUDOTEXT_FILL") ?? DEFAULT_FILL_CHAR,
    glyphSize:
      overrides.glyphSize ?? envGlyphSize(env, "PSEUDOTEXT_GLYPH_SIZE") ?? DEFAULT_GLYPH_SIZE,
    color: overrides.color ?? envColor(env, "PSEUDOTEXT_COLOR") ?? DEFAULT_TEXT_COLOR,
    auditEnabled,
    auditLogPath:
      overrides.auditLogPath ??
      envText(env, "PSEUDOTEXT_RENDER_AUDIT_LOG") ??
      join(tmpdir(), DEFAULT_AUDIT_LOG_NAME),
  });
}
