/**
 * packages/node/src/renderAudit.ts — Optional NDJSON render audit.
 *
 * Enable with:
 *   PSEUDOTEXT_RENDER_AUDIT=1
 *
 * Optional:
 *   PSEUDOTEXT_RENDER_AUDIT_LOG=/tmp/pseudotext-render-audit.ndjson
 *
 * Defaults:
 * - Records go to `<os tmpdir>/pseudotext-render-audit.ndjson` so banner output
 *   on the terminal is not interleaved with diagnostics.
 */

import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { type PseudoTextLogEvent, type PseudoTextLogSink, describeThrown } from "@pseudotext/core";

export type RenderAuditOptions = Readonly<{
  enabled: boolean;
  logPath: string;
  /** Called once when the log cannot be written; auditing stops afterwards. */
  onError?: (error: unknown) => void;
}>;

export type RenderAudit = Readonly<{
  enabled: boolean;
  logPath: string | null;
  sink: PseudoTextLogSink;
}>;

const DISABLED_AUDIT: RenderAudit = Object.freeze({
  enabled: false,
  logPath: null,
  sink: () => {},
});

function reportToStderr(error: unknown): void {
  process.stderr.write(`pseudotext: render audit disabled: ${describeThrown(error)}\n`);
}

export function renderAuditRecord(event: PseudoTextLogEvent): string {
  return JSON.stringify({
    ts: new Date().toISOString(),
    pid: process.pid,
    layer: "node",
    level: event.level,
    message: event.message,
    ...(event.fields ?? {}),
  });
}

export function createRenderAudit(opts: RenderAuditOptions): RenderAudit {
  if (!opts.enabled) return DISABLED_AUDIT;

  const onError = opts.onError ?? reportToStderr;
  const logPath = opts.logPath;
  let broken = false;
  let dirReady = false;

  const sink: PseudoTextLogSink = (event) => {
    if (broken) return;
    try {
      if (!dirReady) {
        mkdirSync(dirname(logPath), { recursive: true });
        dirReady = true;
      }
      appendFileSync(logPath, `${renderAuditRecord(event)}\n`, "utf8");
    } catch (error) {
      broken = true;
      onError(error);
    }
  };

  return Object.freeze({ enabled: true, logPath, sink });
}

/** Fan one event out to every defined sink, in order. */
export function combineLogSinks(
  ...sinks: readonly (PseudoTextLogSink | undefined)[]
): PseudoTextLogSink | undefined {
  const active = sinks.filter((sink): sink is PseudoTextLogSink => sink !== undefined);
  if (active.length === 0) return undefined;
  if (active.length === 1) return active[0];
  return (event) => {
    for (const sink of active) sink(event);
  };
}
