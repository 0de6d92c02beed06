/**
 * packages/core/src/log.ts — Structured log events.
 *
 * Components accept an optional `log` sink and default to a no-op. Fields are
 * flat scalars so sinks can serialize an event as one NDJSON record.
 */

export type PseudoTextLogLevel = "info" | "warn" | "error";

export type PseudoTextLogFields = Readonly<Record<string, string | number | boolean>>;

export type PseudoTextLogEvent = Readonly<{
  level: PseudoTextLogLevel;
  message: string;
  fields?: PseudoTextLogFields;
}>;

export type PseudoTextLogSink = (event: PseudoTextLogEvent) => void;

export function makeLogSink(log: PseudoTextLogSink | undefined): PseudoTextLogSink {
  if (typeof log === "function") return log;
  return () => {};
}

/**
 * High-resolution timer.
 * Falls back to Date.now() if performance.now() is unavailable.
 */
export function nowMs(): number {
  const g = globalThis as { performance?: { now?: () => number } };
  const fn = g.performance?.now;
  if (typeof fn === "function") return fn.call(g.performance);
  return Date.now();
}
