/**
 * Structured logging and tracing integration.
 *
 * Provides a compact human-readable logger (stderr, so command output on
 * stdout stays machine-readable) and span helpers for tracing hot paths.
 */
import { Effect, Layer, Logger, LogLevel } from "effect";

// ── Pretty logger ──────────────────────────────────────────────────────────

function render(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

export const prettyLogger = Logger.make(({ logLevel, message, date, annotations }) => {
  const ts = date.toISOString().slice(11, 23);
  const lvl = logLevel.label.toUpperCase().padEnd(5);
  const msg = Array.isArray(message) ? message.map(render).join(" ") : render(message);
  const tags: string[] = [];
  for (const [key, value] of annotations) {
    tags.push(`${key}=${render(value)}`);
  }
  const suffix = tags.length > 0 ? ` [${tags.join(" ")}]` : "";
  console.error(`[${ts}] ${lvl} ${msg}${suffix}`);
});

/** Swap the default logger for `prettyLogger` and set the minimum level. */
export function loggerLayer(level: LogLevel.LogLevel): Layer.Layer<never> {
  return Layer.merge(
    Logger.replace(Logger.defaultLogger, prettyLogger),
    Logger.minimumLogLevel(level),
  );
}

// ── Span helpers ───────────────────────────────────────────────────────────

export function withSpan<A, E, R>(name: string, effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> {
  return Effect.withSpan(name)(effect);
}

// ── Log level from string ──────────────────────────────────────────────────

export function parseLogLevel(level: string): LogLevel.LogLevel {
  switch (level.toLowerCase()) {
    case "trace": return LogLevel.Trace;
    case "debug": return LogLevel.Debug;
    case "info": return LogLevel.Info;
    case "warn":
    case "warning": return LogLevel.Warning;
    case "error": return LogLevel.Error;
    case "none":
    case "off": return LogLevel.None;
    default: return LogLevel.Info;
  }
}
