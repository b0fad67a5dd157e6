/**
 * Structured logging and tracing integration.
 *
 * Provides a compact console logger for CLI runs, a layer that installs it
 * with a minimum level, and span helpers for the pipeline phases. Log lines
 * go to stderr so command output on stdout stays clean.
 */
import { Effect, Layer, Logger, LogLevel } from "effect";

// ── Pretty logger ──────────────────────────────────────────────────────────

function formatPart(part: unknown): string {
  return typeof part === "string" ? part : JSON.stringify(part);
}

export const prettyLogger = Logger.make(({ logLevel, message, date }) => {
  const ts = date.toISOString().slice(11, 23);
  const lvl = logLevel.label.toUpperCase().padEnd(5);
  const msg = Array.isArray(message) ? message.map(formatPart).join(" ") : formatPart(message);
  console.error(`[${ts}] ${lvl} ${msg}`);
});

// ── Span helpers ───────────────────────────────────────────────────────────

export function withSpan<A, E, R>(name: string, effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> {
  return Effect.withSpan(name)(effect);
}

// ── Log level from string ──────────────────────────────────────────────────

export function parseLogLevel(level: string): LogLevel.LogLevel {
  switch (level.toLowerCase()) {
    case "debug": return LogLevel.Debug;
    case "info": return LogLevel.Info;
    case "warn":
    case "warning": return LogLevel.Warning;
    case "error": return LogLevel.Error;
    default: return LogLevel.Info;
  }
}

// ── Layer ──────────────────────────────────────────────────────────────────

/** Replace the default logger with `prettyLogger` and filter below `level`. */
export function loggerLayer(level: string): Layer.Layer<never> {
  return Layer.merge(
    Logger.replace(Logger.defaultLogger, prettyLogger),
    Logger.minimumLogLevel(parseLogLevel(level)),
  );
}
