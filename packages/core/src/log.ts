/**
 * Structured log events emitted by lifecycle code.
 *
 * termloop never writes log output itself: the screen it manages is the
 * terminal, so every factory takes an optional `log` sink and routes events
 * there (the Node package ships an NDJSON file sink).
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogEvent = Readonly<{
  level: LogLevel;
  /** Component that emitted the event, e.g. "application" or "worker". */
  source: string;
  message: string;
  detail?: string;
}>;

export type LogSink = (event: LogEvent) => void;

export const LOG_LEVELS: readonly LogLevel[] = Object.freeze(["debug", "info", "warn", "error"]);

export function isLogLevel(value: unknown): value is LogLevel {
  return value === "debug" || value === "info" || value === "warn" || value === "error";
}

export function logLevelRank(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

export function makeLogSink(log: LogSink | undefined): LogSink {
  if (typeof log === "function") return log;
  return () => {};
}

/**
 * Wrap a sink so that events below `minLevel` are dropped.
 */
export function filterLogSink(log: LogSink, minLevel: LogLevel): LogSink {
  const min = logLevelRank(minLevel);
  return (event) => {
    if (logLevelRank(event.level) < min) return;
    log(event);
  };
}
