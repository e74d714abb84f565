/**
 * packages/node/src/log/fileLogSink.ts: NDJSON log sink for termloop events.
 *
 * Enable with:
 *   TERMLOOP_LOG=/tmp/termloop.ndjson
 *
 * Optional:
 *   TERMLOOP_LOG_LEVEL=debug|info|warn|error   (default: info)
 *
 * The terminal belongs to the application while it runs, so events go to a
 * file rather than stdout/stderr.
 */

import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import {
  type LogEvent,
  type LogLevel,
  type LogSink,
  filterLogSink,
  isLogLevel,
  safeErr,
} from "@termloop/core";

export const LOG_PATH_ENV = "TERMLOOP_LOG";
export const LOG_LEVEL_ENV = "TERMLOOP_LOG_LEVEL";
const DEFAULT_LOG_LEVEL: LogLevel = "info";

export type FileLogSink = Readonly<{
  path: string;
  log: LogSink;
  /** Set once a write has failed; the sink stops writing after that. */
  lastError: () => Error | null;
}>;

export type FileLogSinkOptions = Readonly<{
  minLevel?: LogLevel;
  now?: () => Date;
}>;

function readEnv(env: NodeJS.ProcessEnv, name: string): string | null {
  const raw = env[name];
  if (typeof raw !== "string") return null;
  const value = raw.trim();
  return value.length > 0 ? value : null;
}

export function formatLogLine(event: LogEvent, ts: Date): string {
  return JSON.stringify({
    ts: ts.toISOString(),
    pid: process.pid,
    level: event.level,
    source: event.source,
    message: event.message,
    ...(event.detail === undefined ? {} : { detail: event.detail }),
  });
}

export function createFileLogSink(path: string, opts: FileLogSinkOptions = {}): FileLogSink {
  const now = opts.now ?? (() => new Date());
  let lastError: Error | null = null;
  let ready = false;

  const write: LogSink = (event) => {
    if (lastError !== null) return;
    try {
      if (!ready) {
        mkdirSync(dirname(path), { recursive: true });
        ready = true;
      }
      appendFileSync(path, `${formatLogLine(event, now())}\n`, "utf8");
    } catch (e: unknown) {
      // Diagnostics must not take the application down; keep the first failure.
      lastError = safeErr(e);
    }
  };

  return Object.freeze({
    path,
    log: filterLogSink(write, opts.minLevel ?? DEFAULT_LOG_LEVEL),
    lastError: () => lastError,
  });
}

/**
 * Build the sink configured by TERMLOOP_LOG / TERMLOOP_LOG_LEVEL, or undefined
 * when logging is not enabled.
 */
export function logSinkFromEnv(env: NodeJS.ProcessEnv = process.env): LogSink | undefined {
  const path = readEnv(env, LOG_PATH_ENV);
  if (path === null) return undefined;
  const level = readEnv(env, LOG_LEVEL_ENV)?.toLowerCase();
  const minLevel = isLogLevel(level) ? level : DEFAULT_LOG_LEVEL;
  return createFileLogSink(path, { minLevel }).log;
}
