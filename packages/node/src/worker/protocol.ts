/**
 * Messages between the controlling thread and a termloop worker thread.
 *
 * Everything crossing the boundary is structured-cloned, so guards below
 * validate shape on receipt instead of trusting the sender.
 */

import {
  type LogEvent,
  TermloopError,
  isLogLevel,
  isTermloopErrorCode,
} from "@termloop/core";
import { MessagePort } from "node:worker_threads";

// =============================================================================
// Errors across threads
// =============================================================================

export type SerializedError = Readonly<{
  name: string;
  message: string;
  stack?: string;
  code?: string;
}>;

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

function optionalString(v: unknown): boolean {
  return v === undefined || typeof v === "string";
}

export function serializeError(err: unknown): SerializedError {
  if (err instanceof Error) {
    const code = "code" in err && typeof err.code === "string" ? err.code : undefined;
    return {
      name: err.name,
      message: err.message,
      ...(err.stack === undefined ? {} : { stack: err.stack }),
      ...(code === undefined ? {} : { code }),
    };
  }
  return { name: "Error", message: String(err) };
}

/**
 * Rebuild a thrown value on the receiving thread. termloop codes come back as
 * TermloopError so callers can keep matching on `code`.
 */
export function deserializeError(s: SerializedError): Error {
  const err = isTermloopErrorCode(s.code)
    ? new TermloopError(s.code, s.message)
    : new Error(s.message);
  if (!(err instanceof TermloopError)) err.name = s.name;
  if (s.stack !== undefined) err.stack = s.stack;
  return err;
}

export function isSerializedError(v: unknown): v is SerializedError {
  return (
    isRecord(v) &&
    typeof v.name === "string" &&
    typeof v.message === "string" &&
    optionalString(v.stack) &&
    optionalString(v.code)
  );
}

export function isLogEvent(v: unknown): v is LogEvent {
  return (
    isRecord(v) &&
    isLogLevel(v.level) &&
    typeof v.source === "string" &&
    typeof v.message === "string" &&
    optionalString(v.detail)
  );
}

// =============================================================================
// Worker -> controlling thread
// =============================================================================

export type WorkerToMainMessage =
  | Readonly<{ type: "log"; event: LogEvent }>
  | Readonly<{ type: "message"; payload: unknown }>
  | Readonly<{ type: "failed"; error: SerializedError }>;

export function parseWorkerMessage(m: unknown): WorkerToMainMessage {
  if (isRecord(m)) {
    switch (m.type) {
      case "log":
        if (isLogEvent(m.event)) return { type: "log", event: m.event };
        break;
      case "message":
        return { type: "message", payload: m.payload };
      case "failed":
        if (isSerializedError(m.error)) return { type: "failed", error: m.error };
        break;
    }
  }
  throw new TermloopError(
    "TERMLOOP_PROTOCOL_ERROR",
    `unexpected worker message: ${describeShape(m)}`,
  );
}

export function describeShape(m: unknown): string {
  if (!isRecord(m)) return m === null ? "null" : typeof m;
  return typeof m.type === "string" ? `type=${m.type}` : "object without type";
}

// =============================================================================
// Worker entry data
// =============================================================================

export type WorkerEntryData = Readonly<{
  /** Module URL (href) exporting the task. */
  module: string;
  exportName: string;
  data: unknown;
  signal: SharedArrayBuffer;
}>;

export function parseWorkerEntryData(v: unknown): WorkerEntryData {
  if (
    isRecord(v) &&
    typeof v.module === "string" &&
    typeof v.exportName === "string" &&
    v.signal instanceof SharedArrayBuffer
  ) {
    return { module: v.module, exportName: v.exportName, data: v.data, signal: v.signal };
  }
  throw new TermloopError("TERMLOOP_PROTOCOL_ERROR", "worker entry: malformed workerData");
}

// =============================================================================
// Threaded application (payloads of "message" above)
// =============================================================================

export type DrawOp = Readonly<{
  row: number;
  col: number;
  text: string;
  bold: boolean;
  underline: boolean;
}>;

export type FramePhase = "enter" | "update" | "exit";

export type AppWorkerMessage =
  | Readonly<{ type: "entered" }>
  | Readonly<{ type: "frame"; phase: FramePhase; ops: readonly DrawOp[] }>;

function isDrawOp(v: unknown): v is DrawOp {
  return (
    isRecord(v) &&
    Number.isInteger(v.row) &&
    Number.isInteger(v.col) &&
    typeof v.text === "string" &&
    typeof v.bold === "boolean" &&
    typeof v.underline === "boolean"
  );
}

function isFramePhase(v: unknown): v is FramePhase {
  return v === "enter" || v === "update" || v === "exit";
}

export function parseAppWorkerMessage(m: unknown): AppWorkerMessage {
  if (isRecord(m)) {
    if (m.type === "entered") return { type: "entered" };
    if (m.type === "frame" && isFramePhase(m.phase) && Array.isArray(m.ops)) {
      const ops: DrawOp[] = [];
      for (const op of m.ops) {
        if (!isDrawOp(op)) break;
        ops.push(op);
      }
      if (ops.length === m.ops.length) return { type: "frame", phase: m.phase, ops };
    }
  }
  throw new TermloopError(
    "TERMLOOP_PROTOCOL_ERROR",
    `unexpected application message: ${describeShape(m)}`,
  );
}

export type AppWorkerData = Readonly<{
  /** Module URL (href) exporting a `defineThreadedApp` value. */
  module: string;
  exportName: string;
  data: unknown;
  frameDurationMs: number;
  stopOnError: boolean;
  /** Key ring filled by the controlling thread. */
  keys: SharedArrayBuffer;
  /** Screen size mirrored by the controlling thread. */
  size: SharedArrayBuffer;
  /** Receives `send()` messages; read between ticks. */
  port: MessagePort;
}>;

export function parseAppWorkerData(v: unknown): AppWorkerData {
  if (
    isRecord(v) &&
    typeof v.module === "string" &&
    typeof v.exportName === "string" &&
    typeof v.frameDurationMs === "number" &&
    typeof v.stopOnError === "boolean" &&
    v.keys instanceof SharedArrayBuffer &&
    v.size instanceof SharedArrayBuffer &&
    v.port instanceof MessagePort
  ) {
    return {
      module: v.module,
      exportName: v.exportName,
      data: v.data,
      frameDurationMs: v.frameDurationMs,
      stopOnError: v.stopOnError,
      keys: v.keys,
      size: v.size,
      port: v.port,
    };
  }
  throw new TermloopError("TERMLOOP_PROTOCOL_ERROR", "application worker: malformed data");
}
