/**
 * Fixed-rate tick driver.
 *
 * Each iteration: stop if exit was requested, run the tick, then sleep the rest
 * of the frame budget unless the tick itself requested exit. A tick that runs
 * over budget is followed immediately by the next one; missed frames are not
 * made up. A running tick is never interrupted.
 */

import { TermloopError } from "./errors.js";
import type { ExitSignal, ExitSignalReader } from "./exitSignal.js";

export type PacedLoopStats = Readonly<{
  /** Ticks that ran to completion. */
  ticks: number;
  /** Ticks that used the whole frame budget (no sleep followed). */
  overruns: number;
}>;

type PacedLoopBaseOptions = Readonly<{
  frameDurationMs: number;
  signal: ExitSignalReader | ExitSignal;
  /** Monotonic clock in ms. Default: performance.now(). */
  now?: () => number;
}>;

export type PacedLoopOptions = PacedLoopBaseOptions &
  Readonly<{
    tick: () => void;
    /** Blocking sleep. Default: the signal's wait() when it has one. */
    sleep?: (ms: number) => void;
  }>;

export type PacedLoopAsyncOptions = PacedLoopBaseOptions &
  Readonly<{
    tick: () => void | Promise<void>;
    sleep?: (ms: number) => Promise<void>;
  }>;

function defaultNow(): number {
  return performance.now();
}

function hasWait(signal: ExitSignalReader | ExitSignal): signal is ExitSignal {
  return "wait" in signal && typeof signal.wait === "function";
}

function blockingSleep(ms: number): void {
  Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms);
}

function timerSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function assertFrameDuration(frameDurationMs: number): void {
  if (!Number.isFinite(frameDurationMs) || frameDurationMs <= 0) {
    throw new TermloopError(
      "TERMLOOP_INVALID_CONFIG",
      `pacedLoop: frameDurationMs must be a finite number > 0 (got ${String(frameDurationMs)})`,
    );
  }
}

/**
 * Remaining sleep for a frame: max(0, budget - elapsed).
 */
export function remainingFrameTime(frameDurationMs: number, elapsedMs: number): number {
  return Math.max(0, frameDurationMs - elapsedMs);
}

export function runPacedLoop(opts: PacedLoopOptions): PacedLoopStats {
  assertFrameDuration(opts.frameDurationMs);
  const now = opts.now ?? defaultNow;
  const signal = opts.signal;
  const sleep =
    opts.sleep ?? (hasWait(signal) ? (ms: number) => void signal.wait(ms) : blockingSleep);

  let ticks = 0;
  let overruns = 0;
  while (!signal.isRequested()) {
    const start = now();
    opts.tick();
    ticks++;
    if (signal.isRequested()) break;
    const remaining = remainingFrameTime(opts.frameDurationMs, now() - start);
    if (remaining === 0) {
      overruns++;
      continue;
    }
    sleep(remaining);
  }
  return Object.freeze({ ticks, overruns });
}

export async function runPacedLoopAsync(opts: PacedLoopAsyncOptions): Promise<PacedLoopStats> {
  assertFrameDuration(opts.frameDurationMs);
  const now = opts.now ?? defaultNow;
  const sleep = opts.sleep ?? timerSleep;
  const signal = opts.signal;

  let ticks = 0;
  let overruns = 0;
  while (!signal.isRequested()) {
    const start = now();
    await opts.tick();
    ticks++;
    if (signal.isRequested()) break;
    const remaining = remainingFrameTime(opts.frameDurationMs, now() - start);
    if (remaining === 0) {
      overruns++;
      // Yield so input and timers still run between back-to-back frames.
      await sleep(0);
      continue;
    }
    await sleep(remaining);
  }
  return Object.freeze({ ticks, overruns });
}
