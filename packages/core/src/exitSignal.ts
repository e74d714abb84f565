/**
 * Cross-thread exit latch backed by one SharedArrayBuffer word.
 *
 * Word values: 0 = running, 1 = exit requested. The word only ever moves
 * 0 -> 1. All accesses go through Atomics, so a request is visible to every
 * thread sharing the buffer as soon as `request()` returns.
 */

import { TermloopError } from "./errors.js";

const SIGNAL_WORD = 0;
const SIGNAL_CLEAR = 0;
const SIGNAL_SET = 1;
export const EXIT_SIGNAL_BYTES = Int32Array.BYTES_PER_ELEMENT;

/** Read side, enough to drive a loop. */
export type ExitSignalReader = Readonly<{
  isRequested: () => boolean;
}>;

export type ExitSignal = ExitSignalReader &
  Readonly<{
    /** Idempotent; safe from any thread. */
    request: () => void;
    /**
     * Sleep up to `timeoutMs`, waking early when an exit is requested.
     * Returns whether the signal is set on wake.
     */
    wait: (timeoutMs: number) => boolean;
    /** Share this with another thread to observe/raise the same signal. */
    buffer: SharedArrayBuffer;
  }>;

export function createExitSignal(buffer?: SharedArrayBuffer): ExitSignal {
  const sab = buffer ?? new SharedArrayBuffer(EXIT_SIGNAL_BYTES);
  if (sab.byteLength < EXIT_SIGNAL_BYTES) {
    throw new TermloopError(
      "TERMLOOP_INVALID_ARGUMENT",
      `createExitSignal: buffer must hold at least ${String(EXIT_SIGNAL_BYTES)} bytes (got ${String(sab.byteLength)})`,
    );
  }
  const word = new Int32Array(sab, 0, 1);

  function isRequested(): boolean {
    return Atomics.load(word, SIGNAL_WORD) === SIGNAL_SET;
  }

  return {
    buffer: sab,
    isRequested,

    request(): void {
      if (Atomics.compareExchange(word, SIGNAL_WORD, SIGNAL_CLEAR, SIGNAL_SET) === SIGNAL_CLEAR) {
        Atomics.notify(word, SIGNAL_WORD);
      }
    },

    wait(timeoutMs: number): boolean {
      if (Number.isFinite(timeoutMs) && timeoutMs > 0) {
        Atomics.wait(word, SIGNAL_WORD, SIGNAL_CLEAR, timeoutMs);
      }
      return isRequested();
    },
  };
}
