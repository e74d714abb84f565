import { type ScreenSize, TermloopError } from "@termloop/core";

const COLS = 0;
const ROWS = 1;
const SIZE_BYTES = 2 * Int32Array.BYTES_PER_ELEMENT;

/**
 * Screen size mirrored into shared memory: the controlling thread writes it,
 * the worker reads it from `size()`. The two words are not updated as one, so a
 * reader may briefly see new cols with old rows during a resize.
 */
export type SharedSize = Readonly<{
  buffer: SharedArrayBuffer;
  set: (size: ScreenSize) => void;
  get: () => ScreenSize;
}>;

function view(buffer: SharedArrayBuffer): SharedSize {
  const words = new Int32Array(buffer, 0, 2);
  return Object.freeze({
    buffer,
    set(size: ScreenSize): void {
      Atomics.store(words, COLS, size.cols);
      Atomics.store(words, ROWS, size.rows);
    },
    get(): ScreenSize {
      return { cols: Atomics.load(words, COLS), rows: Atomics.load(words, ROWS) };
    },
  });
}

export function createSharedSize(initial: ScreenSize): SharedSize {
  const size = view(new SharedArrayBuffer(SIZE_BYTES));
  size.set(initial);
  return size;
}

export function attachSharedSize(buffer: SharedArrayBuffer): SharedSize {
  if (buffer.byteLength < SIZE_BYTES) {
    throw new TermloopError(
      "TERMLOOP_PROTOCOL_ERROR",
      `attachSharedSize: buffer of ${String(buffer.byteLength)} bytes is too small`,
    );
  }
  return view(buffer);
}
