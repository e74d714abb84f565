/**
 * Single-producer / single-consumer key queue in shared memory.
 *
 * Layout (Int32 words):
 *   [0] head     next slot to read   (written by the consumer only)
 *   [1] tail     next slot to write  (written by the producer only)
 *   [2] dropped  keys rejected because the ring was full
 *   [3..]        slots, `capacity` of them
 *
 * head/tail are free-running counters; the slot index is `counter & mask`.
 * When full, the newest key is dropped.
 */

import { type KeyCode, TermloopError } from "@termloop/core";

const HEAD = 0;
const TAIL = 1;
const DROPPED = 2;
const HEADER_WORDS = 3;

export const DEFAULT_KEY_RING_CAPACITY = 256;

export type KeyRing = Readonly<{
  buffer: SharedArrayBuffer;
  capacity: number;
  /** Producer side. Returns false (and counts a drop) when full. */
  push: (key: KeyCode) => boolean;
  /** Consumer side. Never blocks. */
  pop: () => KeyCode | null;
  size: () => number;
  dropped: () => number;
}>;

function isPowerOfTwo(n: number): boolean {
  return Number.isInteger(n) && n > 0 && (n & (n - 1)) === 0;
}

export function keyRingBytes(capacity: number): number {
  return (HEADER_WORDS + capacity) * Int32Array.BYTES_PER_ELEMENT;
}

function view(buffer: SharedArrayBuffer, capacity: number): KeyRing {
  const header = new Int32Array(buffer, 0, HEADER_WORDS);
  const slots = new Int32Array(buffer, HEADER_WORDS * Int32Array.BYTES_PER_ELEMENT, capacity);
  const mask = capacity - 1;

  function size(): number {
    return (Atomics.load(header, TAIL) - Atomics.load(header, HEAD)) | 0;
  }

  return Object.freeze({
    buffer,
    capacity,
    size,

    push(key: KeyCode): boolean {
      const tail = Atomics.load(header, TAIL);
      if (((tail - Atomics.load(header, HEAD)) | 0) >= capacity) {
        Atomics.add(header, DROPPED, 1);
        return false;
      }
      Atomics.store(slots, tail & mask, key);
      Atomics.store(header, TAIL, (tail + 1) | 0);
      return true;
    },

    pop(): KeyCode | null {
      const head = Atomics.load(header, HEAD);
      if (head === Atomics.load(header, TAIL)) return null;
      const key = Atomics.load(slots, head & mask);
      Atomics.store(header, HEAD, (head + 1) | 0);
      return key;
    },

    dropped(): number {
      return Atomics.load(header, DROPPED);
    },
  });
}

export function createKeyRing(capacity: number = DEFAULT_KEY_RING_CAPACITY): KeyRing {
  if (!isPowerOfTwo(capacity)) {
    throw new TermloopError(
      "TERMLOOP_INVALID_ARGUMENT",
      `createKeyRing: capacity must be a power of two (got ${String(capacity)})`,
    );
  }
  return view(new SharedArrayBuffer(keyRingBytes(capacity)), capacity);
}

/** Open a ring created on another thread. */
export function attachKeyRing(buffer: SharedArrayBuffer): KeyRing {
  const capacity = buffer.byteLength / Int32Array.BYTES_PER_ELEMENT - HEADER_WORDS;
  if (!isPowerOfTwo(capacity)) {
    throw new TermloopError(
      "TERMLOOP_PROTOCOL_ERROR",
      `attachKeyRing: buffer of ${String(buffer.byteLength)} bytes is not a key ring`,
    );
  }
  return view(buffer, capacity);
}
