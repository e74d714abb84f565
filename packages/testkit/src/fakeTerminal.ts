/**
 * In-process TerminalDriver for tests.
 *
 * Tracks the terminal mode the way a real TTY would (raw input, cursor
 * visibility, keypad), records every draw and refresh, and replays scripted
 * keys. A `null` entry in the key script reads as "no key" for one readKey().
 */

import {
  type AcquireScreenOptions,
  type KeyCode,
  type ScreenHandle,
  type ScreenSize,
  type TerminalDriver,
  TermloopError,
  type TextStyle,
  assertCell,
} from "@termloop/core";

export type FakeDrawOp = Readonly<{
  row: number;
  col: number;
  text: string;
  style: Readonly<{ bold: boolean; underline: boolean }>;
}>;

export type FakeTerminalMode = Readonly<{
  raw: boolean;
  cursorVisible: boolean;
  keypad: boolean;
}>;

export type FakeTerminalOptions = Readonly<{
  keys?: readonly (KeyCode | null)[];
  size?: ScreenSize;
  /** Make acquireScreen() fail with TERMLOOP_RESOURCE_UNAVAILABLE. */
  failAcquire?: string;
  /** Make size() on an acquired handle fail with TERMLOOP_RESOURCE_UNAVAILABLE. */
  failSize?: string;
  initialMode?: FakeTerminalMode;
}>;

export type FakeTerminal = TerminalDriver &
  Readonly<{
    acquireCount: () => number;
    releaseCount: () => number;
    refreshCount: () => number;
    isHeld: () => boolean;
    mode: () => FakeTerminalMode;
    /** Every drawText call, in order. */
    draws: () => readonly FakeDrawOp[];
    /** Draws grouped by the refresh that flushed them. */
    frames: () => readonly (readonly FakeDrawOp[])[];
    /** Texts drawn, in order. */
    texts: () => readonly string[];
    pushKeys: (...keys: readonly (KeyCode | null)[]) => void;
    pendingKeys: () => number;
  }>;

const DEFAULT_MODE: FakeTerminalMode = Object.freeze({
  raw: false,
  cursorVisible: true,
  keypad: false,
});

export function createFakeTerminal(opts: FakeTerminalOptions = {}): FakeTerminal {
  const size: ScreenSize = opts.size ?? { cols: 80, rows: 24 };
  const keys: (KeyCode | null)[] = [...(opts.keys ?? [])];
  const draws: FakeDrawOp[] = [];
  const frames: FakeDrawOp[][] = [];
  let pending: FakeDrawOp[] = [];
  let mode: FakeTerminalMode = opts.initialMode ?? DEFAULT_MODE;
  let saved: FakeTerminalMode | null = null;
  let live: ScreenHandle | null = null;
  let acquireCount = 0;
  let releaseCount = 0;
  let refreshCount = 0;

  function assertLive(handle: ScreenHandle, method: string): void {
    if (live !== handle) {
      throw new TermloopError("TERMLOOP_INVALID_STATE", `${method}: screen handle is not live`);
    }
  }

  return {
    acquireScreen(acquireOpts: AcquireScreenOptions): ScreenHandle {
      if (opts.failAcquire !== undefined) {
        throw new TermloopError("TERMLOOP_RESOURCE_UNAVAILABLE", opts.failAcquire);
      }
      if (live !== null) {
        throw new TermloopError("TERMLOOP_RESOURCE_UNAVAILABLE", "screen is already acquired");
      }
      acquireCount++;
      saved = mode;
      mode = { raw: true, cursorVisible: false, keypad: acquireOpts.keypad };

      const handle: ScreenHandle = {
        readKey(): KeyCode | null {
          assertLive(handle, "readKey");
          return keys.shift() ?? null;
        },
        drawText(row: number, col: number, text: string, style?: TextStyle): void {
          assertLive(handle, "drawText");
          assertCell("drawText", row, col);
          const op: FakeDrawOp = {
            row,
            col,
            text,
            style: { bold: style?.bold === true, underline: style?.underline === true },
          };
          draws.push(op);
          pending.push(op);
        },
        refresh(): void {
          assertLive(handle, "refresh");
          refreshCount++;
          frames.push(pending);
          pending = [];
        },
        size(): ScreenSize {
          if (opts.failSize !== undefined) {
            throw new TermloopError("TERMLOOP_RESOURCE_UNAVAILABLE", opts.failSize);
          }
          return size;
        },
      };
      live = handle;
      return handle;
    },

    releaseScreen(handle: ScreenHandle): void {
      assertLive(handle, "releaseScreen");
      live = null;
      releaseCount++;
      mode = saved ?? DEFAULT_MODE;
      saved = null;
      pending = [];
    },

    acquireCount: () => acquireCount,
    releaseCount: () => releaseCount,
    refreshCount: () => refreshCount,
    isHeld: () => live !== null,
    mode: () => mode,
    draws: () => draws,
    frames: () => frames,
    texts: () => draws.map((d) => d.text),
    pushKeys: (...more) => {
      keys.push(...more);
    },
    pendingKeys: () => keys.length,
  };
}
