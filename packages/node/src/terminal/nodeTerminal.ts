/**
 * packages/node/src/terminal/nodeTerminal.ts: TerminalDriver over stdin/stdout.
 *
 * Acquire puts the input TTY in raw mode and switches the output to the
 * alternate screen with the cursor hidden; release undoes both and restores
 * the raw-mode flag found at acquire time. One screen per process.
 */

import {
  type AcquireScreenOptions,
  type KeyCode,
  type ScreenHandle,
  type ScreenSize,
  TermloopError,
  type TerminalDriver,
  type TextStyle,
  assertCell,
  describeThrown,
} from "@termloop/core";
import terminalSize from "terminal-size";
import { decodeKeys } from "./keyDecoder.js";

const CSI = "\x1b[";
const ALT_SCREEN_ON = `${CSI}?1049h`;
const ALT_SCREEN_OFF = `${CSI}?1049l`;
const CURSOR_HIDE = `${CSI}?25l`;
const CURSOR_SHOW = `${CSI}?25h`;
const CLEAR = `${CSI}2J${CSI}H`;
const SGR_RESET = `${CSI}0m`;
const KEYPAD_ON = `${CSI}?1h\x1b=`;
const KEYPAD_OFF = `${CSI}?1l\x1b>`;

/** Keys buffered between readKey() calls; input past this is dropped. */
export const KEY_QUEUE_LIMIT = 1024;

type DataListener = (chunk: Uint8Array | string) => void;

/** The parts of a tty.ReadStream the driver uses. */
export interface TerminalInput {
  readonly isTTY?: boolean;
  readonly isRaw?: boolean;
  setRawMode?(mode: boolean): unknown;
  on(event: "data", listener: DataListener): unknown;
  off(event: "data", listener: DataListener): unknown;
  resume(): unknown;
  pause(): unknown;
}

/** The parts of a tty.WriteStream the driver uses. */
export interface TerminalOutput {
  readonly columns?: number;
  readonly rows?: number;
  write(data: string): unknown;
}

export type NodeTerminalOptions = Readonly<{
  /** Default: process.stdin. */
  input?: TerminalInput;
  /** Default: process.stdout. */
  output?: TerminalOutput;
}>;

type LiveScreen = Readonly<{
  handle: ScreenHandle;
  release: () => void;
}>;

// Process-wide: the terminal has one screen whichever driver instance took it.
let live: LiveScreen | null = null;

export function isScreenHeld(): boolean {
  return live !== null;
}

function sgr(style: TextStyle | undefined): string {
  const codes: string[] = [];
  if (style?.bold === true) codes.push("1");
  if (style?.underline === true) codes.push("4");
  return codes.length === 0 ? "" : `${CSI}${codes.join(";")}m`;
}

function positiveInt(n: number | undefined): number | null {
  return typeof n === "number" && Number.isInteger(n) && n > 0 ? n : null;
}

function clipColumns(text: string, width: number): string {
  const chars = Array.from(text);
  return chars.length <= width ? text : chars.slice(0, width).join("");
}

export function createNodeTerminal(opts: NodeTerminalOptions = {}): TerminalDriver {
  const input: TerminalInput = opts.input ?? process.stdin;
  const output: TerminalOutput = opts.output ?? process.stdout;

  function size(): ScreenSize {
    const cols = positiveInt(output.columns);
    const rows = positiveInt(output.rows);
    if (cols !== null && rows !== null) return { cols, rows };
    const fallback = terminalSize();
    return { cols: cols ?? fallback.columns, rows: rows ?? fallback.rows };
  }

  function enableRawMode(): boolean {
    if (input.isTTY !== true || typeof input.setRawMode !== "function") {
      throw new TermloopError(
        "TERMLOOP_RESOURCE_UNAVAILABLE",
        "input is not a TTY; raw mode is unavailable",
      );
    }
    const wasRaw = input.isRaw === true;
    try {
      input.setRawMode(true);
    } catch (e: unknown) {
      throw new TermloopError(
        "TERMLOOP_RESOURCE_UNAVAILABLE",
        `setRawMode failed: ${describeThrown(e)}`,
        { cause: e },
      );
    }
    return wasRaw;
  }

  return {
    acquireScreen({ keypad }: AcquireScreenOptions): ScreenHandle {
      if (live !== null) {
        throw new TermloopError("TERMLOOP_RESOURCE_UNAVAILABLE", "screen is already acquired");
      }
      const wasRaw = enableRawMode();

      const queue: KeyCode[] = [];
      const onData: DataListener = (chunk) => {
        for (const key of decodeKeys(chunk, keypad)) {
          if (queue.length >= KEY_QUEUE_LIMIT) break;
          queue.push(key);
        }
      };
      let pending = "";
      let released = false;

      function check(method: string): void {
        if (released) {
          throw new TermloopError("TERMLOOP_INVALID_STATE", `${method}: screen handle was released`);
        }
      }

      const handle: ScreenHandle = {
        readKey(): KeyCode | null {
          check("readKey");
          return queue.shift() ?? null;
        },

        drawText(row: number, col: number, text: string, style?: TextStyle): void {
          check("drawText");
          assertCell("drawText", row, col);
          const bounds = size();
          if (row >= bounds.rows || col >= bounds.cols) return;
          const attrs = sgr(style);
          const clipped = clipColumns(text, bounds.cols - col);
          pending += `${CSI}${String(row + 1)};${String(col + 1)}H${attrs}${clipped}`;
          if (attrs.length > 0) pending += SGR_RESET;
        },

        refresh(): void {
          check("refresh");
          if (pending.length === 0) return;
          const frame = pending;
          pending = "";
          output.write(frame);
        },

        size(): ScreenSize {
          check("size");
          return size();
        },
      };

      input.on("data", onData);
      input.resume();
      output.write(`${ALT_SCREEN_ON}${CURSOR_HIDE}${CLEAR}${keypad ? KEYPAD_ON : ""}`);

      live = {
        handle,
        release: () => {
          released = true;
          queue.length = 0;
          pending = "";
          try {
            input.off("data", onData);
            output.write(`${keypad ? KEYPAD_OFF : ""}${SGR_RESET}${CURSOR_SHOW}${ALT_SCREEN_OFF}`);
          } finally {
            input.setRawMode?.(wasRaw);
            input.pause();
          }
        },
      };
      return handle;
    },

    releaseScreen(handle: ScreenHandle): void {
      const current = live;
      if (current === null || current.handle !== handle) {
        throw new TermloopError(
          "TERMLOOP_INVALID_STATE",
          "releaseScreen: handle is not the live screen",
        );
      }
      live = null;
      current.release();
    },
  };
}
