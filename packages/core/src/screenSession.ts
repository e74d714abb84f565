/**
 * Scoped ownership of the terminal screen.
 *
 * Invariants:
 *   - enter() acquires at most once per session
 *   - exit() releases exactly once, whatever happened in between
 *   - passthrough calls outside an active session throw TERMLOOP_INVALID_STATE
 */

import { TermloopError, describeThrown } from "./errors.js";
import type { LogSink } from "./log.js";
import { makeLogSink } from "./log.js";
import type {
  KeyCode,
  Screen,
  ScreenHandle,
  ScreenSize,
  TerminalDriver,
  TextStyle,
} from "./terminal.js";

export type ScreenSessionOptions = Readonly<{
  keypad?: boolean;
  log?: LogSink;
}>;

export type ScreenSessionState = "Idle" | "Active" | "Released";

export type ScreenSession = Screen &
  Readonly<{
    enter: () => void;
    exit: () => void;
    isActive: () => boolean;
    state: () => ScreenSessionState;
  }>;

export function createScreenSession(
  driver: TerminalDriver,
  opts: ScreenSessionOptions = {},
): ScreenSession {
  const keypad = opts.keypad === true;
  const log = makeLogSink(opts.log);
  let state: ScreenSessionState = "Idle";
  let handle: ScreenHandle | null = null;

  function active(method: string): ScreenHandle {
    if (state !== "Active" || handle === null) {
      throw new TermloopError("TERMLOOP_INVALID_STATE", `${method}: screen session is ${state}`);
    }
    return handle;
  }

  return {
    enter(): void {
      if (state !== "Idle") {
        throw new TermloopError(
          "TERMLOOP_INVALID_STATE",
          `enter: screen session is ${state}, sessions are single-use`,
        );
      }
      try {
        handle = driver.acquireScreen({ keypad });
      } catch (e: unknown) {
        if (e instanceof TermloopError) throw e;
        throw new TermloopError(
          "TERMLOOP_RESOURCE_UNAVAILABLE",
          `acquireScreen failed: ${describeThrown(e)}`,
          { cause: e },
        );
      }
      state = "Active";
      log({
        level: "debug",
        source: "screen",
        message: "screen acquired",
        detail: `keypad=${String(keypad)}`,
      });
    },

    exit(): void {
      if (state !== "Active" || handle === null) return;
      const h = handle;
      handle = null;
      state = "Released";
      driver.releaseScreen(h);
      log({ level: "debug", source: "screen", message: "screen released" });
    },

    isActive(): boolean {
      return state === "Active";
    },

    state(): ScreenSessionState {
      return state;
    },

    readKey(): KeyCode | null {
      return active("readKey").readKey();
    },

    drawText(row: number, col: number, text: string, style?: TextStyle): void {
      active("drawText").drawText(row, col, text, style);
    },

    refresh(): void {
      active("refresh").refresh();
    },

    size(): ScreenSize {
      return active("size").size();
    },
  };
}

/**
 * Run `body` with the screen held. The screen is released on every exit path,
 * including a throwing or rejecting body.
 */
export async function withScreenSession<T>(
  driver: TerminalDriver,
  opts: ScreenSessionOptions,
  body: (screen: Screen) => T | Promise<T>,
): Promise<T> {
  const session = createScreenSession(driver, opts);
  session.enter();
  try {
    return await body(session);
  } finally {
    session.exit();
  }
}
