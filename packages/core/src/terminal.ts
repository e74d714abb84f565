/**
 * Terminal collaborator contract.
 *
 * A TerminalDriver owns the process-wide screen resource. termloop only ever
 * talks to it through these methods; drawing and key decoding are the
 * driver's business.
 */

import { TermloopError } from "./errors.js";

export type KeyCode = number;

/** Escape key, by convention. The lifecycle code never interprets key values. */
export const KEY_ESC: KeyCode = 27;

export type TextStyle = Readonly<{
  bold?: boolean;
  underline?: boolean;
}>;

export type ScreenSize = Readonly<{ cols: number; rows: number }>;

export type AcquireScreenOptions = Readonly<{
  /** Enable extended key decoding. */
  keypad: boolean;
}>;

/**
 * Exclusive capability over the screen for one session.
 */
export interface ScreenHandle {
  /** Next pending key, or null. Never blocks. */
  readKey(): KeyCode | null;
  drawText(row: number, col: number, text: string, style?: TextStyle): void;
  refresh(): void;
  size(): ScreenSize;
}

export interface TerminalDriver {
  /**
   * Take the screen: raw input, hidden cursor, non-blocking key reads.
   * Throws TERMLOOP_RESOURCE_UNAVAILABLE when a handle is already live or the
   * terminal cannot be put into the required mode.
   */
  acquireScreen(opts: AcquireScreenOptions): ScreenHandle;
  /** Restore the terminal and free the process-wide slot. */
  releaseScreen(handle: ScreenHandle): void;
}

/**
 * What lifecycle hooks see of the screen.
 */
export type Screen = Readonly<{
  readKey: () => KeyCode | null;
  drawText: (row: number, col: number, text: string, style?: TextStyle) => void;
  refresh: () => void;
  size: () => ScreenSize;
}>;

export function assertCell(method: string, row: number, col: number): void {
  if (!Number.isInteger(row) || row < 0) {
    throw new TermloopError(
      "TERMLOOP_INVALID_ARGUMENT",
      `${method}: row must be a non-negative integer (got ${String(row)})`,
    );
  }
  if (!Number.isInteger(col) || col < 0) {
    throw new TermloopError(
      "TERMLOOP_INVALID_ARGUMENT",
      `${method}: col must be a non-negative integer (got ${String(col)})`,
    );
  }
}
