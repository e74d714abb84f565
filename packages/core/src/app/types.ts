import type { AppConfig } from "../config.js";
import type { LogSink } from "../log.js";
import type { KeyCode, Screen, TerminalDriver } from "../terminal.js";
import type { AppState } from "./stateMachine.js";

/**
 * The part of an application a hook may drive.
 */
export type AppControl = Readonly<{
  requestExit: () => void;
  isExitRequested: () => boolean;
}>;

export type HookContext = Readonly<{
  screen: Screen;
  app: AppControl;
}>;

export type UpdateContext = HookContext &
  Readonly<{
    /** Key read for this tick, or null when no input was pending. */
    key: KeyCode | null;
    /** 0-based index of this onUpdate call. */
    tick: number;
  }>;

/**
 * Lifecycle hooks. Every hook is optional; an unset hook is a no-op.
 */
export type AppHooks = Readonly<{
  onEnter?: (ctx: HookContext) => void;
  onUpdate?: (ctx: UpdateContext) => void;
  onExit?: (ctx: HookContext) => void;
}>;

export type ApplicationOptions = AppConfig &
  Readonly<{
    hooks?: AppHooks;
    terminal: TerminalDriver;
    log?: LogSink;
  }>;

export interface Application extends AppControl {
  readonly state: AppState;
  /**
   * Acquire the screen and run onEnter. If onEnter throws, the screen is
   * released before the error propagates.
   */
  enter(): void;
  /**
   * Run one tick: read a key, call onUpdate, refresh. Returns false without
   * doing anything once an exit has been requested.
   */
  update(): boolean;
  /**
   * Run onExit and release the screen. Idempotent once Exited.
   */
  exit(): void;
  /**
   * enter(), paced update() calls until exit is requested, then exit().
   */
  run(): Promise<void>;
}
