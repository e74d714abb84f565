import type {
  AppConfig,
  AppControl,
  AppHooks,
  AppState,
  HookContext,
  LogSink,
  TerminalDriver,
} from "@termloop/core";

const THREADED_APP = "termloop.threadedApp";

/**
 * Hooks for an application whose update loop runs on a worker thread. Every
 * hook, onMessage included, runs on that thread and never concurrently with
 * another hook.
 */
export type ThreadedAppHooks = AppHooks &
  Readonly<{
    /** A value passed to `send()`, delivered before the next onUpdate. */
    onMessage?: (message: unknown, ctx: HookContext) => void;
  }>;

export type ThreadedAppDefinition<D> = Readonly<{
  kind: typeof THREADED_APP;
  setup: (data: D) => ThreadedAppHooks;
}>;

/**
 * Mark a module export as a threaded application. `setup` runs on the worker
 * thread once per run; keep hook state in its closure.
 *
 * @example
 * ```ts
 * export default defineThreadedApp<{ title: string }>(({ title }) => {
 *   let frames = 0;
 *   return {
 *     onEnter: ({ screen }) => screen.drawText(0, 0, title),
 *     onUpdate: ({ key, app }) => {
 *       frames++;
 *       if (key === KEY_ESC) app.requestExit();
 *     },
 *   };
 * });
 * ```
 */
export function defineThreadedApp<D>(
  setup: ThreadedAppDefinition<D>["setup"],
): ThreadedAppDefinition<D> {
  return Object.freeze({ kind: THREADED_APP, setup });
}

export function isThreadedAppDefinition(v: unknown): v is ThreadedAppDefinition<unknown> {
  return (
    typeof v === "object" &&
    v !== null &&
    "kind" in v &&
    v.kind === THREADED_APP &&
    "setup" in v &&
    typeof v.setup === "function"
  );
}

export type ThreadedApplicationOptions<D> = AppConfig &
  Readonly<{
    /** Module exporting a `defineThreadedApp` value (file URL or href). */
    module: string | URL;
    /** Default: "default". */
    exportName?: string;
    /** Passed to `setup` on the worker thread; must be structured-cloneable. */
    data?: D;
    /** Default: the process terminal. */
    terminal?: TerminalDriver;
    /** Default: the TERMLOOP_LOG file sink, when configured. */
    log?: LogSink;
    /** Keys buffered between the controlling thread and the worker (power of two). */
    keyRingCapacity?: number;
  }>;

export interface ThreadedApplication extends AppControl {
  readonly state: AppState;
  /**
   * Take the screen, start the worker and resolve once onEnter has completed
   * there. On failure everything is torn down before the promise rejects.
   */
  enter(): Promise<void>;
  /** Structured-clone `message` to the worker's onMessage hook. */
  send(message: unknown): void;
  isRunning(): boolean;
  /** Resolves once the worker thread has ended, for whatever reason. */
  whenStopped(): Promise<void>;
  /**
   * Request exit, wait for onExit to finish on the worker, release the
   * screen. Rejects with the worker's failure, if any. Idempotent once Exited.
   */
  exit(): Promise<void>;
  /**
   * enter(), then `body` (default: wait until the worker stops), then exit().
   */
  run(body?: (app: ThreadedApplication) => void | Promise<void>): Promise<void>;
}
