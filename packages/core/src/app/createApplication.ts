/**
 * Single-threaded application lifecycle.
 *
 * Responsibilities:
 *   - Screen acquisition before onEnter, release after onExit
 *   - One tick per update(): read key, onUpdate, refresh
 *   - Exit signalling and the optional paced driver (run())
 *
 * Invariants:
 *   - onEnter completes before the first onUpdate
 *   - onExit runs at most once, and the screen is released exactly once
 *   - update() outside Entered/Running throws TERMLOOP_INVALID_STATE
 *   - lifecycle calls from inside a hook throw TERMLOOP_INVALID_STATE
 *
 * @see docs/guide/lifecycle.md
 */

import { resolveAppConfig } from "../config.js";
import { TermloopError, describeThrown } from "../errors.js";
import { createExitSignal } from "../exitSignal.js";
import { makeLogSink } from "../log.js";
import { runPacedLoopAsync } from "../pacedLoop.js";
import { type ScreenSession, createScreenSession } from "../screenSession.js";
import type { Screen, TextStyle } from "../terminal.js";
import { APP_TRANSITIONS, type AppState, LifecycleStateMachine } from "./stateMachine.js";
import { type Failure, runTeardown } from "./teardown.js";
import type { AppControl, Application, ApplicationOptions } from "./types.js";

const SOURCE = "application";

/**
 * Hooks get a plain Screen view, never the session itself.
 */
export function screenView(screen: Screen): Screen {
  return Object.freeze({
    readKey: () => screen.readKey(),
    drawText: (row: number, col: number, text: string, style?: TextStyle) =>
      screen.drawText(row, col, text, style),
    refresh: () => screen.refresh(),
    size: () => screen.size(),
  });
}

export function createApplication(opts: ApplicationOptions): Application {
  const config = resolveAppConfig(opts);
  const hooks = opts.hooks ?? {};
  const log = makeLogSink(opts.log);
  const signal = createExitSignal();
  const sm = new LifecycleStateMachine<AppState>("Created", APP_TRANSITIONS, (from, to) => {
    log({ level: "debug", source: SOURCE, message: `${from} -> ${to}` });
  });

  let session: ScreenSession | null = null;
  let screen: Screen | null = null;
  let tick = 0;
  let inHook: string | null = null;

  const control: AppControl = Object.freeze({
    requestExit: () => signal.request(),
    isExitRequested: () => signal.isRequested(),
  });

  function assertNotReentrant(method: string): void {
    if (inHook !== null) {
      throw new TermloopError("TERMLOOP_INVALID_STATE", `${method}: re-entrant call from ${inHook}`);
    }
  }

  function inside<T>(hook: string, fn: () => T): T {
    inHook = hook;
    try {
      return fn();
    } finally {
      inHook = null;
    }
  }

  function activeSession(method: string): Readonly<{ session: ScreenSession; screen: Screen }> {
    if (session === null || screen === null) {
      throw new TermloopError("TERMLOOP_INVALID_STATE", `${method}: no active screen session`);
    }
    return { session, screen };
  }

  function teardown(failure: Failure | null): void {
    signal.request();
    const active = activeSession("exit");
    runTeardown(
      [
        {
          name: "onExit",
          run: () => {
            inside("onExit", () => hooks.onExit?.({ screen: active.screen, app: control }));
            active.session.refresh();
          },
        },
        { name: "screen release", run: () => active.session.exit() },
        {
          name: "state",
          run: () => {
            session = null;
            screen = null;
            sm.to("Exited");
          },
        },
      ],
      log,
      SOURCE,
      failure,
    );
  }

  const app: Application = {
    get state(): AppState {
      return sm.state;
    },

    requestExit: control.requestExit,
    isExitRequested: control.isExitRequested,

    enter(): void {
      assertNotReentrant("enter");
      sm.assertOneOf(["Created"], "enter: must be Created");

      // Acquisition errors propagate before any hook runs; the app stays
      // Created so the caller may retry.
      const s = createScreenSession(opts.terminal, { keypad: config.keypad, log: opts.log });
      s.enter();
      const view = screenView(s);
      session = s;
      screen = view;
      sm.to("Entered");

      try {
        inside("onEnter", () => hooks.onEnter?.({ screen: view, app: control }));
        s.refresh();
      } catch (e: unknown) {
        log({ level: "error", source: SOURCE, message: "onEnter threw", detail: describeThrown(e) });
        signal.request();
        runTeardown(
          [
            { name: "screen release", run: () => s.exit() },
            {
              name: "state",
              run: () => {
                session = null;
                screen = null;
                sm.to("Exited");
              },
            },
          ],
          log,
          SOURCE,
          { error: e },
        );
      }
    },

    update(): boolean {
      assertNotReentrant("update");
      sm.assertOneOf(["Entered", "Running"], "update: must be Entered or Running");
      if (signal.isRequested()) return false;

      const active = activeSession("update");
      const key = active.session.readKey();
      const current = tick++;
      try {
        inside("onUpdate", () =>
          hooks.onUpdate?.({ screen: active.screen, app: control, key, tick: current }),
        );
      } catch (e: unknown) {
        log({ level: "error", source: SOURCE, message: "onUpdate threw", detail: describeThrown(e) });
        if (config.stopOnError) signal.request();
        throw e;
      }
      active.session.refresh();
      sm.to("Running");
      return true;
    },

    exit(): void {
      assertNotReentrant("exit");
      if (sm.state === "Exited") return;
      sm.assertOneOf(["Entered", "Running"], "exit: must be Entered or Running");
      teardown(null);
    },

    async run(): Promise<void> {
      app.enter();
      let failure: Failure | null = null;
      try {
        await runPacedLoopAsync({
          frameDurationMs: config.frameDurationMs,
          signal,
          tick: () => {
            app.update();
          },
        });
      } catch (e: unknown) {
        failure = { error: e };
      }
      // exit() may have run while the loop was sleeping between ticks.
      if (sm.state === "Exited") {
        if (failure !== null) throw failure.error;
        return;
      }
      teardown(failure);
    },
  };

  return app;
}
