/**
 * Threaded application: hooks run on a worker thread, the screen stays here.
 *
 * Controlling thread                      Worker thread
 *   screen session (real ScreenHandle)     onEnter, paced onUpdate, onExit
 *   key pump: handle -> shared key ring    readKey(): pop key ring
 *   replay "frame" messages on handle  <-  refresh(): post buffered draws
 *   send(msg) -> MessageChannel port   ->  onMessage between ticks
 *
 * Teardown order on exit(): exit signal, worker joined (onExit done), key pump
 * stopped, screen released.
 *
 * @see docs/guide/worker-model.md
 */

import {
  APP_TRANSITIONS,
  type AppState,
  type Failure,
  LifecycleStateMachine,
  type ScreenSession,
  TermloopError,
  createScreenSession,
  describeThrown,
  makeLogSink,
  resolveAppConfig,
  runTeardown,
  safeErr,
} from "@termloop/core";
import { MessageChannel } from "node:worker_threads";
import { logSinkFromEnv } from "../log/fileLogSink.js";
import { createNodeTerminal } from "../terminal/nodeTerminal.js";
import { deferred } from "../worker/deferred.js";
import { createKeyRing } from "../worker/keyRing.js";
import {
  type AppWorkerData,
  type AppWorkerMessage,
  parseAppWorkerMessage,
} from "../worker/protocol.js";
import { createSharedSize } from "../worker/sharedSize.js";
import { computeKeyPumpInterval } from "../worker/tickTiming.js";
import { createWorker, siblingModuleUrl } from "../worker/worker.js";
import type { ThreadedApplication, ThreadedApplicationOptions } from "./types.js";

const SOURCE = "threaded-application";

export function createThreadedApplication<D>(
  opts: ThreadedApplicationOptions<D>,
): ThreadedApplication {
  const config = resolveAppConfig(opts);
  const log = makeLogSink(opts.log ?? logSinkFromEnv());
  const terminal = opts.terminal ?? createNodeTerminal();
  const sm = new LifecycleStateMachine<AppState>("Created", APP_TRANSITIONS, (from, to) => {
    log({ level: "debug", source: SOURCE, message: `${from} -> ${to}` });
  });

  const keys = createKeyRing(opts.keyRingCapacity);
  const sharedSize = createSharedSize({ cols: 0, rows: 0 });
  const channel = new MessageChannel();
  const workerData: AppWorkerData = {
    module: typeof opts.module === "string" ? opts.module : opts.module.href,
    exportName: opts.exportName ?? "default",
    data: opts.data,
    frameDurationMs: config.frameDurationMs,
    stopOnError: config.stopOnError,
    keys: keys.buffer,
    size: sharedSize.buffer,
    port: channel.port2,
  };

  const entered = deferred<void>();
  let hasEntered = false;
  let session: ScreenSession | null = null;
  let pump: ReturnType<typeof setInterval> | null = null;
  let pumpFailure: Error | null = null;
  let finishing: Promise<void> | null = null;

  function replay(msg: AppWorkerMessage): void {
    if (msg.type === "entered") {
      hasEntered = true;
      entered.resolve();
      return;
    }
    const s = session;
    if (s === null || !s.isActive()) {
      throw new TermloopError("TERMLOOP_INVALID_STATE", "frame received without an active screen");
    }
    for (const op of msg.ops) {
      s.drawText(op.row, op.col, op.text, { bold: op.bold, underline: op.underline });
    }
    s.refresh();
    if (msg.phase === "update" && sm.is("Entered")) sm.to("Running");
  }

  const worker = createWorker({
    module: siblingModuleUrl("appWorker"),
    data: workerData,
    transferList: [channel.port2],
    log,
    onMessage: (payload) => replay(parseAppWorkerMessage(payload)),
  });

  function pumpKeys(s: ScreenSession): void {
    for (;;) {
      const key = s.readKey();
      if (key === null) break;
      if (!keys.push(key)) {
        log({
          level: "warn",
          source: SOURCE,
          message: "key ring full; key dropped",
          detail: `dropped=${String(keys.dropped())}`,
        });
      }
    }
    sharedSize.set(s.size());
  }

  function startPump(s: ScreenSession): void {
    pump = setInterval(() => {
      try {
        pumpKeys(s);
      } catch (e: unknown) {
        stopPump();
        pumpFailure = safeErr(e);
        log({
          level: "error",
          source: SOURCE,
          message: "key pump failed",
          detail: describeThrown(e),
        });
        worker.requestExit();
      }
    }, computeKeyPumpInterval(config.frameDurationMs));
    // Input listeners and the worker keep the process alive, not the pump.
    pump.unref();
  }

  function stopPump(): void {
    if (pump === null) return;
    clearInterval(pump);
    pump = null;
  }

  async function shutdown(pending: Failure | null): Promise<void> {
    worker.requestExit();
    let failure = pending;
    if (worker.state !== "NotStarted") {
      try {
        await worker.exit();
      } catch (e: unknown) {
        if (failure === null) {
          failure = { error: e };
        } else {
          log({
            level: "error",
            source: SOURCE,
            message: "worker failed during teardown",
            detail: describeThrown(e),
          });
        }
      }
    }
    if (failure === null && pumpFailure !== null) failure = { error: pumpFailure };
    runTeardown(
      [
        { name: "key pump", run: stopPump },
        { name: "screen release", run: () => session?.exit() },
        {
          name: "state",
          run: () => {
            session = null;
            channel.port1.close();
            sm.to("Exited");
          },
        },
      ],
      log,
      SOURCE,
      failure,
    );
  }

  function finish(pending: Failure | null): Promise<void> {
    if (finishing === null) finishing = shutdown(pending);
    return finishing;
  }

  const app: ThreadedApplication = {
    get state(): AppState {
      return sm.state;
    },

    requestExit(): void {
      worker.requestExit();
    },

    isExitRequested(): boolean {
      return worker.isExitRequested();
    },

    isRunning(): boolean {
      return !sm.is("Created", "Exited") && worker.isRunning();
    },

    whenStopped(): Promise<void> {
      return worker.whenStopped();
    },

    async enter(): Promise<void> {
      sm.assertOneOf(["Created"], "enter: must be Created");

      // Acquisition and size errors propagate before the worker exists; the
      // app stays Created.
      const s = createScreenSession(terminal, { keypad: config.keypad, log });
      s.enter();
      try {
        sharedSize.set(s.size());
      } catch (e: unknown) {
        runTeardown([{ name: "screen release", run: () => s.exit() }], log, SOURCE, { error: e });
      }
      session = s;
      sm.to("Entered");
      startPump(s);

      let startup: Failure | null = null;
      try {
        await worker.enter();
        await Promise.race([entered.promise, worker.whenStopped()]);
      } catch (e: unknown) {
        startup = { error: e };
      }
      if (startup === null && hasEntered) return;

      await finish(startup);
      // finish() resolved: exit() won the race, or the worker returned without entering.
      throw new TermloopError(
        "TERMLOOP_WORKER_ERROR",
        "worker stopped before the application entered",
      );
    },

    send(message: unknown): void {
      sm.assertOneOf(["Entered", "Running"], "send: must be Entered or Running");
      channel.port1.postMessage(message);
    },

    async exit(): Promise<void> {
      if (sm.state === "Exited") return;
      if (finishing === null) {
        sm.assertOneOf(["Entered", "Running"], "exit: must be Entered or Running");
      }
      await finish(null);
    },

    async run(body?: (app: ThreadedApplication) => void | Promise<void>): Promise<void> {
      await app.enter();
      try {
        await (body === undefined ? app.whenStopped() : body(app));
      } catch (e: unknown) {
        try {
          await finish({ error: e });
        } catch (teardownErr: unknown) {
          if (teardownErr !== e) {
            log({
              level: "error",
              source: SOURCE,
              message: "exit failed after body error",
              detail: describeThrown(teardownErr),
            });
          }
        }
        throw e;
      }
      await app.exit();
    },
  };

  return app;
}
