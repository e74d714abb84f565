/**
 * packages/node/src/worker/appWorker.ts: worker side of a threaded application.
 *
 * Runs the user's hooks on this thread:
 *   onEnter -> flush -> "entered" -> paced onUpdate loop -> onExit -> flush
 *
 * The screen seen by hooks here is a proxy. Keys come from the shared key ring,
 * draws are buffered and each refresh() posts them as one "frame" message for
 * the controlling thread to replay on the real screen.
 */

import {
  type AppControl,
  type Failure,
  type HookContext,
  type KeyCode,
  type Screen,
  type ScreenSize,
  TermloopError,
  type TextStyle,
  assertCell,
  describeThrown,
  runPacedLoop,
  runTeardown,
  screenView,
} from "@termloop/core";
import { type MessagePort, receiveMessageOnPort } from "node:worker_threads";
import { type ThreadedAppHooks, isThreadedAppDefinition } from "../app/types.js";
import { type KeyRing, attachKeyRing } from "./keyRing.js";
import {
  type AppWorkerData,
  type AppWorkerMessage,
  type DrawOp,
  type FramePhase,
  parseAppWorkerData,
} from "./protocol.js";
import { attachSharedSize } from "./sharedSize.js";
import { type WorkerTaskContext, defineWorkerTask, readExport } from "./task.js";

const SOURCE = "worker";

type ProxyScreen = Screen &
  Readonly<{
    setPhase: (phase: FramePhase) => void;
  }>;

function createProxyScreen(
  keys: KeyRing,
  size: () => ScreenSize,
  post: (msg: AppWorkerMessage) => void,
): ProxyScreen {
  let pending: DrawOp[] = [];
  let phase: FramePhase = "enter";

  return Object.freeze({
    setPhase(next: FramePhase): void {
      phase = next;
    },

    readKey(): KeyCode | null {
      return keys.pop();
    },

    drawText(row: number, col: number, text: string, style?: TextStyle): void {
      assertCell("drawText", row, col);
      pending.push({
        row,
        col,
        text,
        bold: style?.bold === true,
        underline: style?.underline === true,
      });
    },

    refresh(): void {
      const ops = pending;
      pending = [];
      post({ type: "frame", phase, ops });
    },

    size,
  });
}

function loadDefinition(mod: unknown, data: AppWorkerData): ThreadedAppHooks {
  const def = readExport(mod, data.exportName);
  if (!isThreadedAppDefinition(def)) {
    throw new TermloopError(
      "TERMLOOP_INVALID_ARGUMENT",
      `module ${data.module} has no threaded application export "${data.exportName}"`,
    );
  }
  return def.setup(data.data);
}

function runHooks(
  hooks: ThreadedAppHooks,
  data: AppWorkerData,
  ctx: WorkerTaskContext<unknown>,
): void {
  const signal = ctx.exitSignal;
  const control: AppControl = Object.freeze({
    requestExit: () => signal.request(),
    isExitRequested: () => signal.isRequested(),
  });
  const sharedSize = attachSharedSize(data.size);
  const screen = createProxyScreen(attachKeyRing(data.keys), sharedSize.get, (msg) =>
    ctx.post(msg),
  );
  const hookCtx: HookContext = Object.freeze({ screen: screenView(screen), app: control });

  function guarded(hook: string, fn: () => void): void {
    try {
      fn();
    } catch (e: unknown) {
      ctx.log({
        level: "error",
        source: SOURCE,
        message: `${hook} threw`,
        detail: describeThrown(e),
      });
      if (data.stopOnError) signal.request();
      throw e;
    }
  }

  function drainMessages(port: MessagePort): void {
    for (;;) {
      const received = receiveMessageOnPort(port);
      if (received === undefined) return;
      const message: unknown = received.message;
      guarded("onMessage", () => hooks.onMessage?.(message, hookCtx));
    }
  }

  // A throwing onEnter ends the run here; onExit only follows a completed onEnter.
  hooks.onEnter?.(hookCtx);
  screen.refresh();
  ctx.post({ type: "entered" } satisfies AppWorkerMessage);

  screen.setPhase("update");
  let tick = 0;
  let failure: Failure | null = null;
  try {
    const stats = runPacedLoop({
      frameDurationMs: data.frameDurationMs,
      signal,
      tick: () => {
        drainMessages(data.port);
        if (signal.isRequested()) return;
        const key = screen.readKey();
        const current = tick++;
        guarded("onUpdate", () => hooks.onUpdate?.({ ...hookCtx, key, tick: current }));
        screen.refresh();
      },
    });
    ctx.log({
      level: "debug",
      source: SOURCE,
      message: "update loop ended",
      detail: `ticks=${String(stats.ticks)} overruns=${String(stats.overruns)}`,
    });
  } catch (e: unknown) {
    failure = { error: e };
  }

  screen.setPhase("exit");
  runTeardown(
    [
      {
        name: "onExit",
        run: () => {
          hooks.onExit?.(hookCtx);
          screen.refresh();
        },
      },
    ],
    ctx.log,
    SOURCE,
    failure,
  );
}

async function runThreadedApp(ctx: WorkerTaskContext<unknown>): Promise<void> {
  const data = parseAppWorkerData(ctx.data);
  try {
    const mod: unknown = await import(data.module);
    runHooks(loadDefinition(mod, data), data, ctx);
  } finally {
    data.port.close();
  }
}

export default defineWorkerTask<unknown>(runThreadedApp);
