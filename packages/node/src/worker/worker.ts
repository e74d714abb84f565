/**
 * Generic background worker: runs a `defineWorkerTask` export on a
 * worker_threads thread that shares an ExitSignal with the caller.
 *
 * Cancellation is cooperative only. exit() raises the signal and waits for the
 * task to return; the thread is never terminated from outside.
 *
 * @see docs/guide/worker-model.md
 */

import {
  type ExitSignal,
  LifecycleStateMachine,
  type LogSink,
  TermloopError,
  WORKER_TRANSITIONS,
  type WorkerState,
  createExitSignal,
  describeThrown,
  makeLogSink,
  safeErr,
} from "@termloop/core";
import { type TransferListItem, Worker as ThreadWorker } from "node:worker_threads";
import { deferred } from "./deferred.js";
import { type WorkerEntryData, deserializeError, parseWorkerMessage } from "./protocol.js";

const SOURCE = "worker";

export type WorkerOptions<D> = Readonly<{
  /** Module exporting a `defineWorkerTask` value (file URL or href). */
  module: string | URL;
  /** Default: "default". */
  exportName?: string;
  data?: D;
  /** Objects moved (not copied) to the worker along with `data`. */
  transferList?: readonly TransferListItem[];
  log?: LogSink;
  /** Receives what the task passes to `ctx.post`. */
  onMessage?: (message: unknown) => void;
}>;

export interface Worker {
  readonly state: WorkerState;
  /** Start the thread; resolves once it is online. */
  enter(): Promise<void>;
  requestExit(): void;
  isExitRequested(): boolean;
  isRunning(): boolean;
  /**
   * Raise the exit signal and wait for the task to return. Rejects with
   * TERMLOOP_WORKER_ERROR if the task failed; later calls resolve.
   */
  exit(): Promise<void>;
  /** Resolves (never rejects) once the thread has ended. */
  whenStopped(): Promise<void>;
}

/**
 * Worker entry next to this file. Under a TypeScript loader this module is a
 * .ts file, and so is its sibling.
 */
export function siblingModuleUrl(name: string, base: string = import.meta.url): URL {
  const ext = base.endsWith(".ts") ? ".ts" : ".js";
  return new URL(`./${name}${ext}`, base);
}

export type ThreadEntry = Readonly<{ filename: string | URL; eval: boolean }>;

/**
 * How to start `entry` on a worker thread. Loader hooks registered with
 * `--import tsx` stay on the main thread under Node 20, so a .ts entry is
 * started through a bootstrap that registers tsx inside the thread first.
 */
export function threadEntry(entry: URL): ThreadEntry {
  if (!entry.pathname.endsWith(".ts")) return { filename: entry, eval: false };
  const href = JSON.stringify(entry.href);
  return {
    filename: `import("tsx/esm/api").then(({ register }) => { register(); return import(${href}); });`,
    eval: true,
  };
}

export function createWorker<D>(opts: WorkerOptions<D>): Worker {
  const log = makeLogSink(opts.log);
  const signal: ExitSignal = createExitSignal();
  const sm = new LifecycleStateMachine<WorkerState>("NotStarted", WORKER_TRANSITIONS, (from, to) => {
    log({ level: "debug", source: SOURCE, message: `${from} -> ${to}` });
  });
  const stopped = deferred<void>();
  const moduleHref = typeof opts.module === "string" ? opts.module : opts.module.href;

  let thread: ThreadWorker | null = null;
  let failure: Error | null = null;
  let failureReported = false;
  let stopping: Promise<void> | null = null;

  function fail(err: Error): void {
    if (failure === null) {
      failure = err;
      log({ level: "error", source: SOURCE, message: "worker failed", detail: describeThrown(err) });
      return;
    }
    log({
      level: "error",
      source: SOURCE,
      message: "additional worker failure",
      detail: describeThrown(err),
    });
  }

  function handleMessage(m: unknown): void {
    let msg: ReturnType<typeof parseWorkerMessage>;
    try {
      msg = parseWorkerMessage(m);
    } catch (e: unknown) {
      fail(safeErr(e));
      signal.request();
      return;
    }
    switch (msg.type) {
      case "log":
        log(msg.event);
        return;
      case "message":
        try {
          opts.onMessage?.(msg.payload);
        } catch (e: unknown) {
          fail(
            new TermloopError("TERMLOOP_WORKER_ERROR", `onMessage threw: ${describeThrown(e)}`, {
              cause: e,
            }),
          );
          signal.request();
        }
        return;
      case "failed": {
        const cause = deserializeError(msg.error);
        fail(
          new TermloopError("TERMLOOP_WORKER_ERROR", `worker task failed: ${describeThrown(cause)}`, {
            cause,
          }),
        );
        return;
      }
    }
  }

  function handleExit(code: number): void {
    if (code !== 0 && failure === null) {
      fail(new TermloopError("TERMLOOP_WORKER_ERROR", `worker exited with code ${String(code)}`));
    }
    thread = null;
    sm.to("Stopped");
    log({ level: "info", source: SOURCE, message: "worker stopped", detail: `code=${String(code)}` });
    stopped.resolve();
  }

  const worker: Worker = {
    get state(): WorkerState {
      return sm.state;
    },

    async enter(): Promise<void> {
      sm.assertOneOf(["NotStarted"], "enter: must be NotStarted");

      const workerData: WorkerEntryData = {
        module: moduleHref,
        exportName: opts.exportName ?? "default",
        data: opts.data,
        signal: signal.buffer,
      };
      const online = deferred<void>();
      const entry = threadEntry(siblingModuleUrl("workerEntry"));
      const t = new ThreadWorker(entry.filename, {
        eval: entry.eval,
        workerData,
        ...(opts.transferList === undefined ? {} : { transferList: [...opts.transferList] }),
      });
      thread = t;
      sm.to("Running");
      t.on("online", () => online.resolve());
      t.on("message", handleMessage);
      t.on("error", (err: unknown) => {
        fail(
          new TermloopError("TERMLOOP_WORKER_ERROR", `worker thread error: ${describeThrown(err)}`, {
            cause: err,
          }),
        );
      });
      t.on("exit", handleExit);

      await Promise.race([online.promise, stopped.promise]);
      if (failure !== null && sm.state === "Stopped") {
        failureReported = true;
        throw failure;
      }
      log({ level: "info", source: SOURCE, message: "worker started", detail: moduleHref });
    },

    requestExit(): void {
      signal.request();
    },

    isExitRequested(): boolean {
      return signal.isRequested();
    },

    isRunning(): boolean {
      return thread !== null && sm.is("Running", "Stopping");
    },

    async exit(): Promise<void> {
      if (sm.state === "NotStarted") {
        throw new TermloopError("TERMLOOP_INVALID_STATE", "exit: worker was never started");
      }
      if (stopping === null) {
        if (sm.state === "Running") sm.to("Stopping");
        signal.request();
        stopping = stopped.promise;
      }
      await stopping;
      if (failure !== null && !failureReported) {
        failureReported = true;
        throw failure;
      }
    },

    whenStopped(): Promise<void> {
      return stopped.promise;
    },
  };

  return worker;
}

/**
 * Run `body` while the worker runs; exit() always follows. If both `body` and
 * exit() fail, the body's error wins and the exit error goes to `log`.
 */
export async function withWorker<T>(
  worker: Worker,
  body: (worker: Worker) => T | Promise<T>,
  log?: LogSink,
): Promise<T> {
  await worker.enter();
  let result: T;
  try {
    result = await body(worker);
  } catch (e: unknown) {
    try {
      await worker.exit();
    } catch (exitErr: unknown) {
      makeLogSink(log)({
        level: "error",
        source: SOURCE,
        message: "exit failed after body error",
        detail: describeThrown(exitErr),
      });
    }
    throw e;
  }
  await worker.exit();
  return result;
}
