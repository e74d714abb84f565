import type { ExitSignal, LogSink } from "@termloop/core";
import type { TransferListItem } from "node:worker_threads";

const WORKER_TASK = "termloop.workerTask";

export type WorkerTaskContext<D> = Readonly<{
  data: D;
  /** Shared with the controlling thread; poll it or use its wait(). */
  exitSignal: ExitSignal;
  /** Forwarded to the controlling thread's log sink. */
  log: LogSink;
  /** Delivered to the controlling thread's `onMessage`. */
  post: (message: unknown, transferList?: readonly TransferListItem[]) => void;
}>;

export type WorkerTask<D> = Readonly<{
  kind: typeof WORKER_TASK;
  run: (ctx: WorkerTaskContext<D>) => void | Promise<void>;
}>;

/**
 * Mark a module export as something `createWorker` can run.
 *
 * @example
 * ```ts
 * export default defineWorkerTask<{ limit: number }>(({ data, exitSignal }) => {
 *   for (let i = 0; i < data.limit && !exitSignal.isRequested(); i++) step(i);
 * });
 * ```
 */
export function defineWorkerTask<D>(run: WorkerTask<D>["run"]): WorkerTask<D> {
  return Object.freeze({ kind: WORKER_TASK, run });
}

export function isWorkerTask(v: unknown): v is WorkerTask<unknown> {
  return (
    typeof v === "object" &&
    v !== null &&
    "kind" in v &&
    v.kind === WORKER_TASK &&
    "run" in v &&
    typeof v.run === "function"
  );
}

/**
 * Read `name` from an imported module namespace.
 */
export function readExport(mod: unknown, name: string): unknown {
  if (typeof mod !== "object" || mod === null) return undefined;
  return Object.prototype.hasOwnProperty.call(mod, name) ? Reflect.get(mod, name) : undefined;
}
