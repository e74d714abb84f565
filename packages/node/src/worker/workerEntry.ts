/**
 * packages/node/src/worker/workerEntry.ts: worker thread entrypoint.
 *
 * Imports the task module named in workerData, validates the export and runs
 * it. A failing task is reported with a "failed" message; the controlling
 * thread turns that into TERMLOOP_WORKER_ERROR.
 */

import { type LogEvent, TermloopError, createExitSignal } from "@termloop/core";
import { type TransferListItem, parentPort, workerData } from "node:worker_threads";
import { type WorkerToMainMessage, parseWorkerEntryData, serializeError } from "./protocol.js";
import { isWorkerTask, readExport } from "./task.js";

if (parentPort === null) {
  throw new Error("workerEntry: parentPort is null (not running in worker_threads)");
}
const port = parentPort;

function send(msg: WorkerToMainMessage, transferList?: readonly TransferListItem[]): void {
  port.postMessage(msg, transferList);
}

async function main(): Promise<void> {
  try {
    const entry = parseWorkerEntryData(workerData);
    const mod: unknown = await import(entry.module);
    const task = readExport(mod, entry.exportName);
    if (!isWorkerTask(task)) {
      throw new TermloopError(
        "TERMLOOP_INVALID_ARGUMENT",
        `worker module ${entry.module} has no worker task export "${entry.exportName}"`,
      );
    }
    await task.run({
      data: entry.data,
      exitSignal: createExitSignal(entry.signal),
      log: (event: LogEvent) => send({ type: "log", event }),
      post: (message, transferList) => send({ type: "message", payload: message }, transferList),
    });
  } catch (e: unknown) {
    send({ type: "failed", error: serializeError(e) });
  }
}

await main();
