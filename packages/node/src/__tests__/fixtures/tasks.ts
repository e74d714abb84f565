import { defineWorkerTask } from "../../worker/task.js";

/** Posts "ready", then sleeps on the exit signal until it is raised. */
export default defineWorkerTask<{ label: string }>(({ data, exitSignal, log, post }) => {
  log({ level: "info", source: "fixture", message: `started ${data.label}` });
  post({ ready: data.label });
  while (!exitSignal.wait(20)) {
    // sleep until the controlling thread asks us to stop
  }
  post({ done: data.label });
});

/** Returns on its own without waiting for an exit request. */
export const finishesAlone = defineWorkerTask<number>(async ({ data, post }) => {
  await Promise.resolve();
  post(data * 2);
});

export const fails = defineWorkerTask<undefined>(() => {
  throw new TypeError("task failed");
});

export const rejects = defineWorkerTask<undefined>(async () => {
  await Promise.resolve();
  throw new Error("task rejected");
});

export const notATask = () => {};
