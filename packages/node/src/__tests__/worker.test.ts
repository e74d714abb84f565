import { type LogEvent, TermloopError } from "@termloop/core";
import { assert, describe, test, waitFor } from "@termloop/testkit";
import { createWorker, threadEntry, withWorker } from "../worker/worker.js";
import { fixtureUrl } from "./fixtures/index.js";

const TASKS = fixtureUrl("tasks");

function isWorkerError(
  err: unknown,
  check: (cause: unknown) => boolean,
): err is TermloopError {
  return err instanceof TermloopError && err.code === "TERMLOOP_WORKER_ERROR" && check(err.cause);
}

describe("createWorker", () => {
  test("runs the task until exit is requested, then joins it", async () => {
    const messages: unknown[] = [];
    const events: LogEvent[] = [];
    const worker = createWorker({
      module: TASKS,
      data: { label: "w1" },
      log: (ev) => events.push(ev),
      onMessage: (m) => messages.push(m),
    });
    assert.equal(worker.state, "NotStarted");
    assert.equal(worker.isRunning(), false);

    await worker.enter();
    assert.equal(worker.state, "Running");
    assert.equal(worker.isRunning(), true);
    await waitFor(() => messages.length >= 1);
    assert.equal(worker.isExitRequested(), false);

    await worker.exit();
    assert.equal(worker.state, "Stopped");
    assert.equal(worker.isRunning(), false);
    assert.equal(worker.isExitRequested(), true);
    assert.deepEqual(messages, [{ ready: "w1" }, { done: "w1" }]);
    assert.deepEqual(
      events.filter((e) => e.source === "fixture"),
      [{ level: "info", source: "fixture", message: "started w1" }],
    );
    assert.deepEqual(
      events.filter((e) => e.level === "debug").map((e) => e.message),
      ["NotStarted -> Running", "Running -> Stopping", "Stopping -> Stopped"],
    );

    await worker.exit();
    assert.equal(worker.state, "Stopped");
  });

  test("a task may finish on its own", async () => {
    const messages: unknown[] = [];
    const worker = createWorker({
      module: TASKS,
      exportName: "finishesAlone",
      data: 21,
      onMessage: (m) => messages.push(m),
    });
    await worker.enter();
    await worker.whenStopped();
    assert.equal(worker.state, "Stopped");
    assert.deepEqual(messages, [42]);
    await worker.exit();
  });

  test("requestExit from the controlling thread stops the task", async () => {
    const worker = createWorker({ module: TASKS, data: { label: "w2" } });
    await worker.enter();
    worker.requestExit();
    await worker.whenStopped();
    assert.equal(worker.isRunning(), false);
    await worker.exit();
  });

  test("lifecycle misuse is rejected", async () => {
    const worker = createWorker({ module: TASKS, data: { label: "w3" } });
    await assert.rejects(worker.exit(), {
      code: "TERMLOOP_INVALID_STATE",
      message: "exit: worker was never started",
    });
    await worker.enter();
    await assert.rejects(worker.enter(), {
      code: "TERMLOOP_INVALID_STATE",
      message: "enter: must be NotStarted (state=Running)",
    });
    await worker.exit();
  });

  test("a throwing task is reported once, with the original error as cause", async () => {
    const worker = createWorker({ module: TASKS, exportName: "fails" });
    await assert.rejects(
      async () => {
        await worker.enter();
        await worker.exit();
      },
      (err: unknown) =>
        isWorkerError(
          err,
          (cause) =>
            cause instanceof Error && cause.name === "TypeError" && cause.message === "task failed",
        ) && err.message === "worker task failed: TypeError: task failed",
    );
    assert.equal(worker.state, "Stopped");
    await worker.exit();
  });

  test("a rejecting async task is reported", async () => {
    const worker = createWorker({ module: TASKS, exportName: "rejects" });
    await assert.rejects(
      async () => {
        await worker.enter();
        await worker.exit();
      },
      (err: unknown) =>
        isWorkerError(err, (cause) => cause instanceof Error && cause.message === "task rejected"),
    );
  });

  test("exports that are not worker tasks are rejected", async () => {
    for (const exportName of ["missing", "notATask"]) {
      const worker = createWorker({ module: TASKS, exportName });
      await assert.rejects(
        async () => {
          await worker.enter();
          await worker.exit();
        },
        (err: unknown) =>
          isWorkerError(
            err,
            (cause) =>
              cause instanceof TermloopError &&
              cause.code === "TERMLOOP_INVALID_ARGUMENT" &&
              cause.message === `worker module ${TASKS.href} has no worker task export "${exportName}"`,
          ),
      );
    }
  });
});

describe("withWorker", () => {
  test("returns the body's value and always joins the worker", async () => {
    const worker = createWorker({ module: TASKS, data: { label: "scoped" } });
    const state = await withWorker(worker, (w) => w.state);
    assert.equal(state, "Running");
    assert.equal(worker.state, "Stopped");
  });

  test("the body's error wins and the worker is still joined", async () => {
    const worker = createWorker({ module: TASKS, data: { label: "scoped-fail" } });
    await assert.rejects(
      withWorker(worker, () => {
        throw new Error("body failed");
      }),
      { message: "body failed" },
    );
    assert.equal(worker.state, "Stopped");
  });
});

describe("threadEntry", () => {
  test("a built .js entry is loaded directly", () => {
    const entry = new URL("file:///srv/app/dist/worker/workerEntry.js");
    assert.deepEqual(threadEntry(entry), { filename: entry, eval: false });
  });

  test("a .ts entry is loaded after registering tsx in the thread", () => {
    const entry = new URL("file:///srv/app/src/worker/workerEntry.ts");
    assert.deepEqual(threadEntry(entry), {
      filename:
        'import("tsx/esm/api").then(({ register }) => { register(); ' +
        'return import("file:///srv/app/src/worker/workerEntry.ts"); });',
      eval: true,
    });
  });
});
