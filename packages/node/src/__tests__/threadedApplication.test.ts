import { KEY_ESC, type LogEvent, TermloopError } from "@termloop/core";
import { assert, createFakeTerminal, describe, test, waitFor } from "@termloop/testkit";
import { createThreadedApplication } from "../app/threadedApplication.js";
import { fixtureUrl } from "./fixtures/index.js";

const COUNTER = fixtureUrl("counterApp");
const FAILING = fixtureUrl("failingApps");
const FRAME_30FPS_MS = 1000 / 30;
const RESTORED = { raw: false, cursorVisible: true, keypad: false };

function tickKeys(texts: readonly string[]): string[] {
  return texts.filter((t) => t.startsWith("tick=")).map((t) => t.slice(t.indexOf("key=") + 4));
}

function workerFailure(check: (cause: unknown) => boolean): (err: unknown) => boolean {
  return (err) =>
    err instanceof TermloopError && err.code === "TERMLOOP_WORKER_ERROR" && check(err.cause);
}

describe("ThreadedApplication", () => {
  test("runs onUpdate on the worker until a hook requests exit", async () => {
    const terminal = createFakeTerminal();
    const app = createThreadedApplication({
      module: COUNTER,
      data: { exitAfter: 3 },
      fps: 30,
      terminal,
    });
    assert.equal(app.state, "Created");

    await app.enter();
    assert.equal(terminal.isHeld(), true);
    assert.deepEqual(terminal.texts()[0], "ready");
    assert.deepEqual(terminal.frames()[0]?.[0]?.style, { bold: true, underline: false });

    // The third onUpdate requests exit; time from its frame to exit() returning.
    await waitFor(() => terminal.texts().some((t) => t.startsWith("tick=2 ")), 2_000);
    const start = performance.now();
    await app.exit();
    const elapsed = performance.now() - start;
    assert.equal(elapsed < 3 * FRAME_30FPS_MS + 50, true, `exit() took ${elapsed.toFixed(1)}ms`);

    assert.equal(app.isExitRequested(), true);
    assert.equal(app.isRunning(), false);
    assert.equal(app.state, "Exited");
    const texts = terminal.texts();
    assert.deepEqual(
      texts.filter((t) => t.startsWith("tick=")).map((t) => t.split(" ")[0]),
      ["tick=0", "tick=1", "tick=2"],
    );
    assert.equal(texts[texts.length - 1], "updates=3 ordered=true");
    // onEnter, three updates, onExit.
    assert.equal(terminal.refreshCount(), 5);
    assert.equal(terminal.acquireCount(), 1);
    assert.equal(terminal.releaseCount(), 1);
    assert.deepEqual(terminal.mode(), RESTORED);
  });

  test("keys reach the worker in order", async () => {
    const terminal = createFakeTerminal({ keys: [65, 66, KEY_ESC] });
    const app = createThreadedApplication({
      module: COUNTER,
      data: { exitAfter: 0 },
      fps: 100,
      terminal,
    });
    await app.run();

    const keys = tickKeys(terminal.texts()).filter((k) => k !== "null");
    assert.deepEqual(keys, ["65", "66", "27"]);
    assert.equal(app.state, "Exited");
    assert.equal(terminal.releaseCount(), 1);
  });

  test("exit() from the controlling thread stops a free-running loop", async () => {
    const terminal = createFakeTerminal();
    const app = createThreadedApplication({
      module: COUNTER,
      data: { exitAfter: 0 },
      fps: 50,
      terminal,
    });
    await app.enter();
    await waitFor(() => app.state === "Running");
    assert.equal(app.isRunning(), true);
    await app.exit();

    const texts = terminal.texts();
    assert.match(texts[texts.length - 1] ?? "", /^updates=\d+ ordered=true$/);
    assert.equal(app.isRunning(), false);
    await app.exit();
    assert.equal(terminal.releaseCount(), 1);
  });

  test("send() delivers to onMessage between updates", async () => {
    const terminal = createFakeTerminal();
    const app = createThreadedApplication({
      module: COUNTER,
      data: { exitAfter: 0 },
      fps: 100,
      terminal,
    });
    await app.run(async (running) => {
      running.send({ n: 1 });
      running.send("second");
      await waitFor(() => terminal.texts().includes('msg="second"'));
      running.requestExit();
    });

    const msgs = terminal.texts().filter((t) => t.startsWith("msg="));
    assert.deepEqual(msgs, ['msg={"n":1}', 'msg="second"']);
  });

  test("an onUpdate error raises the exit signal, runs onExit and rejects exit()", async () => {
    const events: LogEvent[] = [];
    const terminal = createFakeTerminal();
    const app = createThreadedApplication({
      module: FAILING,
      exportName: "throwsOnUpdate",
      fps: 100,
      terminal,
      log: (ev) => events.push(ev),
    });
    await app.enter();
    await app.whenStopped();
    assert.equal(app.isExitRequested(), true);

    await assert.rejects(
      app.exit(),
      workerFailure(
        (cause) =>
          cause instanceof Error && cause.name === "RangeError" && cause.message === "update failed",
      ),
    );
    assert.equal(app.state, "Exited");
    assert.equal(terminal.releaseCount(), 1);
    assert.deepEqual(terminal.texts(), ["exit requested=true"]);
    assert.deepEqual(
      events.filter((e) => e.source === "worker" && e.level === "error").map((e) => e.message)[0],
      "onUpdate threw",
    );
    await app.exit();
  });

  test("with stopOnError=false the signal is left for teardown to raise", async () => {
    const terminal = createFakeTerminal();
    const app = createThreadedApplication({
      module: FAILING,
      exportName: "throwsOnUpdate",
      stopOnError: false,
      fps: 100,
      terminal,
    });
    await app.enter();
    await app.whenStopped();
    await assert.rejects(app.exit(), { code: "TERMLOOP_WORKER_ERROR" });
    assert.deepEqual(terminal.texts(), ["exit requested=false"]);
  });

  test("an onMessage error fails the run", async () => {
    const terminal = createFakeTerminal();
    const app = createThreadedApplication({
      module: FAILING,
      exportName: "throwsOnMessage",
      fps: 100,
      terminal,
    });
    await app.enter();
    app.send("anything");
    await app.whenStopped();
    await assert.rejects(
      app.exit(),
      workerFailure((cause) => cause instanceof Error && cause.message === "bad message"),
    );
    assert.equal(terminal.releaseCount(), 1);
  });

  test("an onEnter error rejects enter() after releasing the screen", async () => {
    const terminal = createFakeTerminal();
    const app = createThreadedApplication({
      module: FAILING,
      exportName: "throwsOnEnter",
      terminal,
    });
    await assert.rejects(
      app.enter(),
      workerFailure((cause) => cause instanceof Error && cause.message === "enter failed"),
    );
    assert.equal(app.state, "Exited");
    assert.equal(terminal.releaseCount(), 1);
    assert.equal(terminal.texts().includes("should not run"), false);
    assert.deepEqual(terminal.mode(), RESTORED);
  });

  test("a module without a threaded app export is rejected", async () => {
    const terminal = createFakeTerminal();
    const app = createThreadedApplication({ module: FAILING, exportName: "notAnApp", terminal });
    await assert.rejects(
      app.enter(),
      workerFailure(
        (cause) => cause instanceof TermloopError && cause.code === "TERMLOOP_INVALID_ARGUMENT",
      ),
    );
    assert.equal(terminal.isHeld(), false);
  });

  test("an unavailable screen fails enter() before the worker starts", async () => {
    const terminal = createFakeTerminal({ failAcquire: "terminal is busy" });
    const app = createThreadedApplication({ module: COUNTER, data: { exitAfter: 1 }, terminal });
    await assert.rejects(app.enter(), {
      code: "TERMLOOP_RESOURCE_UNAVAILABLE",
      message: "terminal is busy",
    });
    assert.equal(app.state, "Created");
    assert.equal(app.isRunning(), false);
  });

  test("a failing size read releases the screen and leaves the app Created", async () => {
    const terminal = createFakeTerminal({ failSize: "size unavailable" });
    const app = createThreadedApplication({ module: COUNTER, data: { exitAfter: 1 }, terminal });
    await assert.rejects(app.enter(), {
      code: "TERMLOOP_RESOURCE_UNAVAILABLE",
      message: "size unavailable",
    });
    assert.equal(app.state, "Created");
    assert.equal(terminal.isHeld(), false);
    assert.equal(terminal.releaseCount(), 1);
    assert.deepEqual(terminal.mode(), RESTORED);
  });

  test("lifecycle misuse is rejected", async () => {
    const terminal = createFakeTerminal();
    const app = createThreadedApplication({ module: COUNTER, data: { exitAfter: 1 }, terminal });
    await assert.rejects(app.exit(), {
      code: "TERMLOOP_INVALID_STATE",
      message: "exit: must be Entered or Running (state=Created)",
    });
    assert.throws(() => app.send("early"), {
      code: "TERMLOOP_INVALID_STATE",
      message: "send: must be Entered or Running (state=Created)",
    });
    await app.run();
    await assert.rejects(app.enter(), {
      code: "TERMLOOP_INVALID_STATE",
      message: "enter: must be Created (state=Exited)",
    });
    assert.throws(() => app.send("late"), { code: "TERMLOOP_INVALID_STATE" });
  });

  test("configuration is validated at construction", () => {
    const terminal = createFakeTerminal();
    assert.throws(() => createThreadedApplication({ module: COUNTER, fps: 0, terminal }), {
      code: "TERMLOOP_INVALID_CONFIG",
      message: "config.fps: must be a finite number > 0 (got 0)",
    });
    assert.throws(
      () => createThreadedApplication({ module: COUNTER, keyRingCapacity: 3, terminal }),
      { code: "TERMLOOP_INVALID_ARGUMENT" },
    );
  });
});
