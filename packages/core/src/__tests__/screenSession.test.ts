import { assert, createFakeTerminal, test } from "@termloop/testkit";
import { TermloopError } from "../errors.js";
import type { LogEvent } from "../log.js";
import { createScreenSession, withScreenSession } from "../screenSession.js";
import type { TerminalDriver } from "../terminal.js";

test("enter/exit with no body restores the prior terminal mode", () => {
  const terminal = createFakeTerminal();
  const before = terminal.mode();
  const session = createScreenSession(terminal, { keypad: true });

  session.enter();
  assert.deepEqual(terminal.mode(), { raw: true, cursorVisible: false, keypad: true });
  session.exit();

  assert.deepEqual(terminal.mode(), before);
  assert.equal(terminal.acquireCount(), 1);
  assert.equal(terminal.releaseCount(), 1);
});

test("round-trip preserves a non-default prior mode", () => {
  const initialMode = { raw: true, cursorVisible: false, keypad: false };
  const terminal = createFakeTerminal({ initialMode });
  const session = createScreenSession(terminal);
  session.enter();
  session.exit();
  assert.deepEqual(terminal.mode(), initialMode);
});

test("withScreenSession releases when the body throws", async () => {
  const terminal = createFakeTerminal();
  await assert.rejects(
    withScreenSession(terminal, {}, (screen) => {
      screen.drawText(0, 0, "partial");
      throw new Error("body failed");
    }),
    { message: "body failed" },
  );
  assert.equal(terminal.releaseCount(), 1);
  assert.equal(terminal.isHeld(), false);
});

test("withScreenSession returns the body's value", async () => {
  const terminal = createFakeTerminal({ keys: [65] });
  const key = await withScreenSession(terminal, {}, async (screen) => screen.readKey());
  assert.equal(key, 65);
  assert.equal(terminal.releaseCount(), 1);
});

test("a second session cannot acquire a held screen", () => {
  const terminal = createFakeTerminal();
  const first = createScreenSession(terminal);
  first.enter();
  const nested = createScreenSession(terminal);
  assert.throws(() => nested.enter(), {
    code: "TERMLOOP_RESOURCE_UNAVAILABLE",
    message: "screen is already acquired",
  });
  assert.equal(nested.state(), "Idle");
  first.exit();
});

test("driver errors on acquire are reported as resource unavailable", () => {
  const cause = new Error("no tty");
  const driver: TerminalDriver = {
    acquireScreen: () => {
      throw cause;
    },
    releaseScreen: () => {},
  };
  const session = createScreenSession(driver);
  assert.throws(
    () => session.enter(),
    (err: unknown) =>
      err instanceof TermloopError &&
      err.code === "TERMLOOP_RESOURCE_UNAVAILABLE" &&
      err.message === "acquireScreen failed: Error: no tty" &&
      err.cause === cause,
  );
});

test("passthrough calls outside an active session are invalid", () => {
  const terminal = createFakeTerminal();
  const session = createScreenSession(terminal);
  assert.throws(() => session.readKey(), {
    code: "TERMLOOP_INVALID_STATE",
    message: "readKey: screen session is Idle",
  });
  session.enter();
  session.exit();
  assert.throws(() => session.refresh(), {
    code: "TERMLOOP_INVALID_STATE",
    message: "refresh: screen session is Released",
  });
});

test("exit releases once and sessions are single-use", () => {
  const terminal = createFakeTerminal();
  const session = createScreenSession(terminal);
  session.enter();
  session.exit();
  session.exit();
  assert.equal(terminal.releaseCount(), 1);
  assert.throws(() => session.enter(), { code: "TERMLOOP_INVALID_STATE" });
});

test("passthrough forwards keys, draws and refreshes", () => {
  const terminal = createFakeTerminal({ keys: [27, null, 66], size: { cols: 40, rows: 10 } });
  const session = createScreenSession(terminal);
  session.enter();
  assert.equal(session.readKey(), 27);
  assert.equal(session.readKey(), null);
  assert.equal(session.readKey(), 66);
  assert.equal(session.readKey(), null);
  session.drawText(1, 2, "hi", { bold: true });
  session.refresh();
  assert.deepEqual(session.size(), { cols: 40, rows: 10 });
  session.exit();

  assert.deepEqual(terminal.frames(), [
    [{ row: 1, col: 2, text: "hi", style: { bold: true, underline: false } }],
  ]);
});

test("session logs acquisition and release", () => {
  const events: LogEvent[] = [];
  const terminal = createFakeTerminal();
  const session = createScreenSession(terminal, { log: (ev) => events.push(ev) });
  session.enter();
  session.exit();
  assert.deepEqual(
    events.map((e) => e.message),
    ["screen acquired", "screen released"],
  );
});
