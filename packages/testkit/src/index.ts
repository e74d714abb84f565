export {
  type FakeDrawOp,
  type FakeTerminal,
  type FakeTerminalMode,
  type FakeTerminalOptions,
  createFakeTerminal,
} from "./fakeTerminal.js";
export {
  type HookName,
  type HookSpan,
  type HookTimeline,
  createHookTimeline,
  spansOverlap,
} from "./hookTimeline.js";
export { assert, describe, test } from "./nodeTest.js";
export { waitFor } from "./waitFor.js";
