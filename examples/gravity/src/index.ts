/**
 * The update loop runs on a worker thread while this thread pulls the point
 * down once a second. ESC exits.
 *
 *   npm run example:gravity
 */

import { setTimeout as sleep } from "node:timers/promises";
import { createThreadedApplication } from "@termloop/node";
import type { GravityMessage } from "./app.js";

const ext = import.meta.url.endsWith(".ts") ? ".ts" : ".js";

const app = createThreadedApplication({
  module: new URL(`./app${ext}`, import.meta.url),
  keypad: true,
});

await app.run(async (running) => {
  while (running.isRunning()) {
    await sleep(1_000);
    if (!running.isRunning()) break;
    running.send({ type: "gravity", dy: 1 } satisfies GravityMessage);
  }
});
