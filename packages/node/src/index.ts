import {
  type Application,
  type ApplicationOptions,
  type TerminalDriver,
  createApplication,
} from "@termloop/core";
import { logSinkFromEnv } from "./log/fileLogSink.js";
import { createNodeTerminal } from "./terminal/nodeTerminal.js";

export {
  type FileLogSink,
  type FileLogSinkOptions,
  LOG_LEVEL_ENV,
  LOG_PATH_ENV,
  createFileLogSink,
  formatLogLine,
  logSinkFromEnv,
} from "./log/fileLogSink.js";
export {
  KEY_QUEUE_LIMIT,
  type NodeTerminalOptions,
  type TerminalInput,
  type TerminalOutput,
  createNodeTerminal,
  isScreenHeld,
} from "./terminal/nodeTerminal.js";
export {
  KEY_DC,
  KEY_DOWN,
  KEY_END,
  KEY_F0,
  KEY_HOME,
  KEY_IC,
  KEY_LEFT,
  KEY_NPAGE,
  KEY_PPAGE,
  KEY_RIGHT,
  KEY_UP,
  decodeKeys,
  keyF,
} from "./terminal/keyDecoder.js";
export {
  type Worker,
  type WorkerOptions,
  createWorker,
  withWorker,
} from "./worker/worker.js";
export {
  type WorkerTask,
  type WorkerTaskContext,
  defineWorkerTask,
} from "./worker/task.js";
export {
  DEFAULT_KEY_RING_CAPACITY,
  type KeyRing,
  attachKeyRing,
  createKeyRing,
} from "./worker/keyRing.js";
export { computeKeyPumpInterval } from "./worker/tickTiming.js";
export { createThreadedApplication } from "./app/threadedApplication.js";
export {
  type ThreadedAppDefinition,
  type ThreadedAppHooks,
  type ThreadedApplication,
  type ThreadedApplicationOptions,
  defineThreadedApp,
} from "./app/types.js";

export type NodeApplicationOptions = Omit<ApplicationOptions, "terminal"> &
  Readonly<{
    /** Default: the process terminal (stdin/stdout). */
    terminal?: TerminalDriver;
  }>;

/**
 * createApplication() wired to the process terminal and, when TERMLOOP_LOG is
 * set, the NDJSON file log.
 */
export function createNodeApplication(opts: NodeApplicationOptions = {}): Application {
  return createApplication({
    ...opts,
    terminal: opts.terminal ?? createNodeTerminal(),
    log: opts.log ?? logSinkFromEnv(),
  });
}
