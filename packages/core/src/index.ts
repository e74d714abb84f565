/**
 * @termloop/core: lifecycle, pacing and exit signalling around a
 * single-owner terminal screen. Platform-agnostic; see @termloop/node for the
 * Node.js terminal driver and the worker-thread variant.
 */

// =============================================================================
// Errors
// =============================================================================

export {
  TermloopError,
  type TermloopErrorCode,
  describeThrown,
  isTermloopError,
  isTermloopErrorCode,
  safeErr,
} from "./errors.js";

// =============================================================================
// Configuration & logging
// =============================================================================

export {
  type AppConfig,
  DEFAULT_FPS,
  type ResolvedAppConfig,
  computeFrameDuration,
  resolveAppConfig,
} from "./config.js";
export {
  LOG_LEVELS,
  type LogEvent,
  type LogLevel,
  type LogSink,
  filterLogSink,
  isLogLevel,
  logLevelRank,
  makeLogSink,
} from "./log.js";

// =============================================================================
// Terminal collaborator & screen session
// =============================================================================

export {
  type AcquireScreenOptions,
  KEY_ESC,
  type KeyCode,
  type Screen,
  type ScreenHandle,
  type ScreenSize,
  type TerminalDriver,
  type TextStyle,
  assertCell,
} from "./terminal.js";
export {
  type ScreenSession,
  type ScreenSessionOptions,
  type ScreenSessionState,
  createScreenSession,
  withScreenSession,
} from "./screenSession.js";

// =============================================================================
// Exit signal & pacing
// =============================================================================

export {
  EXIT_SIGNAL_BYTES,
  type ExitSignal,
  type ExitSignalReader,
  createExitSignal,
} from "./exitSignal.js";
export {
  type PacedLoopAsyncOptions,
  type PacedLoopOptions,
  type PacedLoopStats,
  remainingFrameTime,
  runPacedLoop,
  runPacedLoopAsync,
} from "./pacedLoop.js";

// =============================================================================
// Application lifecycle
// =============================================================================

export { createApplication, screenView } from "./app/createApplication.js";
export {
  APP_TRANSITIONS,
  type AppState,
  LifecycleStateMachine,
  type TransitionTable,
  WORKER_TRANSITIONS,
  type WorkerState,
} from "./app/stateMachine.js";
export { type Failure, type TeardownStep, runTeardown } from "./app/teardown.js";
export type {
  AppControl,
  AppHooks,
  Application,
  ApplicationOptions,
  HookContext,
  UpdateContext,
} from "./app/types.js";
