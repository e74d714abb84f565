import { TermloopError } from "./errors.js";

export const DEFAULT_FPS = 30;

export type AppConfig = Readonly<{
  /** Target update rate. Must be a finite number > 0 (default: 30). */
  fps?: number;
  /** Enable extended key decoding (arrows, function keys). Default: false. */
  keypad?: boolean;
  /**
   * Raise the exit signal when `onUpdate` throws, so pollers of
   * `isExitRequested()` see the failure. Default: true.
   */
  stopOnError?: boolean;
}>;

export type ResolvedAppConfig = Readonly<{
  fps: number;
  frameDurationMs: number;
  keypad: boolean;
  stopOnError: boolean;
}>;

function invalid(field: string, detail: string): never {
  throw new TermloopError("TERMLOOP_INVALID_CONFIG", `config.${field}: ${detail}`);
}

/**
 * Frame budget in milliseconds for a target rate: exactly `1000 / fps`.
 */
export function computeFrameDuration(fps: number): number {
  if (typeof fps !== "number" || !Number.isFinite(fps) || fps <= 0) {
    invalid("fps", `must be a finite number > 0 (got ${String(fps)})`);
  }
  return 1000 / fps;
}

function readBoolean(field: string, value: unknown, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  if (typeof value !== "boolean") invalid(field, `must be a boolean (got ${typeof value})`);
  return value;
}

export function resolveAppConfig(config: AppConfig = {}): ResolvedAppConfig {
  const fps = config.fps ?? DEFAULT_FPS;
  const frameDurationMs = computeFrameDuration(fps);
  return Object.freeze({
    fps,
    frameDurationMs,
    keypad: readBoolean("keypad", config.keypad, false),
    stopOnError: readBoolean("stopOnError", config.stopOnError, true),
  });
}
