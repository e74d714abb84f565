/**
 * Error type and codes for termloop.
 * @see docs/guide/lifecycle.md
 */

// =============================================================================
// TermloopErrorCode Union
// =============================================================================

/**
 * Deterministic error codes for lifecycle and resource violations.
 * These are surfaced as TermloopError instances.
 */
export type TermloopErrorCode =
  | "TERMLOOP_RESOURCE_UNAVAILABLE"
  | "TERMLOOP_INVALID_STATE"
  | "TERMLOOP_INVALID_CONFIG"
  | "TERMLOOP_INVALID_ARGUMENT"
  | "TERMLOOP_WORKER_ERROR"
  | "TERMLOOP_PROTOCOL_ERROR";

// =============================================================================
// TermloopError Class
// =============================================================================

/**
 * Error class for all deterministic runtime violations.
 * The `code` property identifies the specific violation.
 */
export class TermloopError extends Error {
  override readonly name = "TermloopError";
  readonly code: TermloopErrorCode;

  constructor(code: TermloopErrorCode, message?: string, options?: Readonly<{ cause?: unknown }>) {
    super(message ?? code, options);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TermloopError);
    }
  }
}

const ERROR_CODES: ReadonlySet<string> = new Set<TermloopErrorCode>([
  "TERMLOOP_RESOURCE_UNAVAILABLE",
  "TERMLOOP_INVALID_STATE",
  "TERMLOOP_INVALID_CONFIG",
  "TERMLOOP_INVALID_ARGUMENT",
  "TERMLOOP_WORKER_ERROR",
  "TERMLOOP_PROTOCOL_ERROR",
]);

export function isTermloopErrorCode(value: unknown): value is TermloopErrorCode {
  return typeof value === "string" && ERROR_CODES.has(value);
}

export function isTermloopError(err: unknown, code?: TermloopErrorCode): err is TermloopError {
  if (!(err instanceof TermloopError)) return false;
  return code === undefined || err.code === code;
}

export function safeErr(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export function describeThrown(v: unknown): string {
  if (v instanceof Error) return `${v.name}: ${v.message}`;
  return String(v);
}
