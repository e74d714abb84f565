import { describeThrown } from "../errors.js";
import type { LogSink } from "../log.js";

export type TeardownStep = Readonly<{
  name: string;
  run: () => void;
}>;

/** Boxed so that `undefined`/`null` throws are still carried. */
export type Failure = Readonly<{ error: unknown }>;

/**
 * Run every step even if earlier ones throw. The first failure (or `failure`
 * when one is already pending) is rethrown at the end; later ones go to `log`.
 */
export function runTeardown(
  steps: readonly TeardownStep[],
  log: LogSink,
  source: string,
  failure: Failure | null = null,
): void {
  let first = failure;
  for (const step of steps) {
    try {
      step.run();
    } catch (e: unknown) {
      if (first === null) {
        first = { error: e };
        continue;
      }
      log({
        level: "error",
        source,
        message: `${step.name} failed during teardown`,
        detail: describeThrown(e),
      });
    }
  }
  if (first !== null) throw first.error;
}
