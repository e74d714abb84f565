/**
 * Small transition-checked state machine shared by Application, Worker and
 * ThreadedApplication.
 */

import { TermloopError } from "../errors.js";

export type TransitionTable<S extends string> = Readonly<Record<S, readonly S[]>>;

export class LifecycleStateMachine<S extends string> {
  private current: S;
  private readonly transitions: TransitionTable<S>;
  private readonly onTransition: ((from: S, to: S) => void) | undefined;

  constructor(
    initial: S,
    transitions: TransitionTable<S>,
    onTransition?: (from: S, to: S) => void,
  ) {
    this.current = initial;
    this.transitions = transitions;
    this.onTransition = onTransition;
  }

  get state(): S {
    return this.current;
  }

  is(...states: readonly S[]): boolean {
    return states.includes(this.current);
  }

  assertOneOf(states: readonly S[], message: string): void {
    if (!states.includes(this.current)) {
      throw new TermloopError("TERMLOOP_INVALID_STATE", `${message} (state=${this.current})`);
    }
  }

  to(next: S): void {
    const from = this.current;
    if (from === next) return;
    if (!this.transitions[from].includes(next)) {
      throw new TermloopError(
        "TERMLOOP_INVALID_STATE",
        `invalid lifecycle transition: ${from} -> ${next}`,
      );
    }
    this.current = next;
    this.onTransition?.(from, next);
  }
}

// =============================================================================
// Application lifecycle
// =============================================================================

export type AppState = "Created" | "Entered" | "Running" | "Exited";

export const APP_TRANSITIONS: TransitionTable<AppState> = Object.freeze({
  Created: ["Entered"],
  Entered: ["Running", "Exited"],
  Running: ["Exited"],
  Exited: [],
});

// =============================================================================
// Worker lifecycle
// =============================================================================

export type WorkerState = "NotStarted" | "Running" | "Stopping" | "Stopped";

export const WORKER_TRANSITIONS: TransitionTable<WorkerState> = Object.freeze({
  NotStarted: ["Running"],
  Running: ["Stopping", "Stopped"],
  Stopping: ["Stopped"],
  Stopped: [],
});
