/**
 * Run state machine.
 *
 *   Init → Fetching → RawPersisted → Cleaning → CleanPersisted → Loaded → Done
 *
 * Failed is reachable from every non-terminal state and absorbs.
 */
import { StageError, StateTransitionError } from "./exceptions.js";
import type { StageName } from "./types.js";

export type RunState =
  | "Init"
  | "Fetching"
  | "RawPersisted"
  | "Cleaning"
  | "CleanPersisted"
  | "Loaded"
  | "Done"
  | "Failed";

const NEXT: Record<RunState, RunState | null> = {
  Init: "Fetching",
  Fetching: "RawPersisted",
  RawPersisted: "Cleaning",
  Cleaning: "CleanPersisted",
  CleanPersisted: "Loaded",
  Loaded: "Done",
  Done: null,
  Failed: null,
};

export function isTerminal(state: RunState): boolean {
  return state === "Done" || state === "Failed";
}

export class RunStateMachine {
  private current: RunState = "Init";
  private failure: StageError | undefined;
  private readonly visited: RunState[] = ["Init"];

  get state(): RunState {
    return this.current;
  }

  /** Every state entered so far, starting with Init. */
  get history(): RunState[] {
    return [...this.visited];
  }

  get error(): StageError | undefined {
    return this.failure;
  }

  /** @throws StateTransitionError unless `to` directly follows the current state. */
  transition(to: Exclude<RunState, "Failed">): void {
    if (NEXT[this.current] !== to) {
      throw new StateTransitionError(this.current, to);
    }
    this.enter(to);
  }

  /**
   * Move to Failed, recording the stage and cause.
   * @throws StateTransitionError when the run already finished.
   */
  fail(stage: StageName, cause: unknown): StageError {
    if (isTerminal(this.current)) {
      throw new StateTransitionError(this.current, "Failed");
    }
    this.failure = cause instanceof StageError ? cause : new StageError(stage, cause);
    this.enter("Failed");
    return this.failure;
  }

  private enter(state: RunState): void {
    this.current = state;
    this.visited.push(state);
  }
}
