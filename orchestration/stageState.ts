import { IllegalStageTransitionError } from "../shared/errors.js";
import type { StageState } from "./types.js";

const TRANSITIONS: Record<StageState, readonly StageState[]> = {
  pending: ["ready", "skipped"],
  ready: ["running", "skipped"],
  running: ["succeeded", "failed", "skipped"],
  // pending: rerouted, waiting on a remediation stage
  failed: ["retrying", "escalated", "pending", "skipped"],
  retrying: ["ready", "skipped"],
  escalated: ["ready", "skipped"],
  succeeded: [],
  skipped: [],
};

export interface StageTransition {
  readonly from: StageState;
  readonly to: StageState;
  readonly at: string;
  readonly reason?: string;
}

export function canTransition(from: StageState, to: StageState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminalState(state: StageState): boolean {
  return TRANSITIONS[state].length === 0;
}

/** Dependents may start once a predecessor is in one of these states. */
export function satisfiesDependents(state: StageState): boolean {
  return state === "succeeded" || state === "skipped";
}

export class StageStateMachine {
  private current: StageState = "pending";
  private readonly transitions: StageTransition[] = [];

  constructor(
    readonly stageId: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  get state(): StageState {
    return this.current;
  }

  get history(): readonly StageTransition[] {
    return this.transitions;
  }

  transition(to: StageState, reason?: string): void {
    if (!canTransition(this.current, to)) {
      throw new IllegalStageTransitionError(this.stageId, this.current, to);
    }
    this.transitions.push({ from: this.current, to, at: this.now().toISOString(), reason });
    this.current = to;
  }

  is(...states: readonly StageState[]): boolean {
    return states.includes(this.current);
  }
}
