import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { IllegalStageTransitionError } from "../shared/errors.js";
import { StageStateMachine, canTransition, isTerminalState, satisfiesDependents } from "./stageState.js";

describe("orchestration/stageState", () => {
  it("should start pending", () => {
    assert.equal(new StageStateMachine("review").state, "pending");
  });

  it("should follow the happy path", () => {
    const machine = new StageStateMachine("review");
    machine.transition("ready");
    machine.transition("running");
    machine.transition("succeeded");
    assert.equal(machine.state, "succeeded");
    assert.deepEqual(
      machine.history.map((t) => `${t.from}>${t.to}`),
      ["pending>ready", "ready>running", "running>succeeded"],
    );
  });

  it("should allow retry, escalation and reroute out of failed", () => {
    assert.equal(canTransition("failed", "retrying"), true);
    assert.equal(canTransition("failed", "escalated"), true);
    assert.equal(canTransition("failed", "pending"), true);
    assert.equal(canTransition("retrying", "ready"), true);
    assert.equal(canTransition("escalated", "ready"), true);
  });

  it("should reject dispatching a stage that is not ready", () => {
    const machine = new StageStateMachine("build_test");
    assert.throws(
      () => machine.transition("running"),
      (error: unknown) =>
        error instanceof IllegalStageTransitionError &&
        error.message === "Illegal transition for stage build_test: pending → running",
    );
    assert.equal(machine.state, "pending");
  });

  it("should treat succeeded and skipped as terminal", () => {
    assert.equal(isTerminalState("succeeded"), true);
    assert.equal(isTerminalState("skipped"), true);
    assert.equal(isTerminalState("failed"), false);

    const machine = new StageStateMachine("integration");
    machine.transition("skipped", "aborted");
    assert.throws(() => machine.transition("ready"), IllegalStageTransitionError);
    assert.equal(machine.history[0]?.reason, "aborted");
  });

  it("should release dependents only after success or skip", () => {
    assert.equal(satisfiesDependents("succeeded"), true);
    assert.equal(satisfiesDependents("skipped"), true);
    assert.equal(satisfiesDependents("failed"), false);
    assert.equal(satisfiesDependents("running"), false);
  });
});
