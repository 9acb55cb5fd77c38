import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import type BetterSqlite3 from "better-sqlite3";
import type { WorkflowResult } from "../orchestration/types.js";
import { openDatabase } from "./db.js";
import { getRecentWorkflowRuns, getRunSuccessRate, getWorkflowRun, saveWorkflowRun } from "./workflowRuns.js";

function result(runId: string, overrides: Partial<WorkflowResult> = {}): WorkflowResult {
  return {
    runId,
    request: "Build a todo API",
    success: true,
    stagesCompleted: ["requirements", "architecture"],
    stagesFailed: [],
    stagesSkipped: [],
    outputs: { requirements: { requirements: [{ id: "R1", description: "List todos" }] } },
    attempts: { requirements: 1, architecture: 2 },
    retries: { requirements: 0, architecture: 1 },
    lastViolations: {},
    failures: [],
    conflicts: [],
    startedAt: "2026-03-01T10:00:00.000Z",
    finishedAt: "2026-03-01T10:00:05.000Z",
    durationMs: 5000,
    ...overrides,
  };
}

describe("workflowRuns", () => {
  let db: BetterSqlite3.Database;

  beforeEach(() => {
    db = openDatabase(":memory:");
  });

  afterEach(() => {
    db.close();
  });

  it("should store and return the full result", () => {
    saveWorkflowRun(db, result("run-1"));

    assert.deepEqual(getWorkflowRun(db, "run-1"), result("run-1"));
    assert.equal(getWorkflowRun(db, "missing"), undefined);
  });

  it("should replace a result saved twice under the same id", () => {
    saveWorkflowRun(db, result("run-1"));
    saveWorkflowRun(db, result("run-1", { success: false, error: "Stages ended failed: review" }));

    assert.equal(getWorkflowRun(db, "run-1")?.success, false);
    assert.equal(getRecentWorkflowRuns(db).length, 1);
  });

  it("should list recent runs newest first", () => {
    saveWorkflowRun(db, result("run-1"));
    saveWorkflowRun(
      db,
      result("run-2", {
        success: false,
        stagesFailed: ["architecture"],
        abortReason: "operator stop",
        finishedAt: "2026-03-02T10:00:00.000Z",
      }),
    );

    const runs = getRecentWorkflowRuns(db);
    assert.deepEqual(
      runs.map((run) => [run.runId, run.success, run.error]),
      [
        ["run-2", false, "operator stop"],
        ["run-1", true, null],
      ],
    );
    assert.deepEqual(runs[0]?.stagesFailed, ["architecture"]);
    assert.deepEqual(runs[1]?.stagesCompleted, ["requirements", "architecture"]);
    assert.equal(getRecentWorkflowRuns(db, 1).length, 1);
  });

  it("should report the share of successful runs", () => {
    assert.equal(getRunSuccessRate(db), 0);

    saveWorkflowRun(db, result("run-1"));
    saveWorkflowRun(db, result("run-2", { success: false }));

    assert.equal(getRunSuccessRate(db), 0.5);
  });
});
