import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import type BetterSqlite3 from "better-sqlite3";
import { createHarness } from "../orchestration/testing/harness.js";
import { openDatabase } from "../state/db.js";
import { getEventsByTraceId, getStageEvents } from "../state/executionEvents.js";
import { RunEventEmitter, createRunEventEmitter } from "./runEventEmitter.js";

describe("RunEventEmitter", () => {
  let db: BetterSqlite3.Database;

  beforeEach(() => {
    db = openDatabase(":memory:");
  });

  afterEach(() => {
    db.close();
  });

  it("should write under the run id it was created for", () => {
    createRunEventEmitter(db, "run-abc").record({ type: "run.started", message: "Build a todo API" });

    assert.equal(getEventsByTraceId(db, "run-abc").length, 1);
    assert.equal(getEventsByTraceId(db, "run-other").length, 0);
  });

  it("should store a run event under its executor and stage", () => {
    const emitter = new RunEventEmitter(db, "run-1");
    emitter.record({
      type: "stage.failed",
      message: "Tests failed",
      stageId: "build_test",
      executorId: "build-test",
      level: "warn",
      metadata: { kind: "validation", attempt: 1 },
    });

    const [event] = getEventsByTraceId(db, "run-1");
    assert.ok(event);
    assert.equal(event.agent, "build-test");
    assert.equal(event.event_type, "stage.failed");
    assert.equal(event.phase, "build_test");
    assert.equal(event.level, "warn");
    assert.equal(event.metadata, JSON.stringify({ kind: "validation", attempt: 1 }));
  });

  it("should attribute events without an executor to the scheduler", () => {
    new RunEventEmitter(db, "run-1").record({ type: "run.started", message: "Build a todo API" });

    const [event] = getEventsByTraceId(db, "run-1");
    assert.equal(event?.agent, "scheduler");
    assert.equal(event?.level, "info");
    assert.equal(event?.phase, null);
  });

  it("should not throw when the database is gone", () => {
    db.close();
    const emitter = new RunEventEmitter(db, "run-closed");

    assert.doesNotThrow(() => {
      emitter.record({ type: "run.started", message: "should not throw" });
    });
  });

  it("should receive every lifecycle event of a scheduled run", async () => {
    const { scheduler, fakes } = createHarness(undefined, {
      events: (runId) => createRunEventEmitter(db, runId),
    });
    fakes.script("review", { status: "failed", error: "reviewer unavailable" });

    await scheduler.execute("Build a todo API", undefined, { runId: "run-1" });

    const events = getEventsByTraceId(db, "run-1");
    assert.equal(events[0]?.event_type, "run.started");
    assert.equal(events.at(-1)?.event_type, "run.finished");
    assert.deepEqual(
      getStageEvents(db, "run-1", "review").map((event) => event.event_type),
      [
        "stage.dispatched",
        "stage.failed",
        "stage.retrying",
        "stage.dispatched",
        "stage.succeeded",
      ],
    );
  });
});
