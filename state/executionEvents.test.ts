import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import type BetterSqlite3 from "better-sqlite3";
import { openDatabase } from "./db.js";
import {
  emitExecutionEvent,
  getEventsByTraceId,
  getStageEvents,
  cleanupOldEvents,
} from "./executionEvents.js";

describe("executionEvents", () => {
  let db: BetterSqlite3.Database;

  beforeEach(() => {
    db = openDatabase(":memory:");
  });

  afterEach(() => {
    db.close();
  });

  describe("emitExecutionEvent", () => {
    it("should insert an event and return the id", () => {
      const id = emitExecutionEvent(db, {
        traceId: "run-001",
        agent: "product",
        eventType: "stage.dispatched",
        message: "Attempt 1 of requirements",
      });

      assert.equal(typeof id, "number");
      assert.ok(id > 0);
    });

    it("should store all fields correctly", () => {
      emitExecutionEvent(db, {
        traceId: "run-002",
        agent: "architect",
        eventType: "conflict.resolved",
        message: "architect decided retry",
        phase: "build_test",
        metadata: { topic: "approval denied" },
        level: "info",
      });

      const [row] = getEventsByTraceId(db, "run-002");
      assert.ok(row);
      assert.equal(row.agent, "architect");
      assert.equal(row.event_type, "conflict.resolved");
      assert.equal(row.phase, "build_test");
      assert.equal(row.message, "architect decided retry");
      assert.equal(row.level, "info");
      assert.equal(row.metadata, JSON.stringify({ topic: "approval denied" }));
    });

    it("should default level to info and leave optional fields null", () => {
      emitExecutionEvent(db, { traceId: "run-003", agent: "scheduler", eventType: "run.started", message: "go" });

      const [row] = getEventsByTraceId(db, "run-003");
      assert.equal(row?.level, "info");
      assert.equal(row?.phase, null);
      assert.equal(row?.metadata, null);
    });
  });

  describe("getStageEvents", () => {
    it("should return the events of one stage in a run", () => {
      emitExecutionEvent(db, { traceId: "r1", agent: "reviewer", eventType: "stage.failed", message: "m", phase: "review" });
      emitExecutionEvent(db, { traceId: "r1", agent: "build-test", eventType: "stage.succeeded", message: "m", phase: "build_test" });
      emitExecutionEvent(db, { traceId: "r2", agent: "reviewer", eventType: "stage.failed", message: "m", phase: "review" });

      assert.deepEqual(
        getStageEvents(db, "r1", "review").map((e) => [e.trace_id, e.event_type]),
        [["r1", "stage.failed"]],
      );
    });
  });

  describe("cleanupOldEvents", () => {
    it("should delete only events older than the retention window", () => {
      emitExecutionEvent(db, { traceId: "r1", agent: "product", eventType: "e1", message: "m1" });
      db.prepare(
        `INSERT INTO execution_events (trace_id, agent, event_type, message, created_at)
         VALUES ('r0', 'product', 'e0', 'old', '2020-01-01T00:00:00.000Z')`,
      ).run();

      assert.equal(cleanupOldEvents(db, 30), 1);
      assert.equal(getEventsByTraceId(db, "r1").length, 1);
      assert.equal(getEventsByTraceId(db, "r0").length, 0);
    });

    it("should reject a retention window that is not a whole number of days", () => {
      emitExecutionEvent(db, { traceId: "r1", agent: "product", eventType: "e1", message: "m1" });

      assert.throws(() => cleanupOldEvents(db, Number("abc")), {
        name: "RangeError",
        message: "daysToKeep must be a non-negative integer, got NaN",
      });
      assert.throws(() => cleanupOldEvents(db, -1), RangeError);
      assert.equal(getEventsByTraceId(db, "r1").length, 1);
    });
  });
});
