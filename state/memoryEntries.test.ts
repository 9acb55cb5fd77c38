import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import type BetterSqlite3 from "better-sqlite3";
import { MemoryStore } from "../memory/memoryStore.js";
import type { MemoryEntry } from "../memory/types.js";
import { openDatabase } from "./db.js";
import {
  countMemoryEntries,
  createMemoryRepository,
  deleteMemoryEntries,
  insertMemoryEntry,
  loadMemoryEntries,
} from "./memoryEntries.js";

const START = new Date("2026-03-01T00:00:00.000Z");

function entry(id: string, sequence: number, overrides: Partial<MemoryEntry> = {}): MemoryEntry {
  return {
    id,
    scope: "failure",
    content: { stageId: "build_test", message: "tests red" },
    initialConfidence: 1,
    createdAt: START.toISOString(),
    source: "build-test",
    tags: ["run-1", "build_test"],
    sequence,
    ...overrides,
  };
}

describe("memoryEntries", () => {
  let db: BetterSqlite3.Database;

  beforeEach(() => {
    db = openDatabase(":memory:");
  });

  afterEach(() => {
    db.close();
  });

  it("should round-trip an entry", () => {
    insertMemoryEntry(db, entry("mem-1", 1));

    const [loaded] = loadMemoryEntries(db);
    assert.deepEqual(loaded, entry("mem-1", 1));
    assert.ok(Object.isFrozen(loaded));
  });

  it("should load entries in append order and filter by scope", () => {
    insertMemoryEntry(db, entry("mem-2", 2, { scope: "working" }));
    insertMemoryEntry(db, entry("mem-1", 1));

    assert.deepEqual(
      loadMemoryEntries(db).map((row) => row.id),
      ["mem-1", "mem-2"],
    );
    assert.deepEqual(
      loadMemoryEntries(db, "working").map((row) => row.id),
      ["mem-2"],
    );
  });

  it("should reject a confidence outside (0, 1]", () => {
    assert.throws(() => insertMemoryEntry(db, entry("mem-1", 1, { initialConfidence: 0 })), /CHECK constraint/);
  });

  it("should delete by id and report how many rows went", () => {
    insertMemoryEntry(db, entry("mem-1", 1));
    insertMemoryEntry(db, entry("mem-2", 2));

    assert.equal(deleteMemoryEntries(db, ["mem-1", "missing"]), 1);
    assert.equal(countMemoryEntries(db), 1);
  });

  it("should hydrate a store and persist its appends and prunes", async () => {
    let now = START;
    let ids = 0;
    const options = {
      now: () => now,
      idFactory: () => `mem-${String(++ids)}`,
      repository: createMemoryRepository(db),
    };

    const first = new MemoryStore(options);
    await first.append("failure", { message: "tests red" }, 1, { source: "build-test" });
    await first.append("project", { decision: "use sqlite" }, 1);
    assert.equal(countMemoryEntries(db), 2);

    const second = new MemoryStore(options);
    assert.equal(second.stats().total, 2);
    assert.deepEqual(second.query("project")[0]?.content, { decision: "use sqlite" });

    now = new Date(START.getTime() + 96 * 3_600_000);
    const removed = await second.prune(0.1);
    assert.deepEqual(
      removed.map((row) => row.id),
      ["mem-1"],
    );
    assert.deepEqual(
      loadMemoryEntries(db).map((row) => row.id),
      ["mem-2"],
    );

    const third = new MemoryStore(options);
    const appended = await third.append("working", { note: "after restart" }, 0.5);
    assert.equal(appended.sequence, 3);
  });
});
