import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { DEFAULT_EXECUTOR_PROFILES, type DefaultExecutorId } from "../agents/defaultHierarchy.js";
import type { ExecutorInvoke } from "../agents/types.js";
import { SCHEMAS_DIR, VALID_OUTPUTS } from "../orchestration/testing/harness.js";
import { getEventsByTraceId } from "../state/executionEvents.js";
import { listArtifacts } from "../state/artifacts.js";
import { getWorkflowRun } from "../state/workflowRuns.js";
import { createRuntime } from "./runtime.js";

const respond: ExecutorInvoke = async (contract) => ({ status: "success", output: { ...VALID_OUTPUTS[contract] } });

function allInvokers(): Partial<Record<DefaultExecutorId, ExecutorInvoke>> {
  const invokers: Partial<Record<DefaultExecutorId, ExecutorInvoke>> = {};
  for (const profile of DEFAULT_EXECUTOR_PROFILES) {
    invokers[profile.id] = respond;
  }
  return invokers;
}

describe("createRuntime", () => {
  it("should read its settings from the given environment", async () => {
    const runtime = createRuntime({
      dbPath: ":memory:",
      contractsDir: SCHEMAS_DIR,
      env: { CADRE_MAX_RETRIES: "1", CADRE_WORKER_POOL_SIZE: "2" },
    });

    assert.equal(runtime.config.scheduler.maxRetries, 1);
    assert.equal(runtime.config.scheduler.workerPoolSize, 2);
    assert.equal(runtime.registry.list().length, 0);
    await runtime.shutdown();
  });

  it("should register only the executors that were given an invoker", async () => {
    const runtime = createRuntime({
      dbPath: ":memory:",
      contractsDir: SCHEMAS_DIR,
      env: {},
      invokers: { architect: respond, product: respond },
    });

    assert.deepEqual(
      runtime.registry
        .list()
        .map((descriptor) => descriptor.id)
        .sort(),
      ["architect", "product"],
    );
    await runtime.shutdown();
  });

  it("should persist the result, events and artifacts of a run", async () => {
    const runtime = createRuntime({ dbPath: ":memory:", contractsDir: SCHEMAS_DIR, env: {}, invokers: allInvokers() });

    const result = await runtime.scheduler.execute("Build a todo API", undefined, { runId: "run-1" });

    assert.equal(result.success, true);
    assert.deepEqual(getWorkflowRun(runtime.db, "run-1")?.stagesCompleted, result.stagesCompleted);
    const events = getEventsByTraceId(runtime.db, "run-1");
    assert.equal(events[0]?.event_type, "run.started");
    assert.equal(events.at(-1)?.event_type, "run.finished");
    assert.equal(listArtifacts(runtime.db, "architect").length, 3);
    await runtime.shutdown();
  });

  it("should take executors added by the register hook", async () => {
    const runtime = createRuntime({
      dbPath: ":memory:",
      contractsDir: SCHEMAS_DIR,
      env: {},
      register: (registry) => {
        registry.register({
          id: "docs",
          authority: 4,
          accepts: ["architecture"],
          produces: ["architecture"],
          invoke: respond,
        });
      },
    });

    assert.equal(runtime.registry.get("docs")?.authority, 4);
    await runtime.shutdown();
  });

  it("should close the database on shutdown and tolerate a second call", async () => {
    const runtime = createRuntime({ dbPath: ":memory:", contractsDir: SCHEMAS_DIR, env: {} });

    await runtime.shutdown();
    await runtime.shutdown();

    assert.equal(runtime.db.open, false);
  });
});
