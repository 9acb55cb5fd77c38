import { describe, it, beforeEach } from "node:test";
import assert from "node:assert/strict";
import { loadRunConfig, mergeRunConfig, type AutonomyConfig } from "../config/runConfig.js";
import { EvaluationEngine, type EvaluationRepository, type StoredScore } from "./evaluationEngine.js";
import type { StageTallies } from "./scorecard.js";

const DEFAULTS = loadRunConfig({});

function autonomy(overrides: Parameters<typeof mergeRunConfig>[1] = {}): AutonomyConfig {
  return mergeRunConfig(DEFAULTS, overrides).autonomy;
}

async function recordAll(engine: EvaluationEngine, executorId: string, score: number): Promise<void> {
  for (const category of ["correctness", "efficiency", "compliance", "cost", "stability"] as const) {
    await engine.recordOutcome(executorId, category, score);
  }
}

describe("EvaluationEngine", () => {
  let engine: EvaluationEngine;

  beforeEach(() => {
    engine = new EvaluationEngine({ config: autonomy() });
  });

  it("should start every executor at the neutral score", () => {
    const card = engine.scorecard("reviewer");

    assert.deepEqual(card.categoryScores, {
      correctness: 50,
      efficiency: 50,
      compliance: 50,
      cost: 50,
      stability: 50,
    });
    assert.equal(card.overallScore, 50);
    assert.equal(card.autonomyLevel, 0.5);
    assert.equal(card.gate, "standard");
    assert.equal(card.successRate, 1);
  });

  it("should average recorded scores into the overall score", async () => {
    await engine.recordOutcome("reviewer", "correctness", 100);

    assert.equal(engine.categoryScore("reviewer", "correctness"), 100);
    assert.equal(engine.overallScore("reviewer"), 60);
    assert.equal(engine.autonomyLevel("reviewer"), 0.6);
  });

  it("should only consider the most recent history window", async () => {
    const windowed = new EvaluationEngine({ config: autonomy({ autonomy: { historyWindow: 3 } }) });
    for (const score of [0, 0, 0, 90, 100, 80]) {
      await windowed.recordOutcome("infra", "stability", score);
    }

    assert.equal(windowed.categoryScore("infra", "stability"), 90);
    assert.equal(windowed.scorecard("infra").samples.stability, 3);
  });

  it("should scale autonomy by the base level", () => {
    assert.equal(engine.autonomyLevel("architect", 2), 1);
  });

  it("should apply configured weights", async () => {
    const weighted = new EvaluationEngine({
      config: autonomy({
        autonomy: { weights: { correctness: 3, efficiency: 1, compliance: 0, cost: 0, stability: 0 } },
      }),
    });
    await weighted.recordOutcome("product", "correctness", 90);
    await weighted.recordOutcome("product", "efficiency", 10);

    assert.equal(weighted.overallScore("product"), 70);
  });

  it("should require approval below the low threshold", async () => {
    await recordAll(engine, "implementation", 10);
    assert.equal(engine.autonomyGate("implementation"), "approval_required");
  });

  it("should exempt review above the high threshold", async () => {
    await recordAll(engine, "implementation", 90);
    assert.equal(engine.autonomyGate("implementation"), "review_exempt");
  });

  it("should stay standard exactly at a threshold", async () => {
    await recordAll(engine, "implementation", 30);
    assert.equal(engine.autonomyLevel("implementation"), 0.3);
    assert.equal(engine.autonomyGate("implementation"), "standard");
  });

  it("should reject scores outside 0..100", async () => {
    await assert.rejects(engine.recordOutcome("infra", "cost", 101), RangeError);
    await assert.rejects(
      engine.recordStageOutcome("infra", { success: true, scores: { cost: -1 } }),
      RangeError,
    );
    assert.deepEqual(engine.scorecard("infra").tallies, {
      total: 0,
      succeeded: 0,
      failed: 0,
      escalations: 0,
    });
  });

  it("should tally stage outcomes and escalations", async () => {
    await engine.recordStageOutcome("build-test", { success: true, scores: { correctness: 100 } });
    await engine.recordStageOutcome("build-test", { success: false, scores: { correctness: 0 } });
    await engine.recordEscalation("build-test");

    const card = engine.scorecard("build-test");
    assert.deepEqual(card.tallies, { total: 2, succeeded: 1, failed: 1, escalations: 1 });
    assert.equal(card.successRate, 0.5);
    assert.equal(card.categoryScores.correctness, 50);
  });

  it("should serialize concurrent writes for the same executor", async () => {
    await Promise.all(
      Array.from({ length: 20 }, (_, i) =>
        engine.recordStageOutcome("integrator", { success: i % 2 === 0, scores: { stability: 100 } }),
      ),
    );

    assert.deepEqual(engine.scorecard("integrator").tallies, {
      total: 20,
      succeeded: 10,
      failed: 10,
      escalations: 0,
    });
  });

  it("should recommend improvements for weak scored categories only", async () => {
    await engine.recordStageOutcome("implementation", {
      success: false,
      scores: { correctness: 0, compliance: 40 },
    });
    for (let i = 0; i < 6; i++) {
      await engine.recordEscalation("implementation");
    }

    assert.deepEqual(engine.recommendations("implementation"), [
      "Improve correctness: current average 0.0",
      "Improve compliance: current average 40.0",
      "Low success rate (0%): consider additional validation",
      "High escalation count (6): review authority scope",
    ]);
    assert.deepEqual(engine.recommendations("architect"), []);
  });

  it("should rank the leaderboard by overall score then id", async () => {
    await engine.recordOutcome("reviewer", "correctness", 100);
    await engine.recordOutcome("infra", "correctness", 0);
    await engine.recordEscalation("architect");
    await engine.recordEscalation("build-test");

    assert.deepEqual(
      engine.leaderboard().map((entry) => [entry.executorId, entry.overallScore]),
      [
        ["reviewer", 60],
        ["architect", 50],
        ["build-test", 50],
        ["infra", 40],
      ],
    );
  });

  it("should hydrate from and write through to a repository", async () => {
    const scores: StoredScore[] = [
      { executorId: "product", category: "correctness", score: 20, recordedAt: "2026-01-01T00:00:00.000Z" },
    ];
    const tallies = new Map<string, StageTallies>([
      ["product", { total: 4, succeeded: 1, failed: 3, escalations: 0 }],
    ]);
    const repository: EvaluationRepository = {
      loadScores: () => scores,
      loadTallies: () => [...tallies].map(([executorId, value]) => ({ executorId, tallies: value })),
      insertScores: (executorId, records) => {
        scores.push(...records.map((record) => ({ ...record, executorId })));
      },
      saveTallies: (executorId, value) => {
        tallies.set(executorId, value);
      },
    };

    const persistent = new EvaluationEngine({ config: autonomy(), repository });
    assert.equal(persistent.categoryScore("product", "correctness"), 20);
    assert.equal(persistent.scorecard("product").successRate, 0.25);

    await persistent.recordStageOutcome("product", { success: true, scores: { correctness: 100 }, runId: "run-1" });

    assert.equal(scores.length, 2);
    assert.equal(scores[1]?.runId, "run-1");
    assert.deepEqual(tallies.get("product"), { total: 5, succeeded: 2, failed: 3, escalations: 0 });
    assert.equal(persistent.categoryScore("product", "correctness"), 60);
  });
});
