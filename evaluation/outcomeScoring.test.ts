import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { scoreStageOutcome } from "./outcomeScoring.js";

const BASE = {
  success: true,
  errorCount: 0,
  warningCount: 0,
  durationMs: 0,
  timeoutMs: 1000,
  attempt: 1,
};

describe("scoreStageOutcome", () => {
  it("should give a clean first-attempt success full marks", () => {
    assert.deepEqual(scoreStageOutcome(BASE), {
      correctness: 100,
      compliance: 100,
      efficiency: 100,
      stability: 100,
    });
  });

  it("should penalise violations, slowness and retries", () => {
    const scores = scoreStageOutcome({
      ...BASE,
      success: false,
      errorCount: 2,
      warningCount: 3,
      durationMs: 250,
      attempt: 3,
    });

    assert.deepEqual(scores, {
      correctness: 0,
      compliance: 35,
      efficiency: 75,
      stability: 50,
    });
  });

  it("should floor every score at zero", () => {
    const scores = scoreStageOutcome({
      ...BASE,
      errorCount: 10,
      durationMs: 5000,
      attempt: 9,
    });

    assert.equal(scores.compliance, 0);
    assert.equal(scores.efficiency, 0);
    assert.equal(scores.stability, 0);
  });

  it("should score cost only when usage and budget are both known", () => {
    assert.equal(scoreStageOutcome({ ...BASE, tokensUsed: 300 }).cost, undefined);
    assert.equal(scoreStageOutcome({ ...BASE, tokensUsed: 300, tokenBudget: 1000 }).cost, 70);
    assert.equal(scoreStageOutcome({ ...BASE, tokensUsed: 300, tokenBudget: 0 }).cost, undefined);
  });
});
