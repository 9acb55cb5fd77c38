import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { ConfigError } from "../shared/errors.js";
import { EQUAL_WEIGHTS, loadRunConfig, mergeRunConfig } from "./runConfig.js";

describe("config/runConfig", () => {
  describe("loadRunConfig", () => {
    it("should fall back to defaults when nothing is set", () => {
      const config = loadRunConfig({});

      assert.deepEqual(config.scheduler, {
        maxRetries: 3,
        workerPoolSize: 4,
        executorTimeoutMs: 300_000,
        maxReroutes: 2,
        maxEscalations: 1,
      });
      assert.equal(config.autonomy.baseLevel, 1);
      assert.equal(config.autonomy.lowThreshold, 0.3);
      assert.equal(config.autonomy.highThreshold, 0.85);
      assert.equal(config.autonomy.historyWindow, 20);
      assert.equal(config.autonomy.neutralScore, 50);
      assert.equal(config.autonomy.allowReviewSkip, true);
      assert.equal(config.autonomy.minExemptionSamples, 5);
      assert.deepEqual(config.autonomy.weights, EQUAL_WEIGHTS);
      assert.deepEqual(config.precedence, []);
      assert.equal(config.pruneThreshold, 0.1);
    });

    it("should read scheduler limits and precedence from the environment", () => {
      const config = loadRunConfig({
        CADRE_MAX_RETRIES: "5",
        CADRE_WORKER_POOL_SIZE: "2",
        CADRE_PRECEDENCE: "architect, product ,,reviewer",
        CADRE_ALLOW_REVIEW_SKIP: "false",
      });

      assert.equal(config.scheduler.maxRetries, 5);
      assert.equal(config.scheduler.workerPoolSize, 2);
      assert.deepEqual(config.precedence, ["architect", "product", "reviewer"]);
      assert.equal(config.autonomy.allowReviewSkip, false);
    });

    it("should parse score weights and keep unspecified categories at 1", () => {
      const config = loadRunConfig({ CADRE_SCORE_WEIGHTS: "correctness=3, cost=0" });

      assert.deepEqual(config.autonomy.weights, {
        correctness: 3,
        efficiency: 1,
        compliance: 1,
        cost: 0,
        stability: 1,
      });
    });

    it("should reject an unknown weight category", () => {
      assert.throws(() => loadRunConfig({ CADRE_SCORE_WEIGHTS: "speed=2" }), ConfigError);
    });

    it("should reject a non-numeric value", () => {
      assert.throws(
        () => loadRunConfig({ CADRE_EXECUTOR_TIMEOUT_MS: "soon" }),
        /CADRE_EXECUTOR_TIMEOUT_MS must be a number/,
      );
    });

    it("should reject a fractional retry count", () => {
      assert.throws(() => loadRunConfig({ CADRE_MAX_RETRIES: "1.5" }), /must be an integer/);
    });

    it("should reject a worker pool of zero", () => {
      assert.throws(() => loadRunConfig({ CADRE_WORKER_POOL_SIZE: "0" }), ConfigError);
    });

    it("should reject inverted autonomy thresholds", () => {
      assert.throws(
        () => loadRunConfig({ CADRE_AUTONOMY_LOW: "0.9", CADRE_AUTONOMY_HIGH: "0.5" }),
        /thresholds/,
      );
    });
  });

  describe("mergeRunConfig", () => {
    it("should return the base when there are no overrides", () => {
      const base = loadRunConfig({});
      assert.equal(mergeRunConfig(base), base);
    });

    it("should overlay nested fields without dropping siblings", () => {
      const base = loadRunConfig({});
      const merged = mergeRunConfig(base, {
        scheduler: { maxRetries: 0 },
        autonomy: { weights: { stability: 4 } },
      });

      assert.equal(merged.scheduler.maxRetries, 0);
      assert.equal(merged.scheduler.workerPoolSize, 4);
      assert.equal(merged.autonomy.weights.stability, 4);
      assert.equal(merged.autonomy.weights.correctness, 1);
    });

    it("should reject weights that are all zero", () => {
      const base = loadRunConfig({});
      assert.throws(
        () =>
          mergeRunConfig(base, {
            autonomy: {
              weights: { correctness: 0, efficiency: 0, compliance: 0, cost: 0, stability: 0 },
            },
          }),
        /must not all be zero/,
      );
    });
  });
});
