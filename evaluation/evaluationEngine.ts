import { componentLogger } from "../config/logger.js";
import {
  SCORE_CATEGORIES,
  isScoreCategory,
  type AutonomyConfig,
  type ScoreCategory,
} from "../config/runConfig.js";
import { KeyedLock } from "../shared/concurrency/keyedLock.js";
import type { OutcomeScores } from "./outcomeScoring.js";
import {
  EMPTY_TALLIES,
  gateFor,
  meanOfRecent,
  successRate,
  weightedAverage,
  type AgentScorecard,
  type AutonomyGate,
  type CategoryScores,
  type ScoreRecord,
  type StageTallies,
} from "./scorecard.js";

const log = componentLogger("evaluation");

const LOW_CATEGORY_AVERAGE = 60;
const LOW_SUCCESS_RATE = 0.8;
const HIGH_ESCALATION_COUNT = 5;

export interface StoredScore extends ScoreRecord {
  readonly executorId: string;
}

export interface StoredTallies {
  readonly executorId: string;
  readonly tallies: StageTallies;
}

/** Synchronous persistence behind the engine; calls run under the executor's lock. */
export interface EvaluationRepository {
  loadScores(): readonly StoredScore[];
  loadTallies(): readonly StoredTallies[];
  insertScores(executorId: string, records: readonly ScoreRecord[]): void;
  saveTallies(executorId: string, tallies: StageTallies): void;
}

export interface StageOutcomeRecord {
  readonly success: boolean;
  readonly scores: OutcomeScores;
  readonly runId?: string;
  readonly stageId?: string;
}

export interface LeaderboardEntry {
  readonly executorId: string;
  readonly overallScore: number;
  readonly autonomyLevel: number;
}

export interface EvaluationEngineOptions {
  readonly config: AutonomyConfig;
  readonly now?: () => Date;
  readonly repository?: EvaluationRepository;
}

interface ExecutorRecord {
  readonly history: Record<ScoreCategory, number[]>;
  tallies: StageTallies;
}

export class EvaluationEngine {
  private readonly records = new Map<string, ExecutorRecord>();
  private readonly lock = new KeyedLock();
  private readonly config: AutonomyConfig;
  private readonly now: () => Date;
  private readonly repository: EvaluationRepository | undefined;

  constructor(options: EvaluationEngineOptions) {
    this.config = options.config;
    this.now = options.now ?? (() => new Date());
    this.repository = options.repository;

    if (this.repository) {
      for (const stored of this.repository.loadScores()) {
        this.push(this.recordFor(stored.executorId), stored.category, stored.score);
      }
      for (const stored of this.repository.loadTallies()) {
        this.recordFor(stored.executorId).tallies = stored.tallies;
      }
      log.debug({ executors: this.records.size }, "Scorecards hydrated from repository");
    }
  }

  async recordOutcome(executorId: string, category: ScoreCategory, score: number): Promise<void> {
    assertScore(category, score);
    await this.lock.runExclusive(executorId, () => {
      this.applyScores(executorId, [{ category, score, recordedAt: this.now().toISOString() }]);
    });
  }

  /** Applies a finished stage's scores and tallies as one write. */
  async recordStageOutcome(executorId: string, outcome: StageOutcomeRecord): Promise<void> {
    const recordedAt = this.now().toISOString();
    const records: ScoreRecord[] = [];
    for (const category of SCORE_CATEGORIES) {
      const score = outcome.scores[category];
      if (score === undefined) continue;
      assertScore(category, score);
      records.push({ category, score, recordedAt, runId: outcome.runId, stageId: outcome.stageId });
    }

    await this.lock.runExclusive(executorId, () => {
      this.applyScores(executorId, records);
      const current = this.recordFor(executorId).tallies;
      this.saveTallies(executorId, {
        ...current,
        total: current.total + 1,
        succeeded: current.succeeded + (outcome.success ? 1 : 0),
        failed: current.failed + (outcome.success ? 0 : 1),
      });
    });

    log.debug(
      { executorId, success: outcome.success, autonomy: this.autonomyLevel(executorId) },
      "Stage outcome recorded",
    );
  }

  async recordEscalation(executorId: string): Promise<void> {
    await this.lock.runExclusive(executorId, () => {
      const current = this.recordFor(executorId).tallies;
      this.saveTallies(executorId, { ...current, escalations: current.escalations + 1 });
    });
  }

  /** Mean of the most recent `historyWindow` scores, neutral when there are none. */
  categoryScore(executorId: string, category: ScoreCategory): number {
    const history = this.records.get(executorId)?.history[category] ?? [];
    return meanOfRecent(history, this.config.historyWindow, this.config.neutralScore);
  }

  categoryScores(executorId: string): CategoryScores {
    return {
      correctness: this.categoryScore(executorId, "correctness"),
      efficiency: this.categoryScore(executorId, "efficiency"),
      compliance: this.categoryScore(executorId, "compliance"),
      cost: this.categoryScore(executorId, "cost"),
      stability: this.categoryScore(executorId, "stability"),
    };
  }

  overallScore(executorId: string): number {
    return weightedAverage(this.categoryScores(executorId), this.config.weights);
  }

  autonomyLevel(executorId: string, baseLevel: number = this.config.baseLevel): number {
    return (baseLevel * this.overallScore(executorId)) / 100;
  }

  autonomyGate(executorId: string, baseLevel: number = this.config.baseLevel): AutonomyGate {
    return gateFor(
      this.autonomyLevel(executorId, baseLevel),
      this.config.lowThreshold,
      this.config.highThreshold,
    );
  }

  scorecard(executorId: string): AgentScorecard {
    const record = this.records.get(executorId);
    const tallies = record?.tallies ?? EMPTY_TALLIES;
    const samples: Record<ScoreCategory, number> = {
      correctness: 0,
      efficiency: 0,
      compliance: 0,
      cost: 0,
      stability: 0,
    };
    for (const category of SCORE_CATEGORIES) {
      samples[category] = Math.min(record?.history[category].length ?? 0, this.config.historyWindow);
    }

    return {
      executorId,
      categoryScores: this.categoryScores(executorId),
      samples,
      tallies,
      overallScore: this.overallScore(executorId),
      successRate: successRate(tallies),
      autonomyLevel: this.autonomyLevel(executorId),
      gate: this.autonomyGate(executorId),
    };
  }

  /** Executors with any recorded activity, best overall score first. */
  leaderboard(): LeaderboardEntry[] {
    return [...this.records.keys()]
      .map((executorId) => ({
        executorId,
        overallScore: this.overallScore(executorId),
        autonomyLevel: this.autonomyLevel(executorId),
      }))
      .sort((a, b) => b.overallScore - a.overallScore || a.executorId.localeCompare(b.executorId));
  }

  recommendations(executorId: string): string[] {
    const card = this.scorecard(executorId);
    const advice: string[] = [];

    for (const category of SCORE_CATEGORIES) {
      const average = card.categoryScores[category];
      if (card.samples[category] > 0 && average < LOW_CATEGORY_AVERAGE) {
        advice.push(`Improve ${category}: current average ${average.toFixed(1)}`);
      }
    }
    if (card.successRate < LOW_SUCCESS_RATE) {
      advice.push(
        `Low success rate (${String(Math.round(card.successRate * 100))}%): consider additional validation`,
      );
    }
    if (card.tallies.escalations > HIGH_ESCALATION_COUNT) {
      advice.push(
        `High escalation count (${String(card.tallies.escalations)}): review authority scope`,
      );
    }
    return advice;
  }

  async flush(): Promise<void> {
    await this.lock.drain();
  }

  private applyScores(executorId: string, records: readonly ScoreRecord[]): void {
    if (records.length === 0) return;
    this.repository?.insertScores(executorId, records);
    const record = this.recordFor(executorId);
    for (const entry of records) {
      this.push(record, entry.category, entry.score);
    }
  }

  private saveTallies(executorId: string, tallies: StageTallies): void {
    this.repository?.saveTallies(executorId, tallies);
    this.recordFor(executorId).tallies = tallies;
  }

  private push(record: ExecutorRecord, category: ScoreCategory, score: number): void {
    const history = record.history[category];
    history.push(score);
    if (history.length > this.config.historyWindow) {
      history.splice(0, history.length - this.config.historyWindow);
    }
  }

  private recordFor(executorId: string): ExecutorRecord {
    let record = this.records.get(executorId);
    if (!record) {
      record = {
        history: { correctness: [], efficiency: [], compliance: [], cost: [], stability: [] },
        tallies: EMPTY_TALLIES,
      };
      this.records.set(executorId, record);
    }
    return record;
  }
}

function assertScore(category: unknown, score: number): void {
  if (!isScoreCategory(category)) {
    throw new RangeError(`Unknown score category: ${String(category)}`);
  }
  if (!Number.isFinite(score) || score < 0 || score > 100) {
    throw new RangeError(`Score for ${category} must be within 0..100, got ${String(score)}`);
  }
}
