import { SCORE_CATEGORIES, type ScoreCategory, type ScoreWeights } from "../config/runConfig.js";

export type AutonomyGate = "approval_required" | "standard" | "review_exempt";

export type CategoryScores = Readonly<Record<ScoreCategory, number>>;

export interface ScoreRecord {
  readonly category: ScoreCategory;
  readonly score: number;
  readonly recordedAt: string;
  readonly runId?: string;
  readonly stageId?: string;
}

export interface StageTallies {
  readonly total: number;
  readonly succeeded: number;
  readonly failed: number;
  readonly escalations: number;
}

export interface AgentScorecard {
  readonly executorId: string;
  readonly categoryScores: CategoryScores;
  readonly samples: Readonly<Record<ScoreCategory, number>>;
  readonly tallies: StageTallies;
  readonly overallScore: number;
  readonly successRate: number;
  readonly autonomyLevel: number;
  readonly gate: AutonomyGate;
}

export const EMPTY_TALLIES: StageTallies = { total: 0, succeeded: 0, failed: 0, escalations: 0 };

export function meanOfRecent(scores: readonly number[], window: number, neutral: number): number {
  const recent = scores.slice(-window);
  if (recent.length === 0) return neutral;
  return recent.reduce((sum, score) => sum + score, 0) / recent.length;
}

export function weightedAverage(scores: CategoryScores, weights: ScoreWeights): number {
  let total = 0;
  let totalWeight = 0;
  for (const category of SCORE_CATEGORIES) {
    total += scores[category] * weights[category];
    totalWeight += weights[category];
  }
  return totalWeight > 0 ? total / totalWeight : 0;
}

export function successRate(tallies: StageTallies): number {
  return tallies.total === 0 ? 1 : tallies.succeeded / tallies.total;
}

export function gateFor(level: number, lowThreshold: number, highThreshold: number): AutonomyGate {
  if (level < lowThreshold) return "approval_required";
  if (level > highThreshold) return "review_exempt";
  return "standard";
}
