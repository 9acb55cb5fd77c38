import type { ScoreCategory } from "../config/runConfig.js";

const ERROR_PENALTY = 25;
const WARNING_PENALTY = 5;
const RETRY_PENALTY = 25;

export interface StageOutcomeFacts {
  readonly success: boolean;
  readonly errorCount: number;
  readonly warningCount: number;
  readonly durationMs: number;
  readonly timeoutMs: number;
  readonly attempt: number;
  readonly tokensUsed?: number;
  readonly tokenBudget?: number;
}

export type OutcomeScores = Partial<Record<ScoreCategory, number>>;

/**
 * Maps what happened during one stage attempt onto 0-100 category scores.
 * Cost is scored only when both token usage and a budget are known.
 */
export function scoreStageOutcome(facts: StageOutcomeFacts): OutcomeScores {
  const scores: OutcomeScores = {
    correctness: facts.success ? 100 : 0,
    compliance: Math.max(0, 100 - ERROR_PENALTY * facts.errorCount - WARNING_PENALTY * facts.warningCount),
    efficiency: ratioScore(facts.durationMs, facts.timeoutMs),
    stability: Math.max(0, 100 - RETRY_PENALTY * (facts.attempt - 1)),
  };

  if (facts.tokensUsed !== undefined && facts.tokenBudget !== undefined && facts.tokenBudget > 0) {
    scores.cost = ratioScore(facts.tokensUsed, facts.tokenBudget);
  }

  return scores;
}

function ratioScore(used: number, limit: number): number {
  if (limit <= 0) return 0;
  return Math.round(100 * (1 - Math.min(1, Math.max(0, used) / limit)));
}
