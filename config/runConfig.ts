import { ConfigError } from "../shared/errors.js";

export const SCORE_CATEGORIES = [
  "correctness",
  "efficiency",
  "compliance",
  "cost",
  "stability",
] as const;

export type ScoreCategory = (typeof SCORE_CATEGORIES)[number];
export type ScoreWeights = Readonly<Record<ScoreCategory, number>>;

export interface SchedulerConfig {
  readonly maxRetries: number;
  readonly workerPoolSize: number;
  readonly executorTimeoutMs: number;
  readonly maxReroutes: number;
  readonly maxEscalations: number;
}

export interface AutonomyConfig {
  readonly baseLevel: number;
  readonly lowThreshold: number;
  readonly highThreshold: number;
  readonly weights: ScoreWeights;
  readonly historyWindow: number;
  readonly neutralScore: number;
  readonly allowReviewSkip: boolean;
  /** Stage outcomes an executor needs on record before its work may skip review. */
  readonly minExemptionSamples: number;
}

export interface RunConfig {
  readonly scheduler: SchedulerConfig;
  readonly autonomy: AutonomyConfig;
  readonly precedence: readonly string[];
  readonly pruneThreshold: number;
}

export interface RunConfigOverrides {
  readonly scheduler?: Partial<SchedulerConfig>;
  readonly autonomy?: Partial<Omit<AutonomyConfig, "weights">> & {
    readonly weights?: Partial<ScoreWeights>;
  };
  readonly precedence?: readonly string[];
  readonly pruneThreshold?: number;
}

export const EQUAL_WEIGHTS: ScoreWeights = {
  correctness: 1,
  efficiency: 1,
  compliance: 1,
  cost: 1,
  stability: 1,
};

type Env = Readonly<Record<string, string | undefined>>;

export function loadRunConfig(env: Env = process.env): RunConfig {
  const config: RunConfig = {
    scheduler: {
      maxRetries: readInteger(env, "CADRE_MAX_RETRIES", 3),
      workerPoolSize: readInteger(env, "CADRE_WORKER_POOL_SIZE", 4),
      executorTimeoutMs: readInteger(env, "CADRE_EXECUTOR_TIMEOUT_MS", 300_000),
      maxReroutes: readInteger(env, "CADRE_MAX_REROUTES", 2),
      maxEscalations: readInteger(env, "CADRE_MAX_ESCALATIONS", 1),
    },
    autonomy: {
      baseLevel: readNumber(env, "CADRE_AUTONOMY_BASE", 1),
      lowThreshold: readNumber(env, "CADRE_AUTONOMY_LOW", 0.3),
      highThreshold: readNumber(env, "CADRE_AUTONOMY_HIGH", 0.85),
      weights: parseWeights(env["CADRE_SCORE_WEIGHTS"]),
      historyWindow: readInteger(env, "CADRE_HISTORY_WINDOW", 20),
      neutralScore: 50,
      allowReviewSkip: env["CADRE_ALLOW_REVIEW_SKIP"] !== "false",
      minExemptionSamples: readInteger(env, "CADRE_MIN_EXEMPTION_SAMPLES", 5),
    },
    precedence: parseList(env["CADRE_PRECEDENCE"]),
    pruneThreshold: readNumber(env, "CADRE_PRUNE_THRESHOLD", 0.1),
  };

  assertValidRunConfig(config);
  return config;
}

export function mergeRunConfig(base: RunConfig, overrides?: RunConfigOverrides): RunConfig {
  if (!overrides) return base;

  const merged: RunConfig = {
    scheduler: { ...base.scheduler, ...overrides.scheduler },
    autonomy: {
      ...base.autonomy,
      ...overrides.autonomy,
      weights: { ...base.autonomy.weights, ...overrides.autonomy?.weights },
    },
    precedence: overrides.precedence ?? base.precedence,
    pruneThreshold: overrides.pruneThreshold ?? base.pruneThreshold,
  };

  assertValidRunConfig(merged);
  return merged;
}

export function assertValidRunConfig(config: RunConfig): void {
  const { scheduler, autonomy } = config;

  requireInteger("scheduler.maxRetries", scheduler.maxRetries, 0);
  requireInteger("scheduler.workerPoolSize", scheduler.workerPoolSize, 1);
  requireInteger("scheduler.executorTimeoutMs", scheduler.executorTimeoutMs, 1);
  requireInteger("scheduler.maxReroutes", scheduler.maxReroutes, 0);
  requireInteger("scheduler.maxEscalations", scheduler.maxEscalations, 0);
  requireInteger("autonomy.historyWindow", autonomy.historyWindow, 1);
  requireInteger("autonomy.minExemptionSamples", autonomy.minExemptionSamples, 0);

  if (!(autonomy.baseLevel > 0)) {
    throw new ConfigError(`autonomy.baseLevel must be positive, got ${String(autonomy.baseLevel)}`);
  }
  if (autonomy.lowThreshold < 0 || autonomy.highThreshold < autonomy.lowThreshold) {
    throw new ConfigError(
      `autonomy thresholds must satisfy 0 <= low <= high, got low=${String(autonomy.lowThreshold)} high=${String(autonomy.highThreshold)}`,
    );
  }
  if (autonomy.neutralScore < 0 || autonomy.neutralScore > 100) {
    throw new ConfigError(`autonomy.neutralScore must be within 0..100`);
  }
  assertValidWeights(autonomy.weights);

  if (!(config.pruneThreshold >= 0 && config.pruneThreshold <= 1)) {
    throw new ConfigError(`pruneThreshold must be within 0..1, got ${String(config.pruneThreshold)}`);
  }
}

export function assertValidWeights(weights: ScoreWeights): void {
  let total = 0;
  for (const category of SCORE_CATEGORIES) {
    const weight = weights[category];
    if (!Number.isFinite(weight) || weight < 0) {
      throw new ConfigError(`weight for ${category} must be a non-negative number, got ${String(weight)}`);
    }
    total += weight;
  }
  if (total <= 0) {
    throw new ConfigError("score weights must not all be zero");
  }
}

function parseWeights(raw: string | undefined): ScoreWeights {
  if (raw === undefined || raw.trim().length === 0) {
    return EQUAL_WEIGHTS;
  }

  const weights: Record<ScoreCategory, number> = { ...EQUAL_WEIGHTS };
  for (const pair of raw.split(",")) {
    const [key, value] = pair.split("=").map((part) => part.trim());
    if (!isScoreCategory(key)) {
      throw new ConfigError(`CADRE_SCORE_WEIGHTS has unknown category "${String(key)}"`);
    }
    const weight = Number(value);
    if (value === undefined || value.length === 0 || !Number.isFinite(weight)) {
      throw new ConfigError(`CADRE_SCORE_WEIGHTS has an invalid weight for ${key}: "${String(value)}"`);
    }
    weights[key] = weight;
  }
  return weights;
}

export function isScoreCategory(value: unknown): value is ScoreCategory {
  return SCORE_CATEGORIES.some((category) => category === value);
}

function parseList(raw: string | undefined): readonly string[] {
  if (raw === undefined) return [];
  return raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function readNumber(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim().length === 0) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

function readInteger(env: Env, name: string, fallback: number): number {
  const value = readNumber(env, name, fallback);
  if (!Number.isInteger(value)) {
    throw new ConfigError(`${name} must be an integer, got "${String(env[name])}"`);
  }
  return value;
}

function requireInteger(field: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${field} must be an integer >= ${String(min)}, got ${String(value)}`);
  }
}
