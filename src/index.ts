export { createRuntime } from "./runtime.js";
export type { Runtime, RuntimeOptions } from "./runtime.js";

export { ExecutorRegistry } from "../agents/executorRegistry.js";
export type { ExecutorSnapshot } from "../agents/executorRegistry.js";
export { DEFAULT_EXECUTOR_PROFILES, registerDefaultExecutors } from "../agents/defaultHierarchy.js";
export type { DefaultExecutorId } from "../agents/defaultHierarchy.js";
export type {
  ExecutorDescriptor,
  ExecutorInvoke,
  ExecutorOutcome,
  ExecutorProfile,
  ExecutorUsage,
  InvocationContext,
} from "../agents/types.js";

export { AuthorityResolver } from "../authority/authorityResolver.js";
export type { AuthorityResolverOptions, ResolverCandidate } from "../authority/authorityResolver.js";
export type { Conflict, ConflictResolution, ConflictStatus, ResolutionDecision } from "../authority/conflict.js";

export { componentLogger, logger } from "../config/logger.js";
export { getCadreHome, getContractsDir, getDatabasePath } from "../config/paths.js";
export { EQUAL_WEIGHTS, SCORE_CATEGORIES, loadRunConfig, mergeRunConfig } from "../config/runConfig.js";
export type {
  AutonomyConfig,
  RunConfig,
  RunConfigOverrides,
  SchedulerConfig,
  ScoreCategory,
  ScoreWeights,
} from "../config/runConfig.js";

export { ContractValidator, VERSION_FIELD, hasBlockingViolations } from "../contracts/contractValidator.js";
export type { ContractSummary } from "../contracts/contractValidator.js";
export type { ContractSchema, Payload, Severity, Violation } from "../contracts/contract.types.js";
export { checkCompatibility, compareVersions, parseVersion } from "../contracts/versioning.js";
export type { Compatibility, ContractVersion } from "../contracts/versioning.js";

export { EvaluationEngine } from "../evaluation/evaluationEngine.js";
export type {
  EvaluationEngineOptions,
  EvaluationRepository,
  LeaderboardEntry,
  StageOutcomeRecord,
} from "../evaluation/evaluationEngine.js";
export type { AgentScorecard, AutonomyGate, CategoryScores, StageTallies } from "../evaluation/scorecard.js";

export { DEFAULT_PRUNE_THRESHOLD, MemoryStore } from "../memory/memoryStore.js";
export type { MemoryStoreOptions } from "../memory/memoryStore.js";
export { MEMORY_SCOPES } from "../memory/types.js";
export type { MemoryEntry, MemoryRepository, MemoryScope, MemoryStats, ScoredMemoryEntry } from "../memory/types.js";

export { DEFAULT_FAILURE_ROUTING, DEFAULT_STAGE_ORDER, DEFAULT_WORKFLOW } from "../orchestration/defaultWorkflow.js";
export { compileWorkflow, topologicalOrder } from "../orchestration/workflowGraph.js";
export { WorkflowScheduler, retryArbiter } from "../orchestration/workflowScheduler.js";
export type { SubmitOptions, WorkflowSchedulerOptions } from "../orchestration/workflowScheduler.js";
export type {
  ApprovalGate,
  ApprovalRequest,
  ArtifactRecord,
  ArtifactStore,
  ConflictArbiter,
  FailureRoutingTable,
  RunEvent,
  RunEventSink,
  RunStatus,
  StageDefinition,
  StageFailure,
  WorkflowGraph,
  WorkflowResult,
} from "../orchestration/types.js";

export { SqliteArtifactStore } from "../state/artifacts.js";
export { openDatabase } from "../state/db.js";
export { getEventsByTraceId, getStageEvents } from "../state/executionEvents.js";
export type { ExecutionEventRow } from "../state/executionEvents.js";
export { getRecentWorkflowRuns, getRunSuccessRate, getWorkflowRun } from "../state/workflowRuns.js";

export {
  ConfigError,
  ExecutorRegistrationError,
  GraphError,
  OwnershipError,
  SchemaNotFoundError,
  UnresolvableConflictError,
  ValidationError,
} from "../shared/errors.js";
