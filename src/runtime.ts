import type BetterSqlite3 from "better-sqlite3";
import { registerDefaultExecutors, type DefaultExecutorId } from "../agents/defaultHierarchy.js";
import { ExecutorRegistry } from "../agents/executorRegistry.js";
import type { ExecutorInvoke } from "../agents/types.js";
import { componentLogger } from "../config/logger.js";
import { getContractsDir, getDatabasePath } from "../config/paths.js";
import { loadRunConfig, type RunConfig } from "../config/runConfig.js";
import { ContractValidator } from "../contracts/contractValidator.js";
import { EvaluationEngine } from "../evaluation/evaluationEngine.js";
import { createRunEventEmitter } from "../execution/runEventEmitter.js";
import { MemoryStore } from "../memory/memoryStore.js";
import type { ApprovalGate, ConflictArbiter, FailureRoutingTable } from "../orchestration/types.js";
import { WorkflowScheduler } from "../orchestration/workflowScheduler.js";
import { SqliteArtifactStore } from "../state/artifacts.js";
import { openDatabase } from "../state/db.js";
import { createMemoryRepository } from "../state/memoryEntries.js";
import { createEvaluationRepository } from "../state/scoreEntries.js";
import { saveWorkflowRun } from "../state/workflowRuns.js";

const log = componentLogger("runtime");

export interface RuntimeOptions {
  /** Defaults to CADRE_DB_PATH or the cadre home directory. */
  readonly dbPath?: string;
  readonly contractsDir?: string;
  readonly env?: Readonly<Record<string, string | undefined>>;
  /** Invokers for the default hierarchy; profiles without one stay unregistered. */
  readonly invokers?: Partial<Record<DefaultExecutorId, ExecutorInvoke>>;
  /** Registers further executors before artifact owners are collected. */
  readonly register?: (registry: ExecutorRegistry) => void;
  readonly routing?: FailureRoutingTable;
  readonly arbiter?: ConflictArbiter;
  readonly approvalGate?: ApprovalGate;
  readonly now?: () => Date;
}

export interface Runtime {
  readonly db: BetterSqlite3.Database;
  readonly config: RunConfig;
  readonly registry: ExecutorRegistry;
  readonly validator: ContractValidator;
  readonly memory: MemoryStore;
  readonly evaluation: EvaluationEngine;
  readonly artifacts: SqliteArtifactStore;
  readonly scheduler: WorkflowScheduler;
  /** Waits for running workflows and pending writes, then closes the database. */
  shutdown(): Promise<void>;
}

/**
 * Builds the process-wide state: one database, one registry, one validator,
 * memory and evaluation hydrated from the database, and a scheduler whose runs
 * write their events and results back to it.
 */
export function createRuntime(options: RuntimeOptions = {}): Runtime {
  const config = loadRunConfig(options.env);
  const validator = ContractValidator.fromDirectory(options.contractsDir ?? getContractsDir());
  const db = openDatabase(options.dbPath ?? getDatabasePath());

  const registry = new ExecutorRegistry();
  registerDefaultExecutors(registry, options.invokers ?? {});
  options.register?.(registry);

  const memory = new MemoryStore({ now: options.now, repository: createMemoryRepository(db) });
  const evaluation = new EvaluationEngine({
    config: config.autonomy,
    now: options.now,
    repository: createEvaluationRepository(db),
  });
  const artifacts = new SqliteArtifactStore(db, { owners: registry.artifactOwners(), now: options.now });

  const scheduler = new WorkflowScheduler({
    registry,
    validator,
    memory,
    evaluation,
    config,
    routing: options.routing,
    arbiter: options.arbiter,
    approvalGate: options.approvalGate,
    artifacts,
    events: (runId) => createRunEventEmitter(db, runId),
    onRunFinished: (result) => saveWorkflowRun(db, result),
    now: options.now,
  });

  log.info(
    { executors: registry.list().length, contracts: validator.listContracts().length },
    "Runtime initialized",
  );

  let closed = false;
  const shutdown = async (): Promise<void> => {
    if (closed) return;
    closed = true;
    await scheduler.drain();
    await memory.flush();
    await evaluation.flush();
    db.close();
    log.info("Runtime shut down");
  };

  return { db, config, registry, validator, memory, evaluation, artifacts, scheduler, shutdown };
}
