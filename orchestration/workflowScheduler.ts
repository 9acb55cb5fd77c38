import crypto from "node:crypto";
import type { ExecutorRegistry } from "../agents/executorRegistry.js";
import { AuthorityResolver } from "../authority/authorityResolver.js";
import type { ConflictResolution } from "../authority/conflict.js";
import { componentLogger } from "../config/logger.js";
import { mergeRunConfig, type RunConfig, type RunConfigOverrides } from "../config/runConfig.js";
import type { ContractValidator } from "../contracts/contractValidator.js";
import type { EvaluationEngine } from "../evaluation/evaluationEngine.js";
import type { MemoryStore } from "../memory/memoryStore.js";
import { DEFAULT_FAILURE_ROUTING, DEFAULT_WORKFLOW } from "./defaultWorkflow.js";
import type {
  ApprovalGate,
  ArtifactStore,
  ConflictArbiter,
  FailureRoutingTable,
  RunEventSink,
  RunStatus,
  WorkflowGraph,
  WorkflowResult,
} from "./types.js";
import { compileWorkflow } from "./workflowGraph.js";
import { WorkflowRun } from "./workflowRun.js";

const log = componentLogger("scheduler");

export interface WorkflowSchedulerOptions {
  readonly registry: ExecutorRegistry;
  readonly validator: ContractValidator;
  readonly memory: MemoryStore;
  readonly evaluation: EvaluationEngine;
  readonly config: RunConfig;
  readonly routing?: FailureRoutingTable;
  readonly arbiter?: ConflictArbiter;
  readonly approvalGate?: ApprovalGate;
  readonly artifacts?: ArtifactStore;
  /** Builds the event sink of each run. */
  readonly events?: (runId: string) => RunEventSink;
  readonly onRunFinished?: (result: WorkflowResult) => void | Promise<void>;
  readonly now?: () => Date;
  readonly idFactory?: () => string;
  /** Finished runs kept for `status`; older ones are forgotten first. Defaults to 100. */
  readonly retainFinishedRuns?: number;
}

export const DEFAULT_RETAINED_RUNS = 100;

export interface SubmitOptions {
  readonly overrides?: RunConfigOverrides;
  readonly runId?: string;
}

/** Resolver decides to retry unless told otherwise. */
export const retryArbiter: ConflictArbiter = (conflict, resolverId): ConflictResolution => ({
  decision: "retry",
  rationale: `${resolverId} ordered a retry of ${conflict.stageId} after ${conflict.topic}`,
});

export class WorkflowScheduler {
  private readonly runs = new Map<string, WorkflowRun>();
  private readonly finishedOrder: string[] = [];
  private readonly options: WorkflowSchedulerOptions;
  private readonly retainFinishedRuns: number;

  constructor(options: WorkflowSchedulerOptions) {
    this.options = options;
    this.retainFinishedRuns = options.retainFinishedRuns ?? DEFAULT_RETAINED_RUNS;
    if (!Number.isInteger(this.retainFinishedRuns) || this.retainFinishedRuns < 0) {
      throw new RangeError(
        `retainFinishedRuns must be a non-negative integer, got ${String(options.retainFinishedRuns)}`,
      );
    }
  }

  /**
   * Validates the graph against a snapshot of the registry and returns a run
   * handle. Throws GraphError before any stage runs.
   */
  submit(request: string, graph: WorkflowGraph = DEFAULT_WORKFLOW, submitOptions: SubmitOptions = {}): WorkflowRun {
    const { validator, registry } = this.options;
    const config = mergeRunConfig(this.options.config, submitOptions.overrides);
    const routing = this.options.routing ?? DEFAULT_FAILURE_ROUTING;
    const executors = registry.snapshot();

    const workflow = compileWorkflow(graph, {
      executors,
      hasContract: (name) => validator.hasContract(name),
      routing,
    });

    const runId = submitOptions.runId ?? this.options.idFactory?.() ?? crypto.randomUUID();
    if (this.runs.has(runId)) {
      throw new RangeError(`Run id already in use: ${runId}`);
    }

    const run: WorkflowRun = new WorkflowRun({
      runId,
      request,
      workflow,
      executors,
      validator,
      memory: this.options.memory,
      evaluation: this.options.evaluation,
      resolver: new AuthorityResolver({ authorities: executors.authorityTable(), precedence: config.precedence }),
      config,
      routing,
      arbiter: this.options.arbiter ?? retryArbiter,
      approvalGate: this.options.approvalGate,
      artifacts: this.options.artifacts,
      events: this.options.events?.(runId),
      now: this.options.now,
      onFinished: (result) => this.runFinished(run, result),
    });
    this.runs.set(runId, run);

    log.info({ runId, stages: workflow.order.length }, "Workflow submitted");
    return run;
  }

  execute(request: string, graph?: WorkflowGraph, submitOptions?: SubmitOptions): Promise<WorkflowResult> {
    return this.submit(request, graph, submitOptions).run();
  }

  status(runId: string): RunStatus | undefined {
    return this.runs.get(runId)?.status();
  }

  abort(runId: string, reason: string): boolean {
    const run = this.runs.get(runId);
    if (!run) return false;
    run.abort(reason);
    return true;
  }

  /** Drops a run that is not executing; its persisted result stays in the database. */
  forget(runId: string): boolean {
    const run = this.runs.get(runId);
    if (!run || run.isActive()) return false;
    this.runs.delete(runId);
    const index = this.finishedOrder.indexOf(runId);
    if (index !== -1) this.finishedOrder.splice(index, 1);
    return true;
  }

  /** Waits for every submitted run that has started to finish. */
  async drain(): Promise<void> {
    await Promise.all([...this.runs.values()].map((run) => run.settled()));
  }

  private async runFinished(run: WorkflowRun, result: WorkflowResult): Promise<void> {
    if (this.runs.get(run.runId) === run) {
      this.finishedOrder.push(run.runId);
    }
    while (this.finishedOrder.length > this.retainFinishedRuns) {
      const evicted = this.finishedOrder.shift();
      if (evicted !== undefined) this.runs.delete(evicted);
    }
    await this.options.onRunFinished?.(result);
  }
}
