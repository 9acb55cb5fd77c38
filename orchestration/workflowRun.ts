import YAML from "yaml";
import type { ExecutorSnapshot } from "../agents/executorRegistry.js";
import type { ExecutorUsage } from "../agents/types.js";
import type { AuthorityResolver } from "../authority/authorityResolver.js";
import { markUnresolved, openConflict, resolveConflict, type Conflict } from "../authority/conflict.js";
import type { RunConfig } from "../config/runConfig.js";
import { componentLogger, type Logger } from "../config/logger.js";
import type { Payload, Violation } from "../contracts/contract.types.js";
import type { ContractValidator } from "../contracts/contractValidator.js";
import { hasBlockingViolations } from "../contracts/contractValidator.js";
import { isRecord } from "../contracts/ruleCompiler.js";
import type { EvaluationEngine, StageOutcomeRecord } from "../evaluation/evaluationEngine.js";
import { scoreStageOutcome } from "../evaluation/outcomeScoring.js";
import { gateFor, type AutonomyGate } from "../evaluation/scorecard.js";
import type { MemoryStore } from "../memory/memoryStore.js";
import { KeyedLock } from "../shared/concurrency/keyedLock.js";
import {
  OwnershipError,
  UnresolvableConflictError,
  ValidationError,
  describeError,
} from "../shared/errors.js";
import { invokeExecutor } from "./executorInvoker.js";
import { assembleInput } from "./inputAssembler.js";
import { StageStateMachine, satisfiesDependents } from "./stageState.js";
import type {
  ApprovalGate,
  ArtifactBinding,
  ArtifactStore,
  ConflictArbiter,
  FailureKind,
  FailureRoutingTable,
  RunEvent,
  RunEventSink,
  RunPhase,
  RunStatus,
  StageFailure,
  WorkflowResult,
} from "./types.js";
import { resolveRoute, type CompiledWorkflow } from "./workflowGraph.js";

const WORKING_CONFIDENCE = 0.9;
const SKILL_CONFIDENCE = 0.8;
const FAILURE_CONFIDENCE = 1;
const PROJECT_CONFIDENCE = 1;

export interface WorkflowRunOptions {
  readonly runId: string;
  readonly request: string;
  readonly workflow: CompiledWorkflow;
  readonly executors: ExecutorSnapshot;
  readonly validator: ContractValidator;
  readonly memory: MemoryStore;
  readonly evaluation: EvaluationEngine;
  readonly resolver: AuthorityResolver;
  readonly config: RunConfig;
  readonly routing: FailureRoutingTable;
  readonly arbiter: ConflictArbiter;
  readonly approvalGate?: ApprovalGate;
  readonly artifacts?: ArtifactStore;
  readonly events?: RunEventSink;
  readonly now?: () => Date;
  readonly onFinished?: (result: WorkflowResult) => void | Promise<void>;
}

interface RunStage {
  readonly id: string;
  readonly contract: string;
  readonly executor: string;
  readonly category: string;
  readonly required: boolean;
  readonly reviews: readonly string[];
  readonly publishes: readonly ArtifactBinding[];
  readonly basePredecessors: readonly string[];
  readonly predecessors: string[];
  readonly machine: StageStateMachine;
  readonly remediationOf?: string;
  readonly failures: StageFailure[];
  attempts: number;
  retries: number;
  hops: number;
  escalations: number;
  approved: boolean;
  extras: Payload;
}

type AttemptOutcome =
  | { readonly ok: true; readonly output: Payload; readonly violations: readonly Violation[] }
  | {
      readonly ok: false;
      readonly kind: FailureKind;
      readonly message: string;
      readonly violations: readonly Violation[];
      readonly rejectedOutput?: unknown;
      readonly executed: boolean;
    };

/**
 * One execution of a workflow. Ready stages are dispatched as independent
 * promises, at most `workerPoolSize` at a time; each completion's effects are
 * applied under a run-level lock.
 */
export class WorkflowRun {
  readonly runId: string;
  readonly request: string;

  private readonly options: WorkflowRunOptions;
  private readonly log: Logger;
  private readonly now: () => Date;
  private readonly stages = new Map<string, RunStage>();
  private readonly outputs = new Map<string, Payload>();
  private readonly inFlight = new Map<string, Promise<void>>();
  private readonly conflicts = new Map<string, Conflict>();
  private readonly lastViolations = new Map<string, readonly Violation[]>();
  private readonly failures: StageFailure[] = [];
  private readonly completed: string[] = [];
  private readonly controller = new AbortController();
  private readonly effects = new KeyedLock();

  private phase: RunPhase = "pending";
  private startedAt: Date | undefined;
  private finishedAt: Date | undefined;
  private abortReason: string | undefined;
  private fatalError: string | undefined;
  private running: Promise<WorkflowResult> | undefined;

  constructor(options: WorkflowRunOptions) {
    this.options = options;
    this.runId = options.runId;
    this.request = options.request;
    this.now = options.now ?? (() => new Date());
    this.log = componentLogger("scheduler", { runId: options.runId });

    for (const id of options.workflow.order) {
      const stage = options.workflow.stages.get(id);
      if (!stage) continue;
      this.stages.set(id, {
        id,
        contract: stage.contract,
        executor: stage.executor,
        category: stage.category,
        required: stage.required,
        reviews: stage.reviews,
        publishes: stage.publishes,
        basePredecessors: [...stage.predecessors],
        predecessors: [...stage.predecessors],
        machine: new StageStateMachine(id, this.now),
        failures: [],
        attempts: 0,
        retries: 0,
        hops: 0,
        escalations: 0,
        approved: false,
        extras: {},
      });
    }
  }

  /** Runs the workflow once; later calls return the same result. */
  run(): Promise<WorkflowResult> {
    this.running ??= this.execute();
    return this.running;
  }

  /** Resolves once a started run has finished; at once for a run never started. */
  async settled(): Promise<void> {
    await this.running;
  }

  /** Skips every unfinished stage and signals in-flight executors. */
  abort(reason: string): void {
    if (this.stopped || this.phase === "succeeded" || this.phase === "failed") return;
    this.abortReason = reason;
    this.controller.abort(new Error(reason));
    this.log.warn({ reason }, "Run aborted");
    this.emit({ type: "run.aborted", message: reason, level: "warn" });
  }

  status(): RunStatus {
    const started = this.startedAt?.getTime();
    const ended = this.finishedAt?.getTime() ?? this.now().getTime();
    return {
      runId: this.runId,
      phase: this.phase,
      elapsedMs: started === undefined ? 0 : ended - started,
      stages: [...this.stages.values()].map((stage) => ({
        id: stage.id,
        executor: stage.executor,
        state: stage.machine.state,
        attempts: stage.attempts,
        retries: stage.retries,
        hops: stage.hops,
        escalations: stage.escalations,
        remediationOf: stage.remediationOf,
      })),
      conflicts: [...this.conflicts.values()],
    };
  }

  /** True from the moment the run starts until its result is produced. */
  isActive(): boolean {
    return this.phase === "running";
  }

  private get stopped(): boolean {
    return this.abortReason !== undefined || this.fatalError !== undefined;
  }

  private async execute(): Promise<WorkflowResult> {
    this.startedAt = this.now();
    this.phase = "running";
    this.log.info({ stages: this.stages.size }, "Run started");
    this.emit({ type: "run.started", message: this.request, metadata: { stages: [...this.stages.keys()] } });

    try {
      await this.loop();
    } catch (error) {
      this.fail(error);
    }
    await Promise.all(this.inFlight.values());

    return this.finish();
  }

  private async loop(): Promise<void> {
    const poolSize = this.options.config.scheduler.workerPoolSize;

    while (!this.stopped) {
      this.promoteReady();

      for (const stage of this.stages.values()) {
        if (this.inFlight.size >= poolSize || this.stopped) break;
        if (stage.machine.state === "ready" && !this.inFlight.has(stage.id)) {
          this.dispatch(stage);
        }
      }

      if (this.inFlight.size === 0) break;
      await Promise.race(this.inFlight.values());
    }
  }

  private promoteReady(): void {
    for (const stage of this.stages.values()) {
      if (stage.machine.state !== "pending") continue;
      const unblocked = stage.predecessors.every((id) => {
        const predecessor = this.stages.get(id);
        return predecessor !== undefined && satisfiesDependents(predecessor.machine.state);
      });
      if (!unblocked) continue;

      stage.machine.transition("ready");
      if (this.reviewWaived(stage)) {
        stage.machine.transition("skipped", "review waived");
        this.log.info({ stageId: stage.id, reviews: stage.reviews }, "Review waived for trusted executors");
        this.emit({ type: "review.waived", message: `Review ${stage.id} waived`, stageId: stage.id });
      }
    }
  }

  private reviewWaived(stage: RunStage): boolean {
    const { allowReviewSkip, minExemptionSamples } = this.options.config.autonomy;
    if (stage.reviews.length === 0 || !allowReviewSkip) return false;
    return stage.reviews.every((id) => {
      const reviewed = this.stages.get(id);
      if (!reviewed) return false;
      const outcomes = this.options.evaluation.scorecard(reviewed.executor).tallies.total;
      return outcomes >= minExemptionSamples && this.gateOf(reviewed.executor) === "review_exempt";
    });
  }

  private dispatch(stage: RunStage): void {
    stage.machine.transition("running");
    stage.attempts += 1;
    this.log.debug({ stageId: stage.id, attempt: stage.attempts }, "Stage dispatched");
    this.emit({
      type: "stage.dispatched",
      message: `Attempt ${String(stage.attempts)} of ${stage.id}`,
      stageId: stage.id,
      executorId: stage.executor,
    });

    const work = this.attempt(stage)
      .catch((error: unknown) => {
        this.fail(error);
      })
      .finally(() => {
        this.inFlight.delete(stage.id);
      });
    this.inFlight.set(stage.id, work);
  }

  private async attempt(stage: RunStage): Promise<void> {
    const gate = this.gateOf(stage.executor);
    if (gate === "approval_required" && !stage.approved) {
      const approved = await this.requestApproval(stage, gate);
      if (this.stopped) {
        this.skipStopped(stage);
        return;
      }
      if (!approved) {
        await this.handleFailure(stage, {
          ok: false,
          kind: "approval",
          message: `Executor ${stage.executor} needs approval before ${stage.id} and none was granted`,
          violations: [],
          executed: false,
        });
        return;
      }
    }

    const startedAt = Date.now();
    const { outcome, usage } = await this.perform(stage);
    const durationMs = Date.now() - startedAt;

    const scored = outcome.ok || outcome.executed ? this.scoreOutcome(stage, outcome, durationMs, usage) : undefined;
    if (outcome.ok) {
      await this.handleSuccess(stage, outcome.output, outcome.violations, scored);
    } else {
      await this.handleFailure(stage, outcome, scored);
    }
  }

  /** Resolves to undefined when the run stops before the gate answers. */
  private async requestApproval(stage: RunStage, gate: AutonomyGate): Promise<boolean | undefined> {
    const gateFn = this.options.approvalGate;
    if (!gateFn) return false;
    return this.untilStopped(
      gateFn({
        runId: this.runId,
        stageId: stage.id,
        executorId: stage.executor,
        autonomyLevel: this.options.evaluation.autonomyLevel(
          stage.executor,
          this.options.config.autonomy.baseLevel,
        ),
        gate,
        signal: this.controller.signal,
      }),
    );
  }

  private untilStopped<T>(pending: T | Promise<T>): Promise<T | undefined> {
    const signal = this.controller.signal;
    if (signal.aborted) return Promise.resolve(undefined);

    return new Promise<T | undefined>((resolve, reject) => {
      const onAbort = (): void => {
        resolve(undefined);
      };
      signal.addEventListener("abort", onAbort, { once: true });
      Promise.resolve(pending).then(
        (value) => {
          signal.removeEventListener("abort", onAbort);
          resolve(value);
        },
        (error: unknown) => {
          signal.removeEventListener("abort", onAbort);
          reject(error);
        },
      );
    });
  }

  private skipStopped(stage: RunStage): void {
    const reason = this.abortReason ?? this.fatalError ?? "run stopped";
    stage.machine.transition("skipped", reason);
    this.log.debug({ stageId: stage.id, reason }, "Stage skipped after the run stopped");
  }

  private async perform(stage: RunStage): Promise<{ outcome: AttemptOutcome; usage?: ExecutorUsage }> {
    const { validator, executors } = this.options;
    const executor = executors.get(stage.executor);
    if (!executor) {
      throw new Error(`Executor ${stage.executor} disappeared from the run snapshot`);
    }

    const schema = validator.getSchema(stage.contract);
    const input = assembleInput({
      stageId: stage.id,
      request: this.request,
      runId: this.runId,
      fields: Object.keys(schema.input.fields),
      predecessorsOf: (id) => this.stages.get(id)?.predecessors ?? [],
      outputs: this.outputs,
      extras: stage.extras,
    });

    const inputViolations = validator.validateInput(stage.contract, input);
    if (hasBlockingViolations(inputViolations)) {
      const error = new ValidationError(stage.contract, "input", inputViolations);
      return {
        outcome: { ok: false, kind: "validation", message: error.message, violations: inputViolations, executed: false },
      };
    }

    const result = await invokeExecutor({
      executor,
      contract: stage.contract,
      input,
      runId: this.runId,
      stageId: stage.id,
      attempt: stage.attempts,
      timeoutMs: this.options.config.scheduler.executorTimeoutMs,
      signal: this.controller.signal,
    });

    if (!result.ok) {
      return {
        outcome: {
          ok: false,
          kind: result.failure.timedOut ? "timeout" : "executor",
          message: result.failure.message,
          violations: [],
          executed: true,
        },
      };
    }

    const outputViolations = validator.validateOutput(stage.contract, result.output);
    if (hasBlockingViolations(outputViolations) || !isRecord(result.output)) {
      const error = new ValidationError(stage.contract, "output", outputViolations);
      return {
        outcome: {
          ok: false,
          kind: "validation",
          message: error.message,
          violations: outputViolations,
          rejectedOutput: result.output,
          executed: true,
        },
        usage: result.usage,
      };
    }

    const output = result.output;
    try {
      await this.publish(stage, output);
    } catch (error) {
      if (!(error instanceof OwnershipError)) throw error;
      return {
        outcome: {
          ok: false,
          kind: "ownership",
          message: error.message,
          violations: outputViolations,
          rejectedOutput: output,
          executed: true,
        },
        usage: result.usage,
      };
    }

    return { outcome: { ok: true, output, violations: outputViolations }, usage: result.usage };
  }

  private async publish(stage: RunStage, output: Payload): Promise<void> {
    const store = this.options.artifacts;
    if (!store) return;

    for (const binding of stage.publishes) {
      const value = output[binding.field];
      if (value === undefined) continue;
      const record = await store.put(binding.path, renderArtifact(binding.path, value), stage.executor);
      this.log.debug({ stageId: stage.id, path: record.path, version: record.version }, "Artifact published");
    }
  }

  private async handleSuccess(
    stage: RunStage,
    output: Payload,
    violations: readonly Violation[],
    scored: StageOutcomeRecord | undefined,
  ): Promise<void> {
    await this.effects.runExclusive(this.runId, async () => {
      if (scored) await this.options.evaluation.recordStageOutcome(stage.executor, scored);
      const tags = [this.runId, stage.id];
      await this.options.memory.append(
        "working",
        { runId: this.runId, stageId: stage.id, contract: stage.contract, output },
        WORKING_CONFIDENCE,
        { source: stage.executor, tags },
      );
      if (stage.remediationOf !== undefined) {
        const origin = this.stages.get(stage.remediationOf);
        await this.options.memory.append(
          "skill",
          {
            category: origin?.category ?? stage.category,
            remediationOf: stage.remediationOf,
            executor: stage.executor,
            resolved: (origin?.failures ?? []).map((failure) => failure.message),
          },
          SKILL_CONFIDENCE,
          { source: stage.executor, tags },
        );
      }
    });

    this.outputs.set(stage.id, output);
    this.lastViolations.set(stage.id, violations);
    this.completed.push(stage.id);
    stage.machine.transition("succeeded");

    this.log.info({ stageId: stage.id, attempts: stage.attempts }, "Stage succeeded");
    this.emit({
      type: "stage.succeeded",
      message: `${stage.id} succeeded`,
      stageId: stage.id,
      executorId: stage.executor,
      metadata: { attempts: stage.attempts, warnings: violations.length },
    });
  }

  private async handleFailure(
    stage: RunStage,
    outcome: Extract<AttemptOutcome, { ok: false }>,
    scored?: StageOutcomeRecord,
  ): Promise<void> {
    if (this.stopped) {
      this.skipStopped(stage);
      return;
    }

    const failure: StageFailure = {
      stageId: stage.id,
      executorId: stage.executor,
      attempt: stage.attempts,
      hop: stage.hops,
      kind: outcome.kind,
      message: outcome.message,
      violations: outcome.violations,
      rejectedOutput: outcome.rejectedOutput,
      at: this.now().toISOString(),
    };

    await this.effects.runExclusive(this.runId, async () => {
      if (scored) await this.options.evaluation.recordStageOutcome(stage.executor, scored);
      await this.options.memory.append(
        "failure",
        {
          runId: this.runId,
          stageId: stage.id,
          executor: stage.executor,
          kind: failure.kind,
          message: failure.message,
          violations: failure.violations.map((violation) => violation.ruleId),
        },
        FAILURE_CONFIDENCE,
        { source: stage.executor, tags: [this.runId, stage.id, failure.kind] },
      );
    });

    stage.failures.push(failure);
    this.failures.push(failure);
    this.lastViolations.set(stage.id, failure.violations);
    if (this.stopped) {
      this.skipStopped(stage);
      return;
    }
    stage.machine.transition("failed", failure.message);

    this.log.warn({ stageId: stage.id, kind: failure.kind, error: failure.message }, "Stage attempt failed");
    this.emit({
      type: "stage.failed",
      message: failure.message,
      stageId: stage.id,
      executorId: stage.executor,
      level: "warn",
      metadata: { kind: failure.kind, attempt: failure.attempt, violations: failure.violations.length },
    });

    if (failure.kind === "approval") {
      await this.escalate(stage, failure, "approval denied");
      return;
    }

    stage.retries += 1;
    if (stage.retries <= this.options.config.scheduler.maxRetries) {
      stage.extras = { ...stage.extras, failureContext: failure };
      stage.machine.transition("retrying");
      stage.machine.transition("ready");
      this.emit({
        type: "stage.retrying",
        message: `Retry ${String(stage.retries)} of ${stage.id}`,
        stageId: stage.id,
        executorId: stage.executor,
      });
      return;
    }

    if (stage.remediationOf !== undefined) {
      await this.escalate(stage, failure, "remediation exhausted its retries");
      return;
    }

    const route = resolveRoute(stage.category, this.options.routing, this.options.executors);
    if (!route) {
      await this.escalate(stage, failure, `no failure route for ${stage.category}`);
      return;
    }
    if (stage.hops >= this.options.config.scheduler.maxReroutes) {
      await this.escalate(stage, failure, `routing chain for ${stage.id} exceeded ${String(stage.hops)} hops`);
      return;
    }

    this.reroute(stage, route.executor, route.contract, failure);
  }

  private reroute(stage: RunStage, executor: string, contract: string, failure: StageFailure): void {
    stage.hops += 1;
    const id = `${stage.id}:remediation-${String(stage.hops)}`;

    this.stages.set(id, {
      id,
      contract,
      executor,
      category: stage.category,
      required: stage.required,
      reviews: [],
      publishes: [],
      basePredecessors: [...stage.basePredecessors],
      predecessors: [...stage.basePredecessors],
      machine: new StageStateMachine(id, this.now),
      remediationOf: stage.id,
      failures: [],
      attempts: 0,
      retries: 0,
      hops: 0,
      escalations: 0,
      approved: false,
      extras: {
        failureContext: failure,
        failureHistory: [...stage.failures],
        remediationOf: stage.id,
      },
    });

    stage.predecessors.unshift(id);
    stage.retries = 0;
    stage.extras = {};
    stage.machine.transition("pending", `rerouted to ${executor}`);

    this.log.info({ stageId: stage.id, remediation: id, executor, hop: stage.hops }, "Stage rerouted");
    this.emit({
      type: "stage.rerouted",
      message: `${stage.id} rerouted to ${executor} as ${id}`,
      stageId: stage.id,
      executorId: executor,
      metadata: { hop: stage.hops, contract },
    });
  }

  private async escalate(stage: RunStage, failure: StageFailure, topic: string): Promise<void> {
    const { config, resolver, arbiter, evaluation } = this.options;

    if (stage.escalations >= config.scheduler.maxEscalations) {
      this.giveUp(stage);
      return;
    }
    stage.escalations += 1;

    const origin = stage.remediationOf === undefined ? undefined : this.stages.get(stage.remediationOf);
    const participants = origin
      ? [stage.executor, origin.executor]
      : [stage.executor, ...stage.basePredecessors.map((id) => this.stages.get(id)?.executor ?? "")].filter(
          (id) => id.length > 0,
        );

    let conflict = openConflict(
      {
        runId: this.runId,
        stageId: stage.id,
        topic,
        agentsInvolved: participants,
        evidence: [evidenceOf(failure)],
      },
      this.now(),
    );
    this.conflicts.set(conflict.id, conflict);

    let resolverId: string;
    try {
      resolverId = resolver.resolve(conflict);
    } catch (error) {
      if (!(error instanceof UnresolvableConflictError)) throw error;
      conflict = markUnresolved(conflict, this.now());
      this.conflicts.set(conflict.id, conflict);
      await this.recordConflict(conflict);
      this.emit({
        type: "conflict.unresolved",
        message: error.message,
        stageId: stage.id,
        level: "error",
        metadata: { conflictId: conflict.id, agents: conflict.agentsInvolved },
      });
      this.fail(error);
      return;
    }

    const resolution = await this.untilStopped(arbiter(conflict, resolverId));
    if (resolution === undefined) {
      this.skipStopped(stage);
      return;
    }
    conflict = resolveConflict(conflict, resolverId, resolution, this.now());
    this.conflicts.set(conflict.id, conflict);

    await this.effects.runExclusive(this.runId, () => evaluation.recordEscalation(stage.executor));
    await this.recordConflict(conflict);
    stage.machine.transition("escalated", topic);

    this.log.info(
      { stageId: stage.id, conflictId: conflict.id, resolverId, decision: resolution.decision },
      "Conflict resolved",
    );
    this.emit({
      type: "conflict.resolved",
      message: `${resolverId} decided ${resolution.decision}: ${resolution.rationale}`,
      stageId: stage.id,
      executorId: resolverId,
      metadata: { conflictId: conflict.id, topic },
    });

    switch (resolution.decision) {
      case "retry":
        stage.retries = 0;
        stage.approved ||= failure.kind === "approval";
        stage.extras = {
          ...stage.extras,
          failureContext: failure,
          resolution: { resolverId, decision: resolution.decision, rationale: resolution.rationale },
        };
        stage.machine.transition("ready", `retry ordered by ${resolverId}`);
        break;
      case "skip":
        stage.machine.transition("skipped", `skip ordered by ${resolverId}`);
        break;
      case "abort":
        this.abort(`Conflict ${conflict.id} resolved by ${resolverId}: ${resolution.rationale}`);
        break;
    }
  }

  private giveUp(stage: RunStage): void {
    if (stage.required) {
      this.fail(new Error(`Stage ${stage.id} failed after exhausting retries and escalations`));
      return;
    }
    stage.machine.transition("skipped", "optional stage failed");
    this.log.warn({ stageId: stage.id }, "Optional stage skipped after failing");
    this.emit({ type: "stage.skipped", message: `${stage.id} skipped after failing`, stageId: stage.id, level: "warn" });
  }

  private async recordConflict(conflict: Conflict): Promise<void> {
    await this.effects.runExclusive(this.runId, async () => {
      await this.options.memory.append(
        "project",
        {
          runId: this.runId,
          conflictId: conflict.id,
          stageId: conflict.stageId,
          topic: conflict.topic,
          agents: conflict.agentsInvolved,
          status: conflict.status,
          resolverId: conflict.resolverId ?? null,
          decision: conflict.resolution?.decision ?? null,
        },
        PROJECT_CONFIDENCE,
        { source: conflict.resolverId ?? "scheduler", tags: [this.runId, "conflict"] },
      );
    });
  }

  private scoreOutcome(
    stage: RunStage,
    outcome: AttemptOutcome,
    durationMs: number,
    usage: ExecutorUsage | undefined,
  ): StageOutcomeRecord {
    const violations = outcome.violations;
    const scores = scoreStageOutcome({
      success: outcome.ok,
      errorCount: violations.filter((violation) => violation.severity === "error").length,
      warningCount: violations.filter((violation) => violation.severity === "warning").length,
      durationMs,
      timeoutMs: this.options.config.scheduler.executorTimeoutMs,
      attempt: stage.retries + 1,
      tokensUsed: usage?.tokens,
      tokenBudget: usage?.tokenBudget,
    });

    return { success: outcome.ok, scores, runId: this.runId, stageId: stage.id };
  }

  private gateOf(executorId: string): AutonomyGate {
    const { baseLevel, lowThreshold, highThreshold } = this.options.config.autonomy;
    return gateFor(this.options.evaluation.autonomyLevel(executorId, baseLevel), lowThreshold, highThreshold);
  }

  private fail(error: unknown): void {
    if (this.fatalError !== undefined) return;
    this.fatalError = describeError(error);
    this.controller.abort(error);
    this.log.error({ error: this.fatalError }, "Run failed");
  }

  private async finish(): Promise<WorkflowResult> {
    const unfinished = [...this.stages.values()].filter((stage) =>
      stage.machine.is("pending", "ready", "retrying", "escalated"),
    );
    if (!this.stopped && unfinished.length > 0) {
      this.fatalError = `Workflow stalled with unfinished stages: ${unfinished.map((stage) => stage.id).join(", ")}`;
    }
    const reason = this.abortReason ?? this.fatalError;
    for (const stage of unfinished) {
      stage.machine.transition("skipped", reason);
    }

    const failed = this.stageIds("failed");
    if (!this.stopped && failed.length > 0) {
      this.fatalError = `Stages ended failed: ${failed.join(", ")}`;
    }

    this.finishedAt = this.now();
    const startedAt = this.startedAt ?? this.finishedAt;
    const success = !this.stopped;
    this.phase = this.abortReason !== undefined ? "aborted" : success ? "succeeded" : "failed";

    const result: WorkflowResult = Object.freeze({
      runId: this.runId,
      request: this.request,
      success,
      stagesCompleted: [...this.completed],
      stagesFailed: failed,
      stagesSkipped: this.stageIds("skipped"),
      outputs: Object.fromEntries(this.outputs),
      attempts: Object.fromEntries([...this.stages.values()].map((stage) => [stage.id, stage.attempts])),
      retries: Object.fromEntries([...this.stages.values()].map((stage) => [stage.id, stage.retries])),
      lastViolations: Object.fromEntries(this.lastViolations),
      failures: [...this.failures],
      conflicts: [...this.conflicts.values()],
      startedAt: startedAt.toISOString(),
      finishedAt: this.finishedAt.toISOString(),
      durationMs: this.finishedAt.getTime() - startedAt.getTime(),
      abortReason: this.abortReason,
      error: this.fatalError,
    });

    await this.effects.runExclusive(this.runId, async () => {
      await this.options.memory.append(
        "project",
        {
          runId: this.runId,
          request: this.request,
          success,
          stagesCompleted: result.stagesCompleted,
          stagesFailed: result.stagesFailed,
          conflicts: result.conflicts.length,
        },
        PROJECT_CONFIDENCE,
        { source: "scheduler", tags: [this.runId, "run"] },
      );
    });

    this.log.info(
      { success, completed: result.stagesCompleted.length, failed: failed.length, durationMs: result.durationMs },
      "Run finished",
    );
    this.emit({
      type: "run.finished",
      message: success ? "Run succeeded" : `Run failed: ${this.abortReason ?? this.fatalError ?? "unknown"}`,
      level: success ? "info" : "error",
      metadata: { completed: result.stagesCompleted.length, failed: failed.length },
    });

    if (this.options.onFinished) {
      try {
        await this.options.onFinished(result);
      } catch (error) {
        this.log.error({ error: describeError(error) }, "Failed to persist run result");
      }
    }
    return result;
  }

  private stageIds(state: "failed" | "skipped"): string[] {
    return [...this.stages.values()].filter((stage) => stage.machine.state === state).map((stage) => stage.id);
  }

  private emit(event: RunEvent): void {
    this.options.events?.record(event);
  }
}

function evidenceOf(failure: StageFailure): Readonly<Record<string, unknown>> {
  return {
    stageId: failure.stageId,
    executorId: failure.executorId,
    attempt: failure.attempt,
    hop: failure.hop,
    kind: failure.kind,
    message: failure.message,
    violations: failure.violations.map((violation) => violation.ruleId),
  };
}

function renderArtifact(path: string, value: unknown): string {
  if (typeof value === "string") return value;
  if (path.endsWith(".yaml") || path.endsWith(".yml")) return YAML.stringify(value);
  return JSON.stringify(value, null, 2);
}
