import type { Conflict, ConflictResolution } from "../authority/conflict.js";
import type { Violation } from "../contracts/contract.types.js";
import type { AutonomyGate } from "../evaluation/scorecard.js";
import type { EventLevel } from "../state/executionEvents.js";

export interface ArtifactBinding {
  /** Output field whose value is written. */
  readonly field: string;
  readonly path: string;
}

export interface StageDefinition {
  readonly id: string;
  /** One contract name governs both input and output. */
  readonly contract: string;
  readonly executor: string;
  /** Failure-routing key; defaults to the stage id. */
  readonly category?: string;
  /** Defaults to true. */
  readonly required?: boolean;
  /** Stages whose output this stage reviews; must be ancestors. */
  readonly reviews?: readonly string[];
  readonly publishes?: readonly ArtifactBinding[];
}

export interface WorkflowEdge {
  readonly from: string;
  readonly to: string;
}

export interface WorkflowGraph {
  readonly stages: readonly StageDefinition[];
  readonly edges: readonly WorkflowEdge[];
}

export interface RouteTarget {
  readonly executor: string;
  /** Defaults to the first contract the executor produces. */
  readonly contract?: string;
}

export type FailureRoutingTable = Readonly<Record<string, RouteTarget>>;

export type StageState =
  | "pending"
  | "ready"
  | "running"
  | "succeeded"
  | "failed"
  | "retrying"
  | "escalated"
  | "skipped";

export type RunPhase = "pending" | "running" | "succeeded" | "failed" | "aborted";

export type FailureKind = "validation" | "executor" | "timeout" | "ownership" | "approval";

export interface StageFailure {
  readonly stageId: string;
  readonly executorId: string;
  readonly attempt: number;
  /** Routing hop the failure happened on; 0 before any remediation. */
  readonly hop: number;
  readonly kind: FailureKind;
  readonly message: string;
  readonly violations: readonly Violation[];
  readonly rejectedOutput?: unknown;
  readonly at: string;
}

export interface StageStatus {
  readonly id: string;
  readonly executor: string;
  readonly state: StageState;
  readonly attempts: number;
  readonly retries: number;
  readonly hops: number;
  readonly escalations: number;
  readonly remediationOf?: string;
}

export interface RunStatus {
  readonly runId: string;
  readonly phase: RunPhase;
  readonly elapsedMs: number;
  readonly stages: readonly StageStatus[];
  readonly conflicts: readonly Conflict[];
}

export interface WorkflowResult {
  readonly runId: string;
  readonly request: string;
  readonly success: boolean;
  /** In completion order. */
  readonly stagesCompleted: readonly string[];
  readonly stagesFailed: readonly string[];
  readonly stagesSkipped: readonly string[];
  readonly outputs: Readonly<Record<string, unknown>>;
  readonly attempts: Readonly<Record<string, number>>;
  readonly retries: Readonly<Record<string, number>>;
  readonly lastViolations: Readonly<Record<string, readonly Violation[]>>;
  readonly failures: readonly StageFailure[];
  readonly conflicts: readonly Conflict[];
  readonly startedAt: string;
  readonly finishedAt: string;
  readonly durationMs: number;
  readonly abortReason?: string;
  readonly error?: string;
}

export interface ArtifactRecord {
  readonly path: string;
  readonly content: string;
  readonly version: number;
  readonly ownerId: string;
  readonly createdAt: string;
}

/** Versioned key-value store keyed by artifact path. */
export interface ArtifactStore {
  get(path: string): ArtifactRecord | undefined | Promise<ArtifactRecord | undefined>;
  /** Rejects with OwnershipError when `ownerId` is not the path's owner. */
  put(path: string, content: string, ownerId: string): ArtifactRecord | Promise<ArtifactRecord>;
  history(path: string): readonly ArtifactRecord[] | Promise<readonly ArtifactRecord[]>;
}

export interface ApprovalRequest {
  readonly runId: string;
  readonly stageId: string;
  readonly executorId: string;
  readonly autonomyLevel: number;
  readonly gate: AutonomyGate;
  /** Aborted when the run stops; the run no longer waits for an answer after that. */
  readonly signal: AbortSignal;
}

export type ApprovalGate = (request: ApprovalRequest) => boolean | Promise<boolean>;

export type ConflictArbiter = (
  conflict: Conflict,
  resolverId: string,
) => ConflictResolution | Promise<ConflictResolution>;

export interface RunEvent {
  readonly type: string;
  readonly message: string;
  readonly stageId?: string;
  readonly executorId?: string;
  readonly level?: EventLevel;
  readonly metadata?: Record<string, unknown>;
}

export interface RunEventSink {
  record(event: RunEvent): void;
}
