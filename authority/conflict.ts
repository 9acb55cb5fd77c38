import crypto from "node:crypto";
import { ConflictStateError } from "../shared/errors.js";

export type ConflictStatus = "open" | "resolved" | "unresolved";
export type ResolutionDecision = "retry" | "skip" | "abort";

export interface ConflictResolution {
  readonly decision: ResolutionDecision;
  readonly rationale: string;
}

export interface Conflict {
  readonly id: string;
  readonly runId: string;
  readonly stageId: string;
  readonly topic: string;
  readonly agentsInvolved: readonly string[];
  readonly evidence: readonly Readonly<Record<string, unknown>>[];
  readonly status: ConflictStatus;
  readonly resolverId?: string;
  readonly resolution?: ConflictResolution;
  readonly createdAt: string;
  readonly resolvedAt?: string;
}

export interface OpenConflictInput {
  readonly runId: string;
  readonly stageId: string;
  readonly topic: string;
  readonly agentsInvolved: readonly string[];
  readonly evidence?: readonly Readonly<Record<string, unknown>>[];
}

export function openConflict(input: OpenConflictInput, now: Date = new Date()): Conflict {
  const conflict: Conflict = {
    id: crypto.randomUUID(),
    runId: input.runId,
    stageId: input.stageId,
    topic: input.topic,
    agentsInvolved: Object.freeze([...new Set(input.agentsInvolved)]),
    evidence: Object.freeze([...(input.evidence ?? [])]),
    status: "open",
    createdAt: now.toISOString(),
  };
  return Object.freeze(conflict);
}

export function resolveConflict(
  conflict: Conflict,
  resolverId: string,
  resolution: ConflictResolution,
  now: Date = new Date(),
): Conflict {
  assertOpen(conflict);
  const resolved: Conflict = {
    ...conflict,
    status: "resolved",
    resolverId,
    resolution: Object.freeze({ ...resolution }),
    resolvedAt: now.toISOString(),
  };
  return Object.freeze(resolved);
}

export function markUnresolved(conflict: Conflict, now: Date = new Date()): Conflict {
  assertOpen(conflict);
  const unresolved: Conflict = { ...conflict, status: "unresolved", resolvedAt: now.toISOString() };
  return Object.freeze(unresolved);
}

function assertOpen(conflict: Conflict): void {
  if (conflict.status !== "open") {
    throw new ConflictStateError(conflict.id, conflict.status);
  }
}
