import type { Violation } from "../contracts/contract.types.js";

export class GraphError extends Error {
  constructor(readonly issues: readonly string[]) {
    super(`Invalid workflow graph: ${issues.join("; ")}`);
    this.name = "GraphError";
  }
}

export class SchemaNotFoundError extends Error {
  constructor(readonly schemaName: string) {
    super(`Contract schema not found: "${schemaName}"`);
    this.name = "SchemaNotFoundError";
  }
}

export class SchemaDefinitionError extends Error {
  constructor(message: string, readonly source?: string) {
    super(source ? `${message} (${source})` : message);
    this.name = "SchemaDefinitionError";
  }
}

export class SchemaConflictError extends Error {
  constructor(
    readonly schemaName: string,
    readonly sources: readonly string[],
  ) {
    super(
      `Contract "${schemaName}" is declared more than once with incompatible required fields and no version discriminator: ${sources.join(", ")}`,
    );
    this.name = "SchemaConflictError";
  }
}

export class RuleCompileError extends Error {
  constructor(
    readonly ruleId: string,
    readonly condition: string,
    reason: string,
  ) {
    super(`Rule ${ruleId} cannot be compiled: ${reason} in "${condition}"`);
    this.name = "RuleCompileError";
  }
}

export class ValidationError extends Error {
  constructor(
    readonly schemaName: string,
    readonly direction: "input" | "output",
    readonly violations: readonly Violation[],
  ) {
    const blocking = violations.filter((v) => v.severity === "error");
    super(
      `${direction} of "${schemaName}" failed validation: ${blocking.map((v) => `${v.ruleId}: ${v.message}`).join("; ")}`,
    );
    this.name = "ValidationError";
  }
}

export class ExecutorFailure extends Error {
  constructor(
    readonly executorId: string,
    message: string,
    readonly timedOut: boolean = false,
  ) {
    super(message);
    this.name = "ExecutorFailure";
  }
}

export class ExecutorRegistrationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ExecutorRegistrationError";
  }
}

export class UnresolvableConflictError extends Error {
  constructor(
    readonly conflictId: string,
    readonly agentsInvolved: readonly string[],
  ) {
    super(
      `No executor holds authority above [${agentsInvolved.join(", ")}] to resolve conflict ${conflictId}`,
    );
    this.name = "UnresolvableConflictError";
  }
}

export class OwnershipError extends Error {
  constructor(
    readonly path: string,
    readonly ownerId: string,
    readonly attemptedBy: string,
  ) {
    super(`Artifact "${path}" is owned by ${ownerId}; write by ${attemptedBy} refused`);
    this.name = "OwnershipError";
  }
}

export class IllegalStageTransitionError extends Error {
  constructor(
    readonly stageId: string,
    readonly from: string,
    readonly to: string,
  ) {
    super(`Illegal transition for stage ${stageId}: ${from} → ${to}`);
    this.name = "IllegalStageTransitionError";
  }
}

export class ConflictStateError extends Error {
  constructor(
    readonly conflictId: string,
    readonly status: string,
  ) {
    super(`Conflict ${conflictId} is already ${status}`);
    this.name = "ConflictStateError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
