import type { Payload } from "../contracts/contract.types.js";

export interface ExecutorProfile {
  readonly id: string;
  /** Integer authority; higher overrides lower. */
  readonly authority: number;
  readonly description?: string;
  readonly accepts: readonly string[];
  readonly produces: readonly string[];
  /** Artifact paths only this executor may write. */
  readonly ownedArtifacts?: readonly string[];
}

export interface InvocationContext {
  readonly runId: string;
  readonly stageId: string;
  readonly attempt: number;
  readonly signal: AbortSignal;
}

export interface ExecutorUsage {
  readonly tokens?: number;
  readonly tokenBudget?: number;
}

export type ExecutorOutcome =
  | { readonly status: "success"; readonly output: unknown; readonly usage?: ExecutorUsage }
  | { readonly status: "failed"; readonly error: string };

export type ExecutorInvoke = (
  contract: string,
  input: Payload,
  context: InvocationContext,
) => Promise<ExecutorOutcome>;

export interface ExecutorDescriptor extends ExecutorProfile {
  readonly invoke: ExecutorInvoke;
}
