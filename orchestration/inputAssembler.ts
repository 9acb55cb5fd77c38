import type { Payload } from "../contracts/contract.types.js";
import { ancestorsOf } from "./workflowGraph.js";

/** Fields every stage input carries, taken from the run rather than from upstream output. */
export const RUN_FIELDS = ["request", "runId"] as const;

export interface InputAssemblyContext {
  readonly stageId: string;
  readonly request: string;
  readonly runId: string;
  /** Declared input fields of the stage's contract. */
  readonly fields: readonly string[];
  readonly predecessorsOf: (stageId: string) => readonly string[];
  readonly outputs: ReadonlyMap<string, Payload>;
  /** Failure context, resolution and similar run-supplied additions. */
  readonly extras?: Payload;
}

/**
 * Builds a stage input. Each declared field comes from the nearest upstream
 * output that carries it: direct predecessors in declared order first, then
 * further ancestors breadth-first.
 */
export function assembleInput(context: InputAssemblyContext): Record<string, unknown> {
  const input: Record<string, unknown> = {};
  const upstream = ancestorsOf(context.stageId, context.predecessorsOf)
    .map((id) => context.outputs.get(id))
    .filter((output): output is Payload => output !== undefined);

  for (const field of context.fields) {
    if (isRunField(field)) continue;
    const source = upstream.find((output) => Object.hasOwn(output, field) && output[field] !== undefined);
    if (source) {
      input[field] = source[field];
    }
  }

  return {
    ...input,
    ...context.extras,
    request: context.request,
    runId: context.runId,
  };
}

function isRunField(field: string): boolean {
  return RUN_FIELDS.some((candidate) => candidate === field);
}
