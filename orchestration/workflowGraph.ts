import type { ExecutorSnapshot } from "../agents/executorRegistry.js";
import { GraphError } from "../shared/errors.js";
import type {
  ArtifactBinding,
  FailureRoutingTable,
  RouteTarget,
  StageDefinition,
  WorkflowGraph,
} from "./types.js";

export interface CompiledStage {
  readonly id: string;
  readonly contract: string;
  readonly executor: string;
  readonly category: string;
  readonly required: boolean;
  readonly reviews: readonly string[];
  readonly publishes: readonly ArtifactBinding[];
  /** In edge declaration order. */
  readonly predecessors: readonly string[];
  readonly successors: readonly string[];
}

export interface CompiledWorkflow {
  readonly stages: ReadonlyMap<string, CompiledStage>;
  /** A topological order of the stage ids. */
  readonly order: readonly string[];
}

export interface GraphCheckContext {
  readonly executors: ExecutorSnapshot;
  readonly hasContract: (name: string) => boolean;
  readonly routing?: FailureRoutingTable;
}

/**
 * Validates a workflow graph and resolves stage defaults.
 * Every problem found is reported together in one GraphError.
 */
export function compileWorkflow(graph: WorkflowGraph, context: GraphCheckContext): CompiledWorkflow {
  const issues: string[] = [];

  if (graph.stages.length === 0) {
    issues.push("Workflow must declare at least one stage");
  }

  const definitions = new Map<string, StageDefinition>();
  for (const stage of graph.stages) {
    if (stage.id.trim().length === 0) {
      issues.push("Stage id must be a non-empty string");
      continue;
    }
    if (definitions.has(stage.id)) {
      issues.push(`Duplicate stage id: ${stage.id}`);
      continue;
    }
    definitions.set(stage.id, stage);
    checkBinding(stage, context, issues);
  }

  const predecessors = new Map<string, string[]>([...definitions.keys()].map((id) => [id, []]));
  const successors = new Map<string, string[]>([...definitions.keys()].map((id) => [id, []]));
  const seenEdges = new Set<string>();

  for (const edge of graph.edges) {
    const label = `${edge.from} → ${edge.to}`;
    const from = successors.get(edge.from);
    const to = predecessors.get(edge.to);
    if (!from || !to) {
      const missing = from ? edge.to : edge.from;
      issues.push(`Edge ${label} references unknown stage "${missing}"`);
      continue;
    }
    if (edge.from === edge.to) {
      issues.push(`Stage ${edge.from} depends on itself`);
      continue;
    }
    if (seenEdges.has(label)) {
      issues.push(`Duplicate edge ${label}`);
      continue;
    }
    seenEdges.add(label);
    from.push(edge.to);
    to.push(edge.from);
  }

  const order = topologicalOrder([...definitions.keys()], predecessors, successors);
  if (order.length < definitions.size) {
    const placed = new Set(order);
    const cyclic = [...definitions.keys()].filter((id) => !placed.has(id));
    issues.push(`Cycle detected among stages: ${cyclic.join(", ")}`);
  } else {
    checkReviews(definitions, predecessors, issues);
  }

  checkRoutes(definitions, context, issues);

  if (issues.length > 0) {
    throw new GraphError(issues);
  }

  const stages = new Map<string, CompiledStage>();
  for (const id of order) {
    const definition = definitions.get(id);
    if (!definition) continue;
    stages.set(id, {
      id,
      contract: definition.contract,
      executor: definition.executor,
      category: definition.category ?? id,
      required: definition.required ?? true,
      reviews: [...(definition.reviews ?? [])],
      publishes: [...(definition.publishes ?? [])],
      predecessors: predecessors.get(id) ?? [],
      successors: successors.get(id) ?? [],
    });
  }
  return { stages, order };
}

/** Kahn's algorithm; stages caught in a cycle are left out of the result. */
export function topologicalOrder(
  ids: readonly string[],
  predecessors: ReadonlyMap<string, readonly string[]>,
  successors: ReadonlyMap<string, readonly string[]>,
): string[] {
  const indegree = new Map(ids.map((id) => [id, predecessors.get(id)?.length ?? 0]));
  const queue = ids.filter((id) => indegree.get(id) === 0);
  const order: string[] = [];

  for (let next = queue.shift(); next !== undefined; next = queue.shift()) {
    order.push(next);
    for (const successor of successors.get(next) ?? []) {
      const remaining = (indegree.get(successor) ?? 0) - 1;
      indegree.set(successor, remaining);
      if (remaining === 0) queue.push(successor);
    }
  }
  return order;
}

/** Every stage reachable backwards from `stageId`, nearest first. */
export function ancestorsOf(
  stageId: string,
  predecessorsOf: (id: string) => readonly string[],
): string[] {
  const visited = new Set<string>();
  const queue = [...predecessorsOf(stageId)];
  const order: string[] = [];

  for (let next = queue.shift(); next !== undefined; next = queue.shift()) {
    if (visited.has(next)) continue;
    visited.add(next);
    order.push(next);
    queue.push(...predecessorsOf(next));
  }
  return order;
}

/** The executor and contract a failed category is routed to, if any. */
export function resolveRoute(
  category: string,
  routing: FailureRoutingTable | undefined,
  executors: ExecutorSnapshot,
): Required<RouteTarget> | undefined {
  const route = routing?.[category];
  if (!route) return undefined;
  const contract = route.contract ?? executors.get(route.executor)?.produces[0];
  return contract === undefined ? undefined : { executor: route.executor, contract };
}

function checkBinding(stage: StageDefinition, context: GraphCheckContext, issues: string[]): void {
  if (!context.hasContract(stage.contract)) {
    issues.push(`Stage ${stage.id} uses unknown contract "${stage.contract}"`);
  }

  const executor = context.executors.get(stage.executor);
  if (!executor) {
    issues.push(`Stage ${stage.id} is bound to unknown executor "${stage.executor}"`);
    return;
  }
  if (!executor.accepts.includes(stage.contract)) {
    issues.push(`Executor ${executor.id} does not accept contract "${stage.contract}" (stage ${stage.id})`);
  }
  if (!executor.produces.includes(stage.contract)) {
    issues.push(`Executor ${executor.id} does not produce contract "${stage.contract}" (stage ${stage.id})`);
  }
}

function checkReviews(
  definitions: ReadonlyMap<string, StageDefinition>,
  predecessors: ReadonlyMap<string, readonly string[]>,
  issues: string[],
): void {
  for (const stage of definitions.values()) {
    if (!stage.reviews || stage.reviews.length === 0) continue;
    const ancestors = new Set(ancestorsOf(stage.id, (id) => predecessors.get(id) ?? []));
    for (const reviewed of stage.reviews) {
      if (!definitions.has(reviewed)) {
        issues.push(`Stage ${stage.id} reviews unknown stage "${reviewed}"`);
      } else if (!ancestors.has(reviewed)) {
        issues.push(`Stage ${stage.id} reviews "${reviewed}", which is not one of its ancestors`);
      }
    }
  }
}

function checkRoutes(
  definitions: ReadonlyMap<string, StageDefinition>,
  context: GraphCheckContext,
  issues: string[],
): void {
  const categories = new Set([...definitions.values()].map((stage) => stage.category ?? stage.id));

  for (const category of categories) {
    const route = context.routing?.[category];
    if (!route) continue;

    const executor = context.executors.get(route.executor);
    if (!executor) {
      issues.push(`Failure route for "${category}" targets unknown executor "${route.executor}"`);
      continue;
    }
    const contract = route.contract ?? executor.produces[0];
    if (contract === undefined || !executor.accepts.includes(contract)) {
      issues.push(
        `Failure route for "${category}" needs a contract executor ${executor.id} accepts, got "${contract ?? ""}"`,
      );
    } else if (!context.hasContract(contract)) {
      issues.push(`Failure route for "${category}" uses unknown contract "${contract}"`);
    }
  }
}
