import type { ExecutorRegistry } from "./executorRegistry.js";
import type { ExecutorInvoke, ExecutorProfile } from "./types.js";

export type DefaultExecutorId =
  | "architect"
  | "product"
  | "build-test"
  | "integrator"
  | "reviewer"
  | "infra"
  | "implementation";

interface DefaultExecutorProfile extends ExecutorProfile {
  readonly id: DefaultExecutorId;
}

export const DEFAULT_EXECUTOR_PROFILES: readonly DefaultExecutorProfile[] = [
  {
    id: "architect",
    authority: 10,
    description: "Defines architecture, enforces invariants, resolves conflicts",
    accepts: ["architecture", "final_approval"],
    produces: ["architecture", "final_approval"],
    ownedArtifacts: ["ARCHITECTURE.md", "DESIGN_DECISIONS.log", "API_CONTRACTS.yaml", "CODING_STANDARDS.md"],
  },
  {
    id: "product",
    authority: 9,
    description: "Turns requests into requirements and acceptance criteria",
    accepts: ["requirements"],
    produces: ["requirements"],
    ownedArtifacts: ["REQUIREMENTS.md", "RISK_REGISTER.md"],
  },
  {
    id: "build-test",
    authority: 8,
    description: "Runs builds and tests, collects metrics",
    accepts: ["build_test"],
    produces: ["build_test"],
  },
  {
    id: "integrator",
    authority: 8,
    description: "Merges approved changes",
    accepts: ["integration"],
    produces: ["integration"],
  },
  {
    id: "reviewer",
    authority: 7,
    description: "Reviews changes against invariants and standards",
    accepts: ["review"],
    produces: ["review"],
  },
  {
    id: "infra",
    authority: 6,
    description: "Manages CI/CD and infrastructure automation",
    accepts: [],
    produces: [],
  },
  {
    id: "implementation",
    authority: 5,
    description: "Writes and modifies code following API contracts",
    accepts: ["implementation"],
    produces: ["implementation"],
  },
];

/**
 * Registers the default hierarchy. Profiles without an invoker are skipped,
 * so callers wire only the executors their workflow uses.
 */
export function registerDefaultExecutors(
  registry: ExecutorRegistry,
  invokers: Partial<Record<DefaultExecutorId, ExecutorInvoke>>,
): void {
  for (const profile of DEFAULT_EXECUTOR_PROFILES) {
    const invoke = invokers[profile.id];
    if (invoke) {
      registry.register({ ...profile, invoke });
    }
  }
}
