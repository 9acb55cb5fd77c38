import type { FailureRoutingTable, WorkflowGraph } from "./types.js";

export const DEFAULT_STAGE_ORDER = [
  "requirements",
  "architecture",
  "implementation",
  "review",
  "build_test",
  "integration",
  "final_approval",
] as const;

export const DEFAULT_WORKFLOW: WorkflowGraph = {
  stages: [
    {
      id: "requirements",
      contract: "requirements",
      executor: "product",
      publishes: [
        { field: "requirements", path: "REQUIREMENTS.md" },
        { field: "risks", path: "RISK_REGISTER.md" },
      ],
    },
    {
      id: "architecture",
      contract: "architecture",
      executor: "architect",
      publishes: [
        { field: "components", path: "ARCHITECTURE.md" },
        { field: "design_decisions", path: "DESIGN_DECISIONS.log" },
        { field: "api_contracts", path: "API_CONTRACTS.yaml" },
      ],
    },
    { id: "implementation", contract: "implementation", executor: "implementation" },
    { id: "review", contract: "review", executor: "reviewer", reviews: ["implementation"] },
    { id: "build_test", contract: "build_test", executor: "build-test" },
    { id: "integration", contract: "integration", executor: "integrator" },
    { id: "final_approval", contract: "final_approval", executor: "architect" },
  ],
  edges: DEFAULT_STAGE_ORDER.slice(1).map((to, index) => ({ from: DEFAULT_STAGE_ORDER[index], to })),
};

export const DEFAULT_FAILURE_ROUTING: FailureRoutingTable = {
  review: { executor: "implementation", contract: "implementation" },
  build_test: { executor: "implementation", contract: "implementation" },
  integration: { executor: "implementation", contract: "implementation" },
  final_approval: { executor: "architect", contract: "architecture" },
};
