export type Severity = "error" | "warning" | "info";

export type FieldType = "string" | "number" | "integer" | "boolean" | "array" | "object" | "any";

export interface FieldDefinition {
  readonly type: FieldType;
  readonly required: boolean;
  readonly enum?: readonly (string | number | boolean)[];
  readonly pattern?: string;
  readonly items?: FieldType;
  readonly since?: string;
  readonly description?: string;
}

export interface RuleDefinition {
  readonly id: string;
  readonly severity: Severity;
  readonly condition: string;
  readonly message: string;
  readonly location?: string;
  readonly fix?: string;
}

export type Payload = Readonly<Record<string, unknown>>;

export interface CompiledRule {
  readonly id: string;
  readonly severity: Severity;
  readonly condition: string;
  readonly message: string;
  readonly location?: string;
  readonly fix?: string;
  readonly predicate: (payload: Payload) => boolean;
}

export interface ContractSection {
  readonly fields: Readonly<Record<string, FieldDefinition>>;
  readonly rules: readonly CompiledRule[];
}

export interface ContractSchema {
  readonly name: string;
  readonly version: string;
  readonly description?: string;
  readonly input: ContractSection;
  readonly output: ContractSection;
  readonly source: string;
}

export type ContractDirection = "input" | "output";

export interface Violation {
  readonly ruleId: string;
  readonly severity: Severity;
  readonly message: string;
  readonly location?: string;
  readonly suggestedFix?: string;
}

export function createViolation(violation: Violation): Violation {
  return Object.freeze({ ...violation });
}
