import { componentLogger } from "../config/logger.js";
import { SchemaNotFoundError } from "../shared/errors.js";
import {
  createViolation,
  type ContractDirection,
  type ContractSchema,
  type FieldDefinition,
  type FieldType,
  type Payload,
  type Violation,
} from "./contract.types.js";
import { isRecord } from "./ruleCompiler.js";
import { buildSchemaIndex, loadSchemasFromDirectory, versionOf, type SchemaIndex } from "./schemaLoader.js";
import { checkCompatibility, compareVersions, parseVersion, type ContractVersion } from "./versioning.js";

const log = componentLogger("contracts");

export const VERSION_FIELD = "contractVersion";

export interface ContractSummary {
  readonly name: string;
  readonly current: string;
  readonly versions: readonly string[];
}

export function hasBlockingViolations(violations: readonly Violation[]): boolean {
  return violations.some((violation) => violation.severity === "error");
}

export class ContractValidator {
  private readonly patterns = new Map<string, RegExp>();

  constructor(private readonly index: SchemaIndex) {}

  static fromDirectory(dir: string): ContractValidator {
    return new ContractValidator(loadSchemasFromDirectory(dir));
  }

  static fromSchemas(schemas: readonly ContractSchema[]): ContractValidator {
    return new ContractValidator(buildSchemaIndex(schemas));
  }

  hasContract(name: string): boolean {
    return this.index.has(name);
  }

  /** Returns the newest version unless a specific one is asked for. */
  getSchema(name: string, version?: string): ContractSchema {
    const versions = this.index.get(name);
    const wanted = version === undefined ? null : parseVersion(version);
    const schema =
      wanted === null
        ? versions?.[0]
        : versions?.find((candidate) => compareVersions(versionOf(candidate), wanted) === 0);

    if (!schema || (version !== undefined && wanted === null)) {
      throw new SchemaNotFoundError(version === undefined ? name : `${name}@${version}`);
    }
    return schema;
  }

  listContracts(): readonly ContractSummary[] {
    return [...this.index.entries()]
      .map(([name, versions]) => ({
        name,
        current: versions[0]?.version ?? "",
        versions: versions.map((schema) => schema.version),
      }))
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  validateInput(name: string, payload: unknown): readonly Violation[] {
    return this.validate(name, "input", payload);
  }

  validateOutput(name: string, payload: unknown): readonly Violation[] {
    return this.validate(name, "output", payload);
  }

  private validate(name: string, direction: ContractDirection, payload: unknown): readonly Violation[] {
    const schema = this.getSchema(name);

    if (!isRecord(payload)) {
      return [
        createViolation({
          ruleId: "contract.shape",
          severity: "error",
          message: `${direction} of ${name} must be an object, got ${describeType(payload)}`,
        }),
      ];
    }

    const violations: Violation[] = [];
    const payloadVersion = this.checkVersion(schema, payload, violations);
    const section = schema[direction];

    for (const [field, definition] of Object.entries(section.fields)) {
      if (!definition.required || isPresent(payload[field])) continue;
      violations.push(
        createViolation({
          ruleId: "contract.required",
          severity: "error",
          message: missingFieldMessage(field, definition, payloadVersion),
          location: field,
          suggestedFix: `Provide "${field}"`,
        }),
      );
    }

    const typed = this.checkTypes(section.fields, payload, violations);
    this.checkEnums(typed, payload, violations);
    this.checkPatterns(typed, payload, violations);

    for (const rule of section.rules) {
      if (rule.predicate(payload)) continue;
      violations.push(
        createViolation({
          ruleId: rule.id,
          severity: rule.severity,
          message: rule.message,
          location: rule.location,
          suggestedFix: rule.fix,
        }),
      );
    }

    if (hasBlockingViolations(violations)) {
      log.debug(
        { contract: name, direction, violations: violations.map((v) => v.ruleId) },
        "Contract validation failed",
      );
    }
    return violations;
  }

  private checkVersion(
    schema: ContractSchema,
    payload: Payload,
    violations: Violation[],
  ): ContractVersion | null {
    const declared = payload[VERSION_FIELD];
    if (declared === undefined) return null;

    const parsed = typeof declared === "string" ? parseVersion(declared) : null;
    if (!parsed) {
      violations.push(
        createViolation({
          ruleId: "contract.version",
          severity: "error",
          message: `${VERSION_FIELD} must look like MAJOR.MINOR[.PATCH], got ${JSON.stringify(declared)}`,
          location: VERSION_FIELD,
        }),
      );
      return null;
    }

    const compatibility = checkCompatibility(parsed, versionOf(schema));
    switch (compatibility.kind) {
      case "same":
        break;
      case "major-mismatch":
        violations.push(
          createViolation({
            ruleId: "contract.version",
            severity: "error",
            message: `${schema.name} ${String(declared)} is incompatible with ${schema.version}: major versions differ`,
            location: VERSION_FIELD,
            suggestedFix: `Produce ${schema.name} ${schema.version}`,
          }),
        );
        break;
      case "newer-minor":
        violations.push(
          createViolation({
            ruleId: "contract.version",
            severity: "warning",
            message: `${schema.name} ${String(declared)} is newer than the loaded ${schema.version}; unknown fields are ignored`,
            location: VERSION_FIELD,
          }),
        );
        break;
      case "older-minor":
        violations.push(
          createViolation({
            ruleId: "contract.version",
            severity: "info",
            message: `${schema.name} ${String(declared)} accepted under ${schema.version}`,
            location: VERSION_FIELD,
          }),
        );
        break;
    }
    return parsed;
  }

  /** Returns the present fields whose values have the declared type. */
  private checkTypes(
    fields: Readonly<Record<string, FieldDefinition>>,
    payload: Payload,
    violations: Violation[],
  ): [string, FieldDefinition][] {
    const typed: [string, FieldDefinition][] = [];

    for (const [field, definition] of Object.entries(fields)) {
      const value = payload[field];
      if (!isPresent(value)) continue;

      if (!matchesType(definition.type, value)) {
        violations.push(typeViolation(field, definition.type, value));
        continue;
      }

      const itemType = definition.items;
      if (itemType && Array.isArray(value)) {
        const badIndex = value.findIndex((item: unknown) => !matchesType(itemType, item));
        if (badIndex >= 0) {
          violations.push(typeViolation(`${field}[${String(badIndex)}]`, itemType, value[badIndex]));
          continue;
        }
      }

      typed.push([field, definition]);
    }
    return typed;
  }

  private checkEnums(typed: readonly [string, FieldDefinition][], payload: Payload, violations: Violation[]): void {
    for (const [field, definition] of typed) {
      const allowed = definition.enum;
      if (!allowed || allowed.some((candidate) => candidate === payload[field])) continue;
      violations.push(
        createViolation({
          ruleId: "contract.enum",
          severity: "error",
          message: `Field ${field} must be one of ${allowed.map((v) => JSON.stringify(v)).join(", ")}`,
          location: field,
        }),
      );
    }
  }

  private checkPatterns(typed: readonly [string, FieldDefinition][], payload: Payload, violations: Violation[]): void {
    for (const [field, definition] of typed) {
      const value = payload[field];
      if (definition.pattern === undefined || typeof value !== "string") continue;
      if (this.pattern(definition.pattern).test(value)) continue;
      violations.push(
        createViolation({
          ruleId: "contract.pattern",
          severity: "error",
          message: `Field ${field} does not match pattern ${definition.pattern}`,
          location: field,
        }),
      );
    }
  }

  private pattern(source: string): RegExp {
    let compiled = this.patterns.get(source);
    if (!compiled) {
      compiled = new RegExp(source);
      this.patterns.set(source, compiled);
    }
    return compiled;
  }
}

function missingFieldMessage(
  field: string,
  definition: FieldDefinition,
  payloadVersion: ContractVersion | null,
): string {
  const since = definition.since === undefined ? null : parseVersion(definition.since);
  if (payloadVersion && since && compareVersions(since, payloadVersion) > 0) {
    return `Missing required field: ${field} (required since ${definition.since ?? ""})`;
  }
  return `Missing required field: ${field}`;
}

function typeViolation(location: string, expected: FieldType, value: unknown): Violation {
  return createViolation({
    ruleId: "contract.type",
    severity: "error",
    message: `Field ${location} must be ${expected === "integer" || expected === "array" || expected === "object" ? "an" : "a"} ${expected}, got ${describeType(value)}`,
    location,
  });
}

function matchesType(type: FieldType, value: unknown): boolean {
  switch (type) {
    case "any":
      return true;
    case "string":
      return typeof value === "string";
    case "number":
      return typeof value === "number" && Number.isFinite(value);
    case "integer":
      return typeof value === "number" && Number.isInteger(value);
    case "boolean":
      return typeof value === "boolean";
    case "array":
      return Array.isArray(value);
    case "object":
      return isRecord(value);
  }
}

function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null;
}

function describeType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}
