import { RuleCompileError, SchemaDefinitionError } from "../shared/errors.js";
import type {
  CompiledRule,
  ContractSchema,
  ContractSection,
  FieldDefinition,
  FieldType,
  RuleDefinition,
  Severity,
} from "./contract.types.js";
import { compileRule, isRecord } from "./ruleCompiler.js";
import { compareVersions, parseVersion } from "./versioning.js";

const CONTRACT_NAME_REGEX = /^[a-z][a-z0-9_-]*$/;
const DEFAULT_VERSION = "1.0";

const VALID_FIELD_TYPES: readonly FieldType[] = [
  "string",
  "number",
  "integer",
  "boolean",
  "array",
  "object",
  "any",
];
const VALID_SEVERITIES: readonly Severity[] = ["error", "warning", "info"];

/**
 * Validates a parsed contract document and compiles its rules.
 *
 * Top-level `validation_rules` are appended to the output section's rules.
 */
export function validateSchemaDocument(raw: unknown, source: string): ContractSchema {
  if (!isRecord(raw)) {
    throw new SchemaDefinitionError("Contract document must be a mapping", source);
  }

  const name = validateName(raw["name"], source);
  const version = validateVersion(raw["version"], source);
  const description = validateOptionalString(raw["description"], "description", source);

  const input = validateSection(raw["input"], "input", version, source, []);
  const output = validateSection(
    raw["output"],
    "output",
    version,
    source,
    raw["validation_rules"] ?? raw["validationRules"] ?? [],
  );

  return { name, version, description, input, output, source };
}

function validateName(value: unknown, source: string): string {
  if (typeof value !== "string" || !CONTRACT_NAME_REGEX.test(value.trim())) {
    throw new SchemaDefinitionError(
      `name must be a lowercase identifier (letters, digits, "_" or "-"). Got: "${String(value)}"`,
      source,
    );
  }
  return value.trim();
}

function validateVersion(value: unknown, source: string): string {
  if (value === undefined || value === null) return DEFAULT_VERSION;
  const raw = typeof value === "number" ? String(value) : value;
  if (typeof raw !== "string" || parseVersion(raw) === null) {
    throw new SchemaDefinitionError(
      `version must look like MAJOR.MINOR[.PATCH]. Got: "${String(value)}"`,
      source,
    );
  }
  return raw.trim();
}

function validateOptionalString(value: unknown, field: string, source: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw new SchemaDefinitionError(`${field} must be a string`, source);
  }
  return value;
}

function validateSection(
  value: unknown,
  direction: "input" | "output",
  version: string,
  source: string,
  extraRules: unknown,
): ContractSection {
  if (value === undefined || value === null) {
    return { fields: {}, rules: validateRules(extraRules, direction, source) };
  }
  if (!isRecord(value)) {
    throw new SchemaDefinitionError(`${direction} must be a mapping with fields and rules`, source);
  }

  const fields = validateFields(value["fields"], direction, version, source);
  const rules = [
    ...validateRules(value["rules"] ?? [], direction, source),
    ...validateRules(extraRules, direction, source),
  ];

  const seen = new Set<string>();
  for (const rule of rules) {
    if (seen.has(rule.id)) {
      throw new SchemaDefinitionError(`${direction} declares rule ${rule.id} more than once`, source);
    }
    seen.add(rule.id);
  }

  return { fields, rules };
}

function validateFields(
  value: unknown,
  direction: string,
  version: string,
  source: string,
): Readonly<Record<string, FieldDefinition>> {
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) {
    throw new SchemaDefinitionError(`${direction}.fields must be a mapping of field names`, source);
  }

  const fields: Record<string, FieldDefinition> = {};
  for (const [fieldName, definition] of Object.entries(value)) {
    fields[fieldName] = validateField(definition, `${direction}.fields.${fieldName}`, version, source);
  }
  return fields;
}

function validateField(value: unknown, label: string, version: string, source: string): FieldDefinition {
  // shorthand: `summary: string`
  if (typeof value === "string") {
    return { type: validateFieldType(value, label, source), required: false };
  }
  if (!isRecord(value)) {
    throw new SchemaDefinitionError(`${label} must be a type name or a mapping`, source);
  }

  const type = value["type"] === undefined ? "any" : validateFieldType(value["type"], label, source);

  const required = value["required"] ?? false;
  if (typeof required !== "boolean") {
    throw new SchemaDefinitionError(`${label}.required must be a boolean`, source);
  }

  const field: {
    -readonly [K in keyof FieldDefinition]: FieldDefinition[K];
  } = { type, required };

  const enumValues = value["enum"];
  if (enumValues !== undefined) {
    if (!Array.isArray(enumValues) || enumValues.length === 0 || !enumValues.every(isEnumValue)) {
      throw new SchemaDefinitionError(`${label}.enum must be a non-empty list of scalars`, source);
    }
    field.enum = enumValues;
  }

  const pattern = value["pattern"];
  if (pattern !== undefined) {
    if (typeof pattern !== "string") {
      throw new SchemaDefinitionError(`${label}.pattern must be a string`, source);
    }
    try {
      new RegExp(pattern);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new SchemaDefinitionError(`${label}.pattern is not a valid expression: ${message}`, source);
    }
    field.pattern = pattern;
  }

  if (value["items"] !== undefined) {
    if (type !== "array") {
      throw new SchemaDefinitionError(`${label}.items is only allowed on array fields`, source);
    }
    field.items = validateFieldType(value["items"], `${label}.items`, source);
  }

  const since = value["since"];
  if (since !== undefined) {
    const sinceRaw = typeof since === "number" ? String(since) : since;
    const sinceVersion = typeof sinceRaw === "string" ? parseVersion(sinceRaw) : null;
    const schemaVersion = parseVersion(version);
    if (typeof sinceRaw !== "string" || !sinceVersion || !schemaVersion) {
      throw new SchemaDefinitionError(`${label}.since must be a version`, source);
    }
    if (compareVersions(sinceVersion, schemaVersion) > 0) {
      throw new SchemaDefinitionError(
        `${label}.since (${sinceRaw}) is newer than the contract version ${version}`,
        source,
      );
    }
    field.since = sinceRaw;
  }

  const description = value["description"];
  if (typeof description === "string") {
    field.description = description;
  }

  return field;
}

function validateFieldType(value: unknown, label: string, source: string): FieldType {
  const match = VALID_FIELD_TYPES.find((candidate) => candidate === value);
  if (!match) {
    throw new SchemaDefinitionError(
      `${label} type must be one of: ${VALID_FIELD_TYPES.join(", ")}. Got: "${String(value)}"`,
      source,
    );
  }
  return match;
}

function isEnumValue(value: unknown): value is string | number | boolean {
  return typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}

function validateRules(value: unknown, direction: string, source: string): CompiledRule[] {
  if (!Array.isArray(value)) {
    throw new SchemaDefinitionError(`${direction}.rules must be a list`, source);
  }

  return value.map((entry: unknown, index) => {
    const definition = validateRuleDefinition(entry, `${direction}.rules[${String(index)}]`, source);
    try {
      return compileRule(definition);
    } catch (error) {
      if (error instanceof RuleCompileError) {
        throw new SchemaDefinitionError(error.message, source);
      }
      throw error;
    }
  });
}

function validateRuleDefinition(value: unknown, label: string, source: string): RuleDefinition {
  if (!isRecord(value)) {
    throw new SchemaDefinitionError(`${label} must be a mapping`, source);
  }

  const id = value["id"] ?? value["rule_id"];
  if (typeof id !== "string" || id.trim().length === 0) {
    throw new SchemaDefinitionError(`${label}.id must be a non-empty string`, source);
  }

  const severity = VALID_SEVERITIES.find((candidate) => candidate === (value["severity"] ?? "error"));
  if (!severity) {
    throw new SchemaDefinitionError(
      `${label}.severity must be one of: ${VALID_SEVERITIES.join(", ")}. Got: "${String(value["severity"])}"`,
      source,
    );
  }

  const condition = value["condition"];
  if (typeof condition !== "string" || condition.trim().length === 0) {
    throw new SchemaDefinitionError(`${label}.condition must be a non-empty string`, source);
  }

  const message = value["message"];
  if (typeof message !== "string" || message.trim().length === 0) {
    throw new SchemaDefinitionError(`${label}.message must be a non-empty string`, source);
  }

  return {
    id: id.trim(),
    severity,
    condition,
    message,
    location: validateOptionalString(value["location"], `${label}.location`, source),
    fix: validateOptionalString(value["fix"] ?? value["suggested_fix"], `${label}.fix`, source),
  };
}

/** Field names marked required in a section, in declaration order. */
export function requiredFields(section: ContractSection): string[] {
  return Object.entries(section.fields)
    .filter(([, field]) => field.required)
    .map(([name]) => name);
}
