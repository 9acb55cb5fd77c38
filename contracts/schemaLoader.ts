import fs from "node:fs";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { logger } from "../config/logger.js";
import { SchemaConflictError, SchemaDefinitionError } from "../shared/errors.js";
import type { ContractSchema } from "./contract.types.js";
import { requiredFields, validateSchemaDocument } from "./schemaDocument.js";
import { compareVersions, parseVersion, type ContractVersion } from "./versioning.js";

const SCHEMA_EXTENSIONS = new Set([".yaml", ".yml"]);

/** Every loaded version of each contract, newest first. */
export type SchemaIndex = ReadonlyMap<string, readonly ContractSchema[]>;

export function loadSchemaFile(filePath: string): ContractSchema {
  let parsed: unknown;
  try {
    parsed = parseYaml(fs.readFileSync(filePath, "utf-8"));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new SchemaDefinitionError(`Contract document is not valid YAML: ${message}`, filePath);
  }
  return validateSchemaDocument(parsed, filePath);
}

export function loadSchemasFromDirectory(dir: string): SchemaIndex {
  if (!fs.existsSync(dir)) {
    throw new SchemaDefinitionError(`Contract schema directory not found: ${dir}`);
  }

  const files = fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && SCHEMA_EXTENSIONS.has(path.extname(entry.name)))
    .map((entry) => path.join(dir, entry.name))
    .sort();

  const schemas = files.map((file) => loadSchemaFile(file));
  const index = buildSchemaIndex(schemas);

  logger.info({ dir, files: files.length, contracts: index.size }, "Contract schemas loaded");
  return index;
}

export function buildSchemaIndex(schemas: readonly ContractSchema[]): SchemaIndex {
  const byName = new Map<string, ContractSchema[]>();

  for (const schema of schemas) {
    const versions = byName.get(schema.name) ?? [];
    const sameVersion = versions.find((existing) => sameContractVersion(existing, schema));

    if (!sameVersion) {
      versions.push(schema);
      byName.set(schema.name, versions);
      continue;
    }

    if (!sameRequiredFields(sameVersion, schema)) {
      throw new SchemaConflictError(schema.name, [sameVersion.source, schema.source]);
    }

    logger.warn(
      { contract: schema.name, version: schema.version, kept: sameVersion.source, ignored: schema.source },
      "Duplicate contract schema ignored",
    );
  }

  for (const versions of byName.values()) {
    versions.sort((a, b) => compareVersions(versionOf(b), versionOf(a)));
  }
  return byName;
}

function sameContractVersion(a: ContractSchema, b: ContractSchema): boolean {
  return compareVersions(versionOf(a), versionOf(b)) === 0;
}

function sameRequiredFields(a: ContractSchema, b: ContractSchema): boolean {
  const key = (schema: ContractSchema): string =>
    JSON.stringify([requiredFields(schema.input).sort(), requiredFields(schema.output).sort()]);
  return key(a) === key(b);
}

export function versionOf(schema: ContractSchema): ContractVersion {
  const version = parseVersion(schema.version);
  if (!version) {
    throw new SchemaDefinitionError(`Contract ${schema.name} has an invalid version "${schema.version}"`, schema.source);
  }
  return version;
}
