import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { logger } from "./logger.js";

const SOURCE_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..");
// Compiled code runs from dist/, while schemas and schema.sql stay in the source tree.
const PROJECT_ROOT = path.basename(SOURCE_ROOT) === "dist" ? path.dirname(SOURCE_ROOT) : SOURCE_ROOT;

let _resolvedHome: string | null = null;

function resolveCadreHome(): string {
  if (!_resolvedHome) {
    _resolvedHome = process.env.CADRE_HOME ?? path.join(os.homedir(), ".cadre");
    logger.debug({ cadreHome: _resolvedHome }, "CADRE_HOME resolved");
  }
  return _resolvedHome;
}

export function getCadreHome(): string {
  return resolveCadreHome();
}

export function getDatabasePath(): string {
  return process.env.CADRE_DB_PATH ?? path.join(resolveCadreHome(), "cadre.db");
}

export function getContractsDir(): string {
  return process.env.CADRE_CONTRACTS_DIR ?? path.join(PROJECT_ROOT, "contracts", "schemas");
}

export function getSchemaSqlPath(): string {
  return path.join(PROJECT_ROOT, "state", "schema.sql");
}
