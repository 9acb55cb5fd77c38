import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import type BetterSqlite3 from "better-sqlite3";
import { getDatabasePath, getSchemaSqlPath } from "../config/paths.js";

/**
 * Opens (or creates) the database and applies the schema. Pass ":memory:" for
 * a throwaway database.
 */
export function openDatabase(dbPath: string = getDatabasePath()): BetterSqlite3.Database {
  if (dbPath !== ":memory:") {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");

  const schema = fs.readFileSync(getSchemaSqlPath(), "utf-8");
  db.exec(schema);

  return db;
}
