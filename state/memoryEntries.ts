import type BetterSqlite3 from "better-sqlite3";
import { isMemoryScope, type MemoryEntry, type MemoryRepository, type MemoryScope } from "../memory/types.js";

export interface MemoryEntryRow {
  readonly id: string;
  readonly scope: string;
  readonly content: string;
  readonly initial_confidence: number;
  readonly source: string;
  readonly tags: string;
  readonly sequence: number;
  readonly created_at: string;
}

const MEMORY_COLUMNS = `id, scope, content, initial_confidence, source, tags, sequence, created_at`;

export function insertMemoryEntry(db: BetterSqlite3.Database, entry: MemoryEntry): void {
  db.prepare(
    `INSERT INTO memory_entries (${MEMORY_COLUMNS})
     VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
  ).run(
    entry.id,
    entry.scope,
    JSON.stringify(entry.content),
    entry.initialConfidence,
    entry.source,
    JSON.stringify(entry.tags),
    entry.sequence,
    entry.createdAt,
  );
}

export function loadMemoryEntries(db: BetterSqlite3.Database, scope?: MemoryScope): readonly MemoryEntry[] {
  const rows = scope
    ? (db
        .prepare(`SELECT ${MEMORY_COLUMNS} FROM memory_entries WHERE scope = ? ORDER BY sequence ASC`)
        .all(scope) as MemoryEntryRow[])
    : (db.prepare(`SELECT ${MEMORY_COLUMNS} FROM memory_entries ORDER BY sequence ASC`).all() as MemoryEntryRow[]);

  return rows.map(toMemoryEntry);
}

export function deleteMemoryEntries(db: BetterSqlite3.Database, ids: readonly string[]): number {
  const statement = db.prepare("DELETE FROM memory_entries WHERE id = ?");
  const deleteAll = db.transaction((batch: readonly string[]) =>
    batch.reduce((removed, id) => removed + statement.run(id).changes, 0),
  );
  return deleteAll(ids);
}

export function countMemoryEntries(db: BetterSqlite3.Database): number {
  const row = db.prepare("SELECT COUNT(*) AS total FROM memory_entries").get() as { total: number };
  return row.total;
}

/** Backs a MemoryStore with the memory_entries table. */
export function createMemoryRepository(db: BetterSqlite3.Database): MemoryRepository {
  return {
    loadAll: () => loadMemoryEntries(db),
    insert: (entry) => insertMemoryEntry(db, entry),
    remove: (ids) => {
      deleteMemoryEntries(db, ids);
    },
  };
}

function toMemoryEntry(row: MemoryEntryRow): MemoryEntry {
  if (!isMemoryScope(row.scope)) {
    throw new RangeError(`memory_entries row ${row.id} has unknown scope "${row.scope}"`);
  }
  const content: unknown = JSON.parse(row.content);
  const tags: unknown = JSON.parse(row.tags);

  return Object.freeze({
    id: row.id,
    scope: row.scope,
    content,
    initialConfidence: row.initial_confidence,
    createdAt: row.created_at,
    source: row.source,
    tags: Object.freeze(Array.isArray(tags) ? tags.map(String) : []),
    sequence: row.sequence,
  });
}
