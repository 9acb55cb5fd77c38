import type BetterSqlite3 from "better-sqlite3";
import type { ArtifactRecord, ArtifactStore } from "../orchestration/types.js";
import { OwnershipError } from "../shared/errors.js";

interface ArtifactRow {
  readonly path: string;
  readonly owner_id: string;
  readonly version: number;
  readonly content: string;
  readonly updated_at: string;
}

interface ArtifactVersionRow {
  readonly path: string;
  readonly version: number;
  readonly content: string;
  readonly owner_id: string;
  readonly created_at: string;
}

export interface ArtifactSummary {
  readonly path: string;
  readonly ownerId: string;
  readonly version: number;
  readonly updatedAt: string;
}

export function getArtifact(db: BetterSqlite3.Database, path: string): ArtifactRecord | undefined {
  const row = db
    .prepare(`SELECT path, owner_id, version, content, updated_at FROM artifacts WHERE path = ?`)
    .get(path) as ArtifactRow | undefined;
  if (!row) return undefined;
  return { path: row.path, content: row.content, version: row.version, ownerId: row.owner_id, createdAt: row.updated_at };
}

export function getArtifactHistory(db: BetterSqlite3.Database, path: string): readonly ArtifactRecord[] {
  const rows = db
    .prepare(
      `SELECT path, version, content, owner_id, created_at
       FROM artifact_versions
       WHERE path = ?
       ORDER BY version ASC`,
    )
    .all(path) as ArtifactVersionRow[];

  return rows.map((row) => ({
    path: row.path,
    content: row.content,
    version: row.version,
    ownerId: row.owner_id,
    createdAt: row.created_at,
  }));
}

export function listArtifacts(db: BetterSqlite3.Database, ownerId?: string): readonly ArtifactSummary[] {
  const rows = ownerId
    ? (db
        .prepare(`SELECT path, owner_id, version, content, updated_at FROM artifacts WHERE owner_id = ? ORDER BY path ASC`)
        .all(ownerId) as ArtifactRow[])
    : (db
        .prepare(`SELECT path, owner_id, version, content, updated_at FROM artifacts ORDER BY path ASC`)
        .all() as ArtifactRow[]);

  return rows.map((row) => ({ path: row.path, ownerId: row.owner_id, version: row.version, updatedAt: row.updated_at }));
}

export interface SqliteArtifactStoreOptions {
  /** Fixed owners by path; any other path belongs to whoever writes it first. */
  readonly owners?: ReadonlyMap<string, string>;
  readonly now?: () => Date;
}

/** Versioned artifact store over the artifacts and artifact_versions tables. */
export class SqliteArtifactStore implements ArtifactStore {
  private readonly owners: ReadonlyMap<string, string>;
  private readonly now: () => Date;
  private readonly write: (path: string, content: string, ownerId: string) => ArtifactRecord;

  constructor(
    private readonly db: BetterSqlite3.Database,
    options: SqliteArtifactStoreOptions = {},
  ) {
    this.owners = options.owners ?? new Map();
    this.now = options.now ?? (() => new Date());
    this.write = db.transaction((path: string, content: string, ownerId: string) =>
      this.writeVersion(path, content, ownerId),
    );
  }

  get(path: string): ArtifactRecord | undefined {
    return getArtifact(this.db, path);
  }

  put(path: string, content: string, ownerId: string): ArtifactRecord {
    return this.write(path, content, ownerId);
  }

  history(path: string): readonly ArtifactRecord[] {
    return getArtifactHistory(this.db, path);
  }

  ownerOf(path: string): string | undefined {
    return this.owners.get(path) ?? getArtifact(this.db, path)?.ownerId;
  }

  private writeVersion(path: string, content: string, ownerId: string): ArtifactRecord {
    const owner = this.ownerOf(path);
    if (owner !== undefined && owner !== ownerId) {
      throw new OwnershipError(path, owner, ownerId);
    }

    const version = (getArtifact(this.db, path)?.version ?? 0) + 1;
    const createdAt = this.now().toISOString();

    this.db
      .prepare(
        `INSERT INTO artifacts (path, owner_id, version, content, updated_at)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT(path) DO UPDATE SET
           version = excluded.version,
           content = excluded.content,
           updated_at = excluded.updated_at`,
      )
      .run(path, ownerId, version, content, createdAt);
    this.db
      .prepare(
        `INSERT INTO artifact_versions (path, version, content, owner_id, created_at)
         VALUES (?, ?, ?, ?, ?)`,
      )
      .run(path, version, content, ownerId, createdAt);

    return { path, content, version, ownerId, createdAt };
  }
}
