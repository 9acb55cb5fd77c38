import type BetterSqlite3 from "better-sqlite3";
import { isScoreCategory } from "../config/runConfig.js";
import type { EvaluationRepository, StoredScore, StoredTallies } from "../evaluation/evaluationEngine.js";
import type { ScoreRecord, StageTallies } from "../evaluation/scorecard.js";

interface ScoreEntryRow {
  readonly executor_id: string;
  readonly category: string;
  readonly score: number;
  readonly run_id: string | null;
  readonly stage_id: string | null;
  readonly recorded_at: string;
}

interface TalliesRow {
  readonly executor_id: string;
  readonly total: number;
  readonly succeeded: number;
  readonly failed: number;
  readonly escalations: number;
}

export function insertScoreEntries(
  db: BetterSqlite3.Database,
  executorId: string,
  records: readonly ScoreRecord[],
): void {
  const statement = db.prepare(
    `INSERT INTO score_entries (executor_id, category, score, run_id, stage_id, recorded_at)
     VALUES (?, ?, ?, ?, ?, ?)`,
  );
  const insertAll = db.transaction((batch: readonly ScoreRecord[]) => {
    for (const record of batch) {
      statement.run(
        executorId,
        record.category,
        record.score,
        record.runId ?? null,
        record.stageId ?? null,
        record.recordedAt,
      );
    }
  });
  insertAll(records);
}

/** Scores in insertion order, optionally for one executor. */
export function getScoreEntries(db: BetterSqlite3.Database, executorId?: string): readonly StoredScore[] {
  const columns = "executor_id, category, score, run_id, stage_id, recorded_at";
  const rows = executorId
    ? (db
        .prepare(`SELECT ${columns} FROM score_entries WHERE executor_id = ? ORDER BY id ASC`)
        .all(executorId) as ScoreEntryRow[])
    : (db.prepare(`SELECT ${columns} FROM score_entries ORDER BY id ASC`).all() as ScoreEntryRow[]);

  return rows.flatMap((row) => {
    if (!isScoreCategory(row.category)) return [];
    return [
      {
        executorId: row.executor_id,
        category: row.category,
        score: row.score,
        recordedAt: row.recorded_at,
        runId: row.run_id ?? undefined,
        stageId: row.stage_id ?? undefined,
      },
    ];
  });
}

export function saveExecutorTallies(db: BetterSqlite3.Database, executorId: string, tallies: StageTallies): void {
  db.prepare(
    `INSERT INTO executor_tallies (executor_id, total, succeeded, failed, escalations, updated_at)
     VALUES (?, ?, ?, ?, ?, strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
     ON CONFLICT(executor_id) DO UPDATE SET
       total = excluded.total,
       succeeded = excluded.succeeded,
       failed = excluded.failed,
       escalations = excluded.escalations,
       updated_at = excluded.updated_at`,
  ).run(executorId, tallies.total, tallies.succeeded, tallies.failed, tallies.escalations);
}

export function getExecutorTallies(db: BetterSqlite3.Database): readonly StoredTallies[] {
  const rows = db
    .prepare(
      `SELECT executor_id, total, succeeded, failed, escalations
       FROM executor_tallies
       ORDER BY executor_id ASC`,
    )
    .all() as TalliesRow[];

  return rows.map((row) => ({
    executorId: row.executor_id,
    tallies: { total: row.total, succeeded: row.succeeded, failed: row.failed, escalations: row.escalations },
  }));
}

export function createEvaluationRepository(db: BetterSqlite3.Database): EvaluationRepository {
  return {
    loadScores: () => getScoreEntries(db),
    loadTallies: () => getExecutorTallies(db),
    insertScores: (executorId, records) => insertScoreEntries(db, executorId, records),
    saveTallies: (executorId, tallies) => saveExecutorTallies(db, executorId, tallies),
  };
}
