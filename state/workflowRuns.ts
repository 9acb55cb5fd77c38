import type BetterSqlite3 from "better-sqlite3";
import type { WorkflowResult } from "../orchestration/types.js";

export interface WorkflowRunRow {
  readonly run_id: string;
  readonly request: string;
  readonly success: number;
  readonly stages_completed: string;
  readonly stages_failed: string;
  readonly stages_skipped: string;
  readonly conflicts: number;
  readonly result: string;
  readonly error: string | null;
  readonly started_at: string;
  readonly finished_at: string;
  readonly duration_ms: number;
}

export interface WorkflowRunSummary {
  readonly runId: string;
  readonly request: string;
  readonly success: boolean;
  readonly stagesCompleted: readonly string[];
  readonly stagesFailed: readonly string[];
  readonly conflicts: number;
  readonly error: string | null;
  readonly finishedAt: string;
  readonly durationMs: number;
}

const RUN_COLUMNS = `run_id, request, success, stages_completed, stages_failed, stages_skipped, conflicts, result, error, started_at, finished_at, duration_ms`;

export function saveWorkflowRun(db: BetterSqlite3.Database, result: WorkflowResult): void {
  db.prepare(
    `INSERT OR REPLACE INTO workflow_runs (${RUN_COLUMNS})
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
  ).run(
    result.runId,
    result.request,
    result.success ? 1 : 0,
    JSON.stringify(result.stagesCompleted),
    JSON.stringify(result.stagesFailed),
    JSON.stringify(result.stagesSkipped),
    result.conflicts.length,
    JSON.stringify(result),
    result.error ?? result.abortReason ?? null,
    result.startedAt,
    result.finishedAt,
    result.durationMs,
  );
}

/** The full stored result of a run. */
export function getWorkflowRun(db: BetterSqlite3.Database, runId: string): WorkflowResult | undefined {
  const row = db.prepare(`SELECT result FROM workflow_runs WHERE run_id = ?`).get(runId) as
    | { result: string }
    | undefined;
  if (!row) return undefined;
  return JSON.parse(row.result) as WorkflowResult;
}

export function getRecentWorkflowRuns(db: BetterSqlite3.Database, limit: number = 20): readonly WorkflowRunSummary[] {
  const rows = db
    .prepare(
      `SELECT ${RUN_COLUMNS}
       FROM workflow_runs
       ORDER BY finished_at DESC, run_id ASC
       LIMIT ?`,
    )
    .all(limit) as WorkflowRunRow[];

  return rows.map((row) => ({
    runId: row.run_id,
    request: row.request,
    success: row.success === 1,
    stagesCompleted: parseList(row.stages_completed),
    stagesFailed: parseList(row.stages_failed),
    conflicts: row.conflicts,
    error: row.error,
    finishedAt: row.finished_at,
    durationMs: row.duration_ms,
  }));
}

export function getRunSuccessRate(db: BetterSqlite3.Database): number {
  const row = db
    .prepare(`SELECT COUNT(*) AS total, COALESCE(SUM(success), 0) AS succeeded FROM workflow_runs`)
    .get() as { total: number; succeeded: number };
  return row.total === 0 ? 0 : row.succeeded / row.total;
}

function parseList(raw: string): readonly string[] {
  const parsed: unknown = JSON.parse(raw);
  return Array.isArray(parsed) ? parsed.map(String) : [];
}
