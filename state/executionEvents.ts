import type BetterSqlite3 from "better-sqlite3";

export type EventLevel = "info" | "warn" | "error" | "debug";

export interface ExecutionEventInput {
  /** Run id of the workflow the event belongs to. */
  readonly traceId: string;
  readonly agent: string;
  readonly eventType: string;
  readonly message: string;
  /** Stage id, when the event concerns one stage. */
  readonly phase?: string;
  readonly metadata?: Record<string, unknown>;
  readonly level?: EventLevel;
}

export interface ExecutionEventRow {
  readonly id: number;
  readonly trace_id: string;
  readonly agent: string;
  readonly event_type: string;
  readonly phase: string | null;
  readonly message: string;
  readonly metadata: string | null;
  readonly level: EventLevel;
  readonly created_at: string;
}

const EVENT_COLUMNS = `id, trace_id, agent, event_type, phase, message, metadata, level, created_at`;

export function emitExecutionEvent(db: BetterSqlite3.Database, event: ExecutionEventInput): number {
  const metadataJson = event.metadata ? JSON.stringify(event.metadata) : null;

  const result = db
    .prepare(
      `INSERT INTO execution_events (trace_id, agent, event_type, phase, message, metadata, level)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
    )
    .run(
      event.traceId,
      event.agent,
      event.eventType,
      event.phase ?? null,
      event.message,
      metadataJson,
      event.level ?? "info",
    );

  return Number(result.lastInsertRowid);
}

export function getEventsByTraceId(db: BetterSqlite3.Database, traceId: string): readonly ExecutionEventRow[] {
  return db
    .prepare(
      `SELECT ${EVENT_COLUMNS}
       FROM execution_events
       WHERE trace_id = ?
       ORDER BY id ASC`,
    )
    .all(traceId) as ExecutionEventRow[];
}

export function getStageEvents(
  db: BetterSqlite3.Database,
  traceId: string,
  stageId: string,
): readonly ExecutionEventRow[] {
  return db
    .prepare(
      `SELECT ${EVENT_COLUMNS}
       FROM execution_events
       WHERE trace_id = ? AND phase = ?
       ORDER BY id ASC`,
    )
    .all(traceId, stageId) as ExecutionEventRow[];
}

export function cleanupOldEvents(db: BetterSqlite3.Database, daysToKeep: number = 30): number {
  if (!Number.isInteger(daysToKeep) || daysToKeep < 0) {
    throw new RangeError(`daysToKeep must be a non-negative integer, got ${String(daysToKeep)}`);
  }
  const result = db
    .prepare(
      `DELETE FROM execution_events
       WHERE created_at < strftime('%Y-%m-%dT%H:%M:%fZ', 'now', ? || ' days')`,
    )
    .run(`-${String(daysToKeep)}`);

  return result.changes;
}
