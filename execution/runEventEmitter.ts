import type BetterSqlite3 from "better-sqlite3";
import { logger } from "../config/logger.js";
import type { RunEvent, RunEventSink } from "../orchestration/types.js";
import { emitExecutionEvent } from "../state/executionEvents.js";

const SCHEDULER_AGENT = "scheduler";

/**
 * Writes the lifecycle events of one run to execution_events, keyed by run id.
 * A failed write is logged and dropped so it never fails the run.
 */
export class RunEventEmitter implements RunEventSink {
  constructor(
    private readonly db: BetterSqlite3.Database,
    private readonly runId: string,
  ) {}

  record(event: RunEvent): void {
    const agent = event.executorId ?? SCHEDULER_AGENT;
    try {
      emitExecutionEvent(this.db, {
        traceId: this.runId,
        agent,
        eventType: event.type,
        message: event.message,
        phase: event.stageId,
        metadata: event.metadata === undefined ? undefined : { ...event.metadata },
        level: event.level,
      });
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      logger.warn({ error: msg, agent, eventType: event.type, runId: this.runId }, "Failed to emit run event");
    }
  }
}

export function createRunEventEmitter(db: BetterSqlite3.Database, runId: string): RunEventEmitter {
  return new RunEventEmitter(db, runId);
}
