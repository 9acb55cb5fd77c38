import { logger } from "../config/logger.js";
import { loadRunConfig } from "../config/runConfig.js";
import { MemoryStore } from "../memory/memoryStore.js";
import { openDatabase } from "../state/db.js";
import { createMemoryRepository } from "../state/memoryEntries.js";
import { cleanupOldEvents } from "../state/executionEvents.js";

const args = process.argv.slice(2);

const thresholdFlagIndex = args.indexOf("--threshold");
const thresholdArg = thresholdFlagIndex !== -1 ? args[thresholdFlagIndex + 1] : undefined;
const daysFlagIndex = args.indexOf("--keep-events-days");
const daysArg = daysFlagIndex !== -1 ? args[daysFlagIndex + 1] : undefined;

const threshold = thresholdArg === undefined ? loadRunConfig().pruneThreshold : Number(thresholdArg);
const daysToKeep = daysArg === undefined ? 30 : Number(daysArg);

if (!(threshold >= 0 && threshold <= 1)) {
  logger.error({ threshold: thresholdArg }, "--threshold must be a number within [0, 1]");
  process.exitCode = 1;
} else if (!Number.isInteger(daysToKeep) || daysToKeep < 0) {
  logger.error({ keepEventsDays: daysArg }, "--keep-events-days must be a non-negative integer");
  process.exitCode = 1;
} else {
  const db = openDatabase();

  try {
    const memory = new MemoryStore({ repository: createMemoryRepository(db) });
    const before = memory.stats();

    const removed = await memory.prune(threshold);
    const eventsDeleted = cleanupOldEvents(db, daysToKeep);

    logger.info(
      { threshold, before: before.total, removed: removed.length, remaining: memory.stats().total },
      "Memory pruned",
    );
    logger.info({ daysToKeep, eventsDeleted }, "Old execution events removed");
  } finally {
    db.close();
  }
}
