import crypto from "node:crypto";
import { componentLogger } from "../config/logger.js";
import { KeyedLock } from "../shared/concurrency/keyedLock.js";
import { strengthAt } from "./decay.js";
import {
  MEMORY_SCOPES,
  type AppendOptions,
  type MemoryEntry,
  type MemoryRepository,
  type MemoryScope,
  type MemoryStats,
  type QueryOptions,
  type ScopeStats,
  type ScoredMemoryEntry,
} from "./types.js";

const log = componentLogger("memory");

export const DEFAULT_PRUNE_THRESHOLD = 0.1;

export interface MemoryStoreOptions {
  readonly now?: () => Date;
  readonly repository?: MemoryRepository;
  readonly idFactory?: () => string;
}

export type MemoryPredicate = (entry: ScoredMemoryEntry) => boolean;

export class MemoryStore {
  private readonly entries = new Map<string, MemoryEntry>();
  private readonly lock = new KeyedLock();
  private readonly now: () => Date;
  private readonly repository: MemoryRepository | undefined;
  private readonly idFactory: () => string;
  private sequence = 0;

  constructor(options: MemoryStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.repository = options.repository;
    this.idFactory = options.idFactory ?? (() => crypto.randomUUID());

    if (this.repository) {
      for (const entry of this.repository.loadAll()) {
        this.entries.set(entry.id, entry);
        this.sequence = Math.max(this.sequence, entry.sequence);
      }
      log.debug({ entries: this.entries.size }, "Memory hydrated from repository");
    }
  }

  async append(
    scope: MemoryScope,
    content: unknown,
    initialConfidence: number,
    options: AppendOptions = {},
  ): Promise<MemoryEntry> {
    if (!(initialConfidence > 0 && initialConfidence <= 1)) {
      throw new RangeError(
        `initialConfidence must be within (0, 1], got ${String(initialConfidence)}`,
      );
    }
    const snapshot = snapshotContent(content);

    return this.lock.runExclusive(scope, () => {
      this.sequence += 1;
      const entry: MemoryEntry = Object.freeze({
        id: this.idFactory(),
        scope,
        content: snapshot,
        initialConfidence,
        createdAt: this.now().toISOString(),
        source: options.source ?? "system",
        tags: Object.freeze([...(options.tags ?? [])]),
        sequence: this.sequence,
      });

      this.repository?.insert(entry);
      this.entries.set(entry.id, entry);
      return entry;
    });
  }

  /** Entries of a scope at or above `minStrength`, newest first. */
  query(scope: MemoryScope, predicate?: MemoryPredicate, options: QueryOptions = {}): ScoredMemoryEntry[] {
    const minStrength = options.minStrength ?? 0;
    const now = this.now();

    const matches = [...this.entries.values()]
      .filter((entry) => entry.scope === scope)
      .map((entry) => this.score(entry, now))
      .filter((entry) => entry.strength >= minStrength)
      .filter((entry) => hasTags(entry, options.tags))
      .filter((entry) => (predicate ? predicate(entry) : true))
      .sort(newestFirst);

    return options.limit === undefined ? matches : matches.slice(0, options.limit);
  }

  /** Case-insensitive substring match over content; entries weaker than `minStrength` (default 0.1) are left out. */
  search(
    text: string,
    scope?: MemoryScope,
    options: Pick<QueryOptions, "minStrength"> = {},
  ): ScoredMemoryEntry[] {
    const needle = text.toLowerCase();
    const minStrength = options.minStrength ?? DEFAULT_PRUNE_THRESHOLD;
    const now = this.now();

    return [...this.entries.values()]
      .filter((entry) => scope === undefined || entry.scope === scope)
      .filter((entry) => JSON.stringify(entry.content).toLowerCase().includes(needle))
      .map((entry) => this.score(entry, now))
      .filter((entry) => entry.strength >= minStrength)
      .sort(newestFirst);
  }

  get(id: string): ScoredMemoryEntry | undefined {
    const entry = this.entries.get(id);
    return entry ? this.score(entry, this.now()) : undefined;
  }

  /** Removes entries whose strength is strictly below the threshold. */
  async prune(threshold: number = DEFAULT_PRUNE_THRESHOLD): Promise<ScoredMemoryEntry[]> {
    if (!(threshold >= 0 && threshold <= 1)) {
      throw new RangeError(`prune threshold must be within [0, 1], got ${String(threshold)}`);
    }

    const removed: ScoredMemoryEntry[] = [];
    for (const scope of MEMORY_SCOPES) {
      const pruned = await this.lock.runExclusive(scope, () => {
        const now = this.now();
        const expired = [...this.entries.values()]
          .filter((entry) => entry.scope === scope)
          .map((entry) => this.score(entry, now))
          .filter((entry) => entry.strength < threshold);

        if (expired.length > 0) {
          this.repository?.remove(expired.map((entry) => entry.id));
          for (const entry of expired) {
            this.entries.delete(entry.id);
          }
        }
        return expired;
      });
      removed.push(...pruned);
    }

    log.info({ threshold, removed: removed.length, remaining: this.entries.size }, "Memory pruned");
    return removed;
  }

  stats(): MemoryStats {
    const byScope: Record<MemoryScope, ScopeStats> = {
      working: { count: 0, averageStrength: 0 },
      project: { count: 0, averageStrength: 0 },
      skill: { count: 0, averageStrength: 0 },
      failure: { count: 0, averageStrength: 0 },
    };

    for (const scope of MEMORY_SCOPES) {
      const scored = this.query(scope);
      const total = scored.reduce((sum, entry) => sum + entry.strength, 0);
      byScope[scope] = {
        count: scored.length,
        averageStrength: scored.length === 0 ? 0 : total / scored.length,
      };
    }

    return { total: this.entries.size, byScope };
  }

  /** Waits for every queued mutation to settle. */
  async flush(): Promise<void> {
    await this.lock.drain();
  }

  private score(entry: MemoryEntry, now: Date): ScoredMemoryEntry {
    return {
      ...entry,
      strength: strengthAt(entry.initialConfidence, entry.scope, new Date(entry.createdAt), now),
    };
  }
}

function snapshotContent(content: unknown): unknown {
  const serialized = JSON.stringify(content);
  if (serialized === undefined) {
    throw new TypeError("Memory content must be JSON-serializable");
  }
  const parsed: unknown = JSON.parse(serialized);
  return parsed;
}

function hasTags(entry: MemoryEntry, tags: readonly string[] | undefined): boolean {
  return tags === undefined || tags.every((tag) => entry.tags.includes(tag));
}

function newestFirst(a: MemoryEntry, b: MemoryEntry): number {
  if (a.createdAt !== b.createdAt) {
    return a.createdAt < b.createdAt ? 1 : -1;
  }
  return b.sequence - a.sequence;
}
