export const MEMORY_SCOPES = ["working", "project", "skill", "failure"] as const;

export type MemoryScope = (typeof MEMORY_SCOPES)[number];

export interface MemoryEntry {
  readonly id: string;
  readonly scope: MemoryScope;
  readonly content: unknown;
  readonly initialConfidence: number;
  readonly createdAt: string;
  readonly source: string;
  readonly tags: readonly string[];
  readonly sequence: number;
}

export interface ScoredMemoryEntry extends MemoryEntry {
  readonly strength: number;
}

export interface AppendOptions {
  readonly source?: string;
  readonly tags?: readonly string[];
}

export interface QueryOptions {
  readonly minStrength?: number;
  readonly limit?: number;
  readonly tags?: readonly string[];
}

export interface ScopeStats {
  readonly count: number;
  readonly averageStrength: number;
}

export interface MemoryStats {
  readonly total: number;
  readonly byScope: Readonly<Record<MemoryScope, ScopeStats>>;
}

/** Synchronous persistence behind the store; every call runs under the scope lock. */
export interface MemoryRepository {
  loadAll(): readonly MemoryEntry[];
  insert(entry: MemoryEntry): void;
  remove(ids: readonly string[]): void;
}

export function isMemoryScope(value: unknown): value is MemoryScope {
  return MEMORY_SCOPES.some((scope) => scope === value);
}
