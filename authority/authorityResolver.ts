import { componentLogger } from "../config/logger.js";
import { UnresolvableConflictError } from "../shared/errors.js";
import type { Conflict } from "./conflict.js";

const log = componentLogger("authority");

export interface AuthorityResolverOptions {
  /** Executor id → integer authority. */
  readonly authorities: Readonly<Record<string, number>>;
  /** Tie-break order among executors of equal authority; unlisted ids sort after listed ones. */
  readonly precedence?: readonly string[];
}

export interface ResolverCandidate {
  readonly executorId: string;
  readonly authority: number;
}

/**
 * Picks the executor that settles a conflict: strictly more authority than
 * every participant, highest first, then precedence order, then id.
 */
export class AuthorityResolver {
  private readonly authorities: ReadonlyMap<string, number>;
  private readonly precedence: readonly string[];

  constructor(options: AuthorityResolverOptions) {
    this.authorities = new Map(Object.entries(options.authorities));
    this.precedence = options.precedence ?? [];
  }

  authorityOf(executorId: string): number {
    const authority = this.authorities.get(executorId);
    if (authority === undefined) {
      throw new RangeError(`Unknown executor in conflict: ${executorId}`);
    }
    return authority;
  }

  candidates(conflict: Pick<Conflict, "agentsInvolved">): ResolverCandidate[] {
    if (conflict.agentsInvolved.length === 0) {
      throw new RangeError("A conflict needs at least one participant");
    }
    const ceiling = Math.max(...conflict.agentsInvolved.map((id) => this.authorityOf(id)));

    return [...this.authorities.entries()]
      .filter(([, authority]) => authority > ceiling)
      .map(([executorId, authority]) => ({ executorId, authority }))
      .sort(
        (a, b) =>
          b.authority - a.authority ||
          this.rank(a.executorId) - this.rank(b.executorId) ||
          a.executorId.localeCompare(b.executorId),
      );
  }

  resolve(conflict: Pick<Conflict, "id" | "agentsInvolved">): string {
    const [winner] = this.candidates(conflict);
    if (!winner) {
      log.warn(
        { conflictId: conflict.id, agents: conflict.agentsInvolved },
        "No executor can resolve conflict",
      );
      throw new UnresolvableConflictError(conflict.id, conflict.agentsInvolved);
    }

    log.info(
      { conflictId: conflict.id, resolverId: winner.executorId, authority: winner.authority },
      "Conflict resolver selected",
    );
    return winner.executorId;
  }

  private rank(executorId: string): number {
    const index = this.precedence.indexOf(executorId);
    return index === -1 ? this.precedence.length : index;
  }
}
