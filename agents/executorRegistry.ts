import { componentLogger } from "../config/logger.js";
import { ExecutorRegistrationError } from "../shared/errors.js";
import type { ExecutorDescriptor } from "./types.js";

const log = componentLogger("executors");

/** Read-only view a run works against; taken once at submission. */
export interface ExecutorSnapshot {
  get(executorId: string): ExecutorDescriptor | undefined;
  list(): readonly ExecutorDescriptor[];
  authorityTable(): Readonly<Record<string, number>>;
}

export class ExecutorRegistry implements ExecutorSnapshot {
  private readonly executors = new Map<string, ExecutorDescriptor>();

  register(descriptor: ExecutorDescriptor): void {
    if (descriptor.id.trim().length === 0) {
      throw new ExecutorRegistrationError("Executor id must be a non-empty string");
    }
    if (this.executors.has(descriptor.id)) {
      throw new ExecutorRegistrationError(`Executor already registered: ${descriptor.id}`);
    }
    if (!Number.isInteger(descriptor.authority)) {
      throw new ExecutorRegistrationError(
        `Executor ${descriptor.id} authority must be an integer, got ${String(descriptor.authority)}`,
      );
    }

    this.executors.set(
      descriptor.id,
      Object.freeze({
        ...descriptor,
        accepts: Object.freeze([...descriptor.accepts]),
        produces: Object.freeze([...descriptor.produces]),
        ownedArtifacts: Object.freeze([...(descriptor.ownedArtifacts ?? [])]),
      }),
    );
    log.debug({ executorId: descriptor.id, authority: descriptor.authority }, "Executor registered");
  }

  has(executorId: string): boolean {
    return this.executors.has(executorId);
  }

  get(executorId: string): ExecutorDescriptor | undefined {
    return this.executors.get(executorId);
  }

  list(): readonly ExecutorDescriptor[] {
    return [...this.executors.values()];
  }

  authorityTable(): Readonly<Record<string, number>> {
    return Object.fromEntries(this.list().map((executor) => [executor.id, executor.authority]));
  }

  /** Artifact path → owning executor, across every registered executor. */
  artifactOwners(): ReadonlyMap<string, string> {
    const owners = new Map<string, string>();
    for (const executor of this.executors.values()) {
      for (const artifactPath of executor.ownedArtifacts ?? []) {
        owners.set(artifactPath, executor.id);
      }
    }
    return owners;
  }

  /** Later registrations do not reach a snapshot. */
  snapshot(): ExecutorSnapshot {
    const frozen = new Map(this.executors);
    const authorities = Object.freeze(this.authorityTable());
    return {
      get: (executorId) => frozen.get(executorId),
      list: () => [...frozen.values()],
      authorityTable: () => authorities,
    };
  }
}
