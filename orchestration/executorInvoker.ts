import type { Payload } from "../contracts/contract.types.js";
import type { ExecutorDescriptor, ExecutorOutcome, ExecutorUsage } from "../agents/types.js";
import { ExecutorFailure, describeError } from "../shared/errors.js";

export interface InvocationRequest {
  readonly executor: ExecutorDescriptor;
  readonly contract: string;
  readonly input: Payload;
  readonly runId: string;
  readonly stageId: string;
  readonly attempt: number;
  readonly timeoutMs: number;
  /** Run-level signal; aborting it aborts the invocation. */
  readonly signal: AbortSignal;
}

export type InvocationResult =
  | { readonly ok: true; readonly output: unknown; readonly usage?: ExecutorUsage; readonly durationMs: number }
  | { readonly ok: false; readonly failure: ExecutorFailure; readonly durationMs: number };

/**
 * Calls an executor bounded by a timeout. Rejections, `failed` outcomes,
 * timeouts and run aborts all come back as an ExecutorFailure.
 */
export async function invokeExecutor(request: InvocationRequest): Promise<InvocationResult> {
  const { executor } = request;
  const controller = new AbortController();
  const startedAt = Date.now();
  let cleanup = (): void => undefined;

  const interrupted = new Promise<ExecutorFailure>((resolve) => {
    const timer = setTimeout(() => {
      const failure = new ExecutorFailure(
        executor.id,
        `Executor ${executor.id} timed out after ${String(request.timeoutMs)}ms`,
        true,
      );
      controller.abort(failure);
      resolve(failure);
    }, request.timeoutMs);

    const onAbort = (): void => {
      const failure = new ExecutorFailure(executor.id, `Run aborted while ${executor.id} was running`);
      controller.abort(failure);
      resolve(failure);
    };
    cleanup = () => {
      clearTimeout(timer);
      request.signal.removeEventListener("abort", onAbort);
    };

    if (request.signal.aborted) {
      onAbort();
    } else {
      request.signal.addEventListener("abort", onAbort, { once: true });
    }
  });

  const call = new Promise<ExecutorOutcome>((resolve) => {
    resolve(
      executor.invoke(request.contract, request.input, {
        runId: request.runId,
        stageId: request.stageId,
        attempt: request.attempt,
        signal: controller.signal,
      }),
    );
  }).then(
    (outcome): InvocationResult =>
      outcome.status === "success"
        ? { ok: true, output: outcome.output, usage: outcome.usage, durationMs: Date.now() - startedAt }
        : {
            ok: false,
            failure: new ExecutorFailure(executor.id, outcome.error),
            durationMs: Date.now() - startedAt,
          },
    (error: unknown): InvocationResult => ({
      ok: false,
      failure: new ExecutorFailure(executor.id, describeError(error)),
      durationMs: Date.now() - startedAt,
    }),
  );

  try {
    return await Promise.race([
      call,
      interrupted.then(
        (failure): InvocationResult => ({ ok: false, failure, durationMs: Date.now() - startedAt }),
      ),
    ]);
  } finally {
    cleanup();
  }
}
