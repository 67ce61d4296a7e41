import pLimit from "p-limit";
import { StageName, StageServiceError, dLog } from "@scanflow/shared";
import type { StageHandlers, StageResponse } from "../stages/contracts";

type Limiter = ReturnType<typeof pLimit>;

export interface StageRunnerOptions {
  /** Simultaneous invocations per stage */
  concurrency: number;
  /** Queued invocations per stage before new ones are turned away */
  maxPending: number;
}

/** How the orchestrator reaches a stage processor */
export interface StageInvoker {
  invoke<S extends StageName>(stage: S, payload: unknown): Promise<StageResponse<S>>;
}

/**
 * Runs stage handlers in-process with a bounded slot pool per stage. Inner
 * retries happen inside the held slot. A saturated stage rejects with
 * TooManyRequestsException, which the orchestrator retries at state level.
 */
export class StageRunner implements StageInvoker {
  private readonly limits: Record<StageName, Limiter>;

  constructor(
    private readonly handlers: StageHandlers,
    private readonly opts: StageRunnerOptions
  ) {
    if (opts.concurrency < 1) throw new RangeError("stage concurrency must be >= 1");
    const make = () => pLimit(opts.concurrency);
    this.limits = {
      segmentation: make(),
      vlm_processing: make(),
      llm_enhancement: make(),
      results_storage: make(),
    };
  }

  invoke<S extends StageName>(stage: S, payload: unknown): Promise<StageResponse<S>> {
    const handler = this.handlers[stage];
    const limit = this.limits[stage];
    if (limit.pendingCount >= this.opts.maxPending) {
      return Promise.reject(
        new StageServiceError(
          `Stage ${stage} is saturated (${limit.activeCount} active, ${limit.pendingCount} pending)`,
          "TooManyRequestsException"
        )
      );
    }
    dLog(`[stage-runner] ${stage} active=${limit.activeCount} pending=${limit.pendingCount}`);
    return limit(() => handler(payload));
  }

  load(): Record<StageName, { active: number; pending: number }> {
    const of = (stage: StageName) => ({
      active: this.limits[stage].activeCount,
      pending: this.limits[stage].pendingCount,
    });
    return {
      segmentation: of("segmentation"),
      vlm_processing: of("vlm_processing"),
      llm_enhancement: of("llm_enhancement"),
      results_storage: of("results_storage"),
    };
  }
}
