import { Queue } from "bullmq";
import {
  QUEUE_RETRY_POLICY,
  RetryPolicy,
  WORKFLOW_QUEUE_NAME,
  dLog,
  defaultSleep,
  eLog,
  errorMessage,
  runWithRetry,
} from "@scanflow/shared";
import { StepMessage, stepId } from "./types";

export interface ScheduleOptions {
  delayMs?: number;
}

/**
 * Durable hand-off between workflow steps. `schedule` resolves false when a
 * step with the same id was already accepted.
 */
export interface StepScheduler {
  schedule(step: StepMessage, opts?: ScheduleOptions): Promise<boolean>;
  close(): Promise<void>;
}

/** BullMQ-backed scheduler; each step is one job on the workflow queue */
export class BullStepScheduler implements StepScheduler {
  constructor(
    private readonly queue: Queue<StepMessage>,
    private readonly policy: RetryPolicy = QUEUE_RETRY_POLICY
  ) {}

  static create(redisUrl: string): BullStepScheduler {
    return new BullStepScheduler(new Queue<StepMessage>(WORKFLOW_QUEUE_NAME, { connection: { url: redisUrl } }));
  }

  async schedule(step: StepMessage, opts: ScheduleOptions = {}): Promise<boolean> {
    const jobId = stepId(step);
    return runWithRetry(
      async () => {
        const existing = await this.queue.getJob(jobId);
        if (existing) {
          dLog(`[workflow] step ${jobId} already queued`);
          return false;
        }
        await this.queue.add(step.state, step, {
          jobId,
          delay: opts.delayMs && opts.delayMs > 0 ? opts.delayMs : undefined,
          removeOnComplete: { age: 24 * 3600, count: 10_000 },
          removeOnFail: { age: 7 * 24 * 3600 },
        });
        return true;
      },
      this.policy,
      { operation: "queue.scheduleStep" }
    );
  }

  async close(): Promise<void> {
    await this.queue.close();
  }
}

export type StepHandler = (step: StepMessage) => Promise<unknown>;

/**
 * In-process FIFO for local runs and tests. Steps run when `drain` is
 * called; delays go through the injected sleep.
 */
export class InlineStepScheduler implements StepScheduler {
  private readonly pending: Array<{ step: StepMessage; delayMs: number }> = [];
  private readonly seen = new Set<string>();
  readonly delays: number[] = [];

  constructor(private readonly sleep: (ms: number) => Promise<void> = defaultSleep) {}

  async schedule(step: StepMessage, opts: ScheduleOptions = {}): Promise<boolean> {
    const id = stepId(step);
    if (this.seen.has(id)) return false;
    this.seen.add(id);
    // deep copy: a queued step must not share state with the caller
    this.pending.push({ step: structuredClone(step), delayMs: opts.delayMs ?? 0 });
    return true;
  }

  get size(): number {
    return this.pending.length;
  }

  /** Run queued steps, including those they schedule, until none remain */
  async drain(handler: StepHandler, maxSteps = 1000): Promise<number> {
    let processed = 0;
    while (this.pending.length > 0) {
      if (processed >= maxSteps) {
        throw new Error(`InlineStepScheduler exceeded ${maxSteps} steps`);
      }
      const next = this.pending.shift();
      if (!next) break;
      if (next.delayMs > 0) {
        this.delays.push(next.delayMs);
        await this.sleep(next.delayMs);
      }
      try {
        await handler(next.step);
      } catch (err) {
        eLog(`[workflow] inline step ${stepId(next.step)} failed: ${errorMessage(err)}`);
        throw err;
      }
      processed++;
    }
    return processed;
  }

  async close(): Promise<void> {
    this.pending.length = 0;
  }
}
