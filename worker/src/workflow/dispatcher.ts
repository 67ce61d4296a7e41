import { EXECUTION_ID_PREFIX, JobId, WorkflowInput, nLog } from "@scanflow/shared";
import { PIPELINE_DEFINITION, WorkflowDefinition } from "./definition";
import type { StepScheduler } from "./scheduler";

export function executionIdFor(jobId: JobId): string {
  return `${EXECUTION_ID_PREFIX}${jobId}`;
}

export interface DispatchResult {
  executionId: string;
  /** false when an execution with this id was already started */
  started: boolean;
}

export interface ExecutionStarter {
  startExecution(input: WorkflowInput): Promise<DispatchResult>;
}

/** Starts workflow executions by scheduling their first state */
export class WorkflowDispatcher implements ExecutionStarter {
  constructor(
    private readonly scheduler: StepScheduler,
    private readonly definition: WorkflowDefinition = PIPELINE_DEFINITION,
    private readonly now: () => Date = () => new Date()
  ) {}

  async startExecution(input: WorkflowInput): Promise<DispatchResult> {
    const started = await this.scheduler.schedule({
      executionId: input.execution_id,
      state: this.definition.startAt,
      attempt: 0,
      context: { input, startedAt: this.now().toISOString(), results: {} },
    });
    nLog(
      started
        ? `[workflow] started ${input.execution_id} for job ${input.job_id}`
        : `[workflow] ${input.execution_id} already started, skipping`
    );
    return { executionId: input.execution_id, started };
  }
}
