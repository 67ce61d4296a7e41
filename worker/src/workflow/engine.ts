import {
  ErrorEnvelope,
  ExecutionTimeoutError,
  InvalidStageInputError,
  StageName,
  eLog,
  errorMessage,
  nLog,
  toErrorEnvelope,
  wLog,
} from "@scanflow/shared";
import type { Notifier } from "../notifications/notifier";
import { isRejection } from "../stages/contracts";
import type { ErrorHandlerResponse } from "../stages/errorHandlerStage";
import {
  ErrorHandlerState,
  PIPELINE_DEFINITION,
  StageState,
  WorkflowDefinition,
  matchesError,
  retryDelayMs,
} from "./definition";
import type { StageInvoker } from "./stageRunner";
import type { StepScheduler } from "./scheduler";
import type { ExecutionContext, ExecutionResults, StateName, StepMessage, StepOutcome } from "./types";

export interface WorkflowEngineDeps {
  scheduler: StepScheduler;
  stages: StageInvoker;
  errorHandler: (payload: unknown) => Promise<ErrorHandlerResponse>;
  notifier: Notifier;
  definition?: WorkflowDefinition;
  now?: () => Date;
}

async function invokeInto<S extends StageName>(
  stages: StageInvoker,
  stage: S,
  payload: unknown,
  results: ExecutionResults
): Promise<void> {
  const response = await stages.invoke(stage, payload);
  if (isRejection(response)) {
    throw new InvalidStageInputError(response.error, response.missing);
  }
  results[stage] = response;
}

/**
 * Runs one state per call and checkpoints the next through the scheduler.
 * Nothing is held in memory between steps: the context travels inside each
 * step message.
 */
export class WorkflowEngine {
  private readonly definition: WorkflowDefinition;
  private readonly now: () => Date;

  constructor(private readonly deps: WorkflowEngineDeps) {
    this.definition = deps.definition ?? PIPELINE_DEFINITION;
    this.now = deps.now ?? (() => new Date());
  }

  async advance(step: StepMessage): Promise<StepOutcome> {
    const state = this.definition.states[step.state];
    switch (state.type) {
      case "Stage":
        return this.runStageState(step, state);
      case "ErrorHandler":
        return this.runErrorHandler(step, state);
      case "Succeed":
        return this.succeed(step);
      case "Fail":
        return this.fail(step);
    }
  }

  private tag(step: StepMessage): string {
    return `[workflow] ${step.executionId} ${step.state}#${step.attempt}`;
  }

  private timedOut(ctx: ExecutionContext): boolean {
    const started = Date.parse(ctx.startedAt);
    return this.now().getTime() - started > this.definition.timeoutSeconds * 1000;
  }

  private async scheduleNext(
    step: StepMessage,
    next: StateName,
    context: ExecutionContext,
    attempt = 0,
    delayMs = 0
  ): Promise<StepOutcome> {
    const accepted = await this.deps.scheduler.schedule(
      { executionId: step.executionId, state: next, attempt, context },
      { delayMs }
    );
    if (!accepted) {
      wLog(`${this.tag(step)} next step ${next}#${attempt} already scheduled`);
      return { kind: "duplicate" };
    }
    return { kind: "scheduled", next, attempt, delayMs };
  }

  private async runStageState(step: StepMessage, state: StageState): Promise<StepOutcome> {
    const ctx = step.context;
    if (this.timedOut(ctx)) {
      const timeout = new ExecutionTimeoutError(
        `Execution ${step.executionId} exceeded ${this.definition.timeoutSeconds}s before ${step.state}`
      );
      eLog(`${this.tag(step)} ${timeout.message}`);
      return this.toCatch(step, state, toErrorEnvelope(timeout, state.stage));
    }

    const results: ExecutionResults = { ...ctx.results };
    try {
      await invokeInto(this.deps.stages, state.stage, state.selectInput(ctx), results);
    } catch (err) {
      const envelope = toErrorEnvelope(err, state.stage);
      const rule = state.retry.find((r) => matchesError(r.errorEquals, envelope.errorType));
      if (rule && step.attempt < rule.maxAttempts) {
        const delayMs = retryDelayMs(rule, step.attempt);
        wLog(`${this.tag(step)} ${envelope.errorType}: ${envelope.message}; retrying in ${delayMs}ms`);
        return this.scheduleNext(step, step.state, ctx, step.attempt + 1, delayMs);
      }
      return this.toCatch(step, state, envelope);
    }

    nLog(`${this.tag(step)} succeeded -> ${state.next}`);
    return this.scheduleNext(step, state.next, { ...ctx, results });
  }

  private async toCatch(step: StepMessage, state: StageState, envelope: ErrorEnvelope): Promise<StepOutcome> {
    const rule = state.catch.find((r) => matchesError(r.errorEquals, envelope.errorType));
    const next: StateName = rule ? rule.next : "FailExecution";
    eLog(`${this.tag(step)} caught ${envelope.errorType} (${envelope.kind}) -> ${next}`);
    return this.scheduleNext(step, next, { ...step.context, error: envelope });
  }

  private async runErrorHandler(step: StepMessage, state: ErrorHandlerState): Promise<StepOutcome> {
    const ctx = step.context;
    const envelope: ErrorEnvelope = ctx.error ?? {
      kind: "permanent",
      errorType: "UnknownError",
      message: "Unknown error",
      stage: state.stage,
    };

    try {
      const res = await this.deps.errorHandler({
        job_id: ctx.input.job_id,
        stage: state.stage,
        execution_id: ctx.input.execution_id,
        error: envelope,
      });
      if (res.statusCode === 400) {
        eLog(`${this.tag(step)} error handler rejected its payload: ${res.error}`);
      }
    } catch (err) {
      // the failure path continues regardless
      eLog(`${this.tag(step)} error handler raised: ${errorMessage(err)}`);
    }
    return this.scheduleNext(step, state.next, ctx);
  }

  private async succeed(step: StepMessage): Promise<StepOutcome> {
    const { input } = step.context;
    try {
      await this.deps.notifier.notify({
        type: "execution.succeeded",
        job_id: input.job_id,
        execution_id: input.execution_id,
        status: "completed",
        timestamp: this.now().toISOString(),
      });
    } catch (err) {
      eLog(`${this.tag(step)} success notification failed: ${errorMessage(err)}`);
    }
    nLog(`${this.tag(step)} execution SUCCEEDED for job ${input.job_id}`);
    return { kind: "completed", status: "SUCCEEDED" };
  }

  private async fail(step: StepMessage): Promise<StepOutcome> {
    const { input, error } = step.context;
    try {
      await this.deps.notifier.notify({
        type: "execution.failed",
        job_id: input.job_id,
        execution_id: input.execution_id,
        status: "failed",
        error: error?.message ?? "Unknown error",
        timestamp: this.now().toISOString(),
      });
    } catch (err) {
      eLog(`${this.tag(step)} failure notification failed: ${errorMessage(err)}`);
    }
    eLog(`${this.tag(step)} execution FAILED for job ${input.job_id}: ${error?.message ?? "Unknown error"}`);
    return { kind: "completed", status: "FAILED" };
  }
}
