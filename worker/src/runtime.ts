import type { JobStore } from "@scanflow/shared";
import type { Capabilities } from "./capabilities/types";
import { IngestionConsumer } from "./ingestion/ingestionConsumer";
import type { ObjectLimits } from "./ingestion/validateObject";
import type { ExecutionLogSink } from "./notifications/executionLog";
import type { Notifier } from "./notifications/notifier";
import { handleDescription } from "./stages/describeStage";
import { handleEnhancement } from "./stages/enhanceStage";
import { handleStageError } from "./stages/errorHandlerStage";
import { handleResultsStorage } from "./stages/storeResultsStage";
import { handleSegmentation } from "./stages/segmentStage";
import type { StageDeps, StageSettings } from "./stages/stageProcessor";
import type { ObjectStorage } from "./storage/objectStorage";
import { WorkflowDispatcher } from "./workflow/dispatcher";
import { WorkflowEngine } from "./workflow/engine";
import type { StepScheduler } from "./workflow/scheduler";
import { StageRunner, StageRunnerOptions } from "./workflow/stageRunner";

export interface RuntimeDeps {
  jobStore: JobStore;
  storage: ObjectStorage;
  capabilities: Capabilities;
  notifier: Notifier;
  logSink: ExecutionLogSink;
  scheduler: StepScheduler;
  settings: StageSettings;
  runner: StageRunnerOptions;
  defaultUserId: string;
  limits?: ObjectLimits;
}

export interface Runtime {
  stages: StageRunner;
  engine: WorkflowEngine;
  dispatcher: WorkflowDispatcher;
  ingestion: IngestionConsumer;
}

/** Wire every pipeline component around one set of collaborators */
export function createRuntime(deps: RuntimeDeps): Runtime {
  const stageDeps: StageDeps = {
    jobStore: deps.jobStore,
    storage: deps.storage,
    capabilities: deps.capabilities,
    notifier: deps.notifier,
    settings: deps.settings,
  };

  const stages = new StageRunner(
    {
      segmentation: (payload) => handleSegmentation(stageDeps, payload),
      vlm_processing: (payload) => handleDescription(stageDeps, payload),
      llm_enhancement: (payload) => handleEnhancement(stageDeps, payload),
      results_storage: (payload) => handleResultsStorage(stageDeps, payload),
    },
    deps.runner
  );

  const engine = new WorkflowEngine({
    scheduler: deps.scheduler,
    stages,
    errorHandler: (payload) =>
      handleStageError({ jobStore: deps.jobStore, logSink: deps.logSink, now: deps.settings.now }, payload),
    notifier: deps.notifier,
    now: deps.settings.now,
  });

  const dispatcher = new WorkflowDispatcher(deps.scheduler, undefined, deps.settings.now);
  const ingestion = new IngestionConsumer({
    jobStore: deps.jobStore,
    dispatcher,
    defaultUserId: deps.defaultUserId,
    limits: deps.limits,
  });

  return { stages, engine, dispatcher, ingestion };
}
