import { InMemoryJobStore, setLogLevel } from "@scanflow/shared";
import { FIXED_NOW, MemoryLogSink } from "../../__tests__/support/fakes";
import { extractErrorMessage, handleStageError } from "../errorHandlerStage";

beforeAll(() => {
  setLogLevel("silent");
});

describe("extractErrorMessage", () => {
  it("prefers the structured message", () => {
    expect(extractErrorMessage({ message: "boom", Cause: "ignored" })).toBe("boom");
  });

  it("reads errorMessage out of a JSON Cause", () => {
    expect(extractErrorMessage({ Error: "SegmentationError", Cause: JSON.stringify({ errorMessage: "no mask" }) })).toBe(
      "no mask"
    );
  });

  it("unwraps a Cause encoded twice", () => {
    const cause = JSON.stringify(JSON.stringify({ errorMessage: "deep failure" }));
    expect(extractErrorMessage({ Cause: cause })).toBe("deep failure");
  });

  it("unwraps an errorMessage that is itself an encoded payload", () => {
    const cause = JSON.stringify({ errorMessage: JSON.stringify({ message: "innermost" }) });
    expect(extractErrorMessage({ Cause: cause })).toBe("innermost");
  });

  it("falls back to the raw Cause", () => {
    expect(extractErrorMessage({ Cause: "plain cause text" })).toBe("plain cause text");
    expect(extractErrorMessage({ Cause: '{"foo":1}' })).toBe('{"foo":1}');
  });

  it("falls back to the error name, then a fixed text", () => {
    expect(extractErrorMessage({ message: " ", Error: "States.TaskFailed" })).toBe("States.TaskFailed");
    expect(extractErrorMessage({})).toBe("Unknown error");
  });
});

describe("handleStageError", () => {
  async function setup() {
    const jobStore = new InMemoryJobStore(() => FIXED_NOW);
    const logSink = new MemoryLogSink();
    const { jobId } = await jobStore.createJob({ userId: "u-1", imageKey: "scans/a.nii" });
    await jobStore.updateStatus(jobId, "ENHANCING");
    return { jobStore, logSink, jobId, deps: { jobStore, logSink, now: () => FIXED_NOW } };
  }

  it("marks the job FAILED and logs the execution entry", async () => {
    const { jobStore, logSink, jobId, deps } = await setup();

    const res = await handleStageError(deps, {
      job_id: jobId,
      stage: "llm_enhancement",
      execution_id: "exec-1",
      error: { kind: "permanent", errorType: "LLMEnhancementError", message: "empty report" },
    });

    expect(res).toEqual({
      statusCode: 200,
      job_id: jobId,
      execution_id: "exec-1",
      stage: "llm_enhancement",
      error_message: "empty report",
      status_updated: true,
      logged: true,
    });
    expect(await jobStore.getJob(jobId)).toMatchObject({ status: "FAILED", errorMessage: "empty report" });
    expect(logSink.entries).toEqual([
      {
        executionId: "exec-1",
        entry: {
          timestamp: FIXED_NOW.toISOString(),
          job_id: jobId,
          execution_id: "exec-1",
          stage: "llm_enhancement",
          error_type: "LLMEnhancementError",
          error_kind: "permanent",
          message: "empty report",
        },
      },
    ]);
  });

  it("accepts the legacy Error/Cause pair", async () => {
    const { logSink, jobId, deps } = await setup();

    const res = await handleStageError(deps, {
      job_id: jobId,
      stage: "segmentation",
      execution_id: "exec-2",
      error: { Error: "States.TaskFailed", Cause: JSON.stringify({ errorMessage: "endpoint down" }) },
    });

    expect(res).toMatchObject({ statusCode: 200, error_message: "endpoint down" });
    expect(logSink.entries[0].entry).toMatchObject({ error_type: "States.TaskFailed", error_kind: null });
  });

  it("skips the status write after a transition conflict", async () => {
    const { jobStore, jobId, deps } = await setup();
    const writes = jobStore.writeCount;

    const res = await handleStageError(deps, {
      job_id: jobId,
      stage: "vlm_processing",
      execution_id: "exec-3",
      error: { kind: "validation", errorType: "StatusTransitionError", message: "Job moved on" },
    });

    expect(res).toMatchObject({ statusCode: 200, status_updated: false, logged: true });
    expect(jobStore.writeCount).toBe(writes);
    expect((await jobStore.getJob(jobId))?.status).toBe("ENHANCING");
  });

  it("still reports success when the log sink fails", async () => {
    const { jobStore, logSink, jobId, deps } = await setup();
    logSink.failWith = new Error("redis down");

    const res = await handleStageError(deps, {
      job_id: jobId,
      stage: "results_storage",
      execution_id: "exec-4",
      error: { message: "disk full" },
    });

    expect(res).toMatchObject({ statusCode: 200, status_updated: true, logged: false });
    expect((await jobStore.getJob(jobId))?.status).toBe("FAILED");
  });

  it("rejects a payload without the routing fields", async () => {
    const { deps } = await setup();

    const res = await handleStageError(deps, { job_id: "job-1", stage: "painting" });

    expect(res).toEqual({
      statusCode: 400,
      error: "Missing or invalid required parameter(s): stage, execution_id",
      missing: ["stage", "execution_id"],
    });
  });
});
