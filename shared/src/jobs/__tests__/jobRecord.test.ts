import type { Job } from "../../types";
import { allowedPriorStatuses, canTransition, fromJobRecord, isTerminalStatus, toJobRecord } from "../jobRecord";

describe("canTransition", () => {
  it("only moves forward through the pipeline", () => {
    expect(canTransition("UPLOADED", "SEGMENTING")).toBe(true);
    expect(canTransition("ENHANCING", "STORING")).toBe(true);
    expect(canTransition("CONVERTING", "SEGMENTING")).toBe(false);
    expect(canTransition("STORING", "ENHANCING")).toBe(false);
  });

  it("treats FAILED and COMPLETED as terminal", () => {
    expect(canTransition("COMPLETED", "FAILED")).toBe(true);
    expect(canTransition("FAILED", "FAILED")).toBe(true);
    expect(canTransition("FAILED", "COMPLETED")).toBe(false);
    expect(canTransition("COMPLETED", "COMPLETED")).toBe(true);
    expect(canTransition("COMPLETED", "STORING")).toBe(false);
    expect(canTransition("FAILED", "UPLOADED")).toBe(false);
  });

  it("knows the terminal statuses", () => {
    expect(isTerminalStatus("COMPLETED")).toBe(true);
    expect(isTerminalStatus("FAILED")).toBe(true);
    expect(isTerminalStatus("STORING")).toBe(false);
  });

  it("lists the statuses a write may start from", () => {
    expect(allowedPriorStatuses("CONVERTING")).toEqual(["UPLOADED", "SEGMENTING", "CONVERTING"]);
    expect(allowedPriorStatuses("FAILED")).toHaveLength(7);
  });
});

describe("job record round trip", () => {
  const job: Job = {
    jobId: "8f14e45f-ceea-4e67-9a2b-000000000001",
    userId: "user-1",
    originalImageKey: "uploads/patient.nii",
    status: "FAILED",
    errorMessage: "VLM model did not return a valid image description",
    dedupeKey: "abc",
    createdAt: new Date("2024-03-01T10:00:00.000Z"),
    updatedAt: new Date("2024-03-01T10:05:00.000Z"),
  };

  it("renders status lowercase with ISO timestamps", () => {
    expect(toJobRecord(job)).toEqual({
      job_id: job.jobId,
      user_id: "user-1",
      original_image_key: "uploads/patient.nii",
      status: "failed",
      error_message: "VLM model did not return a valid image description",
      created_at: "2024-03-01T10:00:00.000Z",
      updated_at: "2024-03-01T10:05:00.000Z",
    });
  });

  it("reproduces id, status and error message", () => {
    const back = fromJobRecord(toJobRecord(job));
    expect(back.jobId).toBe(job.jobId);
    expect(back.status).toBe(job.status);
    expect(back.errorMessage).toBe(job.errorMessage);
    expect(back.updatedAt.getTime()).toBe(job.updatedAt.getTime());
  });

  it("rejects unknown statuses", () => {
    expect(() => fromJobRecord({ ...toJobRecord(job), status: "paused" })).toThrow("Unknown job status 'paused'");
  });
});
