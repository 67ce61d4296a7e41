import { setLogLevel } from "@scanflow/shared";
import {
  FIXED_NOW,
  INPUT_BUCKET,
  OUTPUT_BUCKET,
  SCAN_KEY,
  arrival,
  createHarness,
  seedScan,
} from "./support/fakes";

beforeAll(() => {
  setLogLevel("silent");
});

function statusesOf(log: Array<{ jobId: string; status: string }>, jobId: string): string[] {
  return log.filter((entry) => entry.jobId === jobId).map((entry) => entry.status);
}

describe("pipeline end to end", () => {
  it("takes a new scan through every stage to COMPLETED", async () => {
    const h = createHarness();
    await seedScan(h.storage);

    const batch = await h.runtime.ingestion.processBatch([arrival()]);
    expect(batch.successful).toBe(1);
    const jobId = batch.results[0].jobId ?? "";
    expect(batch.results[0].executionId).toBe(`mri-analysis-${jobId}`);

    expect(await h.drain()).toBe(5);

    expect(statusesOf(h.store.statusLog, jobId)).toEqual([
      "UPLOADED",
      "SEGMENTING",
      "CONVERTING",
      "ENHANCING",
      "STORING",
      "COMPLETED",
    ]);
    expect(h.capabilities.calls).toEqual(["segment:application/gzip", "describe", "search:3", "generate"]);

    const maskKey = `segmentation-results/${jobId}/20260314-092653-segmentation.nii.gz`;
    const mask = h.storage.objects.get(`${OUTPUT_BUCKET}/${maskKey}`);
    expect(mask?.body.toString()).toBe("mask-bytes");
    expect(mask?.opts.metadata).toEqual({
      job_id: jobId,
      processing_type: "segmentation",
      timestamp: "20260314-092653",
    });

    const result = await h.store.getResult(jobId);
    expect(result?.segmentationResultKey).toBe(maskKey);
    expect(result?.imageDescription).toBe("Hyperintense region in the left frontal lobe.");
    expect(result?.enhancedReport).toContain("(high confidence)");
    expect(result?.confidenceScores).toEqual({
      segmentation: { overall: 0.93 },
      vlm: { overall: 0.88 },
      llm: { overall: 0.9, findings: 0.9, diagnosis: 0.8 },
    });
    expect(result?.sourceReferences).toEqual([
      {
        title: "Glioma imaging features",
        source: "Test Radiology Notes",
        author: "A. Tester",
        publicationDate: "2021-05-01",
        url: "https://example.org/glioma",
        relevanceScore: 0.82,
      },
    ]);
    expect(result?.processingMetrics.storage).toEqual({
      integrity_warnings: 0,
      stored_at: FIXED_NOW.toISOString(),
    });

    expect(h.notifier.types()).toEqual(["job.completed", "execution.succeeded"]);
    expect(h.notifier.events[0]).toEqual({
      type: "job.completed",
      job_id: jobId,
      result_id: result?.resultId,
      user_id: "system",
      status: "completed",
      timestamp: FIXED_NOW.toISOString(),
    });
    expect(h.logSink.entries).toEqual([]);
  });

  it("fails the job and stops when the description comes back empty", async () => {
    const h = createHarness();
    await seedScan(h.storage);
    h.capabilities.visionReply = async () => ({ text_description: "   ", confidence_score: 0.4 });

    const batch = await h.runtime.ingestion.processBatch([arrival()]);
    const jobId = batch.results[0].jobId ?? "";

    expect(await h.drain()).toBe(4);

    const message = "VLM model did not return a valid image description";
    expect(statusesOf(h.store.statusLog, jobId)).toEqual([
      "UPLOADED",
      "SEGMENTING",
      "CONVERTING",
      "FAILED",
      "FAILED",
    ]);
    const job = await h.store.getJob(jobId);
    expect(job?.status).toBe("FAILED");
    expect(job?.errorMessage).toBe(message);

    const result = await h.store.getResult(jobId);
    expect(result?.segmentationResultKey).toBe(`segmentation-results/${jobId}/20260314-092653-segmentation.nii.gz`);
    expect(result?.imageDescription).toBeNull();
    expect(result?.enhancedReport).toBeNull();
    expect(Object.keys(result?.confidenceScores ?? {})).toEqual(["segmentation"]);

    expect(h.capabilities.calls).toEqual(["segment:application/gzip", "describe"]);
    expect(h.notifier.types()).toEqual(["execution.failed"]);
    expect(h.notifier.events[0]).toMatchObject({ status: "failed", error: message });

    expect(h.logSink.entries).toEqual([
      {
        executionId: `mri-analysis-${jobId}`,
        entry: {
          timestamp: FIXED_NOW.toISOString(),
          job_id: jobId,
          execution_id: `mri-analysis-${jobId}`,
          stage: "vlm_processing",
          error_type: "VLMProcessingError",
          error_kind: "permanent",
          message,
        },
      },
    ]);
  });

  it("runs one execution for a notification delivered twice", async () => {
    const h = createHarness();
    await seedScan(h.storage);

    const batch = await h.runtime.ingestion.processBatch([arrival(), arrival()]);
    expect(batch.successful).toBe(2);
    expect(batch.results[1]).toMatchObject({ duplicate: true, jobId: batch.results[0].jobId });
    expect(h.scheduler.size).toBe(1);

    await h.drain();
    expect(await h.store.listJobs({ limit: 10 })).toHaveLength(1);
    expect(h.notifier.types()).toEqual(["job.completed", "execution.succeeded"]);

    const late = await h.runtime.ingestion.processRecord(arrival());
    expect(late).toMatchObject({ success: true, duplicate: true });
    expect(h.scheduler.size).toBe(0);
  });

  it("creates no job for an empty object", async () => {
    const h = createHarness();

    const batch = await h.runtime.ingestion.processBatch([arrival({ object_size: 0 })]);

    expect(batch).toMatchObject({ successful: 0, failed: 1 });
    expect(batch.results[0]).toEqual({
      success: false,
      objectKey: SCAN_KEY,
      error: `Object ${SCAN_KEY} is empty (size=0)`,
      errorKind: "validation",
      retryable: false,
    });
    expect(await h.store.listJobs({ limit: 10 })).toEqual([]);
    expect(h.scheduler.size).toBe(0);
  });

  it("rejects an unsupported extension without failing the rest of the batch", async () => {
    const h = createHarness();
    await seedScan(h.storage);

    const batch = await h.runtime.ingestion.processBatch([arrival({ object_key: "notes/readme.txt" }), arrival()]);

    expect(batch).toMatchObject({ successful: 1, failed: 1 });
    expect(batch.results[0]).toMatchObject({ success: false, errorKind: "validation", retryable: false });
    expect(batch.results[1]).toMatchObject({ success: true, duplicate: false });
    expect(h.scheduler.size).toBe(1);
  });

  it("treats a new etag for the same key as a new upload", async () => {
    const h = createHarness();
    await seedScan(h.storage);

    const batch = await h.runtime.ingestion.processBatch([arrival(), arrival({ etag: "def456" })]);
    expect(batch.results[1].duplicate).toBe(false);
    expect(batch.results[1].jobId).not.toBe(batch.results[0].jobId);

    await h.drain();
    const jobs = await h.store.listJobs({ status: "COMPLETED", limit: 10 });
    expect(jobs).toHaveLength(2);
  });

  it("recovers inside the stage from transient capability errors", async () => {
    const h = createHarness();
    await seedScan(h.storage);
    const base = h.capabilities.segmentationReply;
    let failures = 2;
    h.capabilities.segmentationReply = async () => {
      if (failures > 0) {
        failures--;
        throw Object.assign(new Error("socket hang up"), { code: "ECONNRESET" });
      }
      return base();
    };

    const batch = await h.runtime.ingestion.processBatch([arrival()]);
    const jobId = batch.results[0].jobId ?? "";
    await h.drain();

    expect((await h.store.getJob(jobId))?.status).toBe("COMPLETED");
    expect(h.capabilities.calls.filter((c) => c.startsWith("segment:"))).toHaveLength(3);
    expect(h.scheduler.delays).toEqual([]);
  });

  it("fails segmentation when the source object is missing", async () => {
    const h = createHarness();

    const batch = await h.runtime.ingestion.processBatch([arrival()]);
    const jobId = batch.results[0].jobId ?? "";
    await h.drain();

    const job = await h.store.getJob(jobId);
    expect(job?.status).toBe("FAILED");
    expect(job?.errorMessage).toBe(`NoSuchKey: ${INPUT_BUCKET}/${SCAN_KEY}`);
    expect(h.capabilities.calls).toEqual([]);
    expect(h.logSink.entries[0].entry).toMatchObject({
      stage: "segmentation",
      error_type: "PermanentError",
      error_kind: "permanent",
    });
  });

  it("keeps going when the execution log cannot be written", async () => {
    const h = createHarness();
    await seedScan(h.storage);
    h.capabilities.reportReply = async () => ({ enhanced_report: "" });
    h.logSink.failWith = new Error("redis down");

    const batch = await h.runtime.ingestion.processBatch([arrival()]);
    const jobId = batch.results[0].jobId ?? "";
    await h.drain();

    const job = await h.store.getJob(jobId);
    expect(job?.status).toBe("FAILED");
    expect(job?.errorMessage).toBe("Language model did not return an enhanced report");
    expect(h.notifier.types()).toEqual(["execution.failed"]);
  });
});
