import { z } from "zod";
import { SegmentationError } from "@scanflow/shared";
import type { SegmentationOutput } from "./contracts";
import { StageDeps, StageDefinition, runStage } from "./stageProcessor";

const segmentPayload = z.object({
  job_id: z.string().min(1),
  execution_id: z.string().min(1),
  bucket_name: z.string().min(1),
  object_key: z.string().min(1),
});

export type SegmentPayload = z.infer<typeof segmentPayload>;

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** yyyyMMdd-HHmmss in UTC */
export function formatKeyTimestamp(d: Date): string {
  return (
    `${d.getUTCFullYear()}${pad(d.getUTCMonth() + 1)}${pad(d.getUTCDate())}-` +
    `${pad(d.getUTCHours())}${pad(d.getUTCMinutes())}${pad(d.getUTCSeconds())}`
  );
}

export function segmentationResultKey(jobId: string, at: Date): string {
  return `segmentation-results/${jobId}/${formatKeyTimestamp(at)}-segmentation.nii.gz`;
}

function contentTypeFor(objectKey: string): string {
  const lower = objectKey.toLowerCase();
  if (lower.endsWith(".dcm")) return "application/dicom";
  if (lower.endsWith(".gz")) return "application/gzip";
  return "application/octet-stream";
}

export const segmentStage: StageDefinition<"segmentation", SegmentPayload> = {
  stage: "segmentation",
  inProgressStatus: "SEGMENTING",
  schema: segmentPayload,

  async run({ payload, deps, invoke, transfer, elapsedSeconds }): Promise<SegmentationOutput> {
    const { job_id, execution_id, bucket_name, object_key } = payload;
    const { storage, capabilities, jobStore, settings } = deps;

    const image = await transfer("segmentation.download", () => storage.getObject(bucket_name, object_key));
    const response = await invoke("segmentation.invoke", () =>
      capabilities.segmentation.segment(image, contentTypeFor(object_key))
    );

    const data = response.segmentation_data;
    const mask = typeof data === "string" && data !== "" ? Buffer.from(data, "base64") : null;
    if (!mask || mask.length === 0) {
      throw new SegmentationError("Segmentation model did not return valid segmentation data");
    }

    const at = settings.now();
    const resultKey = segmentationResultKey(job_id, at);
    await transfer("segmentation.upload", () =>
      storage.putObject(settings.outputBucket, resultKey, mask, {
        contentType: "application/gzip",
        metadata: { job_id, processing_type: "segmentation", timestamp: formatKeyTimestamp(at) },
      })
    );

    const confidence = typeof response.confidence_score === "number" ? response.confidence_score : 0;
    const processingTime = elapsedSeconds();
    await jobStore.upsertResult(job_id, {
      segmentationResultKey: resultKey,
      confidenceScores: { segmentation: { overall: confidence } },
      processingMetrics: {
        segmentation: {
          processing_time_seconds: processingTime,
          invocation_time_seconds: response.invocation_time_seconds ?? 0,
          model_name: response.model_name ?? "unknown",
          mask_bytes: mask.length,
        },
      },
    });

    return {
      statusCode: 200,
      job_id,
      execution_id,
      segmentation_result_key: resultKey,
      confidence_score: confidence,
      processing_time_seconds: processingTime,
    };
  },
};

export function handleSegmentation(deps: StageDeps, payload: unknown) {
  return runStage(segmentStage, deps, payload);
}
