import { z } from "zod";
import { VLMProcessingError } from "@scanflow/shared";
import type { DescriptionOutput } from "./contracts";
import { StageDeps, StageDefinition, runStage } from "./stageProcessor";

const describePayload = z.object({
  job_id: z.string().min(1),
  execution_id: z.string().min(1),
  segmentation_result_key: z.string().min(1),
  /** Defaults to the output bucket segmentation writes to */
  bucket_name: z.string().min(1).optional(),
  prompt: z.string().min(1).optional(),
});

export type DescribePayload = z.infer<typeof describePayload>;

export const describeStage: StageDefinition<"vlm_processing", DescribePayload> = {
  stage: "vlm_processing",
  inProgressStatus: "CONVERTING",
  schema: describePayload,

  async run({ payload, deps, invoke, transfer, elapsedSeconds }): Promise<DescriptionOutput> {
    const { job_id, execution_id, segmentation_result_key } = payload;
    const { storage, capabilities, jobStore, settings } = deps;
    const bucket = payload.bucket_name ?? settings.outputBucket;

    const mask = await transfer("vlm.download", () => storage.getObject(bucket, segmentation_result_key));
    const response = await invoke("vlm.invoke", () =>
      capabilities.vision.describe(mask, payload.prompt ?? settings.vlmPrompt)
    );

    const text = response.text_description;
    if (typeof text !== "string" || text.trim() === "") {
      throw new VLMProcessingError("VLM model did not return a valid image description");
    }

    const confidence = typeof response.confidence_score === "number" ? response.confidence_score : 0;
    const processingTime = elapsedSeconds();
    await jobStore.upsertResult(job_id, {
      imageDescription: text,
      confidenceScores: { vlm: { overall: confidence } },
      processingMetrics: {
        vlm: {
          processing_time_seconds: processingTime,
          invocation_time_seconds: response.invocation_time_seconds ?? 0,
          model_name: response.model_name ?? "unknown",
        },
      },
    });

    return {
      statusCode: 200,
      job_id,
      execution_id,
      image_description: text,
      confidence_score: confidence,
      processing_time_seconds: processingTime,
    };
  },
};

export function handleDescription(deps: StageDeps, payload: unknown) {
  return runStage(describeStage, deps, payload);
}
