import { z } from "zod";
import {
  JobStore,
  JsonObject,
  JsonValue,
  ResultPatch,
  SourceReference,
  eLog,
  errorMessage,
  nLog,
  wLog,
} from "@scanflow/shared";
import type { StorageOutput } from "./contracts";
import { assertIntegrity } from "./integrityChecks";
import { StageDeps, StageDefinition, runStage } from "./stageProcessor";

const storePayload = z
  .object({
    job_id: z.string().min(1),
    execution_id: z.string().min(1),
    segmentation_result: z.record(z.unknown()),
    vlm_result: z.record(z.unknown()),
    llm_result: z.record(z.unknown()),
  })
  .superRefine((payload, ctx) => {
    const required: Array<[string, Record<string, unknown>, string]> = [
      ["segmentation_result", payload.segmentation_result, "segmentation_result_key"],
      ["vlm_result", payload.vlm_result, "image_description"],
      ["llm_result", payload.llm_result, "enhanced_report"],
    ];
    for (const [section, block, key] of required) {
      if (!(key in block)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [section, key], message: `${key} is required` });
      }
    }
  });

export type StorePayload = z.infer<typeof storePayload>;

const jsonValue: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValue), z.record(jsonValue)])
);
const jsonObject: z.ZodType<JsonObject> = z.record(jsonValue);

const sourceReference: z.ZodType<SourceReference> = z.object({
  title: z.string(),
  source: z.string(),
  author: z.string(),
  publicationDate: z.string(),
  url: z.string(),
  relevanceScore: z.number(),
  inferred: z.boolean().optional(),
});

function text(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() !== "" ? value : undefined;
}

/** Fields that survived the integrity check, shaped for the job store */
function toResultPatch(payload: StorePayload, warnings: number, storedAt: string): ResultPatch {
  const patch: ResultPatch = {
    segmentationResultKey: text(payload.segmentation_result.segmentation_result_key),
    imageDescription: text(payload.vlm_result.image_description),
    enhancedReport: text(payload.llm_result.enhanced_report),
    processingMetrics: { storage: { integrity_warnings: warnings, stored_at: storedAt } },
  };

  const scores = jsonObject.safeParse(payload.llm_result.confidence_scores);
  if (scores.success && Object.keys(scores.data).length > 0) {
    patch.confidenceScores = { llm: scores.data };
  }
  const refs = z.array(sourceReference).safeParse(payload.llm_result.source_references);
  if (refs.success) {
    patch.sourceReferences = refs.data;
  }
  return patch;
}

async function lookupUserId(jobStore: JobStore, jobId: string): Promise<string> {
  try {
    const job = await jobStore.getJob(jobId);
    return job ? job.userId : "unknown";
  } catch (err) {
    wLog(`[stage:results_storage] user lookup failed for job ${jobId}: ${errorMessage(err)}`);
    return "unknown";
  }
}

export const storeResultsStage: StageDefinition<"results_storage", StorePayload> = {
  stage: "results_storage",
  inProgressStatus: "STORING",
  schema: storePayload,

  async run({ payload, deps }): Promise<StorageOutput> {
    const { job_id, execution_id } = payload;
    const { jobStore, notifier, settings } = deps;

    const integrity = assertIntegrity(job_id, payload);
    const storedAt = settings.now().toISOString();
    const resultId = await jobStore.upsertResult(job_id, toResultPatch(payload, integrity.warnings.length, storedAt));
    await jobStore.updateStatus(job_id, "COMPLETED");

    const userId = await lookupUserId(jobStore, job_id);
    try {
      await notifier.notify({
        type: "job.completed",
        job_id,
        result_id: resultId,
        user_id: userId,
        status: "completed",
        timestamp: settings.now().toISOString(),
      });
    } catch (err) {
      // results are already stored
      eLog(`[stage:results_storage] completion notification failed for job ${job_id}: ${errorMessage(err)}`);
    }

    nLog(`[stage:results_storage] stored result ${resultId} for job ${job_id}`);
    return {
      statusCode: 200,
      job_id,
      execution_id,
      result_id: resultId,
      integrity_check: integrity,
    };
  },
};

export function handleResultsStorage(deps: StageDeps, payload: unknown) {
  return runStage(storeResultsStage, deps, payload);
}
