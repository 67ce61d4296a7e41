import { z } from "zod";
import { LLMEnhancementError } from "@scanflow/shared";
import {
  buildReportPrompt,
  extractConfidenceScores,
  extractSourceReferences,
} from "../capabilities/reportPrompt";
import type { EnhancementOutput } from "./contracts";
import { StageDeps, StageDefinition, runStage } from "./stageProcessor";

const enhancePayload = z.object({
  job_id: z.string().min(1),
  execution_id: z.string().min(1),
  vlm_result: z.object({
    image_description: z.string().min(1),
  }),
});

export type EnhancePayload = z.infer<typeof enhancePayload>;

export const enhanceStage: StageDefinition<"llm_enhancement", EnhancePayload> = {
  stage: "llm_enhancement",
  inProgressStatus: "ENHANCING",
  schema: enhancePayload,

  async run({ payload, deps, invoke, elapsedSeconds }): Promise<EnhancementOutput> {
    const { job_id, execution_id } = payload;
    const description = payload.vlm_result.image_description;
    const { capabilities, jobStore, settings } = deps;

    const docs = await invoke("knowledge.search", () => capabilities.knowledge.search(description, settings.topK));
    const response = await invoke("report.generate", () =>
      capabilities.reports.generate(buildReportPrompt(description, docs))
    );

    const report = response.enhanced_report;
    if (typeof report !== "string" || report.trim() === "") {
      throw new LLMEnhancementError("Language model did not return an enhanced report");
    }

    const scores = extractConfidenceScores(report);
    const references = extractSourceReferences(report, docs);
    const processingTime = elapsedSeconds();

    await jobStore.upsertResult(job_id, {
      enhancedReport: report,
      confidenceScores: { llm: scores },
      sourceReferences: references,
      processingMetrics: {
        llm: {
          processing_time_seconds: processingTime,
          invocation_time_seconds: response.invocation_time_seconds ?? 0,
          model_name: response.model_name ?? "unknown",
          input_tokens: response.input_tokens ?? 0,
          output_tokens: response.output_tokens ?? 0,
          documents_retrieved: docs.length,
        },
      },
    });

    return {
      statusCode: 200,
      job_id,
      execution_id,
      enhanced_report: report,
      confidence_scores: scores,
      source_references: references,
      processing_time_seconds: processingTime,
    };
  },
};

export function handleEnhancement(deps: StageDeps, payload: unknown) {
  return runStage(enhanceStage, deps, payload);
}
