import { DataValidationError, wLog } from "@scanflow/shared";
import type { IntegrityReport } from "./contracts";

export interface CombinedStageOutput {
  segmentation_result: Record<string, unknown>;
  vlm_result: Record<string, unknown>;
  llm_result: Record<string, unknown>;
}

function isMissing(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === "string" && value.trim() === "");
}

function checkText(
  value: unknown,
  missingWarning: string,
  invalidError: string,
  report: IntegrityReport
): void {
  if (isMissing(value)) {
    report.warnings.push(missingWarning);
  } else if (typeof value !== "string") {
    report.errors.push(invalidError);
  }
}

/**
 * Missing fields are warnings; fields present with the wrong type are errors.
 */
export function checkIntegrity(input: CombinedStageOutput): IntegrityReport {
  const report: IntegrityReport = { passed: true, warnings: [], errors: [] };

  checkText(
    input.segmentation_result.segmentation_result_key,
    "Missing segmentation result key",
    "Invalid segmentation result key format",
    report
  );
  checkText(
    input.vlm_result.image_description,
    "Missing or empty image description",
    "Invalid image description format",
    report
  );
  checkText(
    input.llm_result.enhanced_report,
    "Missing or empty enhanced report",
    "Invalid enhanced report format",
    report
  );

  const scores = input.llm_result.confidence_scores;
  if (isMissing(scores) || (typeof scores === "object" && scores !== null && Object.keys(scores).length === 0)) {
    report.warnings.push("Missing confidence scores");
  }

  report.passed = report.errors.length === 0;
  return report;
}

/** Throws one DataValidationError listing every hard error; logs warnings */
export function assertIntegrity(jobId: string, input: CombinedStageOutput): IntegrityReport {
  const report = checkIntegrity(input);
  if (!report.passed) {
    throw new DataValidationError(`Data integrity check failed: ${report.errors.join("; ")}`, report.errors);
  }
  if (report.warnings.length > 0) {
    wLog(`[integrity] job ${jobId}: ${report.warnings.join("; ")}`);
  }
  return report;
}
