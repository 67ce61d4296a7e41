import type { JsonObject, SourceReference } from "@scanflow/shared";
import type { KnowledgeDocument } from "./types";

export function formatKnowledgeContext(docs: KnowledgeDocument[]): string {
  if (docs.length === 0) return "No relevant medical knowledge found.";

  return docs
    .map((doc, i) => {
      let header = `[Document ${i + 1}]\nTitle: ${doc.title}\nSource: ${doc.source}`;
      if (doc.author) header += ` by ${doc.author}`;
      if (doc.publicationDate) header += ` (${doc.publicationDate})`;
      return `${header}\nRelevance Score: ${doc.relevanceScore.toFixed(2)}\nContent: ${doc.content}\n`;
    })
    .join("\n\n");
}

export function buildReportPrompt(imageDescription: string, docs: KnowledgeDocument[]): string {
  return `You are a medical AI assistant specialized in analyzing MRI images. Your task is to generate a comprehensive medical report based on the image description provided by a Vision-Language Model and relevant medical knowledge.

## MRI Image Description:
${imageDescription}

## Relevant Medical Knowledge:
${formatKnowledgeContext(docs)}

## Instructions:
Please generate a detailed medical report that includes:

1. Key Findings: Identify and describe the main observations from the MRI image.
2. Clinical Significance: Explain the potential medical implications of these findings.
3. Differential Diagnosis: List possible diagnoses based on the findings, ordered by likelihood.
4. Recommended Follow-up: Suggest appropriate next steps for further evaluation or treatment.
5. Confidence Assessment: For each key finding and diagnosis, provide a confidence level (High, Medium, or Low) and explain your reasoning.
6. References: Cite the relevant medical knowledge sources that informed your analysis.

Your report should be professional, clear, and medically accurate. Use medical terminology appropriately but ensure the report remains understandable. Acknowledge any limitations in the analysis.

## Medical Report:
`;
}

const CONFIDENCE_CUES: Array<[RegExp, number]> = [
  [/high confidence/i, 0.9],
  [/medium confidence/i, 0.7],
  [/low confidence/i, 0.5],
];

/**
 * Overall confidence from the first cue found (high, then medium, then low);
 * 0.8 when the report states none. Diagnosis sits 0.1 below overall.
 */
export function extractConfidenceScores(report: string): JsonObject {
  const cue = CONFIDENCE_CUES.find(([pattern]) => pattern.test(report));
  const overall = cue ? cue[1] : 0.8;
  return {
    overall,
    findings: overall,
    diagnosis: Math.round((overall - 0.1) * 100) / 100,
  };
}

function toReference(doc: KnowledgeDocument, inferred: boolean): SourceReference {
  const ref: SourceReference = {
    title: doc.title,
    source: doc.source,
    author: doc.author,
    publicationDate: doc.publicationDate,
    url: doc.url,
    relevanceScore: doc.relevanceScore,
  };
  if (inferred) ref.inferred = true;
  return ref;
}

/**
 * Documents whose title appears in the report. When none is cited, the top
 * hit is returned flagged `inferred`.
 */
export function extractSourceReferences(report: string, docs: KnowledgeDocument[]): SourceReference[] {
  const seen = new Set<string>();
  const cited: SourceReference[] = [];
  for (const doc of docs) {
    if (!doc.title || seen.has(doc.title) || !report.includes(doc.title)) continue;
    seen.add(doc.title);
    cited.push(toReference(doc, false));
  }
  if (cited.length > 0 || docs.length === 0) return cited;
  return [toReference(docs[0], true)];
}
