/**
 * Narrow contracts for the external services each stage calls.
 * Responses are loosely typed on purpose: stages validate them.
 */

export interface SegmentationResponse {
  segmentation_data?: unknown;
  confidence_score?: unknown;
  invocation_time_seconds?: number;
  model_name?: string;
}

export interface SegmentationCapability {
  segment(image: Buffer, contentType: string): Promise<SegmentationResponse>;
}

export interface VisionResponse {
  text_description?: unknown;
  confidence_score?: unknown;
  invocation_time_seconds?: number;
  model_name?: string;
}

export interface VisionCapability {
  describe(image: Buffer, prompt: string): Promise<VisionResponse>;
}

export interface KnowledgeDocument {
  title: string;
  content: string;
  source: string;
  author: string;
  publicationDate: string;
  url: string;
  relevanceScore: number;
  confidence: number;
}

export interface KnowledgeIndex {
  search(query: string, topK: number): Promise<KnowledgeDocument[]>;
}

export interface ReportResponse {
  enhanced_report?: unknown;
  model_name?: string;
  input_tokens?: number;
  output_tokens?: number;
  invocation_time_seconds?: number;
}

export interface ReportGenerator {
  generate(prompt: string): Promise<ReportResponse>;
}

export interface Capabilities {
  segmentation: SegmentationCapability;
  vision: VisionCapability;
  knowledge: KnowledgeIndex;
  reports: ReportGenerator;
}
