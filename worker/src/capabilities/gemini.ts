import { GoogleGenAI } from "@google/genai";
import { dLog } from "@scanflow/shared";
import type { ReportGenerator, ReportResponse, VisionCapability, VisionResponse } from "./types";

/** Vision-language description of a segmented volume */
export class GeminiVisionClient implements VisionCapability {
  constructor(
    private readonly ai: GoogleGenAI,
    private readonly model: string
  ) {}

  async describe(image: Buffer, prompt: string): Promise<VisionResponse> {
    const started = Date.now();
    const resp = await this.ai.models.generateContent({
      model: this.model,
      contents: [
        { inlineData: { mimeType: "application/octet-stream", data: image.toString("base64") } },
        { text: prompt },
      ],
      config: { temperature: 0 },
    });
    const elapsed = (Date.now() - started) / 1000;
    dLog(`[gemini.vision] ${this.model} answered in ${elapsed.toFixed(2)}s`);

    const text = resp.text?.trim();
    return {
      text_description: text ? text : undefined,
      invocation_time_seconds: elapsed,
      model_name: this.model,
    };
  }
}

/** Report writer for the enhancement stage */
export class GeminiReportGenerator implements ReportGenerator {
  constructor(
    private readonly ai: GoogleGenAI,
    private readonly model: string,
    private readonly temperature: number,
    private readonly maxOutputTokens: number
  ) {}

  async generate(prompt: string): Promise<ReportResponse> {
    const started = Date.now();
    const resp = await this.ai.models.generateContent({
      model: this.model,
      contents: [{ role: "user", parts: [{ text: prompt }] }],
      config: { temperature: this.temperature, maxOutputTokens: this.maxOutputTokens, topP: 0.9 },
    });
    const elapsed = (Date.now() - started) / 1000;
    const usage = resp.usageMetadata;
    dLog(`[gemini.report] ${this.model} answered in ${elapsed.toFixed(2)}s`);

    const text = resp.text?.trim();
    return {
      enhanced_report: text ? text : undefined,
      model_name: this.model,
      input_tokens: usage?.promptTokenCount ?? 0,
      output_tokens: usage?.candidatesTokenCount ?? 0,
      invocation_time_seconds: elapsed,
    };
  }
}
