import axios from "axios";
import { PermanentError, dLog } from "@scanflow/shared";
import type { SegmentationCapability, SegmentationResponse } from "./types";

/**
 * HTTP client for the segmentation model endpoint. Sends the raw volume and
 * expects JSON back: `{ segmentation_data: <base64>, confidence_score }`.
 */
export class HttpSegmentationClient implements SegmentationCapability {
  constructor(
    private readonly endpointUrl: string,
    private readonly timeoutMs: number
  ) {
    if (!endpointUrl) {
      throw new PermanentError("SEGMENTATION_ENDPOINT_URL is not configured", "validation");
    }
  }

  async segment(image: Buffer, contentType: string): Promise<SegmentationResponse> {
    const started = Date.now();
    const response = await axios.post<unknown>(this.endpointUrl, image, {
      headers: { "Content-Type": contentType, Accept: "application/json" },
      timeout: this.timeoutMs,
      maxBodyLength: Infinity,
      maxContentLength: Infinity,
    });
    const elapsed = (Date.now() - started) / 1000;
    dLog(`[segmentation] endpoint answered in ${elapsed.toFixed(2)}s`);

    const body = response.data;
    if (typeof body !== "object" || body === null || Array.isArray(body)) {
      return { invocation_time_seconds: elapsed };
    }
    return {
      segmentation_data: Reflect.get(body, "segmentation_data"),
      confidence_score: Reflect.get(body, "confidence_score"),
      invocation_time_seconds: elapsed,
      model_name: this.endpointUrl,
    };
  }
}
