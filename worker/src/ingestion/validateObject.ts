import { createHash } from "crypto";
import { ImageNotification, MAX_IMAGE_BYTES, PermanentError, SUPPORTED_IMAGE_EXT } from "@scanflow/shared";

export interface ObjectLimits {
  maxBytes: number;
  extensions: readonly string[];
}

export const DEFAULT_OBJECT_LIMITS: ObjectLimits = {
  maxBytes: MAX_IMAGE_BYTES,
  extensions: SUPPORTED_IMAGE_EXT,
};

export function hasSupportedExtension(objectKey: string, extensions: readonly string[]): boolean {
  const lower = objectKey.toLowerCase();
  return extensions.some((ext) => lower.endsWith(ext.toLowerCase()));
}

/** Rejects (permanently) objects that are empty, too large, or of an unsupported type */
export function validateObject(n: ImageNotification, limits: ObjectLimits = DEFAULT_OBJECT_LIMITS): void {
  if (n.objectSize <= 0) {
    throw new PermanentError(`Object ${n.objectKey} is empty (size=${n.objectSize})`, "validation");
  }
  if (n.objectSize > limits.maxBytes) {
    throw new PermanentError(
      `Object ${n.objectKey} is ${n.objectSize} bytes, above the ${limits.maxBytes} byte limit`,
      "validation"
    );
  }
  if (!hasSupportedExtension(n.objectKey, limits.extensions)) {
    throw new PermanentError(
      `Object ${n.objectKey} has an unsupported extension (allowed: ${limits.extensions.join(", ")})`,
      "validation"
    );
  }
}

/** One key per logical upload: sha256 over bucket, key and etag */
export function dedupeKeyFor(n: ImageNotification): string {
  return createHash("sha256").update(`${n.bucketName}\0${n.objectKey}\0${n.etag}`).digest("hex");
}
