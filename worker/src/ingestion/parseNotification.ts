import { z } from "zod";
import { ImageNotification, NotificationParseError } from "@scanflow/shared";

const flatNotification = z.object({
  bucket_name: z.string().min(1),
  object_key: z.string().min(1),
  event_name: z.string().default("ObjectCreated:Put"),
  event_time: z.string().min(1),
  object_size: z.coerce.number().int().nonnegative(),
  etag: z.string().default(""),
  user_id: z.string().min(1).optional(),
});

const s3Record = z.object({
  eventName: z.string().default("ObjectCreated:Put"),
  eventTime: z.string().min(1),
  userIdentity: z.object({ principalId: z.string() }).partial().optional(),
  s3: z.object({
    bucket: z.object({ name: z.string().min(1) }),
    object: z.object({
      key: z.string().min(1),
      size: z.coerce.number().int().nonnegative(),
      eTag: z.string().default(""),
    }),
  }),
});

const s3Event = z.object({ Records: z.array(s3Record).min(1) });

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function decodeJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new NotificationParseError(`Notification is not valid JSON: ${raw.slice(0, 80)}`, err);
  }
}

/** Drops one level of `body` / `Message` wrapping, decoding string bodies */
function unwrap(raw: unknown): unknown {
  const value = typeof raw === "string" ? decodeJson(raw) : raw;
  if (!isRecord(value)) return value;

  for (const key of ["body", "Message"]) {
    const inner = value[key];
    if (inner === undefined) continue;
    return typeof inner === "string" ? decodeJson(inner) : inner;
  }
  return value;
}

/** S3 keys arrive URL-encoded with '+' for spaces */
function decodeS3Key(key: string): string {
  try {
    return decodeURIComponent(key.replace(/\+/g, " "));
  } catch {
    return key;
  }
}

/**
 * Normalize one delivered record into an ImageNotification. Accepts the flat
 * payload, a JSON string, one envelope level, or an S3 event.
 */
export function parseNotification(raw: unknown): ImageNotification {
  const value = unwrap(raw);
  if (!isRecord(value)) {
    throw new NotificationParseError("Notification payload must be a JSON object");
  }

  if ("Records" in value) {
    const event = s3Event.safeParse(value);
    if (!event.success) {
      throw new NotificationParseError(`Malformed storage event: ${event.error.issues[0]?.message ?? "invalid"}`);
    }
    const record = event.data.Records[0];
    return {
      bucketName: record.s3.bucket.name,
      objectKey: decodeS3Key(record.s3.object.key),
      eventName: record.eventName,
      eventTime: record.eventTime,
      objectSize: record.s3.object.size,
      etag: record.s3.object.eTag.replace(/"/g, ""),
    };
  }

  const flat = flatNotification.safeParse(value);
  if (!flat.success) {
    const fields = [...new Set(flat.error.issues.map((i) => i.path.join(".")))];
    throw new NotificationParseError(`Malformed notification, bad field(s): ${fields.join(", ")}`);
  }
  const n = flat.data;
  return {
    bucketName: n.bucket_name,
    objectKey: n.object_key,
    eventName: n.event_name,
    eventTime: n.event_time,
    objectSize: n.object_size,
    etag: n.etag.replace(/"/g, ""),
    ...(n.user_id ? { userId: n.user_id } : {}),
  };
}
