/**
 * Error Classification
 *
 * Maps a failure to one of five kinds that drive retry decisions:
 *   transient      → retry
 *   throttling     → retry with backoff
 *   authentication → fail fast (permission problem)
 *   validation     → fail fast (bad input)
 *   permanent      → fail fast (irrecoverable for this input)
 *
 * Explicit error codes win over HTTP status; unknown failures default to transient.
 */

export type ErrorKind = "transient" | "throttling" | "authentication" | "validation" | "permanent";

export const ERROR_KINDS: readonly ErrorKind[] = [
  "transient",
  "throttling",
  "authentication",
  "validation",
  "permanent",
];

export function isErrorKind(value: unknown): value is ErrorKind {
  return typeof value === "string" && (ERROR_KINDS as readonly string[]).includes(value);
}

const CODE_TABLE: ReadonlyMap<string, ErrorKind> = new Map<string, ErrorKind>([
  // service-side hiccups
  ["ServiceUnavailable", "transient"],
  ["InternalError", "transient"],
  ["InternalServerError", "transient"],
  ["RequestTimeout", "transient"],
  ["ModelError", "transient"],
  ["SlowDown", "transient"],
  // socket level
  ["ECONNRESET", "transient"],
  ["ETIMEDOUT", "transient"],
  ["ECONNREFUSED", "transient"],
  ["ECONNABORTED", "transient"],
  ["EAI_AGAIN", "transient"],
  ["EPIPE", "transient"],
  // postgres: admin shutdown, too many connections, connection failures
  ["57P01", "transient"],
  ["53300", "transient"],
  ["08006", "transient"],
  ["08001", "transient"],
  ["08003", "transient"],

  ["Throttling", "throttling"],
  ["ThrottlingException", "throttling"],
  ["RequestLimitExceeded", "throttling"],
  ["TooManyRequestsException", "throttling"],
  ["ProvisionedThroughputExceededException", "throttling"],
  ["RESOURCE_EXHAUSTED", "throttling"],

  ["AccessDenied", "authentication"],
  ["AccessDeniedException", "authentication"],
  ["UnauthorizedOperation", "authentication"],
  ["InvalidUserID.NotFound", "authentication"],
  ["ExpiredToken", "authentication"],
  ["InvalidAccessKeyId", "authentication"],
  ["SignatureDoesNotMatch", "authentication"],
  ["PERMISSION_DENIED", "authentication"],
  ["UNAUTHENTICATED", "authentication"],

  ["ValidationException", "validation"],
  ["ValidationError", "validation"],
  ["InvalidParameterValue", "validation"],
  ["MalformedInput", "validation"],
  ["InvalidArgument", "validation"],
  ["INVALID_ARGUMENT", "validation"],

  ["NoSuchKey", "permanent"],
  ["NoSuchBucket", "permanent"],
  ["NotFound", "permanent"],
  // postgres data exceptions: bad uuid/number text, out of range, bad datetime
  ["22P02", "validation"],
  ["22003", "validation"],
  ["22007", "validation"],
  ["22008", "validation"],
  ["22023", "validation"],

  // postgres: unique / foreign key violation
  ["23505", "permanent"],
  ["23503", "permanent"],
]);

const PERMANENT_STATUSES: ReadonlySet<number> = new Set([400, 403, 404]);

/**
 * Pure classification over lookup tables.
 */
export function classify(errorCode?: string | null, httpStatus?: number | null): ErrorKind {
  if (errorCode) {
    const byCode = CODE_TABLE.get(errorCode);
    if (byCode) return byCode;
  }
  if (typeof httpStatus === "number" && httpStatus > 0) {
    if (httpStatus >= 500) return "transient";
    if (httpStatus === 429) return "throttling";
    if (PERMANENT_STATUSES.has(httpStatus)) return "permanent";
  }
  return "transient";
}

export type RetryableKind = "transient" | "throttling";

export function isRetryable(kind: ErrorKind): kind is RetryableKind {
  return kind === "transient" || kind === "throttling";
}

function readString(source: object, key: string): string | undefined {
  const value: unknown = Reflect.get(source, key);
  return typeof value === "string" && value !== "" ? value : undefined;
}

function readNumber(source: object, key: string): number | undefined {
  const value: unknown = Reflect.get(source, key);
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

function readObject(source: object, key: string): object | undefined {
  const value: unknown = Reflect.get(source, key);
  return typeof value === "object" && value !== null ? value : undefined;
}

/**
 * Pull a service error code and an HTTP status out of whatever a client threw:
 * AWS SDK v3 (`name`, `Code`, `$metadata.httpStatusCode`), axios (`code`,
 * `response.status`), pg (`code`), Gemini (`status`).
 */
export function extractErrorSignals(err: unknown): { code?: string; status?: number } {
  if (typeof err !== "object" || err === null) return {};

  const code =
    readString(err, "Code") ??
    readString(err, "code") ??
    (err instanceof Error && err.name !== "Error" ? err.name : undefined);

  const metadata = readObject(err, "$metadata");
  const response = readObject(err, "response");
  const status =
    (metadata ? readNumber(metadata, "httpStatusCode") : undefined) ??
    readNumber(err, "statusCode") ??
    readNumber(err, "status") ??
    (response ? readNumber(response, "status") : undefined);

  return { code, status };
}
