import {
  GetObjectCommand,
  PutObjectCommand,
  S3Client,
  type S3ClientConfig,
} from "@aws-sdk/client-s3";
import {
  PermanentError,
  RetryPolicy,
  STORAGE_RETRY_POLICY,
  dLog,
  runWithRetry,
} from "@scanflow/shared";

export interface PutObjectOptions {
  contentType?: string;
  metadata?: Record<string, string>;
}

/** Byte storage for source images and stage artifacts */
export interface ObjectStorage {
  getObject(bucket: string, key: string): Promise<Buffer>;
  putObject(bucket: string, key: string, body: Buffer, opts?: PutObjectOptions): Promise<void>;
}

function sanitizeRegion(input?: string | null): string {
  const raw = (input || "").trim();
  if (!raw) return "us-east-1";
  // "Asia Pacific (Sydney) ap-southeast-2" -> ap-southeast-2
  const m = raw.match(/([a-z]{2}-[a-z0-9-]+-\d)/i);
  if (m && m[1]) return m[1].toLowerCase();
  return raw.toLowerCase();
}

export function createS3Client(region?: string): S3Client {
  const cfg: S3ClientConfig = { region: sanitizeRegion(region) };
  if (process.env.AWS_ACCESS_KEY_ID && process.env.AWS_SECRET_ACCESS_KEY) {
    cfg.credentials = {
      accessKeyId: process.env.AWS_ACCESS_KEY_ID,
      secretAccessKey: process.env.AWS_SECRET_ACCESS_KEY,
    };
  }
  return new S3Client(cfg);
}

export class S3ObjectStorage implements ObjectStorage {
  constructor(
    private readonly client: S3Client,
    private readonly policy: RetryPolicy = STORAGE_RETRY_POLICY
  ) {}

  async getObject(bucket: string, key: string): Promise<Buffer> {
    return runWithRetry(
      async () => {
        const out = await this.client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
        if (!out.Body) {
          throw new PermanentError(`s3://${bucket}/${key} has no body`);
        }
        const bytes = await out.Body.transformToByteArray();
        dLog(`[s3] downloaded s3://${bucket}/${key} (${bytes.byteLength} bytes)`);
        return Buffer.from(bytes);
      },
      this.policy,
      { operation: "s3.getObject" }
    );
  }

  async putObject(bucket: string, key: string, body: Buffer, opts: PutObjectOptions = {}): Promise<void> {
    await runWithRetry(
      () =>
        this.client.send(
          new PutObjectCommand({
            Bucket: bucket,
            Key: key,
            Body: body,
            ContentType: opts.contentType ?? "application/octet-stream",
            Metadata: opts.metadata,
          })
        ),
      this.policy,
      { operation: "s3.putObject" }
    );
    dLog(`[s3] uploaded s3://${bucket}/${key} (${body.length} bytes)`);
  }
}
