import {
  InMemoryJobStore,
  NotificationEvent,
  PermanentError,
  retryPolicy,
} from "@scanflow/shared";
import type {
  Capabilities,
  KnowledgeDocument,
  ReportResponse,
  SegmentationResponse,
  VisionResponse,
} from "../../capabilities/types";
import type { ExecutionLogEntry, ExecutionLogSink } from "../../notifications/executionLog";
import type { Notifier } from "../../notifications/notifier";
import { Runtime, createRuntime } from "../../runtime";
import type { StageSettings } from "../../stages/stageProcessor";
import type { ObjectStorage, PutObjectOptions } from "../../storage/objectStorage";
import { InlineStepScheduler } from "../../workflow/scheduler";

export const INPUT_BUCKET = "incoming-test";
export const OUTPUT_BUCKET = "processed-test";
export const SCAN_KEY = "scans/brain-001.nii.gz";
export const FIXED_NOW = new Date("2026-03-14T09:26:53.000Z");

export const noSleep = async (_ms: number): Promise<void> => {};

export class MemoryObjectStorage implements ObjectStorage {
  readonly objects = new Map<string, { body: Buffer; opts: PutObjectOptions }>();

  async getObject(bucket: string, key: string): Promise<Buffer> {
    const found = this.objects.get(`${bucket}/${key}`);
    if (!found) throw new PermanentError(`NoSuchKey: ${bucket}/${key}`);
    return found.body;
  }

  async putObject(bucket: string, key: string, body: Buffer, opts: PutObjectOptions = {}): Promise<void> {
    this.objects.set(`${bucket}/${key}`, { body, opts });
  }
}

export class RecordingNotifier implements Notifier {
  readonly events: NotificationEvent[] = [];

  async notify(event: NotificationEvent): Promise<void> {
    this.events.push(event);
  }

  types(): string[] {
    return this.events.map((e) => e.type);
  }
}

export class MemoryLogSink implements ExecutionLogSink {
  readonly entries: Array<{ executionId: string; entry: ExecutionLogEntry }> = [];
  failWith: Error | null = null;

  async append(executionId: string, entry: ExecutionLogEntry): Promise<void> {
    if (this.failWith) throw this.failWith;
    this.entries.push({ executionId, entry });
  }
}

export const KNOWLEDGE_DOCS: KnowledgeDocument[] = [
  {
    title: "Glioma imaging features",
    content: "Irregular enhancing margins with surrounding edema.",
    source: "Test Radiology Notes",
    author: "A. Tester",
    publicationDate: "2021-05-01",
    url: "https://example.org/glioma",
    relevanceScore: 0.82,
    confidence: 0.9,
  },
  {
    title: "Ventricular anatomy",
    content: "Lateral ventricles are symmetric in healthy adults.",
    source: "Test Anatomy Atlas",
    author: "",
    publicationDate: "",
    url: "",
    relevanceScore: 0.41,
    confidence: 0.8,
  },
];

export const REPORT_TEXT =
  "Key Findings: enhancing lesion in the left frontal lobe (high confidence). " +
  "See Glioma imaging features for the typical presentation.";

/** Capabilities whose answers tests may swap per call */
export class FakeCapabilities implements Capabilities {
  segmentationReply: () => Promise<SegmentationResponse> = async () => ({
    segmentation_data: Buffer.from("mask-bytes").toString("base64"),
    confidence_score: 0.93,
    model_name: "seg-test",
    invocation_time_seconds: 1.5,
  });
  visionReply: () => Promise<VisionResponse> = async () => ({
    text_description: "Hyperintense region in the left frontal lobe.",
    confidence_score: 0.88,
    model_name: "vlm-test",
  });
  reportReply: () => Promise<ReportResponse> = async () => ({
    enhanced_report: REPORT_TEXT,
    model_name: "report-test",
    input_tokens: 120,
    output_tokens: 80,
  });
  docs: KnowledgeDocument[] = KNOWLEDGE_DOCS;

  readonly calls: string[] = [];
  readonly prompts: string[] = [];

  segmentation = {
    segment: async (_image: Buffer, contentType: string) => {
      this.calls.push(`segment:${contentType}`);
      return this.segmentationReply();
    },
  };
  vision = {
    describe: async (_image: Buffer, prompt: string) => {
      this.calls.push("describe");
      this.prompts.push(prompt);
      return this.visionReply();
    },
  };
  knowledge = {
    search: async (query: string, topK: number) => {
      this.calls.push(`search:${topK}`);
      return this.docs.slice(0, topK);
    },
  };
  reports = {
    generate: async (prompt: string) => {
      this.calls.push("generate");
      this.prompts.push(prompt);
      return this.reportReply();
    },
  };
}

export function testSettings(now: () => Date = () => FIXED_NOW): StageSettings {
  return {
    outputBucket: OUTPUT_BUCKET,
    vlmPrompt: "Describe this scan.",
    topK: 3,
    callTimeoutMs: 1000,
    retryPolicy: retryPolicy({ jitter: false, initialDelayMs: 0 }),
    sleep: noSleep,
    now,
  };
}

export interface Harness {
  runtime: Runtime;
  store: InMemoryJobStore;
  storage: MemoryObjectStorage;
  capabilities: FakeCapabilities;
  notifier: RecordingNotifier;
  logSink: MemoryLogSink;
  scheduler: InlineStepScheduler;
  /** Run every queued workflow step */
  drain(): Promise<number>;
}

export function createHarness(now: () => Date = () => FIXED_NOW): Harness {
  const store = new InMemoryJobStore(now);
  const storage = new MemoryObjectStorage();
  const capabilities = new FakeCapabilities();
  const notifier = new RecordingNotifier();
  const logSink = new MemoryLogSink();
  const scheduler = new InlineStepScheduler(noSleep);

  const runtime = createRuntime({
    jobStore: store,
    storage,
    capabilities,
    notifier,
    logSink,
    scheduler,
    settings: testSettings(now),
    runner: { concurrency: 2, maxPending: 10 },
    defaultUserId: "system",
  });

  return {
    runtime,
    store,
    storage,
    capabilities,
    notifier,
    logSink,
    scheduler,
    drain: () => scheduler.drain((step) => runtime.engine.advance(step)),
  };
}

export function arrival(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    bucket_name: INPUT_BUCKET,
    object_key: SCAN_KEY,
    event_name: "ObjectCreated:Put",
    event_time: "2026-03-14T09:20:00Z",
    object_size: 2048,
    etag: "abc123",
    ...overrides,
  };
}

export async function seedScan(storage: MemoryObjectStorage, key: string = SCAN_KEY): Promise<void> {
  await storage.putObject(INPUT_BUCKET, key, Buffer.from("nifti-bytes"));
}
