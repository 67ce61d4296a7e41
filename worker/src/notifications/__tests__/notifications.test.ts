import { retryPolicy, setLogLevel } from "@scanflow/shared";
import { ExecutionLogEntry, ListWriter, RedisExecutionLogSink } from "../executionLog";
import { Publisher, RedisNotifier } from "../notifier";

beforeAll(() => {
  setLogLevel("silent");
});

class FakePublisher implements Publisher {
  readonly published: Array<[string, string]> = [];
  failures = 0;

  async publish(channel: string, message: string): Promise<number> {
    if (this.failures > 0) {
      this.failures--;
      throw Object.assign(new Error("connection reset"), { code: "ECONNRESET" });
    }
    this.published.push([channel, message]);
    return 1;
  }
}

class FakeLists implements ListWriter {
  readonly calls: string[] = [];

  async lPush(key: string, element: string): Promise<number> {
    this.calls.push(`lPush ${key} ${element.length > 0 ? "entry" : ""}`);
    return 1;
  }

  async lTrim(key: string, start: number, stop: number): Promise<string> {
    this.calls.push(`lTrim ${key} ${start} ${stop}`);
    return "OK";
  }

  async expire(key: string, seconds: number): Promise<boolean> {
    this.calls.push(`expire ${key} ${seconds}`);
    return true;
  }
}

const event = {
  type: "execution.succeeded" as const,
  job_id: "job-1",
  execution_id: "mri-analysis-job-1",
  status: "completed" as const,
  timestamp: "2026-03-14T09:30:00.000Z",
};

const fastPolicy = retryPolicy({ initialDelayMs: 0, jitter: false });

describe("RedisNotifier", () => {
  it("publishes the event as JSON on its channel", async () => {
    const publisher = new FakePublisher();
    await new RedisNotifier(publisher, "scanflow:test", true, fastPolicy).notify(event);
    expect(publisher.published).toEqual([["scanflow:test", JSON.stringify(event)]]);
  });

  it("retries transient publish failures", async () => {
    const publisher = new FakePublisher();
    publisher.failures = 2;
    await new RedisNotifier(publisher, "scanflow:test", true, fastPolicy).notify(event);
    expect(publisher.published).toHaveLength(1);
  });

  it("does nothing when disabled", async () => {
    const publisher = new FakePublisher();
    await new RedisNotifier(publisher, "scanflow:test", false, fastPolicy).notify(event);
    expect(publisher.published).toEqual([]);
  });
});

describe("RedisExecutionLogSink", () => {
  it("pushes, caps and expires the per-execution list", async () => {
    const lists = new FakeLists();
    const entry: ExecutionLogEntry = {
      timestamp: "2026-03-14T09:30:00.000Z",
      job_id: "job-1",
      execution_id: "mri-analysis-job-1",
      stage: "segmentation",
      error_type: "SegmentationError",
      error_kind: "permanent",
      message: "no mask",
    };

    await new RedisExecutionLogSink(lists, 50, 3600).append("mri-analysis-job-1", entry);

    expect(lists.calls).toEqual([
      "lPush execlog:mri-analysis-job-1 entry",
      "lTrim execlog:mri-analysis-job-1 0 49",
      "expire execlog:mri-analysis-job-1 3600",
    ]);
  });
});
