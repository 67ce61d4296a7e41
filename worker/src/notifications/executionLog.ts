import { EXECUTION_LOG_PREFIX, JobId, StageName } from "@scanflow/shared";

export interface ExecutionLogEntry {
  timestamp: string;
  job_id: JobId;
  execution_id: string;
  stage: StageName | null;
  error_type: string;
  error_kind: string | null;
  message: string;
}

export interface ExecutionLogSink {
  append(executionId: string, entry: ExecutionLogEntry): Promise<void>;
}

/** The list commands a Redis-backed sink needs */
export interface ListWriter {
  lPush(key: string, element: string): Promise<number>;
  lTrim(key: string, start: number, stop: number): Promise<string>;
  expire(key: string, seconds: number): Promise<boolean>;
}

/** Newest-first list per execution at `execlog:<executionId>`, capped and expiring */
export class RedisExecutionLogSink implements ExecutionLogSink {
  constructor(
    private readonly redis: ListWriter,
    private readonly maxEntries: number = 100,
    private readonly ttlSeconds: number = 30 * 24 * 60 * 60
  ) {}

  async append(executionId: string, entry: ExecutionLogEntry): Promise<void> {
    const key = `${EXECUTION_LOG_PREFIX}${executionId}`;
    await this.redis.lPush(key, JSON.stringify(entry));
    await this.redis.lTrim(key, 0, this.maxEntries - 1);
    await this.redis.expire(key, this.ttlSeconds);
  }
}
