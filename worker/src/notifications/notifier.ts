import {
  NOTIFY_RETRY_POLICY,
  NotificationEvent,
  RetryPolicy,
  nLog,
  runWithRetry,
} from "@scanflow/shared";

export interface Notifier {
  notify(event: NotificationEvent): Promise<void>;
}

/** The slice of a Redis client a publisher needs */
export interface Publisher {
  publish(channel: string, message: string): Promise<number>;
}

/**
 * Publishes pipeline events as JSON on a Redis channel. Disabled notifiers
 * log and return.
 */
export class RedisNotifier implements Notifier {
  constructor(
    private readonly publisher: Publisher,
    private readonly channel: string,
    private readonly enabled: boolean = true,
    private readonly policy: RetryPolicy = NOTIFY_RETRY_POLICY
  ) {}

  async notify(event: NotificationEvent): Promise<void> {
    if (!this.enabled) {
      nLog(`[notify] disabled, dropping ${event.type} for job ${event.job_id}`);
      return;
    }
    const receivers = await runWithRetry(
      () => this.publisher.publish(this.channel, JSON.stringify(event)),
      this.policy,
      { operation: "notify.publish" }
    );
    nLog(`[notify] ${event.type} for job ${event.job_id} -> ${this.channel} (${receivers} subscribers)`);
  }
}
