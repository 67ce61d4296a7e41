import { PermanentError, StatusTransitionError } from "../errors/pipelineErrors";
import type { JobId, JobStatus } from "../types";
import { canTransition } from "./jobRecord";

/**
 * Throws when `next` may not replace `current`. Shared by every store so the
 * rejection messages match.
 */
export function assertTransition(
  jobId: JobId,
  current: JobStatus | null,
  next: JobStatus,
  expectedStatus?: JobStatus
): void {
  if (current === null) {
    throw new PermanentError(`Job ${jobId} not found`);
  }
  if (expectedStatus !== undefined && current !== expectedStatus) {
    throw new StatusTransitionError(
      `Job ${jobId} is ${current}, expected ${expectedStatus} before moving to ${next}`
    );
  }
  if (!canTransition(current, next)) {
    throw new StatusTransitionError(`Job ${jobId} cannot move from ${current} to ${next}`);
  }
}
