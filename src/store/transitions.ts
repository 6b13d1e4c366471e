import { ConflictError, InvalidStateError } from "../errors";
import { canTransition, isDispatchable, statusForOutcome } from "../job-state";
import type { Job, JobOutcome, JobResult, JobStatus } from "../types";
import { expiredResult } from "./base-store";

// Pure row transitions shared by every JobStore. Each returns a new row.

export function applyDispatch(job: Job, timeoutMs: number, now: Date): Job {
  if (!isDispatchable(job.status)) {
    throw new InvalidStateError(job.id, job.status, "dispatch");
  }
  if (job.attemptCount >= job.maxAttempts) {
    throw new InvalidStateError(job.id, job.status, `dispatch (attempts exhausted: ${job.attemptCount}/${job.maxAttempts})`);
  }
  return {
    ...job,
    status: "dispatched",
    attemptCount: job.attemptCount + 1,
    dispatchedAt: now,
    ackDeadline: new Date(now.getTime() + timeoutMs),
    updatedAt: now,
  };
}

export function applyTerminal(
  job: Job,
  expectedStatus: JobStatus,
  outcome: JobOutcome,
  result: JobResult,
  now: Date,
): Job {
  const target = statusForOutcome(outcome);
  if (!canTransition(expectedStatus, target)) {
    throw new InvalidStateError(job.id, expectedStatus, `mark "${target}"`);
  }
  if (job.status !== expectedStatus) {
    throw new ConflictError(job.id, expectedStatus, job.status);
  }
  return {
    ...job,
    status: target,
    ackDeadline: null,
    result,
    updatedAt: now,
  };
}

export function applyRetryOrExpire(job: Job, now: Date): Job {
  if (job.status !== "dispatched") {
    throw new ConflictError(job.id, "dispatched", job.status);
  }
  if (job.ackDeadline === null || job.ackDeadline.getTime() >= now.getTime()) {
    throw new ConflictError(
      job.id,
      "dispatched",
      job.status,
      `Job ${job.id} is not overdue at ${now.toISOString()}`,
    );
  }
  if (job.attemptCount < job.maxAttempts) {
    return { ...job, status: "retrying", ackDeadline: null, updatedAt: now };
  }
  return {
    ...job,
    status: "expired",
    ackDeadline: null,
    result: expiredResult(job, now),
    updatedAt: now,
  };
}

export function isOverdue(job: Job, now: Date): boolean {
  return (
    job.status === "dispatched" &&
    job.ackDeadline !== null &&
    job.ackDeadline.getTime() < now.getTime()
  );
}

export function isStalled(job: Job, olderThan: Date): boolean {
  const unscheduled = job.status === "retrying" || (job.status === "pending" && job.scheduledFor === null);
  return unscheduled && job.updatedAt.getTime() < olderThan.getTime();
}

export function isReady(job: Job, now: Date): boolean {
  return (
    job.status === "pending" &&
    job.scheduledFor !== null &&
    job.scheduledFor.getTime() <= now.getTime()
  );
}
