import type { Job, JobOutcome, JobResult, JobStatus } from "../types";

export interface JobStore {
  /** Prepares the backing schema; safe to call more than once. */
  initialize(): Promise<void>;
  /**
   * Creates a `pending` row with `attemptCount = 0`. A `scheduledFor` date
   * holds the row back until the checker finds it ready.
   */
  create<T>(
    jobType: string,
    payload: T,
    maxAttempts: number,
    timeoutMs: number,
    scheduledFor?: Date | null,
  ): Promise<Job<T>>;
  get(jobId: string): Promise<Job | null>;
  /**
   * Moves a `pending`/`retrying` job to `dispatched`, bumping the attempt
   * count and setting `ackDeadline = now + timeoutMs`.
   * Throws NotFoundError or InvalidStateError.
   */
  markDispatched(jobId: string, timeoutMs: number): Promise<Job>;
  /**
   * Compare-and-swap into `acknowledged` or `failed`.
   * Throws ConflictError when the row is no longer in `expectedStatus`
   * (`dispatched` unless given).
   */
  markTerminal(
    jobId: string,
    outcome: JobOutcome,
    result: JobResult,
    expectedStatus?: JobStatus,
  ): Promise<Job>;
  /** Dispatched jobs whose deadline is before `now`, produced page by page. */
  findOverdue(now: Date, pageSize?: number): AsyncIterable<Job>;
  /**
   * Conditional on the job still being `dispatched` past its deadline:
   * `retrying` while attempts remain, `expired` otherwise.
   * Throws ConflictError when the condition no longer holds.
   */
  markRetryOrExpire(jobId: string, now?: Date): Promise<Job>;
  /**
   * Unpublished jobs last touched before `olderThan`: `retrying` rows and
   * `pending` rows without a schedule.
   */
  findStalled(olderThan: Date, pageSize?: number): AsyncIterable<Job>;
  /** `pending` rows whose `scheduledFor` is at or before `now`, oldest first. */
  findReady(now: Date, pageSize?: number): AsyncIterable<Job>;
  listRecent(limit: number): Promise<Job[]>;
  /** Resolves when the store is reachable. */
  ping(): Promise<void>;
}

export const DEFAULT_PAGE_SIZE = 100;

export function expiredResult(job: Job, now: Date): JobResult {
  return {
    outcome: "timeout",
    errorDetail: `No result received after ${job.attemptCount} of ${job.maxAttempts} attempts`,
    data: null,
    executionDurationMs: null,
    reportedAt: now.toISOString(),
  };
}
