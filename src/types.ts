// Lifecycle states of a tracked job
export type JobStatus =
  | "pending"
  | "dispatched"
  | "acknowledged"
  | "failed"
  | "retrying"
  | "expired";

// Outcome reported by a worker
export type JobOutcome = "success" | "failure";

export interface JobResult {
  outcome: JobOutcome | "timeout";
  errorDetail: string | null;
  data: unknown;
  executionDurationMs: number | null;
  /** ISO-8601 timestamp of the event that produced this result */
  reportedAt: string;
}

export interface Job<T = unknown> {
  id: string;
  jobType: string;
  payload: T;
  status: JobStatus;
  attemptCount: number;
  maxAttempts: number;
  timeoutMs: number;
  /** Earliest time the job may be published; `null` publishes at once */
  scheduledFor: Date | null;
  dispatchedAt: Date | null;
  ackDeadline: Date | null;
  result: JobResult | null;
  createdAt: Date;
  updatedAt: Date;
}

// Inbound result/ack event consumed from the broker
export interface ResultEvent {
  jobId: string;
  outcome: JobOutcome;
  errorDetail?: string;
  emittedAt: Date;
  result?: unknown;
  executionDurationMs?: number;
}

// Envelope published on the work-request channel
export interface DispatchMessage {
  job_id: string;
  job_type: string;
  payload: unknown;
  attempt_count: number;
}

export interface JobRequest<T = unknown> {
  jobType: string;
  payload: T;
  maxAttempts?: number;
  timeoutMs?: number;
  scheduledFor?: Date;
}

/**
 * Strategy computing the next fire time of a trigger. `null` means the
 * trigger has no further fires.
 * Cron-style parsers live outside the engine and only need to implement this.
 */
export interface Trigger {
  nextFireAfter(last: Date): Date | null;
  describe?(): string;
}

export interface PeriodicDefinition<T = unknown> {
  name: string;
  trigger: Trigger;
  createJob: () => JobRequest<T>;
}

export type ResultHandler = (event: ResultEvent) => Promise<void>;
