import type { JobStatus } from "./types";

/**
 * Base class for every failure raised by a JobStore implementation.
 */
export class JobStoreError extends Error {
  readonly jobId?: string;

  constructor(message: string, options: { jobId?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.jobId = options.jobId;
  }
}

// The referenced job does not exist
export class NotFoundError extends JobStoreError {
  constructor(jobId: string) {
    super(`Job ${jobId} not found`, { jobId });
  }
}

// The requested transition is not allowed from the row's current status
export class InvalidStateError extends JobStoreError {
  readonly status: JobStatus;

  constructor(jobId: string, status: JobStatus, action: string) {
    super(`Cannot ${action} job ${jobId} in status "${status}"`, { jobId });
    this.status = status;
  }
}

/**
 * A conditional update lost the race: the row no longer matches the
 * expected status (or deadline). Callers treat it as a no-op.
 */
export class ConflictError extends JobStoreError {
  readonly expected: JobStatus;
  readonly actual: JobStatus;

  constructor(jobId: string, expected: JobStatus, actual: JobStatus, reason?: string) {
    super(reason ?? `Job ${jobId} is "${actual}", expected "${expected}"`, { jobId });
    this.expected = expected;
    this.actual = actual;
  }
}

// The persistence layer is unreachable or rejected the query
export class StoreError extends JobStoreError {}

export class PublishError extends Error {
  readonly jobId?: string;

  constructor(message: string, options: { jobId?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "PublishError";
    this.jobId = options.jobId;
  }
}

// A broker message could not be decoded into a result event
export class MessageFormatError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "MessageFormatError";
  }
}

// Environment values failed validation at start-up
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorKind(error: unknown): string {
  return error instanceof Error ? error.name : typeof error;
}
