import { NotFoundError } from "../errors";
import type { Job, JobOutcome, JobResult, JobStatus } from "../types";
import { generateId } from "../utils/id-generator";
import { DEFAULT_PAGE_SIZE, type JobStore } from "./base-store";
import {
  applyDispatch,
  applyRetryOrExpire,
  applyTerminal,
  isOverdue,
  isReady,
  isStalled,
} from "./transitions";

/**
 * Process-local JobStore used by tests and by the service when no database
 * URL is configured. Rows are cloned on the way in and out, and every
 * read-modify-write completes without yielding to the event loop.
 */
export class InMemoryJobStore implements JobStore {
  private jobs: Map<string, Job> = new Map();
  private readonly clock: () => Date;

  constructor(options: { clock?: () => Date } = {}) {
    this.clock = options.clock ?? (() => new Date());
  }

  async initialize(): Promise<void> {}

  async create<T>(
    jobType: string,
    payload: T,
    maxAttempts: number,
    timeoutMs: number,
    scheduledFor: Date | null = null,
  ): Promise<Job<T>> {
    const now = this.clock();
    const job: Job<T> = {
      id: generateId(),
      jobType,
      payload,
      status: "pending",
      attemptCount: 0,
      maxAttempts,
      timeoutMs,
      scheduledFor,
      dispatchedAt: null,
      ackDeadline: null,
      result: null,
      createdAt: now,
      updatedAt: now,
    };
    this.jobs.set(job.id, structuredClone(job));
    return job;
  }

  async get(jobId: string): Promise<Job | null> {
    const job = this.jobs.get(jobId);
    return job ? structuredClone(job) : null;
  }

  async markDispatched(jobId: string, timeoutMs: number): Promise<Job> {
    return this.transition(jobId, (job) => applyDispatch(job, timeoutMs, this.clock()));
  }

  async markTerminal(
    jobId: string,
    outcome: JobOutcome,
    result: JobResult,
    expectedStatus: JobStatus = "dispatched",
  ): Promise<Job> {
    return this.transition(jobId, (job) =>
      applyTerminal(job, expectedStatus, outcome, result, this.clock()),
    );
  }

  async markRetryOrExpire(jobId: string, now: Date = this.clock()): Promise<Job> {
    return this.transition(jobId, (job) => applyRetryOrExpire(job, now));
  }

  async *findOverdue(now: Date, pageSize: number = DEFAULT_PAGE_SIZE): AsyncIterable<Job> {
    const overdue = Array.from(this.jobs.values())
      .filter((job) => isOverdue(job, now))
      .sort((a, b) => byTimeThenId(a.ackDeadline, b.ackDeadline, a.id, b.id));
    yield* this.page(overdue, pageSize);
  }

  async *findStalled(olderThan: Date, pageSize: number = DEFAULT_PAGE_SIZE): AsyncIterable<Job> {
    const stalled = Array.from(this.jobs.values())
      .filter((job) => isStalled(job, olderThan))
      .sort((a, b) => byTimeThenId(a.updatedAt, b.updatedAt, a.id, b.id));
    yield* this.page(stalled, pageSize);
  }

  async *findReady(now: Date, pageSize: number = DEFAULT_PAGE_SIZE): AsyncIterable<Job> {
    const ready = Array.from(this.jobs.values())
      .filter((job) => isReady(job, now))
      .sort((a, b) => byTimeThenId(a.scheduledFor, b.scheduledFor, a.id, b.id));
    yield* this.page(ready, pageSize);
  }

  async listRecent(limit: number): Promise<Job[]> {
    return Array.from(this.jobs.values())
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .slice(0, limit)
      .map((job) => structuredClone(job));
  }

  async ping(): Promise<void> {}

  private transition(jobId: string, apply: (job: Job) => Job): Job {
    const current = this.jobs.get(jobId);
    if (!current) {
      throw new NotFoundError(jobId);
    }
    const next = apply(current);
    this.jobs.set(jobId, next);
    return structuredClone(next);
  }

  private async *page(jobs: Job[], pageSize: number): AsyncIterable<Job> {
    for (let offset = 0; offset < jobs.length; offset += pageSize) {
      for (const job of jobs.slice(offset, offset + pageSize)) {
        yield structuredClone(job);
      }
    }
  }
}

function byTimeThenId(a: Date | null, b: Date | null, idA: string, idB: string): number {
  const diff = (a?.getTime() ?? 0) - (b?.getTime() ?? 0);
  if (diff !== 0) return diff;
  return idA < idB ? -1 : idA > idB ? 1 : 0;
}
