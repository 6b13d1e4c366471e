import type { BrokerGateway } from "../broker/broker-gateway";
import { errorMessage, PublishError } from "../errors";
import type { JobStore } from "../store/base-store";
import type { Job } from "../types";
import { JobEvent } from "../utils/job-event";
import { type Logger, silentLogger } from "../utils/logger";

export interface JobExecutorOptions {
  defaultTimeoutMs?: number;
  defaultMaxAttempts?: number;
  clock?: () => Date;
  logger?: Logger;
}

/**
 * Creates job rows and pushes them to the broker.
 *
 * A row only becomes `dispatched` after the broker confirmed the publish.
 * When publishing fails the row keeps its `pending`/`retrying` status and
 * the periodic checker republishes it on a later sweep. Jobs scheduled for
 * a later time are only stored; the checker publishes them once due.
 */
export class JobExecutor extends EventTarget {
  private readonly store: JobStore;
  private readonly broker: BrokerGateway;
  private readonly defaultTimeoutMs: number;
  private readonly defaultMaxAttempts: number;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(store: JobStore, broker: BrokerGateway, options: JobExecutorOptions = {}) {
    super();
    this.store = store;
    this.broker = broker;
    this.defaultTimeoutMs = options.defaultTimeoutMs || 5 * 60 * 1000;
    this.defaultMaxAttempts = options.defaultMaxAttempts || 3;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? silentLogger;
  }

  async dispatch<T>(
    jobType: string,
    payload: T,
    maxAttempts: number = this.defaultMaxAttempts,
    timeoutMs: number = this.defaultTimeoutMs,
    scheduledFor?: Date,
  ): Promise<Job> {
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${maxAttempts}`);
    }
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new RangeError(`timeoutMs must be greater than 0, got ${timeoutMs}`);
    }
    if (scheduledFor !== undefined && Number.isNaN(scheduledFor.getTime())) {
      throw new RangeError("scheduledFor must be a valid date");
    }

    const job = await this.store.create(jobType, payload, maxAttempts, timeoutMs, scheduledFor ?? null);
    if (job.scheduledFor !== null && job.scheduledFor.getTime() > this.clock().getTime()) {
      this.logger.info("Scheduled job", { jobId: job.id, jobType, scheduledFor: job.scheduledFor });
      this.dispatchEvent(new JobEvent("scheduled", { job, status: job.status }));
      return job;
    }
    this.logger.info("Created job", { jobId: job.id, jobType });
    return this.publishAndMark(job);
  }

  /**
   * Republishes an existing `pending` or `retrying` job. Attempt
   * bookkeeping happens in `markDispatched`.
   */
  async redispatch(job: Job): Promise<Job> {
    return this.publishAndMark(job);
  }

  private async publishAndMark(job: Job): Promise<Job> {
    try {
      await this.broker.publish(job);
    } catch (error) {
      if (!(error instanceof PublishError)) {
        throw error;
      }
      this.logger.warn("Publish failed, job left for the periodic checker", {
        jobId: job.id,
        status: job.status,
        error: errorMessage(error),
      });
      this.dispatchEvent(
        new JobEvent("publish-failed", { job, status: job.status, error: errorMessage(error) }),
      );
      return job;
    }

    const dispatched = await this.store.markDispatched(job.id, job.timeoutMs);
    this.logger.info("Job dispatched", {
      jobId: dispatched.id,
      jobType: dispatched.jobType,
      attempt: `${dispatched.attemptCount}/${dispatched.maxAttempts}`,
      ackDeadline: dispatched.ackDeadline,
    });
    this.dispatchEvent(new JobEvent("dispatched", { job: dispatched, status: dispatched.status }));
    return dispatched;
  }
}
