import { ConflictError, errorKind, errorMessage } from "../errors";
import type { JobStore } from "../store/base-store";
import type { Job } from "../types";
import { JobEvent } from "../utils/job-event";
import { type Logger, silentLogger } from "../utils/logger";
import { JobExecutor } from "./job-executor";

export interface SweepReport {
  retried: number;
  expired: number;
  released: number;
  republished: number;
  conflicts: number;
  errors: number;
}

export interface PeriodicCheckerOptions {
  /** Unpublished jobs untouched for this long are republished. */
  stalledAfterMs?: number;
  pageSize?: number;
  clock?: () => Date;
  logger?: Logger;
}

/**
 * One sweep over the store: overdue dispatched jobs are retried or expired,
 * scheduled jobs that came due are published, and jobs whose publish never
 * went through are republished. Each job is
 * handled on its own; one failure never stops the rest of the sweep.
 */
export class PeriodicChecker extends EventTarget {
  private readonly store: JobStore;
  private readonly executor: JobExecutor;
  private readonly stalledAfterMs: number;
  private readonly pageSize?: number;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(store: JobStore, executor: JobExecutor, options: PeriodicCheckerOptions = {}) {
    super();
    this.store = store;
    this.executor = executor;
    this.stalledAfterMs = options.stalledAfterMs ?? 30 * 1000;
    this.pageSize = options.pageSize;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? silentLogger;
  }

  async sweep(now: Date = this.clock()): Promise<SweepReport> {
    const report: SweepReport = {
      retried: 0,
      expired: 0,
      released: 0,
      republished: 0,
      conflicts: 0,
      errors: 0,
    };

    try {
      for await (const job of this.store.findOverdue(now, this.pageSize)) {
        await this.isolate(job, report, () => this.retryOrExpire(job, now, report));
      }
      for await (const job of this.store.findReady(now, this.pageSize)) {
        await this.isolate(job, report, () => this.release(job, report));
      }
      const stalledBefore = new Date(now.getTime() - this.stalledAfterMs);
      for await (const job of this.store.findStalled(stalledBefore, this.pageSize)) {
        await this.isolate(job, report, () => this.republish(job, report));
      }
    } catch (error) {
      // The scan itself failed; the next scheduled sweep starts over.
      this.logger.error("Sweep aborted", { kind: errorKind(error), error: errorMessage(error) });
      report.errors++;
    }

    if (report.retried + report.expired + report.released + report.republished + report.errors > 0) {
      this.logger.info("Sweep finished", { ...report });
    }
    return report;
  }

  private async retryOrExpire(job: Job, now: Date, report: SweepReport): Promise<void> {
    const updated = await this.store.markRetryOrExpire(job.id, now);
    if (updated.status === "expired") {
      report.expired++;
      this.logger.warn("Job expired", {
        jobId: updated.id,
        jobType: updated.jobType,
        attempts: updated.attemptCount,
      });
      this.dispatchEvent(new JobEvent("expired", { job: updated, status: updated.status }));
      return;
    }

    report.retried++;
    this.logger.info("Retrying overdue job", {
      jobId: updated.id,
      attempt: `${updated.attemptCount + 1}/${updated.maxAttempts}`,
    });
    await this.executor.redispatch(updated);
  }

  private async release(job: Job, report: SweepReport): Promise<void> {
    const result = await this.executor.redispatch(job);
    if (result.status === "dispatched") {
      report.released++;
    }
  }

  private async republish(job: Job, report: SweepReport): Promise<void> {
    const result = await this.executor.redispatch(job);
    if (result.status === "dispatched") {
      report.republished++;
    }
  }

  private async isolate(job: Job, report: SweepReport, work: () => Promise<void>): Promise<void> {
    try {
      await work();
    } catch (error) {
      if (error instanceof ConflictError) {
        report.conflicts++;
        this.logger.debug("Lost race, skipping job", { jobId: job.id, status: error.actual });
        return;
      }
      report.errors++;
      this.logger.error("Error processing job", {
        jobId: job.id,
        kind: errorKind(error),
        error: errorMessage(error),
      });
    }
  }
}
