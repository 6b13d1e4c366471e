import type { BrokerGateway } from "../broker/broker-gateway";
import { ConflictError, NotFoundError } from "../errors";
import type { JobStore } from "../store/base-store";
import type { JobResult, ResultEvent } from "../types";
import { JobEvent } from "../utils/job-event";
import { type Logger, silentLogger } from "../utils/logger";

export type ResultHandling = "applied" | "unknown-job" | "duplicate" | "stale";

/**
 * Applies worker results to the store. Unknown, duplicate and late events
 * are discarded; a `ConflictError` means the periodic checker already moved
 * the job on and its decision stands. Any other error propagates so the
 * broker message is requeued.
 */
export class ResultConsumer extends EventTarget {
  private readonly store: JobStore;
  private readonly logger: Logger;

  constructor(store: JobStore, options: { logger?: Logger } = {}) {
    super();
    this.store = store;
    this.logger = options.logger ?? silentLogger;
  }

  async start(broker: BrokerGateway): Promise<void> {
    await broker.consume(async (event) => {
      await this.handle(event);
    });
  }

  async handle(event: ResultEvent): Promise<ResultHandling> {
    this.logger.debug("Processing job result event", { jobId: event.jobId, outcome: event.outcome });

    const job = await this.store.get(event.jobId);
    if (!job) {
      this.logger.warn("Result for unknown job discarded", { jobId: event.jobId });
      return "unknown-job";
    }
    if (job.status !== "dispatched") {
      this.logger.info("Duplicate or late result discarded", { jobId: job.id, status: job.status });
      return "duplicate";
    }

    const result: JobResult = {
      outcome: event.outcome,
      errorDetail: event.errorDetail ?? (event.outcome === "failure" ? "unknown" : null),
      data: event.result ?? null,
      executionDurationMs: event.executionDurationMs ?? null,
      reportedAt: event.emittedAt.toISOString(),
    };

    try {
      const updated = await this.store.markTerminal(job.id, event.outcome, result, "dispatched");
      if (updated.status === "acknowledged") {
        this.logger.info("Job completed successfully", { jobId: updated.id, attempt: updated.attemptCount });
        this.dispatchEvent(new JobEvent("acknowledged", { job: updated, status: updated.status }));
      } else {
        this.logger.warn("Job failed", { jobId: updated.id, error: result.errorDetail });
        this.dispatchEvent(
          new JobEvent("failed", { job: updated, status: updated.status, error: result.errorDetail ?? undefined }),
        );
      }
      return "applied";
    } catch (error) {
      if (error instanceof ConflictError) {
        this.logger.info("Stale result discarded", { jobId: job.id, status: error.actual });
        return "stale";
      }
      if (error instanceof NotFoundError) {
        this.logger.warn("Result for unknown job discarded", { jobId: event.jobId });
        return "unknown-job";
      }
      throw error;
    }
  }
}
