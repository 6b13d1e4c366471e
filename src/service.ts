import { Pool } from "pg";
import type { BrokerGateway } from "./broker/broker-gateway";
import { RabbitMQGateway } from "./broker/rabbitmq-gateway";
import { type AppConfig, toPeriodicDefinition } from "./config";
import { JobExecutor } from "./engine/job-executor";
import { PeriodicChecker } from "./engine/periodic-checker";
import { ResultConsumer } from "./engine/result-consumer";
import { Scheduler, type TriggerInfo } from "./engine/scheduler";
import { errorMessage } from "./errors";
import type { HealthSource } from "./http/health";
import type { JobStore } from "./store/base-store";
import { InMemoryJobStore } from "./store/memory-store";
import { PostgreSQLJobStore } from "./store/postgresql-store";
import type { Job } from "./types";
import { createLogger, type Logger } from "./utils/logger";
import { every } from "./utils/triggers";

export const CHECKER_TASK = "check_pending_jobs";

export interface SchedulerServiceDeps {
  store?: JobStore;
  broker?: BrokerGateway;
  logger?: Logger;
  clock?: () => Date;
}

/**
 * Wires the store, broker and engine components together and owns their
 * start-up and shutdown order.
 */
export class SchedulerService implements HealthSource {
  readonly store: JobStore;
  readonly broker: BrokerGateway;
  readonly executor: JobExecutor;
  readonly consumer: ResultConsumer;
  readonly checker: PeriodicChecker;
  readonly scheduler: Scheduler;

  private readonly config: AppConfig;
  private readonly logger: Logger;
  private readonly pool?: Pool;
  private started: boolean = false;

  constructor(config: AppConfig, deps: SchedulerServiceDeps = {}) {
    this.config = config;
    this.logger = deps.logger ?? createLogger("SchedulerService", config.logLevel);

    if (deps.store) {
      this.store = deps.store;
    } else if (config.database.url) {
      this.pool = new Pool({ connectionString: config.database.url });
      this.pool.on("error", (error) => this.logger.error("Idle database client error", { error }));
      this.store = new PostgreSQLJobStore(this.pool, {
        tableName: config.database.tableName,
        logger: this.logger.child("PostgreSQLJobStore"),
        clock: deps.clock,
      });
    } else {
      this.logger.warn("DATABASE_URL not set, jobs are kept in memory only");
      this.store = new InMemoryJobStore({ clock: deps.clock });
    }

    this.broker =
      deps.broker ??
      new RabbitMQGateway({
        url: config.rabbitmq.url,
        exchange: config.rabbitmq.exchange,
        resultsQueue: config.rabbitmq.resultsQueue,
        deadLetterExchange: config.rabbitmq.deadLetterExchange,
        prefetch: config.rabbitmq.prefetch,
        requeueInitialDelayMs: config.rabbitmq.requeueDelayMs,
        logger: this.logger.child("RabbitMQGateway"),
      });

    this.executor = new JobExecutor(this.store, this.broker, {
      defaultTimeoutMs: config.jobs.defaultTimeoutMs,
      defaultMaxAttempts: config.jobs.defaultMaxAttempts,
      clock: deps.clock,
      logger: this.logger.child("JobExecutor"),
    });
    this.consumer = new ResultConsumer(this.store, { logger: this.logger.child("ResultConsumer") });
    this.checker = new PeriodicChecker(this.store, this.executor, {
      stalledAfterMs: config.checker.stalledAfterMs,
      clock: deps.clock,
      logger: this.logger.child("PeriodicChecker"),
    });
    this.scheduler = new Scheduler(this.executor, {
      tickIntervalMs: config.scheduler.tickIntervalMs,
      clock: deps.clock,
      logger: this.logger.child("Scheduler"),
    });
  }

  async start(): Promise<void> {
    if (this.started) return;
    this.logger.info("Starting job scheduler");

    await this.store.initialize();
    this.logger.info("Job store ready");

    await this.broker.connect();
    await this.consumer.start(this.broker);
    this.logger.info("Result consumer started");

    for (const job of this.config.periodicJobs) {
      this.scheduler.addPeriodic(toPeriodicDefinition(job));
    }
    this.scheduler.addTask(CHECKER_TASK, every(this.config.checker.intervalMs), () =>
      this.checker.sweep(),
    );
    this.scheduler.start();

    this.started = true;
    this.logger.info("Job scheduler fully started");
  }

  async stop(): Promise<void> {
    if (!this.started) return;
    this.started = false;
    this.logger.info("Shutting down job scheduler");

    await this.scheduler.stop();
    await this.broker.close();
    if (this.pool) {
      await this.pool.end();
    }
    this.logger.info("Shutdown complete");
  }

  async isLive(): Promise<boolean> {
    return this.brokerConnected() && (await this.storeReachable());
  }

  brokerConnected(): boolean {
    return this.broker.isConnected();
  }

  async storeReachable(): Promise<boolean> {
    try {
      await this.store.ping();
      return true;
    } catch (error) {
      this.logger.warn("Store ping failed", { error: errorMessage(error) });
      return false;
    }
  }

  schedulerRunning(): boolean {
    return this.scheduler.isRunning();
  }

  triggers(): TriggerInfo[] {
    return this.scheduler.describe();
  }

  recentJobs(limit: number): Promise<Job[]> {
    return this.store.listRecent(limit);
  }
}
